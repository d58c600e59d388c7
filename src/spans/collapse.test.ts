import { describe, it, expect } from 'vitest'
import { collapseMarkers } from './collapse'
import { SpanMarker, MarkerUtils } from './marker'
import { MultiAttributionSpan } from './attribution-span'
import { type Attribution, AttributionPresets } from '../attribution'

const bold = AttributionPresets.BOLD
const italics = AttributionPresets.ITALICS

function markersFor(...ranges: Array<[Attribution, number, number]>): SpanMarker[] {
  return MarkerUtils.sort(
    ranges.flatMap(([attribution, start, end]) => [
      new SpanMarker(attribution, start, 'start'),
      new SpanMarker(attribution, end, 'end')
    ])
  )
}

function segments(result: MultiAttributionSpan[]): Array<[number, number, string[]]> {
  return result.map(span => [span.start, span.end, span.attributions.map(a => a.id)])
}

describe('collapseMarkers', () => {
  it('should return nothing for empty content', () => {
    expect(collapseMarkers(markersFor([bold, 0, 4]), 0)).toEqual([])
    expect(collapseMarkers([], -1)).toEqual([])
  })

  it('should cover empty content with one bare segment', () => {
    expect(segments(collapseMarkers([], 5))).toEqual([[0, 4, []]])
  })

  it('should ignore markers that start past the content', () => {
    expect(segments(collapseMarkers(markersFor([bold, 6, 8]), 5))).toEqual([[0, 4, []]])
  })

  it('should cut a span that runs past the content', () => {
    expect(segments(collapseMarkers(markersFor([bold, 3, 8]), 5))).toEqual([
      [0, 2, []],
      [3, 4, ['bold']]
    ])
  })

  it('should keep the active set when no boundary is committed', () => {
    expect(segments(collapseMarkers(markersFor([bold, 0, 20]), 10))).toEqual([[0, 9, ['bold']]])
  })

  it('should handle a single-unit span', () => {
    expect(segments(collapseMarkers(markersFor([bold, 2, 2]), 4))).toEqual([
      [0, 1, []],
      [2, 2, ['bold']],
      [3, 3, []]
    ])
  })

  it('should split at each boundary of overlapping lanes', () => {
    const result = collapseMarkers(markersFor([bold, 0, 5], [italics, 2, 3]), 6)

    expect(segments(result)).toEqual([
      [0, 1, ['bold']],
      [2, 3, ['bold', 'italics']],
      [4, 5, ['bold']]
    ])
  })

  it('should not share attribution lists between segments', () => {
    const result = collapseMarkers(markersFor([bold, 0, 1], [italics, 2, 3]), 4)

    expect(result).toHaveLength(2)
    expect(result[0]?.has(bold)).toBe(true)
    expect(result[0]?.has(italics)).toBe(false)
    expect(result[1]?.has(italics)).toBe(true)
    expect(result[1]?.equals(new MultiAttributionSpan([italics], 2, 3))).toBe(true)
  })
})
