import { describe, it, expect } from 'vitest'
import { AttributionSpan, MultiAttributionSpan, SpanUtils } from './attribution-span'
import { AttributionPresets, NamedAttribution } from '../attribution'

const bold = AttributionPresets.BOLD
const italics = AttributionPresets.ITALICS

describe('AttributionSpan', () => {
  it('should clip to a range', () => {
    const span = new AttributionSpan(bold, 2, 9)

    expect(span.constrain(4, 12).start).toBe(4)
    expect(span.constrain(4, 12).end).toBe(9)
    expect(span.constrain(0, 5).start).toBe(2)
    expect(span.constrain(0, 5).end).toBe(5)
  })

  it('should copy with changes', () => {
    const span = new AttributionSpan(bold, 2, 9)
    const changed = span.copyWith({ attribution: italics, end: 4 })

    expect(changed.attribution).toBe(italics)
    expect(changed.start).toBe(2)
    expect(changed.end).toBe(4)
    expect(span.end).toBe(9)
  })

  it('should compare structurally', () => {
    const span = new AttributionSpan(bold, 2, 9)

    expect(span.equals(new AttributionSpan(new NamedAttribution('bold'), 2, 9))).toBe(true)
    expect(span.equals(new AttributionSpan(bold, 2, 8))).toBe(false)
  })

  it('should describe itself', () => {
    expect(new AttributionSpan(bold, 7, 12).toString()).toBe(
      '[AttributionSpan] - NamedAttribution(bold), 7 -> 12'
    )
  })
})

describe('MultiAttributionSpan', () => {
  it('should copy with changes without sharing the attribution list', () => {
    const attributions = [bold]
    const span = new MultiAttributionSpan(attributions, 0, 4)
    const changed = span.copyWith({ start: 2 })

    attributions.push(italics)

    expect(changed.start).toBe(2)
    expect(changed.end).toBe(4)
    expect(changed.attributions).toEqual([bold])
  })

  it('should compare attributions in any order', () => {
    const a = new MultiAttributionSpan([bold, italics], 0, 4)

    expect(a.equals(new MultiAttributionSpan([italics, bold], 0, 4))).toBe(true)
    expect(a.equals(new MultiAttributionSpan([bold], 0, 4))).toBe(false)
    expect(a.has(italics)).toBe(true)
  })

  it('should describe itself', () => {
    expect(new MultiAttributionSpan([bold, italics], 3, 4).toString()).toBe(
      '[MultiAttributionSpan] - attributions: {NamedAttribution(bold), NamedAttribution(italics)}, start: 3, end: 4'
    )
  })
})

describe('SpanUtils', () => {
  it('should drop equal spans', () => {
    const first = new AttributionSpan(bold, 0, 4)
    const unique = SpanUtils.unique([
      first,
      new AttributionSpan(new NamedAttribution('bold'), 0, 4),
      new AttributionSpan(italics, 0, 4)
    ])

    expect(unique).toHaveLength(2)
    expect(unique[0]).toBe(first)
  })
})
