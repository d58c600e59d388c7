import { type Attribution, AttributionUtils } from '../attribution'
import { silentLogger, type Logger } from '../logging'
import { MultiAttributionSpan } from './attribution-span'
import type { SpanMarker } from './marker'

/**
 * Collapse every lane of a sorted marker list into one ordered list of
 * segments covering `0` to `contentLength - 1`
 *
 * Algorithm:
 * 1. Walk the markers in order, carrying the set of active attributions
 * 2. A start marker after the current segment's start, or an end marker at
 *    or after it, closes the current segment and opens the next
 * 3. Apply the marker: start adds its attribution, end removes it
 * 4. Markers past the content stop the walk; whatever remains of the
 *    content becomes the final segment
 *
 * Example:
 * ```
 * Markers: bold start@0, bold end@4   contentLength: 10
 * Result:  [0-4 {bold}] [5-9 {}]
 * ```
 *
 * @param markers - Markers sorted by SpanMarker.compare
 */
export function collapseMarkers(
  markers: readonly SpanMarker[],
  contentLength: number,
  log: Logger = silentLogger
): MultiAttributionSpan[] {
  log.debug(`collapsing ${markers.length} markers over content length ${contentLength}`)

  if (contentLength <= 0) {
    return []
  }

  const lastOffset = contentLength - 1
  const first = markers[0]

  if (!first || first.offset > lastOffset) {
    return [new MultiAttributionSpan([], 0, lastOffset)]
  }

  const collapsed: MultiAttributionSpan[] = []
  const active: Attribution[] = []
  let currentStart = 0

  for (const marker of markers) {
    if (marker.offset > lastOffset) {
      log.debug(`marker past the end of the content, stopping at ${marker}`)
      break
    }

    const isBoundary = marker.isStart()
      ? marker.offset > currentStart
      : marker.offset >= currentStart

    if (isBoundary) {
      const currentEnd = marker.isEnd() ? marker.offset : marker.offset - 1
      collapsed.push(new MultiAttributionSpan([...active], currentStart, currentEnd))
      currentStart = marker.isStart() ? marker.offset : marker.offset + 1
    }

    if (marker.isStart()) {
      AttributionUtils.add(active, marker.attribution)
    } else {
      AttributionUtils.remove(active, marker.attribution)
    }
  }

  const lastCommitted = collapsed[collapsed.length - 1]
  if (!lastCommitted || lastCommitted.end < lastOffset) {
    collapsed.push(new MultiAttributionSpan([...active], currentStart, lastOffset))
  }

  log.debug(`collapsed into ${collapsed.length} segments`)
  return collapsed
}
