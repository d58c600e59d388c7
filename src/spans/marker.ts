/**
 * SpanMarker
 *
 * Every attributed span is stored as two markers: a `start` marker at its
 * first offset and an `end` marker at its last offset (both inclusive).
 * Markers from every attribution live in one list, sorted by the total
 * order defined in {@link SpanMarker.compare}.
 */

import { type Attribution, AttributionUtils } from '../attribution'

/**
 * Marker type - whether this marker opens or closes a span
 */
export type SpanMarkerType = 'start' | 'end'

/**
 * SpanMarker marks the start or end of one attribution's span
 *
 * Example:
 * ```
 * Text:    "Hello world"
 * Bold over "Hello" (offsets 0-4):
 *   SpanMarker(bold, 0, 'start')
 *   SpanMarker(bold, 4, 'end')
 * ```
 */
export class SpanMarker {
  constructor(
    /**
     * The attribution that exists between this marker and its counterpart
     */
    public readonly attribution: Attribution,
    /**
     * Position of this marker within the content
     */
    public readonly offset: number,
    public readonly type: SpanMarkerType
  ) {}

  isStart(): boolean {
    return this.type === 'start'
  }

  isEnd(): boolean {
    return this.type === 'end'
  }

  /**
   * Compare this marker with another for list ordering
   *
   * Ordering rules:
   * 1. Offset, ascending
   * 2. At the same offset, 'start' comes before 'end'
   *
   * Putting starts first means a span that opens and another that closes
   * at the same offset overlap by one unit instead of leaving a gap, so the
   * list can be walked linearly (see collapseMarkers).
   *
   * @returns negative if this < other, 0 if equal, positive if this > other
   */
  compare(other: SpanMarker): number {
    if (this.offset !== other.offset) {
      return this.offset - other.offset
    }

    if (this.type !== other.type) {
      return this.type === 'start' ? -1 : 1
    }

    return 0
  }

  /**
   * Create a copy of this marker at a new offset
   */
  withOffset(offset: number): SpanMarker {
    return new SpanMarker(this.attribution, offset, this.type)
  }

  /**
   * Check if this marker belongs to `attribution` (structural equality)
   */
  belongsTo(attribution: Attribution): boolean {
    return this.attribution.equals(attribution)
  }

  equals(other: SpanMarker): boolean {
    return (
      this.offset === other.offset &&
      this.type === other.type &&
      this.attribution.equals(other.attribution)
    )
  }

  toString(): string {
    return `[SpanMarker] - attribution: ${this.attribution}, offset: ${this.offset}, type: ${this.type}`
  }
}

/**
 * Helper functions for working with markers
 */
export const MarkerUtils = {
  /**
   * Sort markers by the total marker order. The sort is stable, so markers
   * that compare equal keep their relative order.
   */
  sort(markers: Iterable<SpanMarker>): SpanMarker[] {
    return [...markers].sort((a, b) => a.compare(b))
  },

  /**
   * Verify that a marker list is sorted and that every lane's markers
   * alternate start, end, start, end with nothing left open. Each end must
   * carry the same attribution as the start it closes.
   *
   * @returns Error message if invalid, undefined if valid
   */
  validate(markers: readonly SpanMarker[]): string | undefined {
    for (let i = 1; i < markers.length; i++) {
      const prev = markers[i - 1]
      const curr = markers[i]

      if (prev && curr && prev.compare(curr) > 0) {
        return `Markers not properly ordered: ${prev} comes before ${curr}`
      }
    }

    const open: SpanMarker[] = []

    for (const marker of markers) {
      const openIndex = open.findIndex(m => AttributionUtils.sameLane(m.attribution, marker.attribution))

      if (marker.isStart()) {
        if (openIndex >= 0) {
          return `Found a start marker following a start marker: ${marker}`
        }
        open.push(marker)
        continue
      }

      const opener = open[openIndex]
      if (!opener) {
        return `Found an end marker with no matching start: ${marker}`
      }
      if (!opener.belongsTo(marker.attribution)) {
        return `Found an end marker that does not match its start: ${marker}`
      }
      open.splice(openIndex, 1)
    }

    const unclosed = open[0]
    if (unclosed) {
      return `Found an open-ended attribution. It starts with: ${unclosed}`
    }

    return undefined
  }
}
