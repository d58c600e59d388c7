import { MarkerUtils, type SpanMarker } from './marker'

/**
 * Ordered marker list
 *
 * The list is sorted by {@link SpanMarker.compare} at all times. There is
 * no single-marker delete: markers are only removed in bulk by operations
 * that restore the alternation invariant in the same step. Every change
 * replaces the array, so a list read from `all` is never altered later.
 */
export class MarkerStore {
  private markers: SpanMarker[]

  constructor(markers: Iterable<SpanMarker> = []) {
    this.markers = MarkerUtils.sort(markers)
  }

  /**
   * Sorted, read-only view of every marker
   */
  get all(): readonly SpanMarker[] {
    return this.markers
  }

  get length(): number {
    return this.markers.length
  }

  get first(): SpanMarker | undefined {
    return this.markers[0]
  }

  get last(): SpanMarker | undefined {
    return this.markers[this.markers.length - 1]
  }

  indexOf(marker: SpanMarker): number {
    return this.markers.indexOf(marker)
  }

  /**
   * Insert a marker at its sorted position
   *
   * Precondition: no marker with the same attribution, offset and type
   * is already stored.
   */
  insert(marker: SpanMarker): void {
    const index = this.markers.findIndex(existing => existing.compare(marker) > 0)
    const at = index >= 0 ? index : this.markers.length
    this.markers = [...this.markers.slice(0, at), marker, ...this.markers.slice(at)]
  }

  /**
   * Remove exactly the given marker instances
   */
  removeAll(toRemove: readonly SpanMarker[]): void {
    if (toRemove.length === 0) {
      return
    }
    const doomed = new Set(toRemove)
    this.markers = this.markers.filter(marker => !doomed.has(marker))
  }

  /**
   * Replace the whole list, re-sorting the new markers
   */
  replaceAll(markers: Iterable<SpanMarker>): void {
    this.markers = MarkerUtils.sort(markers)
  }
}
