/**
 * AttributedSpans
 *
 * A set of spans, each with an associated attribution, over a discrete
 * range such as the characters of a string.
 *
 * Think of it as a set of lanes. Each lane holds a series of
 * non-overlapping spans for one attribution:
 * ```
 * ------------------------------------------------------
 * Bold    :  {xxxx}                      {xxxxx}
 * Italics :             {xxxxxxxx}
 * Link    :                              {xxxxx}
 * ------------------------------------------------------
 * ```
 * Two attributions share a lane iff their `id`s match and each can merge
 * with the other. Spans in the same lane cannot overlap; spans in different
 * lanes can.
 *
 * Each span is stored as a start and an end SpanMarker.
 */

import {
  type Attribution,
  type AttributionFilter,
  AttributionUtils
} from '../attribution'
import { config } from '../config'
import { createLogger, type Logger } from '../logging'
import {
  AppendOverlapError,
  AttributionNotFoundError,
  IncompatibleOverlapError,
  InvalidRangeError,
  InvariantViolationError
} from '../types'
import { AttributionSpan, MultiAttributionSpan, SpanUtils } from './attribution-span'
import { collapseMarkers } from './collapse'
import { MarkerStore } from './marker-store'
import { MarkerUtils, SpanMarker, type SpanMarkerType } from './marker'

export interface AttributedSpansOptions {
  /**
   * Initial markers. They are sorted on construction but must already
   * alternate start/end per attribution.
   */
  markers?: Iterable<SpanMarker>

  /** Diagnostics logger (default: scoped console logger at the configured level) */
  logger?: Logger

  /**
   * Validate the marker list after every mutation and throw
   * InvariantViolationError when it is broken (default: from config)
   */
  validateMutations?: boolean
}

export interface AttributionSpansQuery {
  /** Selects which attributions to return spans for */
  attributionFilter: AttributionFilter
  start: number
  end: number
  /**
   * Clip returned spans to `start`-`end` (default: false). Only the
   * returned spans are affected, never the stored markers.
   */
  resizeSpansToFitInRange?: boolean
}

/**
 * AttributedSpans - marker-based interval engine for attributed content
 *
 * @example
 * ```typescript
 * const spans = new AttributedSpans()
 * spans.addAttribution(AttributionPresets.BOLD, 0, 4)
 * spans.addAttribution(AttributionPresets.link('https://example.com'), 3, 7)
 *
 * spans.hasAttributionAt(2, AttributionPresets.BOLD) // true
 * spans.collapseSpans(10)
 * // [0-2 {bold}] [3-4 {bold, link}] [5-7 {link}] [8-9 {}]
 * ```
 */
export class AttributedSpans {
  private readonly store: MarkerStore
  private readonly log: Logger
  private readonly validateMutations: boolean

  constructor(options: AttributedSpansOptions = {}) {
    this.store = new MarkerStore(options.markers)
    this.log = options.logger ?? createLogger('AttributedSpans', { level: config.logLevel })
    this.validateMutations = options.validateMutations ?? config.validateMutations
  }

  /**
   * Snapshot of all markers, in order
   */
  get markers(): readonly SpanMarker[] {
    return [...this.store.all]
  }

  // ====================
  // Queries
  // ====================

  /**
   * Check if `offset` is covered by `attribution`, or by any attribution
   * when none is given
   */
  hasAttributionAt(offset: number, attribution?: Attribution): boolean {
    if (!attribution) {
      return this.getAllAttributionsAt(offset).length > 0
    }
    return this.findSpanCovering(offset, attribution) !== undefined
  }

  /**
   * Get the full span of `attribution` that contains `offset`
   *
   * For example, with bold applied between the bars in "Hello, |world!|",
   * expanding bold at offset 10 returns a span from 7 to 12.
   *
   * The returned span carries the attribution stored on it, which may be a
   * mergeable lane-mate of `attribution`.
   *
   * @throws AttributionNotFoundError if `attribution` is absent at `offset`
   */
  expandAttributionToSpan(attribution: Attribution, offset: number): AttributionSpan {
    const span = this.findSpanCovering(offset, attribution)
    if (!span) {
      throw new AttributionNotFoundError(attribution, offset)
    }

    return new AttributionSpan(span.start.attribution, span.start.offset, span.end.offset)
  }

  /**
   * Get every attribution whose span covers `offset`
   */
  getAllAttributionsAt(offset: number): Attribution[] {
    const allAttributions = AttributionUtils.unique(
      this.store.all.map(marker => marker.attribution)
    )

    // Lane-mates match each other's spans, so report the attribution each
    // covering span actually carries
    const covering: Attribution[] = []
    for (const attribution of allAttributions) {
      const span = this.findSpanCovering(offset, attribution)
      if (span) {
        AttributionUtils.add(covering, span.start.attribution)
      }
    }
    return covering
  }

  /**
   * Check if each of `attributions` covers at least one unit between
   * `start` and `end`, inclusive
   */
  hasAttributionsWithin(attributions: readonly Attribution[], start: number, end: number): boolean {
    const attributionsToFind = AttributionUtils.unique(attributions)
    if (attributionsToFind.length === 0) {
      return false
    }

    for (let i = start; i <= end; i++) {
      for (const attribution of [...attributionsToFind]) {
        if (this.hasAttributionAt(i, attribution)) {
          AttributionUtils.remove(attributionsToFind, attribution)
        }

        if (attributionsToFind.length === 0) {
          return true
        }
      }
    }

    return false
  }

  /**
   * Find every attribution between `start` and `end`, inclusive, that
   * matches any of `attributions`. Two attributions match when their
   * `id`s are equal.
   */
  getMatchingAttributionsWithin(
    attributions: readonly Attribution[],
    start: number,
    end: number
  ): Attribution[] {
    const ids = new Set(attributions.map(attribution => attribution.id))
    const matching: Attribution[] = []

    for (let i = start; i <= end; i++) {
      for (const candidate of this.getAllAttributionsAt(i)) {
        if (ids.has(candidate.id)) {
          AttributionUtils.add(matching, candidate)
        }
      }
    }

    return matching
  }

  /**
   * Get the spans of every attribution selected by `attributionFilter`
   * that at least partially falls between `start` and `end`, inclusive
   *
   * Spans are returned whole, reaching before `start` or after `end`,
   * unless `resizeSpansToFitInRange` is set.
   */
  getAttributionSpansInRange(query: AttributionSpansQuery): AttributionSpan[] {
    const { attributionFilter, start, end, resizeSpansToFitInRange = false } = query
    const spans: AttributionSpan[] = []

    for (let i = start; i <= end; i++) {
      for (const attribution of this.getAllAttributionsAt(i)) {
        if (!attributionFilter(attribution)) {
          continue
        }

        const span = this.expandAttributionToSpan(attribution, i)
        spans.push(resizeSpansToFitInRange ? span.constrain(start, end) : span)
      }
    }

    return SpanUtils.unique(spans)
  }

  // ====================
  // Mutations
  // ====================

  /**
   * Apply `newAttribution` from `start` to `end`, inclusive
   *
   * Spans in the same lane that overlap the range are merged with it into
   * one span carrying `newAttribution`. An invalid range (`start < 0` or
   * `start > end`) is ignored.
   *
   * @throws IncompatibleOverlapError if a non-mergeable attribution with the
   * same id already exists in the range
   */
  addAttribution(newAttribution: Attribution, start: number, end: number): void {
    if (start < 0 || start > end) {
      this.log.debug(`ignoring ${newAttribution} over invalid range ${start} -> ${end}`)
      return
    }

    // Reject conflicts before touching the marker list
    for (const existing of this.getMatchingAttributionsWithin([newAttribution], start, end)) {
      if (newAttribution.canMergeWith(existing) && existing.canMergeWith(newAttribution)) {
        continue
      }

      let conflictStart = start
      for (let i = start; i <= end; i++) {
        if (this.hasAttributionAt(i, existing)) {
          conflictStart = i
          break
        }
      }

      throw new IncompatibleOverlapError(existing, newAttribution, conflictStart)
    }

    this.log.debug(`adding ${newAttribution}, start: ${start} -> end: ${end}`)

    // Lane spans covering either end of the range are absorbed whole, so the
    // new span reaches from the outer start to the outer end
    const head = this.findSpanCovering(start, newAttribution)
    const tail = this.findSpanCovering(end, newAttribution)
    const spanStart = head ? head.start.offset : start
    const spanEnd = tail ? tail.end.offset : end

    const markersToDelete = this.store.all.filter(marker =>
      this.inLaneOf(marker, newAttribution) &&
      marker.offset >= spanStart &&
      marker.offset <= spanEnd
    )
    this.log.debug(`removing ${markersToDelete.length} markers between ${spanStart} and ${spanEnd}`)
    this.store.removeAll(markersToDelete)

    this.log.debug(`inserting markers at: ${spanStart} and ${spanEnd}`)
    this.store.insert(new SpanMarker(newAttribution, spanStart, 'start'))
    this.store.insert(new SpanMarker(newAttribution, spanEnd, 'end'))

    this.afterMutation('addAttribution')
  }

  /**
   * Remove `attribution` from `start` to `end`, inclusive, along with any
   * attribution in its lane
   *
   * @throws InvalidRangeError if `start < 0` or `start > end`
   */
  removeAttribution(attribution: Attribution, start: number, end: number): void {
    this.log.info(`Removing attribution ${attribution} from ${start} to ${end}`)
    if (start < 0 || start > end) {
      throw new InvalidRangeError(start, end)
    }

    if (!this.hasAttributionsWithin([attribution], start, end)) {
      this.log.debug('No such attribution exists in the given span range')
      return
    }

    // Spans that begin before or end after the removal region are cut one
    // unit before and one unit after it first:
    //
    //    Starting spans + removal region:
    //    ---[xxxxx]---[yyyyyy]----
    //          |-remove-|
    //
    //    After the end caps are inserted (temporarily illegal):
    //    ---[xx]|xxx]---[yy|[yyy]----
    //
    //    After every marker inside the region is removed:
    //    ---[xx]--------[yyy]----
    //
    // A cap carries the attribution of the span it cuts, which may be any
    // attribution in the lane.
    const endCaps: SpanMarker[] = []

    const head = this.findSpanCovering(start, attribution)
    if (head && head.start.offset < start) {
      endCaps.push(new SpanMarker(head.start.attribution, start - 1, 'end'))
    }

    const tail = this.findSpanCovering(end, attribution)
    if (tail && tail.end.offset > end) {
      endCaps.push(new SpanMarker(tail.end.attribution, end + 1, 'start'))
    }

    for (const cap of endCaps) {
      this.log.debug(`inserting cap marker: ${cap}`)
      this.store.insert(cap)
    }

    const markersToDelete = this.store.all.filter(marker =>
      this.inLaneOf(marker, attribution) && marker.offset >= start && marker.offset <= end
    )
    this.log.debug(`removing ${markersToDelete.length} markers between ${start} and ${end}`)
    this.store.removeAll(markersToDelete)

    this.afterMutation('removeAttribution')
  }

  /**
   * Remove `attribution` from `start`-`end` if it covers every unit of that
   * range, otherwise apply it to the whole range
   */
  toggleAttribution(attribution: Attribution, start: number, end: number): void {
    this.log.info(`Toggling attribution ${attribution} from ${start} to ${end}`)
    if (this.isContinuousAttribution(attribution, start, end)) {
      this.removeAttribution(attribution, start, end)
    } else {
      this.addAttribution(attribution, start, end)
    }
  }

  // ====================
  // Splicing
  // ====================

  /**
   * Shift every marker forward by `offset`
   */
  pushAttributionsBack(offset: number): void {
    this.store.replaceAll(this.store.all.map(marker => marker.withOffset(marker.offset + offset)))
    this.afterMutation('pushAttributionsBack')
  }

  /**
   * Cut the region from `startOffset` to `startOffset + count`, exclusive,
   * and pull everything after it back by `count`
   */
  contractAttributions(startOffset: number, count: number): void {
    const windowEnd = startOffset + count
    this.log.debug(`removing ${count} units starting at ${startOffset}`)

    const kept = this.store.all.filter(marker => marker.offset < startOffset)

    // A start and an end of the same attribution removed together cancel
    // out. Anything left unmatched must be replaced to keep symmetry.
    const needToStart: Attribution[] = []
    const needToEnd: Attribution[] = []
    for (const marker of this.store.all) {
      if (marker.offset < startOffset || marker.offset >= windowEnd) {
        continue
      }

      if (marker.isStart()) {
        if (!AttributionUtils.remove(needToEnd, marker.attribution)) {
          AttributionUtils.add(needToStart, marker.attribution)
        }
      } else if (!AttributionUtils.remove(needToStart, marker.attribution)) {
        AttributionUtils.add(needToEnd, marker.attribution)
      }
    }

    for (const attribution of needToStart) {
      this.log.debug(`adding back a start marker for ${attribution} at ${startOffset}`)
      kept.push(new SpanMarker(attribution, startOffset, 'start'))
    }

    const endOffset = Math.max(startOffset - 1, 0)
    for (const attribution of needToEnd) {
      this.log.debug(`adding back an end marker for ${attribution} at ${endOffset}`)
      kept.push(new SpanMarker(attribution, endOffset, 'end'))
    }

    for (const marker of this.store.all) {
      if (marker.offset >= windowEnd) {
        kept.push(marker.withOffset(marker.offset - count))
      }
    }

    this.store.replaceAll(kept)
    this.afterMutation('contractAttributions')
  }

  /**
   * Copy the region from `startOffset` to `endOffset`, inclusive, into a new
   * AttributedSpans whose offset 0 corresponds to `startOffset`
   *
   * Spans that cross either edge of the region are cut at that edge.
   *
   * @param endOffset - Defaults to the offset of the last marker
   */
  copyAttributionRegion(startOffset: number, endOffset?: number): AttributedSpans {
    const regionEnd = endOffset ?? this.store.last?.offset ?? 0
    this.log.debug(`copying region, start: ${startOffset}, end: ${regionEnd}`)

    const copied: SpanMarker[] = []

    // Spans still open at `startOffset` get a start marker at 0
    const before = this.store.all.filter(marker => marker.offset < startOffset)
    for (const [attribution, count] of this.tally(before, 'start')) {
      if (count === 1) {
        copied.push(new SpanMarker(attribution, 0, 'start'))
      } else if (count !== 0) {
        throw this.invariantViolation(
          `Found an unbalanced number of start and end markers before offset: ${startOffset}`
        )
      }
    }

    for (const marker of this.store.all) {
      if (startOffset <= marker.offset && marker.offset <= regionEnd) {
        copied.push(marker.withOffset(marker.offset - startOffset))
      }
    }

    // Spans still open past `regionEnd` get an end marker at the region's end
    const after = this.store.all.filter(marker => marker.offset > regionEnd).reverse()
    for (const [attribution, count] of this.tally(after, 'end')) {
      if (count === 1) {
        copied.push(new SpanMarker(attribution, regionEnd - startOffset, 'end'))
      } else if (count !== 0) {
        throw this.invariantViolation(
          `Found an unbalanced number of start and end markers after offset: ${regionEnd}`
        )
      }
    }

    return new AttributedSpans({
      markers: copied,
      logger: this.log,
      validateMutations: this.validateMutations
    })
  }

  /**
   * Append the spans in `other` so that its offset 0 lands on `index`
   *
   * Spans of the same attribution that meet at the seam, one ending at
   * `index - 1` and one starting at `index`, are fused into one span.
   *
   * @throws AppendOverlapError if `index` is not past this instance's
   * last marker
   */
  addAt(other: AttributedSpans, index: number): void {
    const last = this.store.last
    if (last && last.offset >= index) {
      throw new AppendOverlapError(index, last.offset)
    }

    this.log.debug(`pushing other markers by: ${index}`)
    const pushed = other.copy()
    pushed.pushAttributionsBack(index)

    const combined = [...this.store.all, ...pushed.markers]
    this.mergeBackToBackAttributions(combined, index)

    this.store.replaceAll(combined)
    this.afterMutation('addAt')
  }

  /**
   * Create an independent copy with the same markers and settings
   */
  copy(): AttributedSpans {
    return new AttributedSpans({
      markers: this.store.all,
      logger: this.log,
      validateMutations: this.validateMutations
    })
  }

  // ====================
  // Collapsing
  // ====================

  /**
   * Combine every lane into one ordered list of segments, each listing
   * the attributions active on it
   */
  collapseSpans(contentLength: number): MultiAttributionSpan[] {
    return collapseMarkers(this.store.all, contentLength, this.log)
  }

  /**
   * Check if both instances hold the same markers, in any order
   */
  equals(other: AttributedSpans): boolean {
    const theirs = [...other.markers]
    if (theirs.length !== this.store.length) {
      return false
    }

    for (const marker of this.store.all) {
      const index = theirs.findIndex(candidate => candidate.equals(marker))
      if (index < 0) {
        return false
      }
      theirs.splice(index, 1)
    }

    return true
  }

  toString(): string {
    const lines = [`[AttributedSpans] (${Math.round(this.store.length / 2)} spans):`]
    for (const marker of this.store.all) {
      lines.push(` - ${marker}`)
    }
    return lines.join('\n')
  }

  // ====================
  // Internals
  // ====================

  private inLaneOf(marker: SpanMarker, attribution: Attribution): boolean {
    return AttributionUtils.sameLane(marker.attribution, attribution)
  }

  /**
   * Pair the nearest start marker at or before `offset` with the nearest
   * end marker after it, and return the pair if it covers `offset`
   */
  private findSpanCovering(
    offset: number,
    attribution: Attribution
  ): { start: SpanMarker; end: SpanMarker } | undefined {
    const markerBefore = this.getStartingMarkerAtOrBefore(offset, attribution)
    if (!markerBefore) {
      return undefined
    }

    const markerAfter = this.getEndingMarkerAtOrAfter(markerBefore.offset, attribution)
    if (!markerAfter) {
      throw this.invariantViolation(
        `Found an open-ended attribution. It starts with: ${markerBefore}`
      )
    }

    if (offset < markerBefore.offset || offset > markerAfter.offset) {
      return undefined
    }
    return { start: markerBefore, end: markerAfter }
  }

  /**
   * Nearest start marker at or before `offset`, searching from the end
   */
  private getStartingMarkerAtOrBefore(offset: number, attribution: Attribution): SpanMarker | undefined {
    const markers = this.store.all
    for (let i = markers.length - 1; i >= 0; i--) {
      const marker = markers[i]
      if (marker && marker.isStart() && marker.offset <= offset && this.inLaneOf(marker, attribution)) {
        return marker
      }
    }
    return undefined
  }

  /**
   * Nearest end marker at or after `offset`
   */
  private getEndingMarkerAtOrAfter(offset: number, attribution: Attribution): SpanMarker | undefined {
    return this.store.all.find(marker =>
      marker.isEnd() && marker.offset >= offset && this.inLaneOf(marker, attribution)
    )
  }

  /**
   * Nearest marker in the lane of `attribution` with the given type at or
   * before `offset`
   */
  private getNearestMarkerAtOrBefore(
    offset: number,
    attribution: Attribution,
    type: SpanMarkerType
  ): SpanMarker | undefined {
    let markerBefore: SpanMarker | undefined
    for (const marker of this.store.all) {
      if (marker.offset > offset) {
        break
      }
      if (marker.type === type && this.inLaneOf(marker, attribution)) {
        markerBefore = marker
      }
    }
    return markerBefore
  }

  /**
   * Check if `attribution` covers every unit from `start` to `end`,
   * inclusive, without a break
   */
  private isContinuousAttribution(attribution: Attribution, start: number, end: number): boolean {
    const markerBefore = this.getNearestMarkerAtOrBefore(start, attribution, 'start')
    this.log.debug(`marker before: ${markerBefore}`)
    if (!markerBefore) {
      return false
    }

    const indexBefore = this.store.indexOf(markerBefore)
    const nextMarker = this.store.all.slice(indexBefore + 1).find(marker =>
      this.inLaneOf(marker, attribution) && marker.offset >= markerBefore.offset
    )
    this.log.debug(`next marker: ${nextMarker}`)

    if (!nextMarker) {
      throw this.invariantViolation(
        'Inconsistent attributions state. Found a start marker with no matching end.'
      )
    }
    if (nextMarker.isStart()) {
      throw this.invariantViolation(
        'Inconsistent attributions state. Found a start marker following a start marker.'
      )
    }

    return nextMarker.offset >= end
  }

  /**
   * Count unmatched markers per attribution, walking `markers` in the
   * order given. `opening` markers count +1 and their counterparts -1.
   */
  private tally(markers: readonly SpanMarker[], opening: SpanMarkerType): Array<[Attribution, number]> {
    const counts: Array<[Attribution, number]> = []
    for (const marker of markers) {
      let entry = counts.find(([attribution]) => attribution.equals(marker.attribution))
      if (!entry) {
        entry = [marker.attribution, 0]
        counts.push(entry)
      }
      entry[1] += marker.type === opening ? 1 : -1
    }
    return counts
  }

  /**
   * Fuse spans that meet at `mergePoint` in a list made of two marker lists
   * concatenated there. Mutates `markers`.
   */
  private mergeBackToBackAttributions(markers: SpanMarker[], mergePoint: number): void {
    const endsAtMergePoint = markers.filter(marker => marker.isEnd() && marker.offset === mergePoint - 1)
    const startsAtMergePoint = markers.filter(marker => marker.isStart() && marker.offset === mergePoint)

    for (const startMarker of startsAtMergePoint) {
      const endMarker = endsAtMergePoint.find(marker => marker.belongsTo(startMarker.attribution))
      if (!endMarker) {
        continue
      }

      this.log.debug(`combining spans of ${startMarker.attribution} at ${mergePoint}`)
      markers.splice(markers.indexOf(startMarker), 1)
      markers.splice(markers.indexOf(endMarker), 1)
    }
  }

  private afterMutation(operation: string): void {
    if (!this.validateMutations) {
      return
    }

    const error = MarkerUtils.validate(this.store.all)
    if (error) {
      throw this.invariantViolation(`${operation} left an invalid marker list: ${error}`)
    }
  }

  private invariantViolation(message: string): InvariantViolationError {
    this.log.warn(message)
    this.log.warn(this.toString())
    return new InvariantViolationError(message)
  }
}
