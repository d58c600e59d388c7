/**
 * Derived span values
 *
 * Neither type is stored: both are computed from the marker list on demand
 * and hold no reference back to it.
 */

import { type Attribution, AttributionUtils } from '../attribution'

/**
 * An attribution span from `start` to `end`, inclusive
 *
 * Example:
 * ```
 * Text: "Hello, |world!|"
 * Bold between the bars:
 *   AttributionSpan(bold, 7, 12)
 * ```
 */
export class AttributionSpan {
  constructor(
    public readonly attribution: Attribution,
    public readonly start: number,
    public readonly end: number
  ) {}

  /**
   * Clip this span so it fits within `start`-`end`
   */
  constrain(start: number, end: number): AttributionSpan {
    return this.copyWith({
      start: Math.max(this.start, start),
      end: Math.min(this.end, end)
    })
  }

  copyWith(changes: Partial<Pick<AttributionSpan, 'attribution' | 'start' | 'end'>>): AttributionSpan {
    return new AttributionSpan(
      changes.attribution ?? this.attribution,
      changes.start ?? this.start,
      changes.end ?? this.end
    )
  }

  equals(other: AttributionSpan): boolean {
    return (
      this.start === other.start &&
      this.end === other.end &&
      this.attribution.equals(other.attribution)
    )
  }

  toString(): string {
    return `[AttributionSpan] - ${this.attribution}, ${this.start} -> ${this.end}`
  }
}

/**
 * A span that carries zero or more attributions
 *
 * Produced by collapsing every lane of an AttributedSpans into one
 * ordered list of segments.
 */
export class MultiAttributionSpan {
  constructor(
    public readonly attributions: readonly Attribution[],
    public readonly start: number,
    public readonly end: number
  ) {}

  copyWith(changes: {
    attributions?: readonly Attribution[]
    start?: number
    end?: number
  }): MultiAttributionSpan {
    return new MultiAttributionSpan(
      [...(changes.attributions ?? this.attributions)],
      changes.start ?? this.start,
      changes.end ?? this.end
    )
  }

  /**
   * Check if `attribution` applies to this segment
   */
  has(attribution: Attribution): boolean {
    return AttributionUtils.includes(this.attributions, attribution)
  }

  equals(other: MultiAttributionSpan): boolean {
    return (
      this.start === other.start &&
      this.end === other.end &&
      AttributionUtils.sameMembers(this.attributions, other.attributions)
    )
  }

  toString(): string {
    return `[MultiAttributionSpan] - attributions: {${this.attributions.join(', ')}}, start: ${this.start}, end: ${this.end}`
  }
}

/**
 * Utilities for working with derived spans
 */
export const SpanUtils = {
  /**
   * Deduplicate spans with `equals()`, keeping first occurrences
   */
  unique(spans: Iterable<AttributionSpan>): AttributionSpan[] {
    const result: AttributionSpan[] = []
    for (const span of spans) {
      if (!result.some(existing => existing.equals(span))) {
        result.push(span)
      }
    }
    return result
  }
}
