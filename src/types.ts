/**
 * Error types for attributed spans
 * @module types
 */

import type { Attribution } from './attribution'

// ====================
// Error Types
// ====================

/**
 * Base class for errors a caller can trigger and recover from
 */
export class AttributedSpansError extends Error {
  constructor(message: string, public code: string) {
    super(message)
    this.name = 'AttributedSpansError'
  }
}

export class InvalidRangeError extends AttributedSpansError {
  constructor(public readonly start: number, public readonly end: number) {
    super(
      `Invalid range: expected 0 <= start <= end, got start=${start}, end=${end}`,
      'INVALID_RANGE'
    )
    this.name = 'InvalidRangeError'
  }
}

export class IncompatibleOverlapError extends AttributedSpansError {
  constructor(
    public readonly existingAttribution: Attribution,
    public readonly newAttribution: Attribution,
    public readonly conflictStart: number
  ) {
    super(
      `Tried to insert attribution (${newAttribution}) over a conflicting existing ` +
      `attribution (${existingAttribution}). The overlap began at index ${conflictStart}`,
      'INCOMPATIBLE_OVERLAP'
    )
    this.name = 'IncompatibleOverlapError'
  }
}

export class AttributionNotFoundError extends AttributedSpansError {
  constructor(public readonly attribution: Attribution, public readonly offset: number) {
    super(
      `Tried to expand attribution (${attribution}) at offset ${offset} ` +
      `but the given attribution does not exist at that offset`,
      'ATTRIBUTION_NOT_FOUND'
    )
    this.name = 'AttributionNotFoundError'
  }
}

export class AppendOverlapError extends AttributedSpansError {
  constructor(public readonly index: number, public readonly lastOffset: number) {
    super(
      `Spans can only be appended after the final marker. ` +
      `Final marker offset: ${lastOffset}, requested index: ${index}`,
      'APPEND_OVERLAP'
    )
    this.name = 'AppendOverlapError'
  }
}

/**
 * Corrupted marker list
 *
 * Not an `AttributedSpansError`: this is never the caller's fault and
 * should not be caught alongside recoverable errors.
 */
export class InvariantViolationError extends Error {
  public readonly code = 'INVARIANT_VIOLATION'

  constructor(message: string) {
    super(message)
    this.name = 'InvariantViolationError'
  }
}
