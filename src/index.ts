/**
 * Attributed Spans
 * Labeled, possibly-overlapping intervals over discrete content
 *
 * @packageDocumentation
 * @module attributed-spans
 */

// Core exports
export {
  AttributedSpans,
  SpanMarker,
  MarkerUtils,
  AttributionSpan,
  MultiAttributionSpan,
  SpanUtils,
  collapseMarkers,
} from './spans'
export type { AttributedSpansOptions, AttributionSpansQuery, SpanMarkerType } from './spans'

// Attributions
export {
  NamedAttribution,
  LinkAttribution,
  AttributionUtils,
  AttributionPresets,
} from './attribution'
export type { Attribution, AttributionFilter } from './attribution'

// Errors
export {
  AttributedSpansError,
  InvalidRangeError,
  IncompatibleOverlapError,
  AttributionNotFoundError,
  AppendOverlapError,
  InvariantViolationError,
} from './types'

// Diagnostics & configuration
export { createLogger, consoleSink, silentLogger } from './logging'
export type { Logger, LoggerOptions, LogSink, LogMethod } from './logging'
export { config, loadConfig, LOG_LEVELS } from './config'
export type { Config, LogLevel } from './config'

// Version
export const VERSION = '0.1.0'
