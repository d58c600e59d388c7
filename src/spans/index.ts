/**
 * Attributed spans
 *
 * Marker-based interval engine for attributed content such as rich text.
 *
 * Architecture:
 * - SpanMarker: start/end boundary of one attribution's span
 * - MarkerStore: the sorted marker list every operation reads and writes
 *   (internal to this directory)
 * - AttributedSpans: queries, mutations and splices over the marker list
 * - collapseMarkers: flattens every lane into one list of segments
 *
 * @packageDocumentation
 */

export { AttributedSpans } from './attributed-spans'
export type { AttributedSpansOptions, AttributionSpansQuery } from './attributed-spans'

export { SpanMarker, MarkerUtils } from './marker'
export type { SpanMarkerType } from './marker'

export { AttributionSpan, MultiAttributionSpan, SpanUtils } from './attribution-span'

export { collapseMarkers } from './collapse'
