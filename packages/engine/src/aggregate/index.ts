/**
 * @fileoverview Aggregator barrel exports
 *
 * @module @slant/engine/aggregate
 */

export {
    aggregate,
    deduplicateMatches,
    noisyOr,
    severityFor,
    shortDocumentPenalty,
} from "./aggregator.js";
export type { AggregationInput, AggregationResult } from "./aggregator.js";
