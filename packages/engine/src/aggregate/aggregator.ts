/**
 * @fileoverview Match Aggregator
 *
 * Turns raw detector matches into per-category scores:
 *
 * 1. group by category
 * 2. merge overlapping matches, keeping the strongest per cluster
 * 3. combine the survivors with a noisy-OR, scaled down for short documents
 * 4. weighted mean over available categories for the overall score
 *
 * Pure functions; the same input always yields the same output.
 *
 * @module @slant/engine/aggregate/aggregator
 */

import { PATTERN_CATEGORIES, type PatternCategory } from "../contracts/PatternCategory.js";
import {
    compareByPosition,
    compareStrings,
    overlapFraction,
    overlapLength,
    type PatternMatch,
} from "../contracts/PatternMatch.js";
import type { CategoryScore, CategoryStatus } from "../contracts/Report.js";
import type { ResolvedEngineConfig, SeverityBand, ShortDocumentPenaltyCurve } from "../engine/config.js";

export interface AggregationInput {
    readonly matches: readonly PatternMatch[];
    readonly sentenceCount: number;

    /** Status per category; missing categories count as ok */
    readonly statuses?: Partial<Record<PatternCategory, CategoryStatus>>;

    readonly config: ResolvedEngineConfig;
}

export interface AggregationResult {
    /** One score per category, canonical order */
    readonly scores: readonly CategoryScore[];
    readonly overallScore: number;

    /** Matches that survived de-duplication, positional order */
    readonly retained: readonly PatternMatch[];
}

/**
 * True when `a` should be kept over `b`: higher confidence, then
 * earlier start, then smaller detector id.
 */
function isStronger(a: PatternMatch, b: PatternMatch): boolean {
    if (a.confidence !== b.confidence) {
        return a.confidence > b.confidence;
    }
    if (a.start !== b.start) {
        return a.start < b.start;
    }
    return compareStrings(a.detectorId, b.detectorId) < 0;
}

function shouldMerge(a: PatternMatch, b: PatternMatch, threshold: number): boolean {
    return overlapLength(a, b) > 0 && overlapFraction(a, b) >= threshold;
}

/**
 * Cluster overlapping matches of one category and keep the strongest of
 * each cluster.
 *
 * Matches are visited in positional order; a match joins the current
 * cluster when it overlaps any member enough, otherwise it opens a new one.
 *
 * @param matches - Matches of a single category
 * @param threshold - Minimum overlap fraction (intersection / shorter length)
 */
export function deduplicateMatches(matches: readonly PatternMatch[], threshold = 0): PatternMatch[] {
    const sorted = [...matches].sort(compareByPosition);
    const clusters: PatternMatch[][] = [];

    for (const match of sorted) {
        const current = clusters[clusters.length - 1];
        if (current && current.some(member => shouldMerge(member, match, threshold))) {
            current.push(match);
        }
        else {
            clusters.push([match]);
        }
    }

    return clusters.map(cluster => cluster.reduce((best, match) => (isStronger(match, best) ? match : best)));
}

/**
 * `1 - ∏(1 - c)`. Empty input scores 0; more evidence never lowers it.
 */
export function noisyOr(confidences: readonly number[]): number {
    const miss = confidences.reduce((product, confidence) => {
        const clamped = Math.min(1, Math.max(0, confidence));
        return product * (1 - clamped);
    }, 1);
    return Math.min(1, Math.max(0, 1 - miss));
}

/**
 * Divisor applied to every confidence of a document with `sentenceCount`
 * sentences. 1 when the document is long enough.
 */
export function shortDocumentPenalty(sentenceCount: number, curve: ShortDocumentPenaltyCurve): number {
    const { minSentences, maxFactor } = curve;
    if (minSentences <= 0 || sentenceCount >= minSentences) {
        return 1;
    }
    const missing = minSentences - Math.max(0, sentenceCount);
    return 1 + (maxFactor - 1) * missing / minSentences;
}

/**
 * Label of the highest band whose minimum the score reaches; "none" for 0.
 */
export function severityFor(score: number, bands: readonly SeverityBand[]): string {
    if (score <= 0) {
        return "none";
    }
    let label = "none";
    for (const band of bands) {
        if (score >= band.min) {
            label = band.label;
        }
    }
    return label;
}

/**
 * Aggregate detector output into category scores and an overall score.
 *
 * Matches for categories whose status is not ok are dropped.
 */
export function aggregate(input: AggregationInput): AggregationResult {
    const { config } = input;
    const penalty = shortDocumentPenalty(input.sentenceCount, config.shortDocumentPenalty);

    const byCategory = new Map<PatternCategory, PatternMatch[]>();
    for (const match of input.matches) {
        const bucket = byCategory.get(match.category) ?? [];
        bucket.push(match);
        byCategory.set(match.category, bucket);
    }

    const scores: CategoryScore[] = [];
    const retained: PatternMatch[] = [];
    let weighted = 0;
    let totalWeight = 0;

    for (const category of PATTERN_CATEGORIES) {
        const status = input.statuses?.[category] ?? "ok";

        if (status !== "ok") {
            scores.push(Object.freeze({
                category,
                score         : 0,
                matchCount    : 0,
                representative: null,
                status,
                severity      : "none",
            }));
            continue;
        }

        const kept = deduplicateMatches(byCategory.get(category) ?? [], config.overlapMergeThreshold);
        const score = noisyOr(kept.map(match => match.confidence / penalty));
        const representative = kept.reduce<PatternMatch | null>(
            (best, match) => (best === null || isStronger(match, best) ? match : best),
            null
        );

        retained.push(...kept);
        scores.push(Object.freeze({
            category,
            score,
            matchCount: kept.length,
            representative,
            status,
            severity  : severityFor(score, config.severityBands),
        }));

        const weight = config.categoryWeights[category];
        weighted += weight * score;
        totalWeight += weight;
    }

    const overallScore = totalWeight > 0 ? Math.min(1, Math.max(0, weighted / totalWeight)) : 0;

    return Object.freeze({
        scores  : Object.freeze(scores),
        overallScore,
        retained: Object.freeze(retained.sort(compareByPosition)),
    });
}
