/**
 * Pattern Match
 *
 * A located, scored piece of evidence for one category. Pure data,
 * created by exactly one detector and never mutated afterwards.
 */

import type { AnnotatedDocument, TextRange } from "./AnnotatedDocument.js";
import { sentenceIndexAt } from "./AnnotatedDocument.js";
import type { PatternCategory } from "./PatternCategory.js";

export interface PatternMatch extends TextRange {
    /** Category this evidence supports */
    readonly category: PatternCategory;

    /** The evidence substring, `document.text.slice(start, end)` */
    readonly text: string;

    /** Index of the sentence containing `start` (-1 if none) */
    readonly sentenceIndex: number;

    /** Confidence between 0.0 and 1.0 */
    readonly confidence: number;

    /** Short explanation naming the triggering cue */
    readonly rationale: string;

    /** Identifier of the detector that produced this */
    readonly detectorId: string;
}

export interface PatternMatchInput extends TextRange {
    readonly category: PatternCategory;
    readonly confidence: number;
    readonly rationale: string;
    readonly detectorId: string;
}

/**
 * Factory function to create a PatternMatch.
 * Confidence is clamped to [0, 1] and the result is frozen.
 *
 * @param document - The document the range points into
 * @param input - Category, range, confidence, rationale and detector id
 * @returns Frozen PatternMatch
 */
export function createPatternMatch(document: AnnotatedDocument, input: PatternMatchInput): PatternMatch {
    const confidence = Number.isFinite(input.confidence)
        ? Math.min(1, Math.max(0, input.confidence))
        : 0;

    return Object.freeze({
        category     : input.category,
        start        : input.start,
        end          : input.end,
        text         : document.text.slice(input.start, input.end),
        sentenceIndex: sentenceIndexAt(document, input.start),
        confidence,
        rationale    : input.rationale,
        detectorId   : input.detectorId,
    });
}

/**
 * Number of characters two ranges share.
 */
export function overlapLength(a: TextRange, b: TextRange): number {
    return Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
}

/**
 * Shared characters as a fraction of the shorter range, in [0, 1].
 */
export function overlapFraction(a: TextRange, b: TextRange): number {
    const shorter = Math.min(a.end - a.start, b.end - b.start);
    if (shorter <= 0) {
        return 0;
    }
    return overlapLength(a, b) / shorter;
}

/**
 * Positional order: start, end, detector id, then stronger first.
 */
export function compareByPosition(a: PatternMatch, b: PatternMatch): number {
    return a.start - b.start
        || a.end - b.end
        || compareStrings(a.detectorId, b.detectorId)
        || b.confidence - a.confidence;
}

/**
 * Locale-independent string comparison.
 */
export function compareStrings(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    return a > b ? 1 : 0;
}
