/**
 * @fileoverview Unit tests for the match aggregator
 *
 * Tests cover:
 * - Noisy-OR bounds and monotonicity
 * - Short-document penalty curve
 * - Severity bands
 * - Overlap de-duplication and tie-breaks
 * - Category statuses and the weighted overall score
 */

import { describe, it, expect } from "vitest";
import {
    aggregate,
    deduplicateMatches,
    noisyOr,
    severityFor,
    shortDocumentPenalty,
} from "../aggregate/aggregator.js";
import type { PatternCategory } from "../contracts/PatternCategory.js";
import { createPatternMatch, type PatternMatch } from "../contracts/PatternMatch.js";
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "../engine/config.js";
import { buildDocument } from "./fixtures.js";

const doc = buildDocument("three", [
    { text: "Alpha beta gamma.", tokens: [] },
    { text: "Delta epsilon zeta.", tokens: [] },
    { text: "Eta theta iota.", tokens: [] },
]);

function match(
    category: PatternCategory,
    start: number,
    end: number,
    confidence: number,
    detectorId = "test:detector"
): PatternMatch {
    return createPatternMatch(doc, { category, start, end, confidence, rationale: "test", detectorId });
}

describe("noisyOr", () => {
    it("should score no evidence as 0", () => {
        expect(noisyOr([])).toBe(0);
    });

    it("should combine independent evidence", () => {
        expect(noisyOr([0.5, 0.5])).toBe(0.75);
    });

    it("should never decrease when evidence is added", () => {
        const base = noisyOr([0.5, 0.5]);
        expect(noisyOr([0.5, 0.5, 0.2])).toBeGreaterThan(base);
        expect(noisyOr([0.5, 0.5, 0])).toBe(base);
    });

    it("should stay within [0, 1]", () => {
        expect(noisyOr([1, 0.3])).toBe(1);
        expect(noisyOr([1.5, -2])).toBe(1);
    });
});

describe("shortDocumentPenalty", () => {
    const curve = { minSentences: 3, maxFactor: 1.5 };

    it("should grow as the document gets shorter", () => {
        expect(shortDocumentPenalty(0, curve)).toBe(1.5);
        expect(shortDocumentPenalty(1, curve)).toBeCloseTo(4 / 3, 10);
        expect(shortDocumentPenalty(2, curve)).toBeCloseTo(7 / 6, 10);
    });

    it("should not penalize documents at or above the minimum", () => {
        expect(shortDocumentPenalty(3, curve)).toBe(1);
        expect(shortDocumentPenalty(10, curve)).toBe(1);
        expect(shortDocumentPenalty(0, { minSentences: 0, maxFactor: 2 })).toBe(1);
    });
});

describe("severityFor", () => {
    const bands = DEFAULT_ENGINE_CONFIG.severityBands;

    it("should pick the highest band reached", () => {
        expect(severityFor(0, bands)).toBe("none");
        expect(severityFor(0.1, bands)).toBe("low");
        expect(severityFor(0.4, bands)).toBe("moderate");
        expect(severityFor(0.69, bands)).toBe("moderate");
        expect(severityFor(0.7, bands)).toBe("high");
    });
});

describe("deduplicateMatches", () => {
    it("should keep the most confident of overlapping matches", () => {
        const kept = deduplicateMatches([match("GUILT_INDUCTION", 0, 10, 0.6), match("GUILT_INDUCTION", 5, 15, 0.8)]);

        expect(kept.map(m => [m.start, m.confidence])).toEqual([[5, 0.8]]);
    });

    it("should prefer the earlier start on equal confidence", () => {
        const kept = deduplicateMatches([
            match("GUILT_INDUCTION", 5, 12, 0.6, "a"),
            match("GUILT_INDUCTION", 0, 10, 0.6, "b"),
        ]);

        expect(kept.map(m => [m.start, m.detectorId])).toEqual([[0, "b"]]);
    });

    it("should prefer the smaller detector id on equal confidence and start", () => {
        const kept = deduplicateMatches([
            match("GUILT_INDUCTION", 0, 10, 0.6, "b"),
            match("GUILT_INDUCTION", 0, 8, 0.6, "a"),
        ]);

        expect(kept.map(m => m.detectorId)).toEqual(["a"]);
    });

    it("should keep touching matches apart", () => {
        const kept = deduplicateMatches([match("GUILT_INDUCTION", 0, 5, 0.6), match("GUILT_INDUCTION", 5, 10, 0.6)]);

        expect(kept).toHaveLength(2);
    });

    it("should only merge overlaps reaching the threshold", () => {
        const pair = [match("GUILT_INDUCTION", 0, 10, 0.6), match("GUILT_INDUCTION", 8, 20, 0.7)];

        expect(deduplicateMatches(pair, 0.5)).toHaveLength(2);
        expect(deduplicateMatches(pair, 0.2)).toHaveLength(1);
        expect(deduplicateMatches(pair)).toHaveLength(1);
    });
});

describe("aggregate", () => {
    it("should score categories with a noisy-OR and average the available ones", () => {
        const result = aggregate({
            matches: [
                match("GUILT_INDUCTION", 0, 5, 0.5),
                match("GUILT_INDUCTION", 18, 23, 0.5),
                match("FEAR_APPEAL", 38, 41, 0.4),
                match("LOADED_LANGUAGE", 6, 10, 0.9),
            ],
            sentenceCount: 3,
            statuses     : { LOADED_LANGUAGE: "unavailable" },
            config       : DEFAULT_ENGINE_CONFIG,
        });

        const byCategory = new Map(result.scores.map(score => [score.category, score]));
        expect(byCategory.get("GUILT_INDUCTION")).toMatchObject({ score: 0.75, matchCount: 2, status: "ok", severity: "high" });
        expect(byCategory.get("FEAR_APPEAL")).toMatchObject({ score: 0.4, matchCount: 1, severity: "moderate" });
        expect(byCategory.get("LOADED_LANGUAGE")).toMatchObject({
            score         : 0,
            matchCount    : 0,
            representative: null,
            status        : "unavailable",
            severity      : "none",
        });
        expect(result.overallScore).toBeCloseTo(1.15 / 6, 10);
        expect(result.retained.map(m => m.start)).toEqual([0, 18, 38]);
    });

    it("should weight categories in the overall score", () => {
        const result = aggregate({
            matches      : [match("GUILT_INDUCTION", 0, 5, 0.5), match("FEAR_APPEAL", 38, 41, 0.4)],
            sentenceCount: 3,
            config       : resolveEngineConfig({ categoryWeights: { GUILT_INDUCTION: 3 } }),
        });

        expect(result.overallScore).toBeCloseTo((3 * 0.5 + 0.4) / 9, 10);
    });

    it("should pick the strongest retained match as representative", () => {
        const result = aggregate({
            matches      : [match("FEAR_APPEAL", 0, 5, 0.3), match("FEAR_APPEAL", 18, 23, 0.7)],
            sentenceCount: 3,
            config       : DEFAULT_ENGINE_CONFIG,
        });

        const fear = result.scores.find(score => score.category === "FEAR_APPEAL");
        expect(fear?.representative?.start).toBe(18);
    });

    it("should scale confidences down for short documents", () => {
        const result = aggregate({
            matches      : [match("FEAR_APPEAL", 0, 5, 0.6)],
            sentenceCount: 1,
            config       : DEFAULT_ENGINE_CONFIG,
        });

        const fear = result.scores.find(score => score.category === "FEAR_APPEAL");
        expect(fear?.score).toBeCloseTo(0.45, 10);
    });

    it("should score an empty run as zero everywhere", () => {
        const result = aggregate({ matches: [], sentenceCount: 0, config: DEFAULT_ENGINE_CONFIG });

        expect(result.overallScore).toBe(0);
        expect(result.scores).toHaveLength(7);
        expect(result.scores.every(score => score.score === 0 && score.status === "ok")).toBe(true);
    });

    it("should score 0 when every weight is 0", () => {
        const result = aggregate({
            matches      : [match("FEAR_APPEAL", 0, 5, 0.6)],
            sentenceCount: 3,
            config       : resolveEngineConfig({
                categoryWeights: {
                    LOADED_LANGUAGE     : 0,
                    FALSE_URGENCY       : 0,
                    GUILT_INDUCTION     : 0,
                    VAGUE_GENERALIZATION: 0,
                    APPEAL_TO_EMOTION   : 0,
                    FALSE_DICHOTOMY     : 0,
                    FEAR_APPEAL         : 0,
                },
            }),
        });

        expect(result.overallScore).toBe(0);
    });
});
