/**
 * @fileoverview Unit tests for the report builder
 *
 * Tests cover:
 * - Canonical order, labels and descriptions
 * - Evidence ranking
 * - Degraded status
 * - Invariant checks on inconsistent input
 * - Serialization
 */

import { describe, it, expect } from "vitest";
import { aggregate } from "../aggregate/aggregator.js";
import { PATTERN_CATEGORIES, type PatternCategory } from "../contracts/PatternCategory.js";
import { createPatternMatch, type PatternMatch } from "../contracts/PatternMatch.js";
import type { CategoryScore, CategoryStatus } from "../contracts/Report.js";
import { InvariantViolation } from "../contracts/errors.js";
import { DEFAULT_ENGINE_CONFIG } from "../engine/config.js";
import { buildReport, reportToJson, serializeReport } from "../report/ReportBuilder.js";
import { buildDocument } from "./fixtures.js";

const doc = buildDocument("report-doc", [
    { text: "Alpha beta gamma.", tokens: [] },
    { text: "Delta epsilon zeta.", tokens: [] },
    { text: "Eta theta iota.", tokens: [] },
]);

function match(category: PatternCategory, start: number, end: number, confidence: number, detectorId = "test:d"): PatternMatch {
    return createPatternMatch(doc, { category, start, end, confidence, rationale: "because", detectorId });
}

function aggregated(matches: PatternMatch[], statuses: Partial<Record<PatternCategory, CategoryStatus>> = {}) {
    return aggregate({ matches, sentenceCount: 3, statuses, config: DEFAULT_ENGINE_CONFIG });
}

describe("buildReport", () => {
    it("should list every category in canonical order with its label", () => {
        const { scores, overallScore, retained } = aggregated([]);
        const reversed = [...scores].reverse();

        const report = buildReport("report-doc", reversed, overallScore, retained);

        expect(report.categories.map(category => category.category)).toEqual([...PATTERN_CATEGORIES]);
        expect(report.categories[1].label).toBe("False urgency");
        expect(report.status).toBe("complete");
        expect(report.deadlineExceeded).toBe(false);
        expect(report.faults).toEqual([]);
    });

    it("should rank matches by confidence, then start, then category order", () => {
        const { scores, overallScore, retained } = aggregated([
            match("FEAR_APPEAL", 18, 23, 0.5),
            match("GUILT_INDUCTION", 18, 23, 0.5),
            match("LOADED_LANGUAGE", 38, 41, 0.9),
            match("FALSE_URGENCY", 0, 5, 0.5),
        ]);

        const report = buildReport("report-doc", scores, overallScore, retained);

        expect(report.matches.map(m => [m.category, m.start])).toEqual([
            ["LOADED_LANGUAGE", 38],
            ["FALSE_URGENCY", 0],
            ["GUILT_INDUCTION", 18],
            ["FEAR_APPEAL", 18],
        ]);
    });

    it("should mark the report degraded when a category is unavailable", () => {
        const { scores, overallScore, retained } = aggregated([], { FEAR_APPEAL: "unavailable", FALSE_DICHOTOMY: "disabled" });

        const report = buildReport("report-doc", scores, overallScore, retained, {
            faults          : [{ detectorId: "lexical:fear-appeal", category: "FEAR_APPEAL", reason: "deadline", message: "skipped" }],
            deadlineExceeded: true,
        });

        expect(report.status).toBe("degraded");
        expect(report.unavailableCategories).toEqual(["FEAR_APPEAL"]);
        expect(report.deadlineExceeded).toBe(true);
        expect(report.faults).toHaveLength(1);
    });

    it("should stay complete when categories are only disabled", () => {
        const { scores, overallScore, retained } = aggregated([], { FALSE_DICHOTOMY: "disabled" });

        expect(buildReport("report-doc", scores, overallScore, retained).status).toBe("complete");
    });

    describe("invariants", () => {
        const { scores, overallScore, retained } = aggregated([match("FEAR_APPEAL", 0, 5, 0.6)]);

        const replace = (category: PatternCategory, patch: Partial<CategoryScore>): CategoryScore[] =>
            scores.map(score => (score.category === category ? { ...score, ...patch } : score));

        it("should require a document id", () => {
            expect(() => buildReport("", scores, overallScore, retained)).toThrow(InvariantViolation);
        });

        it("should reject a missing category", () => {
            expect(() => buildReport("d", scores.slice(1), overallScore, retained))
                .toThrow("Missing score for category LOADED_LANGUAGE");
        });

        it("should reject a duplicate category", () => {
            expect(() => buildReport("d", [...scores, scores[0]], overallScore, retained))
                .toThrow("Duplicate score for category LOADED_LANGUAGE");
        });

        it("should reject scores out of range", () => {
            expect(() => buildReport("d", replace("FEAR_APPEAL", { score: 1.2 }), overallScore, retained))
                .toThrow("Score for FEAR_APPEAL is outside [0, 1]: 1.2");
            expect(() => buildReport("d", scores, -0.1, retained)).toThrow("Overall score is outside [0, 1]: -0.1");
        });

        it("should reject a count that disagrees with the retained matches", () => {
            expect(() => buildReport("d", replace("FEAR_APPEAL", { matchCount: 2 }), overallScore, retained))
                .toThrow("Category FEAR_APPEAL reports 2 matches but 1 were retained");
        });

        it("should reject a representative that was not retained", () => {
            const stranger = match("FEAR_APPEAL", 18, 23, 0.9);
            expect(() => buildReport("d", replace("FEAR_APPEAL", { representative: stranger }), overallScore, retained))
                .toThrow("Representative match of FEAR_APPEAL is not among its retained matches");
        });

        it("should reject evidence for a category that is not ok", () => {
            expect(() => buildReport("d", replace("FEAR_APPEAL", { status: "unavailable" }), overallScore, retained))
                .toThrow("Category FEAR_APPEAL is unavailable but carries evidence");
        });
    });
});

describe("serializeReport", () => {
    it("should produce a plain record keyed by category", () => {
        const { scores, overallScore, retained } = aggregated([match("FEAR_APPEAL", 0, 5, 2 / 3)]);
        const report = buildReport("report-doc", scores, overallScore, retained);

        const serialized = serializeReport(report);

        expect(Object.keys(serialized.categories)).toEqual([...PATTERN_CATEGORIES]);
        expect(serialized.categories.FEAR_APPEAL).toEqual({
            label         : "Fear appeal",
            description   : "Threats of harm, often tied to a named person or organization",
            score         : 0.6667,
            matchCount    : 1,
            severity      : "moderate",
            status        : "ok",
            representative: {
                category     : "FEAR_APPEAL",
                start        : 0,
                end          : 5,
                text         : "Alpha",
                sentenceIndex: 0,
                confidence   : 0.6667,
                rationale    : "because",
                detectorId   : "test:d",
            },
        });
        expect(serialized.overallScore).toBe(0.0952);
    });

    it("should render identical reports to identical JSON", () => {
        const first = aggregated([match("FEAR_APPEAL", 0, 5, 0.6), match("GUILT_INDUCTION", 18, 23, 0.4)]);
        const second = aggregated([match("GUILT_INDUCTION", 18, 23, 0.4), match("FEAR_APPEAL", 0, 5, 0.6)]);

        expect(reportToJson(buildReport("d", first.scores, first.overallScore, first.retained)))
            .toBe(reportToJson(buildReport("d", second.scores, second.overallScore, second.retained)));
    });
});
