/**
 * @fileoverview Report Builder
 *
 * Assembles the final, immutable AnalysisReport from aggregation output
 * and serializes it. Assembly is pure; inconsistent input is a defect
 * upstream and raises InvariantViolation.
 *
 * @module @slant/engine/report/ReportBuilder
 */

import { CATEGORY_INFO, PATTERN_CATEGORIES, categoryOrder, isPatternCategory, type PatternCategory } from "../contracts/PatternCategory.js";
import { compareStrings, type PatternMatch } from "../contracts/PatternMatch.js";
import type {
    AnalysisReport,
    CategoryReport,
    CategoryScore,
    CategoryStatus,
    DetectorFaultRecord,
    ReportStatus,
} from "../contracts/Report.js";
import { InvariantViolation } from "../contracts/errors.js";

export interface BuildReportOptions {
    readonly faults?: readonly DetectorFaultRecord[];
    readonly deadlineExceeded?: boolean;
}

/**
 * Evidence strength order: confidence desc, then start, category order,
 * detector id, end.
 */
export function compareByStrength(a: PatternMatch, b: PatternMatch): number {
    return b.confidence - a.confidence
        || a.start - b.start
        || categoryOrder(a.category) - categoryOrder(b.category)
        || compareStrings(a.detectorId, b.detectorId)
        || a.end - b.end;
}

function isUnitScore(value: number): boolean {
    return Number.isFinite(value) && value >= 0 && value <= 1;
}

function checkScores(scores: readonly CategoryScore[], retained: readonly PatternMatch[]): Map<PatternCategory, CategoryScore> {
    const byCategory = new Map<PatternCategory, CategoryScore>();

    for (const score of scores) {
        if (!isPatternCategory(score.category)) {
            throw new InvariantViolation(`Unknown category in scores: ${String(score.category)}`);
        }
        if (byCategory.has(score.category)) {
            throw new InvariantViolation(`Duplicate score for category ${score.category}`);
        }
        if (!isUnitScore(score.score)) {
            throw new InvariantViolation(`Score for ${score.category} is outside [0, 1]: ${score.score}`);
        }
        byCategory.set(score.category, score);
    }

    for (const category of PATTERN_CATEGORIES) {
        const score = byCategory.get(category);
        if (!score) {
            throw new InvariantViolation(`Missing score for category ${category}`);
        }

        const matches = retained.filter(match => match.category === category);
        if (score.status !== "ok" && (matches.length > 0 || score.score !== 0)) {
            throw new InvariantViolation(`Category ${category} is ${score.status} but carries evidence`);
        }
        if (score.matchCount !== matches.length) {
            throw new InvariantViolation(
                `Category ${category} reports ${score.matchCount} matches but ${matches.length} were retained`
            );
        }
        if (score.representative === null ? matches.length > 0 : !matches.includes(score.representative)) {
            throw new InvariantViolation(`Representative match of ${category} is not among its retained matches`);
        }
    }

    return byCategory;
}

/**
 * Assemble an AnalysisReport.
 *
 * @param documentId - Id of the analyzed document
 * @param scores - One score per category, any order
 * @param overallScore - Aggregate score in [0, 1]
 * @param retainedMatches - Matches that survived de-duplication
 * @throws InvariantViolation when the pieces do not agree
 */
export function buildReport(
    documentId: string,
    scores: readonly CategoryScore[],
    overallScore: number,
    retainedMatches: readonly PatternMatch[],
    options: BuildReportOptions = {}
): AnalysisReport {
    if (!documentId) {
        throw new InvariantViolation("Report needs a document id");
    }
    if (!isUnitScore(overallScore)) {
        throw new InvariantViolation(`Overall score is outside [0, 1]: ${overallScore}`);
    }

    const byCategory = checkScores(scores, retainedMatches);

    const categories: CategoryReport[] = [];
    const unavailable: PatternCategory[] = [];
    for (const category of PATTERN_CATEGORIES) {
        const score = byCategory.get(category);
        if (!score) {
            continue;
        }
        if (score.status === "unavailable") {
            unavailable.push(category);
        }
        categories.push(Object.freeze({
            ...score,
            label      : CATEGORY_INFO[category].label,
            description: CATEGORY_INFO[category].description,
        }));
    }

    const status: ReportStatus = unavailable.length > 0 ? "degraded" : "complete";

    return Object.freeze({
        documentId,
        status,
        overallScore,
        categories           : Object.freeze(categories),
        matches              : Object.freeze([...retainedMatches].sort(compareByStrength)),
        unavailableCategories: Object.freeze(unavailable),
        faults               : Object.freeze((options.faults ?? []).map(fault => Object.freeze({ ...fault }))),
        deadlineExceeded     : options.deadlineExceeded ?? false,
    });
}

export interface SerializedMatch {
    category: PatternCategory;
    start: number;
    end: number;
    text: string;
    sentenceIndex: number;
    confidence: number;
    rationale: string;
    detectorId: string;
}

export interface SerializedCategory {
    label: string;
    description: string;
    score: number;
    matchCount: number;
    severity: string;
    status: CategoryStatus;
    representative: SerializedMatch | null;
}

export interface SerializedReport {
    documentId: string;
    status: ReportStatus;
    overallScore: number;
    deadlineExceeded: boolean;
    categories: Partial<Record<PatternCategory, SerializedCategory>>;
    matches: SerializedMatch[];
    unavailableCategories: PatternCategory[];
    faults: DetectorFaultRecord[];
}

/** Decimal places kept for scores and confidences */
const kPRECISION = 4;

function round(value: number): number {
    return Number(value.toFixed(kPRECISION));
}

function serializeMatch(match: PatternMatch): SerializedMatch {
    return {
        category     : match.category,
        start        : match.start,
        end          : match.end,
        text         : match.text,
        sentenceIndex: match.sentenceIndex,
        confidence   : round(match.confidence),
        rationale    : match.rationale,
        detectorId   : match.detectorId,
    };
}

/**
 * Plain, JSON-ready record of a report. Keys come out in a fixed order.
 */
export function serializeReport(report: AnalysisReport): SerializedReport {
    const categories: Partial<Record<PatternCategory, SerializedCategory>> = {};
    for (const category of report.categories) {
        categories[category.category] = {
            label         : category.label,
            description   : category.description,
            score         : round(category.score),
            matchCount    : category.matchCount,
            severity      : category.severity,
            status        : category.status,
            representative: category.representative ? serializeMatch(category.representative) : null,
        };
    }

    return {
        documentId           : report.documentId,
        status               : report.status,
        overallScore         : round(report.overallScore),
        deadlineExceeded     : report.deadlineExceeded,
        categories,
        matches              : report.matches.map(serializeMatch),
        unavailableCategories: [...report.unavailableCategories],
        faults               : report.faults.map(fault => ({ ...fault })),
    };
}

/**
 * Deterministic JSON text of a report.
 */
export function reportToJson(report: AnalysisReport, indent = 2): string {
    return JSON.stringify(serializeReport(report), null, indent);
}
