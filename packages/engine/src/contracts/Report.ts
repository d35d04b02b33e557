/**
 * @fileoverview Report Contract
 *
 * Per-category scores and the final analysis report. Reports are frozen
 * and the engine keeps no reference to them after returning.
 *
 * @module @slant/engine/contracts/Report
 */

import type { PatternCategory } from "./PatternCategory.js";
import type { PatternMatch } from "./PatternMatch.js";

/**
 * - ok: detectors ran and the score is meaningful
 * - disabled: switched off by configuration
 * - unavailable: a detector faulted or was skipped by the deadline
 */
export type CategoryStatus = "ok" | "disabled" | "unavailable";

export type ReportStatus = "complete" | "degraded";

export interface CategoryScore {
    readonly category: PatternCategory;

    /** Score in [0, 1]; 0 unless status is ok */
    readonly score: number;

    /** Number of matches retained after de-duplication */
    readonly matchCount: number;

    /** Highest-confidence retained match, or null */
    readonly representative: PatternMatch | null;

    readonly status: CategoryStatus;

    /** Severity label from the configured bands; "none" for score 0 */
    readonly severity: string;
}

export interface CategoryReport extends CategoryScore {
    readonly label: string;
    readonly description: string;
}

/**
 * Why a detector contributed nothing.
 */
export type FaultReason = "fault" | "deadline" | "invalid-output";

export interface DetectorFaultRecord {
    readonly detectorId: string;
    readonly category: PatternCategory;
    readonly reason: FaultReason;
    readonly message: string;
}

export interface AnalysisReport {
    readonly documentId: string;

    /** degraded when at least one category is unavailable */
    readonly status: ReportStatus;

    readonly overallScore: number;

    /** One entry per category, canonical order */
    readonly categories: readonly CategoryReport[];

    /** Retained matches, strongest evidence first */
    readonly matches: readonly PatternMatch[];

    readonly unavailableCategories: readonly PatternCategory[];
    readonly faults: readonly DetectorFaultRecord[];
    readonly deadlineExceeded: boolean;
}

/**
 * Result of one `analyze` call. Cancellation discards partial results.
 */
export type AnalysisOutcome =
    | { readonly status: "completed"; readonly report: AnalysisReport }
    | { readonly status: "cancelled"; readonly documentId: string; readonly reason: string };
