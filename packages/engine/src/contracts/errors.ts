/**
 * @fileoverview Engine error taxonomy
 *
 * - ResourceLoadError: lexicon or configuration missing/malformed (startup)
 * - InvalidDocumentError: annotation payload that cannot form a document
 * - DetectorFault: one detector failed; recovered by the engine
 * - InvariantViolation: internal inconsistency, always a defect
 *
 * Empty documents, cancellation and deadlines are not errors; they are
 * reported through outcome and report statuses.
 *
 * @module @slant/engine/contracts/errors
 */

import type { PatternCategory } from "./PatternCategory.js";

/**
 * Base class for every error raised by the engine.
 */
export class SlantError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ResourceLoadError extends SlantError {
    /** File or label the resource was loaded from */
    readonly source: string;

    /** Individual validation problems */
    readonly issues: readonly string[];

    constructor(
        message: string,
        details: { source?: string; issues?: readonly string[]; cause?: unknown } = {}
    ) {
        super(message, { cause: details.cause });
        this.source = details.source ?? "<inline>";
        this.issues = Object.freeze([...(details.issues ?? [])]);
    }
}

export class InvalidDocumentError extends SlantError {}

export class DetectorFault extends SlantError {
    readonly detectorId: string;
    readonly category: PatternCategory;

    constructor(detectorId: string, category: PatternCategory, message: string, options?: { cause?: unknown }) {
        super(`Detector ${detectorId} (${category}) failed: ${message}`, options);
        this.detectorId = detectorId;
        this.category = category;
    }
}

export class InvariantViolation extends SlantError {}

/**
 * Message text of anything thrown.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
