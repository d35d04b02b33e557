/**
 * Detector Plugin Contract
 *
 * Detectors inspect an annotated document and return evidence for
 * exactly one category. The engine runs every enabled detector and
 * aggregates their matches.
 *
 * Design principles:
 * - Pure: no side effects, no document mutation, no I/O
 * - Deterministic: same document and resources produce the same matches
 * - Independent: no detector reads another detector's output
 */

import type { AnnotatedDocument } from "./AnnotatedDocument.js";
import { isPatternCategory, type PatternCategory } from "./PatternCategory.js";
import type { PatternMatch } from "./PatternMatch.js";
import type { LexicalResourceStore } from "../lexicon/LexicalResourceStore.js";
import type { ResolvedEngineConfig } from "../engine/config.js";

/**
 * Logger interface for detectors and the engine.
 */
export interface PluginLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context handed to a detector for one run.
 */
export interface DetectorContext {
    /** Shared read-only lexical resources */
    readonly resources: LexicalResourceStore;

    /** Resolved engine configuration */
    readonly config: ResolvedEngineConfig;

    /** Logger prefixed with the detector id */
    readonly logger: PluginLogger;

    /**
     * Trace ID of this analysis run.
     * Use for correlation in logs and events.
     */
    readonly traceId: string;
}

/**
 * Detector Plugin interface.
 *
 * Rules:
 * - Returns matches for its own category only
 * - Every match lies inside the document text and inside at most
 *   `maxSentenceSpan` sentences
 * - Never two matches with the same range
 * - Returns `[]` for an empty document
 *
 * @example
 * ```typescript
 * const shouting: DetectorPlugin = {
 *     id      : "shape:all-caps",
 *     category: "LOADED_LANGUAGE",
 *     detect(document) {
 *         return document.sentences
 *             .flatMap(sentence => sentence.tokens)
 *             .filter(token => token.text.length > 3 && token.text === token.text.toUpperCase())
 *             .map(token => createPatternMatch(document, {
 *                 category  : "LOADED_LANGUAGE",
 *                 start     : token.start,
 *                 end       : token.end,
 *                 confidence: 0.3,
 *                 rationale : `shouted word "${token.text}"`,
 *                 detectorId: "shape:all-caps",
 *             }));
 *     },
 * };
 * ```
 */
export interface DetectorPlugin {
    /**
     * Unique identifier, `<family>:<name>`.
     */
    readonly id: string;

    /** Category every returned match belongs to */
    readonly category: PatternCategory;

    readonly name?: string;
    readonly description?: string;

    /**
     * Number of consecutive sentences one match may cover (default: 1).
     */
    readonly maxSentenceSpan?: number;

    /**
     * Inspect the document.
     *
     * @param document - Read-only annotated document
     * @param context - Resources, configuration, logger, trace id
     */
    detect(document: AnnotatedDocument, context: DetectorContext): readonly PatternMatch[];
}

/**
 * Type guard to check if an object is a DetectorPlugin.
 */
export function isDetectorPlugin(obj: unknown): obj is DetectorPlugin {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        obj.id.length > 0 &&
        "category" in obj &&
        isPatternCategory(obj.category) &&
        "detect" in obj &&
        typeof obj.detect === "function"
    );
}
