/**
 * @fileoverview Slant detection engine
 *
 * Finds rhetorical manipulation patterns in annotated documents.
 *
 * The engine provides:
 * - An immutable annotated document model
 * - A read-only lexical resource store loaded from YAML
 * - Lexical, structural, polarity and entity detectors per category
 * - Noisy-OR aggregation with overlap merging and a short-document penalty
 * - Explainable, deterministic reports
 *
 * @module @slant/engine
 * @example
 * ```typescript
 * import {
 *     PatternEngine,
 *     createAnnotatedDocument,
 *     loadDefaultLexicalResources,
 *     reportToJson,
 * } from "@slant/engine";
 *
 * const engine = new PatternEngine({ resources: loadDefaultLexicalResources() });
 * const outcome = await engine.analyze(createAnnotatedDocument(payload));
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Lexical resources
// ============================================================================

export * from "./lexicon/index.js";

// ============================================================================
// Detectors, aggregation, report
// ============================================================================

export * from "./detectors/index.js";
export * from "./aggregate/index.js";
export * from "./report/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";
