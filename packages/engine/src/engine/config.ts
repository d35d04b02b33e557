/**
 * @fileoverview Engine configuration
 *
 * Recognized options and their documented defaults. Anything omitted
 * takes the default; values outside their range are a startup error.
 *
 * @module @slant/engine/engine/config
 */

import { isPatternCategory, type PatternCategory } from "../contracts/PatternCategory.js";
import { ResourceLoadError } from "../contracts/errors.js";

/**
 * Short-document penalty curve.
 *
 * Below `minSentences`, every contributing confidence is divided by
 * `1 + (maxFactor - 1) * (minSentences - n) / minSentences`.
 */
export interface ShortDocumentPenaltyCurve {
    readonly minSentences: number;
    readonly maxFactor: number;
}

/**
 * Lower bound of a severity label. Bands are ascending by `min`.
 */
export interface SeverityBand {
    readonly min: number;
    readonly label: string;
}

/**
 * Engine options as supplied by the caller. Every field is optional.
 */
export interface EngineConfig {
    /** Weight of each category in the overall score (default: 1 each) */
    readonly categoryWeights?: Partial<Record<PatternCategory, number>>;

    /** Minimum overlap fraction for two same-category matches to merge (default: 0, any overlap) */
    readonly overlapMergeThreshold?: number;

    /** Short-document penalty (default: { minSentences: 3, maxFactor: 1.5 }) */
    readonly shortDocumentPenalty?: Partial<ShortDocumentPenaltyCurve>;

    /** Per-category switch (default: all enabled) */
    readonly categoryEnabled?: Partial<Record<PatternCategory, boolean>>;

    /** Per-run deadline in milliseconds (default: none) */
    readonly runDeadlineMs?: number | null;

    /** Subjectivity above which lexical cues get a bonus (default: 0.5) */
    readonly subjectivityThreshold?: number;

    /** Relative bonus for cues in subjective sentences (default: 0.2) */
    readonly subjectivityBonus?: number;

    /** Polarity magnitude that counts as extreme (default: 0.5) */
    readonly polarityThreshold?: number;

    /** Multiplier for cues in sentences containing a hedge (default: 0.8) */
    readonly hedgeDamping?: number;

    /** Multiplier for cues directly preceded by an intensifier (default: 1.15) */
    readonly intensifierBoost?: number;

    /** Entity types that make a sentence "about a subject" (default: PERSON, ORG) */
    readonly pressureEntityTypes?: readonly string[];

    /** Severity labels (default: low 0, moderate 0.4, high 0.7) */
    readonly severityBands?: readonly SeverityBand[];
}

/**
 * Fully resolved configuration handed to detectors and the aggregator.
 */
export interface ResolvedEngineConfig {
    readonly categoryWeights: Readonly<Record<PatternCategory, number>>;
    readonly overlapMergeThreshold: number;
    readonly shortDocumentPenalty: ShortDocumentPenaltyCurve;
    readonly categoryEnabled: Readonly<Record<PatternCategory, boolean>>;
    readonly runDeadlineMs: number | null;
    readonly subjectivityThreshold: number;
    readonly subjectivityBonus: number;
    readonly polarityThreshold: number;
    readonly hedgeDamping: number;
    readonly intensifierBoost: number;
    readonly pressureEntityTypes: readonly string[];
    readonly severityBands: readonly SeverityBand[];
}

function perCategory<T>(value: T): Record<PatternCategory, T> {
    return {
        LOADED_LANGUAGE     : value,
        FALSE_URGENCY       : value,
        GUILT_INDUCTION     : value,
        VAGUE_GENERALIZATION: value,
        APPEAL_TO_EMOTION   : value,
        FALSE_DICHOTOMY     : value,
        FEAR_APPEAL         : value,
    };
}

export const DEFAULT_ENGINE_CONFIG: ResolvedEngineConfig = Object.freeze({
    categoryWeights      : Object.freeze(perCategory(1)),
    overlapMergeThreshold: 0,
    shortDocumentPenalty : Object.freeze({ minSentences: 3, maxFactor: 1.5 }),
    categoryEnabled      : Object.freeze(perCategory(true)),
    runDeadlineMs        : null,
    subjectivityThreshold: 0.5,
    subjectivityBonus    : 0.2,
    polarityThreshold    : 0.5,
    hedgeDamping         : 0.8,
    intensifierBoost     : 1.15,
    pressureEntityTypes  : Object.freeze(["PERSON", "ORG"]),
    severityBands        : Object.freeze([
        Object.freeze({ min: 0, label: "low" }),
        Object.freeze({ min: 0.4, label: "moderate" }),
        Object.freeze({ min: 0.7, label: "high" }),
    ]),
});

function inRange(value: number, min: number, max: number): boolean {
    return Number.isFinite(value) && value >= min && value <= max;
}

/**
 * Merge caller options over the defaults and validate the result.
 *
 * @param config - Caller options
 * @returns Frozen resolved configuration
 * @throws ResourceLoadError listing every invalid option
 */
export function resolveEngineConfig(config: EngineConfig = {}): ResolvedEngineConfig {
    const issues: string[] = [];
    const defaults = DEFAULT_ENGINE_CONFIG;

    const categoryWeights = { ...defaults.categoryWeights };
    for (const [category, weight] of Object.entries(config.categoryWeights ?? {})) {
        if (!isPatternCategory(category)) {
            issues.push(`categoryWeights: unknown category "${category}"`);
        }
        else if (weight === undefined || !inRange(weight, 0, Number.MAX_VALUE)) {
            issues.push(`categoryWeights.${category} must be a non-negative number`);
        }
        else {
            categoryWeights[category] = weight;
        }
    }

    const categoryEnabled = { ...defaults.categoryEnabled };
    for (const [category, enabled] of Object.entries(config.categoryEnabled ?? {})) {
        if (!isPatternCategory(category)) {
            issues.push(`categoryEnabled: unknown category "${category}"`);
        }
        else if (typeof enabled !== "boolean") {
            issues.push(`categoryEnabled.${category} must be a boolean`);
        }
        else {
            categoryEnabled[category] = enabled;
        }
    }

    const shortDocumentPenalty = {
        minSentences: config.shortDocumentPenalty?.minSentences ?? defaults.shortDocumentPenalty.minSentences,
        maxFactor   : config.shortDocumentPenalty?.maxFactor ?? defaults.shortDocumentPenalty.maxFactor,
    };
    if (!Number.isInteger(shortDocumentPenalty.minSentences) || shortDocumentPenalty.minSentences < 0) {
        issues.push("shortDocumentPenalty.minSentences must be a non-negative integer");
    }
    if (!inRange(shortDocumentPenalty.maxFactor, 1, Number.MAX_VALUE)) {
        issues.push("shortDocumentPenalty.maxFactor must be at least 1");
    }

    const runDeadlineMs = config.runDeadlineMs ?? defaults.runDeadlineMs;
    if (runDeadlineMs !== null && !inRange(runDeadlineMs, 0, Number.MAX_SAFE_INTEGER)) {
        issues.push("runDeadlineMs must be a non-negative number");
    }

    const unitOptions = {
        overlapMergeThreshold: config.overlapMergeThreshold ?? defaults.overlapMergeThreshold,
        subjectivityThreshold: config.subjectivityThreshold ?? defaults.subjectivityThreshold,
        subjectivityBonus    : config.subjectivityBonus ?? defaults.subjectivityBonus,
        polarityThreshold    : config.polarityThreshold ?? defaults.polarityThreshold,
        hedgeDamping         : config.hedgeDamping ?? defaults.hedgeDamping,
    };
    for (const [name, value] of Object.entries(unitOptions)) {
        if (!inRange(value, 0, 1)) {
            issues.push(`${name} must be between 0 and 1`);
        }
    }

    const intensifierBoost = config.intensifierBoost ?? defaults.intensifierBoost;
    if (!inRange(intensifierBoost, 1, 2)) {
        issues.push("intensifierBoost must be between 1 and 2");
    }

    const pressureEntityTypes = (config.pressureEntityTypes ?? defaults.pressureEntityTypes)
        .map(type => type.toUpperCase());

    const severityBands = config.severityBands ?? defaults.severityBands;
    if (severityBands.length === 0) {
        issues.push("severityBands must not be empty");
    }
    severityBands.forEach((band, index) => {
        if (!inRange(band.min, 0, 1) || !band.label) {
            issues.push(`severityBands[${index}] needs a label and a min between 0 and 1`);
        }
        else if (index > 0 && band.min <= severityBands[index - 1].min) {
            issues.push("severityBands must be in strictly ascending order of min");
        }
    });

    if (issues.length > 0) {
        throw new ResourceLoadError(`Invalid engine configuration: ${issues.join(" | ")}`, {
            source: "engine-config",
            issues,
        });
    }

    return Object.freeze({
        categoryWeights     : Object.freeze(categoryWeights),
        shortDocumentPenalty: Object.freeze(shortDocumentPenalty),
        categoryEnabled     : Object.freeze(categoryEnabled),
        runDeadlineMs,
        ...unitOptions,
        intensifierBoost,
        pressureEntityTypes : Object.freeze(pressureEntityTypes),
        severityBands       : Object.freeze(severityBands.map(band => Object.freeze({ ...band }))),
    });
}
