/**
 * @fileoverview Static detector registry
 *
 * The fixed table of detectors per category. Order inside the table is
 * the order the engine runs them in; nothing is discovered at runtime.
 *
 * @module @slant/engine/detectors/registry
 */

import type { Sentence } from "../contracts/AnnotatedDocument.js";
import { isDetectorPlugin, type DetectorPlugin } from "../contracts/DetectorPlugin.js";
import { PATTERN_CATEGORIES, type PatternCategory } from "../contracts/PatternCategory.js";
import { InvariantViolation } from "../contracts/errors.js";
import type { LexicalResourceStore } from "../lexicon/LexicalResourceStore.js";
import { hasConditionalThreat } from "./cues.js";
import { entityPressureDetector } from "./entityPressure.js";
import { createLexicalCueDetector, type SentenceBoost } from "./lexicalCue.js";
import { polarityExtremityDetector } from "./polarityExtremity.js";
import { absoluteClaimDetector, falseDichotomyDetector } from "./structural.js";

/** Urgency cues inside an "if ... will" threat clause */
export const kCONDITIONAL_THREAT_BOOST = 1.25;

function conditionalThreatBoost(sentence: Sentence, context: { resources: LexicalResourceStore }): SentenceBoost | null {
    return hasConditionalThreat(sentence, context.resources)
        ? { factor: kCONDITIONAL_THREAT_BOOST, reason: "conditional threat clause" }
        : null;
}

/**
 * Detectors per category. Every category must appear.
 */
export const DETECTOR_TABLE = {
    LOADED_LANGUAGE: [
        createLexicalCueDetector("LOADED_LANGUAGE", { id: "lexical:loaded-language" }),
    ],
    FALSE_URGENCY: [
        createLexicalCueDetector("FALSE_URGENCY", {
            id           : "lexical:false-urgency",
            sentenceBoost: conditionalThreatBoost,
        }),
    ],
    GUILT_INDUCTION: [
        createLexicalCueDetector("GUILT_INDUCTION", { id: "lexical:guilt-induction" }),
    ],
    VAGUE_GENERALIZATION: [
        createLexicalCueDetector("VAGUE_GENERALIZATION", { id: "lexical:vague-generalization" }),
        absoluteClaimDetector,
    ],
    APPEAL_TO_EMOTION: [
        createLexicalCueDetector("APPEAL_TO_EMOTION", { id: "lexical:emotional-appeal" }),
        polarityExtremityDetector,
    ],
    FALSE_DICHOTOMY: [
        falseDichotomyDetector,
    ],
    FEAR_APPEAL: [
        createLexicalCueDetector("FEAR_APPEAL", { id: "lexical:fear-appeal" }),
        entityPressureDetector,
    ],
} satisfies Record<PatternCategory, readonly DetectorPlugin[]>;

/**
 * Every shipped detector, flattened in canonical category order.
 */
export function createDefaultDetectors(): readonly DetectorPlugin[] {
    return PATTERN_CATEGORIES.flatMap((category): readonly DetectorPlugin[] => DETECTOR_TABLE[category]);
}

/**
 * Validate a detector list.
 *
 * @param detectors - Candidate detectors
 * @returns Frozen copy in the given order
 * @throws InvariantViolation on a malformed detector or a repeated id
 */
export function createDetectorRegistry(detectors: readonly unknown[]): readonly DetectorPlugin[] {
    const ids = new Set<string>();
    const registry: DetectorPlugin[] = [];

    detectors.forEach((detector, index) => {
        if (!isDetectorPlugin(detector)) {
            throw new InvariantViolation(`Detector at index ${index} does not implement DetectorPlugin`);
        }
        if (ids.has(detector.id)) {
            throw new InvariantViolation(`Duplicate detector id: ${detector.id}`);
        }
        if (detector.maxSentenceSpan !== undefined
            && (!Number.isInteger(detector.maxSentenceSpan) || detector.maxSentenceSpan < 1)) {
            throw new InvariantViolation(`Detector ${detector.id} has invalid maxSentenceSpan`);
        }
        ids.add(detector.id);
        registry.push(detector);
    });

    return Object.freeze(registry);
}
