/**
 * @fileoverview Detector barrel exports
 *
 * @module @slant/engine/detectors
 */

export {
    findCueHits,
    hasConditionalThreat,
    hasImperativeCue,
    hasListWord,
    hasSecondPerson,
    unionRange,
    wordTokens,
} from "./cues.js";
export type { CueHit } from "./cues.js";

export { createLexicalCueDetector, groupCueHits } from "./lexicalCue.js";
export type { CueGroup, LexicalCueDetectorOptions, SentenceBoost } from "./lexicalCue.js";

export { absoluteClaimDetector, falseDichotomyDetector } from "./structural.js";
export { polarityExtremityDetector } from "./polarityExtremity.js";
export { entityPressureDetector, pressureConfidence } from "./entityPressure.js";

export {
    DETECTOR_TABLE,
    createDefaultDetectors,
    createDetectorRegistry,
    kCONDITIONAL_THREAT_BOOST,
} from "./registry.js";
