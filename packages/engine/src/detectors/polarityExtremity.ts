/**
 * @fileoverview Polarity extremity detector
 *
 * A sentence with extreme polarity that addresses the reader directly
 * (second-person pronoun or imperative opening) is evidence of an
 * emotional appeal. Confidence is 0.8 × |polarity|; the match spans the
 * sentence's word tokens.
 *
 * @module @slant/engine/detectors/polarityExtremity
 */

import type { AnnotatedDocument } from "../contracts/AnnotatedDocument.js";
import type { DetectorContext, DetectorPlugin } from "../contracts/DetectorPlugin.js";
import { createPatternMatch, type PatternMatch } from "../contracts/PatternMatch.js";
import { hasImperativeCue, hasSecondPerson, wordTokens } from "./cues.js";

export const kPOLARITY_SCALE = 0.8;

const kPOLARITY_EXTREMITY_ID = "polarity:extremity";

export const polarityExtremityDetector: DetectorPlugin = Object.freeze({
    id         : kPOLARITY_EXTREMITY_ID,
    category   : "APPEAL_TO_EMOTION",
    name       : "Polarity extremity",
    description: "Extremely positive or negative sentences aimed at the reader",
    detect(document: AnnotatedDocument, context: DetectorContext): readonly PatternMatch[] {
        const matches: PatternMatch[] = [];

        for (const sentence of document.sentences) {
            const magnitude = Math.abs(sentence.polarity);
            if (magnitude <= context.config.polarityThreshold) {
                continue;
            }

            const words = wordTokens(sentence);
            if (words.length === 0) {
                continue;
            }

            const direct = hasSecondPerson(sentence, context.resources);
            if (!direct && !hasImperativeCue(sentence)) {
                continue;
            }

            const tone = sentence.polarity > 0 ? "positive" : "negative";
            matches.push(createPatternMatch(document, {
                category  : "APPEAL_TO_EMOTION",
                start     : words[0].start,
                end       : words[words.length - 1].end,
                confidence: kPOLARITY_SCALE * magnitude,
                rationale : `extreme ${tone} polarity (${sentence.polarity.toFixed(2)}) ${direct ? "addressed to the reader" : "in an imperative"}`,
                detectorId: kPOLARITY_EXTREMITY_ID,
            }));
        }

        return matches;
    },
});
