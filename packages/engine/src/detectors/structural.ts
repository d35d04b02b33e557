/**
 * @fileoverview Structural detectors
 *
 * Shape patterns over tokens and POS tags; no cue lexicon involved.
 *
 * - false dichotomy: "either ... or ..." (0.7), "only two <noun>" (0.6)
 * - absolute claim: negation or absolute word followed closely by a
 *   comparative or superlative ("nothing is better", "no greater") (0.5)
 *
 * @module @slant/engine/detectors/structural
 */

import type { AnnotatedDocument, Sentence, Token } from "../contracts/AnnotatedDocument.js";
import type { DetectorContext, DetectorPlugin } from "../contracts/DetectorPlugin.js";
import { createPatternMatch, type PatternMatch } from "../contracts/PatternMatch.js";
import type { LexicalResourceStore } from "../lexicon/LexicalResourceStore.js";
import { normalizeTerm } from "../lexicon/normalize.js";
import { wordTokens } from "./cues.js";

export const kEITHER_OR_CONFIDENCE = 0.7;
export const kONLY_TWO_CONFIDENCE = 0.6;
export const kABSOLUTE_CLAIM_CONFIDENCE = 0.5;

/** Tokens after the trigger searched for a comparative or superlative */
const kABSOLUTE_WINDOW = 4;
const kDEGREE_TAGS = new Set(["JJR", "JJS", "RBR", "RBS"]);

const kFALSE_DICHOTOMY_ID = "structural:false-dichotomy";
const kABSOLUTE_CLAIM_ID = "structural:absolute-claim";

function is(token: Token, word: string): boolean {
    return normalizeTerm(token.text) === word;
}

function eitherOrMatches(document: AnnotatedDocument, sentence: Sentence, detectorId: string): PatternMatch[] {
    const words = wordTokens(sentence);
    const matches: PatternMatch[] = [];

    words.forEach((token, index) => {
        if (!is(token, "either")) {
            return;
        }
        const orIndex = words.findIndex((candidate, at) => at > index && is(candidate, "or"));
        if (orIndex < 0) {
            return;
        }
        const nextEither = words.findIndex((candidate, at) => at > index && is(candidate, "either"));
        if (nextEither >= 0 && nextEither < orIndex) {
            return;
        }

        const last = words[orIndex + 1] ?? words[orIndex];
        matches.push(createPatternMatch(document, {
            category  : "FALSE_DICHOTOMY",
            start     : token.start,
            end       : last.end,
            confidence: kEITHER_OR_CONFIDENCE,
            rationale : "\"either ... or\" framing offers exactly two options",
            detectorId,
        }));
    });

    return matches;
}

function onlyTwoMatches(
    document: AnnotatedDocument,
    sentence: Sentence,
    resources: LexicalResourceStore,
    detectorId: string
): PatternMatch[] {
    const words = wordTokens(sentence);
    const matches: PatternMatch[] = [];

    for (let index = 0; index + 2 < words.length; index++) {
        const noun = words[index + 2];
        if (is(words[index], "only") && is(words[index + 1], "two") && resources.isChildTag("NN", noun.pos)) {
            matches.push(createPatternMatch(document, {
                category  : "FALSE_DICHOTOMY",
                start     : words[index].start,
                end       : noun.end,
                confidence: kONLY_TWO_CONFIDENCE,
                rationale : `"only two ${noun.text}" restricts the choice to two options`,
                detectorId,
            }));
        }
    }

    return matches;
}

export const falseDichotomyDetector: DetectorPlugin = Object.freeze({
    id         : kFALSE_DICHOTOMY_ID,
    category   : "FALSE_DICHOTOMY",
    name       : "False dichotomy shapes",
    description: "\"either ... or\" and \"only two <noun>\" constructions",
    detect(document: AnnotatedDocument, context: DetectorContext): readonly PatternMatch[] {
        return document.sentences.flatMap(sentence => [
            ...eitherOrMatches(document, sentence, kFALSE_DICHOTOMY_ID),
            ...onlyTwoMatches(document, sentence, context.resources, kFALSE_DICHOTOMY_ID),
        ]);
    },
});

export const absoluteClaimDetector: DetectorPlugin = Object.freeze({
    id         : kABSOLUTE_CLAIM_ID,
    category   : "VAGUE_GENERALIZATION",
    name       : "Absolute claims",
    description: "Negation or absolute word followed by a comparative or superlative",
    detect(document: AnnotatedDocument, context: DetectorContext): readonly PatternMatch[] {
        const { resources } = context;
        const matches: PatternMatch[] = [];

        for (const sentence of document.sentences) {
            const words = wordTokens(sentence);
            words.forEach((token, index) => {
                if (!resources.inList("negation", token) && !resources.inList("absolute", token)) {
                    return;
                }
                const degree = words
                    .slice(index + 1, index + 1 + kABSOLUTE_WINDOW)
                    .find(candidate => kDEGREE_TAGS.has(candidate.pos));
                if (!degree) {
                    return;
                }
                matches.push(createPatternMatch(document, {
                    category  : "VAGUE_GENERALIZATION",
                    start     : token.start,
                    end       : degree.end,
                    confidence: kABSOLUTE_CLAIM_CONFIDENCE,
                    rationale : `absolute claim "${token.text} ... ${degree.text}"`,
                    detectorId: kABSOLUTE_CLAIM_ID,
                }));
            });
        }

        return matches;
    },
});
