/**
 * @fileoverview Lexical cue detector
 *
 * Finds category lexicon entries in each sentence. Overlapping or
 * adjacent hits merge into one match spanning their union; the match
 * confidence starts at the strongest constituent weight and is then
 * adjusted by sentence-level modifiers:
 *
 * - subjectivity above the threshold: × (1 + subjectivityBonus)
 * - intensifier directly before the span: × intensifierBoost
 * - hedge anywhere in the sentence: × hedgeDamping
 * - optional detector-specific sentence boost
 *
 * @module @slant/engine/detectors/lexicalCue
 */

import type { AnnotatedDocument, Sentence } from "../contracts/AnnotatedDocument.js";
import type { DetectorContext, DetectorPlugin } from "../contracts/DetectorPlugin.js";
import { CATEGORY_INFO, type PatternCategory } from "../contracts/PatternCategory.js";
import { createPatternMatch, type PatternMatch } from "../contracts/PatternMatch.js";
import { findCueHits, hasListWord, type CueHit } from "./cues.js";

/**
 * Extra multiplier a detector applies to every match in a sentence.
 */
export interface SentenceBoost {
    readonly factor: number;
    readonly reason: string;
}

export interface LexicalCueDetectorOptions {
    readonly id: string;
    readonly name?: string;
    readonly description?: string;
    readonly sentenceBoost?: (sentence: Sentence, context: DetectorContext) => SentenceBoost | null;
}

export interface CueGroup {
    first: number;
    last: number;
    weight: number;
    cues: string[];
}

/**
 * Merge hits that overlap or touch, in token order.
 */
export function groupCueHits(hits: readonly CueHit[]): CueGroup[] {
    const groups: CueGroup[] = [];

    for (const hit of hits) {
        const current = groups[groups.length - 1];
        if (current && hit.first <= current.last + 1) {
            current.last = Math.max(current.last, hit.last);
            current.weight = Math.max(current.weight, hit.entry.weight);
            if (!current.cues.includes(hit.entry.key)) {
                current.cues.push(hit.entry.key);
            }
        }
        else {
            groups.push({ first: hit.first, last: hit.last, weight: hit.entry.weight, cues: [hit.entry.key] });
        }
    }

    return groups;
}

/**
 * Build a lexicon-driven detector for one category.
 *
 * @example
 * ```typescript
 * const detector = createLexicalCueDetector("GUILT_INDUCTION", { id: "lexical:guilt-induction" });
 * detector.detect(document, context);
 * ```
 */
export function createLexicalCueDetector(
    category: PatternCategory,
    options: LexicalCueDetectorOptions
): DetectorPlugin {
    const label = CATEGORY_INFO[category].label.toLowerCase();

    const detectSentence = (
        document: AnnotatedDocument,
        sentence: Sentence,
        context: DetectorContext
    ): PatternMatch[] => {
        const { resources, config } = context;
        const hits = findCueHits(sentence, category, resources);
        if (hits.length === 0) {
            return [];
        }

        const hedged = hasListWord("hedge", sentence, resources);
        const subjective = sentence.subjectivity > config.subjectivityThreshold;
        const boost = options.sentenceBoost?.(sentence, context) ?? null;

        return groupCueHits(hits).map((group) => {
            let confidence = group.weight;
            const notes: string[] = [];

            if (subjective) {
                confidence *= 1 + config.subjectivityBonus;
                notes.push("subjective sentence");
            }

            const before = sentence.tokens[group.first - 1];
            if (before && resources.inList("intensifier", before)) {
                confidence *= config.intensifierBoost;
                notes.push(`intensified by "${before.text}"`);
            }

            if (hedged) {
                confidence *= config.hedgeDamping;
                notes.push("hedged");
            }

            if (boost) {
                confidence *= boost.factor;
                notes.push(boost.reason);
            }

            const cues = group.cues.map(cue => `"${cue}"`).join(", ");
            const rationale = notes.length > 0
                ? `${label} cue ${cues} (${notes.join("; ")})`
                : `${label} cue ${cues}`;

            return createPatternMatch(document, {
                category,
                start     : sentence.tokens[group.first].start,
                end       : sentence.tokens[group.last].end,
                confidence,
                rationale,
                detectorId: options.id,
            });
        });
    };

    return Object.freeze({
        id         : options.id,
        category,
        name       : options.name ?? `${CATEGORY_INFO[category].label} lexicon`,
        description: options.description ?? `Matches ${label} terms and phrases from the lexicon`,
        detect(document: AnnotatedDocument, context: DetectorContext): readonly PatternMatch[] {
            const matches = document.sentences.flatMap(sentence => detectSentence(document, sentence, context));
            if (matches.length > 0) {
                context.logger.debug(`${matches.length} cue match(es)`, { category });
            }
            return matches;
        },
    });
}
