/**
 * @fileoverview Cue helpers shared by detectors
 *
 * Token-level matching of lexicon entries and the small sentence tests
 * (second person, imperative, conditional threat) several detectors use.
 *
 * @module @slant/engine/detectors/cues
 */

import type { Sentence, TextRange, Token } from "../contracts/AnnotatedDocument.js";
import type { PatternCategory } from "../contracts/PatternCategory.js";
import type { LexicalResourceStore, LexiconEntry, WordListName } from "../lexicon/LexicalResourceStore.js";
import { isWordText, normalizeTerm } from "../lexicon/normalize.js";

/**
 * One lexicon entry matched against consecutive tokens of a sentence.
 * `first` and `last` are token indices, both inclusive.
 */
export interface CueHit {
    readonly first: number;
    readonly last: number;
    readonly entry: LexiconEntry;
}

/**
 * Word sequences a token can stand for: each of its keys alone, then the
 * multi-word readings of a contracted surface (`Don't` as `do not`).
 */
function tokenReadings(token: Token, resources: LexicalResourceStore): string[][] {
    const readings = resources.tokenKeys(token).map(key => [key]);
    const surface = normalizeTerm(token.text);

    if (surface.includes("'")) {
        for (const promising of [true, false]) {
            const words = resources.expandContraction(surface, promising);
            const joined = words.join(" ");
            if (words.length > 1 && !readings.some(reading => reading.join(" ") === joined)) {
                readings.push(words);
            }
        }
    }

    return readings;
}

function tagAllows(entry: LexiconEntry, offset: number, token: Token, resources: LexicalResourceStore): boolean {
    const tag = entry.tags?.[offset];
    return tag === undefined || resources.isChildTag(tag, token.pos);
}

/**
 * Match the entry words from `wordIndex` on against the tokens from
 * `tokenIndex` on. A contracted token may cover several entry words.
 *
 * @returns Index of the last token used, or null
 */
function matchFrom(
    tokens: readonly Token[],
    tokenIndex: number,
    entry: LexiconEntry,
    wordIndex: number,
    resources: LexicalResourceStore
): number | null {
    if (wordIndex === entry.words.length) {
        return tokenIndex - 1;
    }
    if (tokenIndex >= tokens.length) {
        return null;
    }

    const token = tokens[tokenIndex];
    for (const reading of tokenReadings(token, resources)) {
        const fits = wordIndex + reading.length <= entry.words.length
            && reading.every((word, offset) => word === entry.words[wordIndex + offset]
                && tagAllows(entry, wordIndex + offset, token, resources));

        if (fits) {
            const last = matchFrom(tokens, tokenIndex + 1, entry, wordIndex + reading.length, resources);
            if (last !== null) {
                return last;
            }
        }
    }

    return null;
}

/**
 * Every entry of a category table found in the sentence, ordered by
 * first token then longest span. Pattern entries match a single token
 * through any of its keys.
 */
export function findCueHits(
    sentence: Sentence,
    category: PatternCategory,
    resources: LexicalResourceStore
): CueHit[] {
    const hits: CueHit[] = [];
    const tokens = sentence.tokens;
    const patterns = resources.patternsFor(category);

    tokens.forEach((token, index) => {
        const seen = new Set<string>();
        const firstWords = new Set(tokenReadings(token, resources).map(([word]) => word));

        for (const word of firstWords) {
            for (const entry of resources.entriesStartingWith(category, word)) {
                if (seen.has(entry.key)) {
                    continue;
                }
                const last = matchFrom(tokens, index, entry, 0, resources);
                if (last !== null) {
                    seen.add(entry.key);
                    hits.push({ first: index, last, entry });
                }
            }
        }

        const keys = resources.tokenKeys(token);
        for (const entry of patterns) {
            if (keys.some(key => entry.pattern?.test(key)) && tagAllows(entry, 0, token, resources)) {
                hits.push({ first: index, last: index, entry });
            }
        }
    });

    return hits.sort((a, b) => a.first - b.first || b.last - a.last);
}

export function hasListWord(list: WordListName, sentence: Sentence, resources: LexicalResourceStore): boolean {
    return sentence.tokens.some(token => resources.inList(list, token));
}

export function hasSecondPerson(sentence: Sentence, resources: LexicalResourceStore): boolean {
    return hasListWord("second_person", sentence, resources);
}

/**
 * Tokens carrying at least one letter or digit.
 */
export function wordTokens(sentence: Sentence): Token[] {
    return sentence.tokens.filter(token => isWordText(token.text));
}

/**
 * Sentence opens with a base-form verb ("Act", "Think", "Imagine").
 */
export function hasImperativeCue(sentence: Sentence): boolean {
    const [first] = wordTokens(sentence);
    return first !== undefined && first.pos === "VB";
}

/**
 * A conditional marker together with a future modal ("if ... will").
 */
export function hasConditionalThreat(sentence: Sentence, resources: LexicalResourceStore): boolean {
    return hasListWord("conditional", sentence, resources) && hasListWord("future_modal", sentence, resources);
}

/**
 * Smallest range covering every given range.
 */
export function unionRange(ranges: readonly TextRange[]): TextRange | null {
    if (ranges.length === 0) {
        return null;
    }
    return {
        start: Math.min(...ranges.map(range => range.start)),
        end  : Math.max(...ranges.map(range => range.end)),
    };
}
