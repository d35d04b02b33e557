/**
 * @fileoverview Lexical Resource Store
 *
 * Read-only lookup tables shared by every detector and every run:
 * - category cue tables (terms, multi-word phrases and single-word
 *   `{ regex }` patterns, optional POS constraints)
 * - contraction expansion map
 * - POS tag hierarchy
 * - auxiliary word lists (second person, negation, hedges, ...)
 *
 * Keys are normalized with {@link normalizeTerm}; lookups are O(1) on
 * average. Categories are independent namespaces, so the same term may
 * appear in several tables.
 *
 * @module @slant/engine/lexicon/LexicalResourceStore
 */

import type { Token } from "../contracts/AnnotatedDocument.js";
import { PATTERN_CATEGORIES, type PatternCategory } from "../contracts/PatternCategory.js";
import { compareStrings } from "../contracts/PatternMatch.js";
import { normalizeTerm, splitWords } from "./normalize.js";

/**
 * Names of the auxiliary word lists every lexicon must provide.
 */
export const WORD_LISTS = [
    "second_person",
    "negation",
    "conditional",
    "future_modal",
    "intensifier",
    "hedge",
    "absolute",
] as const;

export type WordListName = (typeof WORD_LISTS)[number];

/**
 * One cue of a category table.
 */
export interface LexiconEntry {
    /** Normalized phrase, words joined by single spaces; `{ expr }` for a pattern */
    readonly key: string;

    /** Normalized words of the phrase, contractions expanded; empty for a pattern */
    readonly words: readonly string[];

    /** Whole-word expression of a pattern entry, null for a phrase */
    readonly pattern: RegExp | null;

    /** Per-word POS constraints (`*` matches anything), or null */
    readonly tags: readonly string[] | null;

    /** Cue weight in (0, 1] */
    readonly weight: number;
}

export interface CueTable {
    /** Default weight of entries that carry none */
    readonly weight: number;
    readonly entries: readonly LexiconEntry[];
}

/**
 * Validated raw material for a store. Produced by the lexicon loader.
 */
export interface LexicalTables {
    readonly version: string;

    /** Contraction → readings; the first is the "secure" one, the second the most likely */
    readonly contractions: ReadonlyMap<string, readonly string[]>;

    /** POS tag → parent tag */
    readonly posParents: ReadonlyMap<string, string>;

    readonly wordLists: Readonly<Record<WordListName, readonly string[]>>;
    readonly cueTables: Readonly<Partial<Record<PatternCategory, CueTable>>>;
}

interface IndexedCueTable {
    readonly weight: number;
    readonly byKey: ReadonlyMap<string, LexiconEntry>;
    readonly byFirstWord: ReadonlyMap<string, readonly LexiconEntry[]>;
    readonly terms: ReadonlySet<string>;
    readonly patterns: readonly LexiconEntry[];
}

const kEMPTY_ENTRIES: readonly LexiconEntry[] = Object.freeze([]);
const kEMPTY_TERMS: ReadonlySet<string> = new Set<string>();

/**
 * Guess the expansion of an unknown contraction from its suffix.
 * With `promising` false only the part that is certain is kept.
 */
function guessContraction(word: string, promising: boolean): string[] | null {
    const suffixes: ReadonlyArray<readonly [string, string]> = [
        ["n't", "not"],
        ["'s", "is"],
        ["'re", "are"],
        ["'ll", "will"],
        ["'d", "would"],
        ["'ve", "have"],
    ];

    for (const [suffix, expansion] of suffixes) {
        if (word.endsWith(suffix)) {
            const stem = word.slice(0, -suffix.length);
            return promising ? [stem, expansion] : [stem];
        }
    }

    return null;
}

/**
 * Contraction expansion against an explicit map. Shared by the store and
 * the lexicon loader, which expands phrases before the store exists.
 */
export function expandWith(
    contractions: ReadonlyMap<string, readonly string[]>,
    word: string,
    promising = true
): string[] {
    const key = normalizeTerm(word);
    const readings = contractions.get(key);

    if (readings && readings.length > 0) {
        const chosen = readings.length === 1 || !promising ? readings[0] : readings[1];
        return splitWords(chosen);
    }

    const parts = guessContraction(key, promising) ?? [key];
    return parts
        .map(part => part.replace(/'/g, ""))
        .filter(part => part.length > 0);
}

function indexTable(table: CueTable): IndexedCueTable {
    const byKey = new Map<string, LexiconEntry>();
    const byFirstWord = new Map<string, LexiconEntry[]>();
    const patterns: LexiconEntry[] = [];

    for (const entry of table.entries) {
        if (entry.pattern) {
            patterns.push(entry);
            continue;
        }
        byKey.set(entry.key, entry);
        const first = entry.words[0];
        const bucket = byFirstWord.get(first) ?? [];
        bucket.push(entry);
        byFirstWord.set(first, bucket);
    }

    // Longest phrases first, then alphabetical, so scans are deterministic
    for (const bucket of byFirstWord.values()) {
        bucket.sort((a, b) => b.words.length - a.words.length || compareStrings(a.key, b.key));
        Object.freeze(bucket);
    }

    return {
        weight: table.weight,
        byKey,
        byFirstWord,
        terms   : new Set(byKey.keys()),
        patterns: Object.freeze(patterns),
    };
}

/**
 * Lexical Resource Store
 *
 * Built once at startup and passed by reference into every detector
 * call. Nothing mutates it after construction.
 *
 * @example
 * ```typescript
 * const store = loadDefaultLexicalResources();
 *
 * store.lookup("Right now", "FALSE_URGENCY");   // true
 * store.expandContraction("don't");            // ["do", "not"]
 * store.isChildTag("VB", "VBD");               // true
 * ```
 */
export class LexicalResourceStore {
    readonly version: string;

    private readonly cueTables: ReadonlyMap<PatternCategory, IndexedCueTable>;
    private readonly wordLists: ReadonlyMap<WordListName, ReadonlySet<string>>;
    private readonly contractions: ReadonlyMap<string, readonly string[]>;
    private readonly posParents: ReadonlyMap<string, string>;

    constructor(tables: LexicalTables) {
        this.version = tables.version;
        this.contractions = new Map(tables.contractions);
        this.posParents = new Map(tables.posParents);

        const cueTables = new Map<PatternCategory, IndexedCueTable>();
        for (const category of PATTERN_CATEGORIES) {
            const table = tables.cueTables[category];
            if (table) {
                cueTables.set(category, indexTable(table));
            }
        }
        this.cueTables = cueTables;

        const wordLists = new Map<WordListName, ReadonlySet<string>>();
        for (const list of WORD_LISTS) {
            wordLists.set(list, new Set(tables.wordLists[list].map(normalizeTerm)));
        }
        this.wordLists = wordLists;
    }

    /**
     * Check whether a term or lemma is a cue of a category, either as a
     * phrase or, for a single word, through a pattern entry.
     *
     * @param termOrLemma - Single word or phrase, any case
     * @param category - Category table to search
     */
    lookup(termOrLemma: string, category: PatternCategory): boolean {
        const table = this.cueTables.get(category);
        if (!table) {
            return false;
        }

        const term = normalizeTerm(termOrLemma);
        if (table.byKey.has(term)) {
            return true;
        }
        return !term.includes(" ") && table.patterns.some(entry => entry.pattern?.test(term));
    }

    /**
     * All normalized phrase keys of a category (empty when it has no table).
     * Pattern entries are listed by {@link patternsFor}.
     */
    termsFor(category: PatternCategory): ReadonlySet<string> {
        return this.cueTables.get(category)?.terms ?? kEMPTY_TERMS;
    }

    /**
     * Entries whose first word is `word`, longest phrase first.
     */
    entriesStartingWith(category: PatternCategory, word: string): readonly LexiconEntry[] {
        return this.cueTables.get(category)?.byFirstWord.get(word) ?? kEMPTY_ENTRIES;
    }

    patternsFor(category: PatternCategory): readonly LexiconEntry[] {
        return this.cueTables.get(category)?.patterns ?? kEMPTY_ENTRIES;
    }

    /**
     * Default weight of a category's cues (0 without a table).
     */
    baseWeight(category: PatternCategory): number {
        return this.cueTables.get(category)?.weight ?? 0;
    }

    hasTable(category: PatternCategory): boolean {
        return this.cueTables.has(category);
    }

    /**
     * Normalized keys a token can match under, lemma first.
     *
     * The surface form follows the lemma; a contracted surface such as
     * `n't` also contributes its single-word expansion (`not`).
     */
    tokenKeys(token: Token): readonly string[] {
        const keys: string[] = [];
        const push = (key: string) => {
            if (key && !keys.includes(key)) {
                keys.push(key);
            }
        };

        push(normalizeTerm(token.lemma));
        const surface = normalizeTerm(token.text);
        push(surface);

        if (surface.includes("'")) {
            const expanded = this.expandContraction(surface);
            if (expanded.length === 1) {
                push(expanded[0]);
            }
        }

        return keys;
    }

    /**
     * True when any key of the token is in the named word list.
     */
    inList(list: WordListName, token: Token): boolean {
        const words = this.wordLists.get(list);
        if (!words) {
            return false;
        }
        return this.tokenKeys(token).some(key => words.has(key));
    }

    listTerms(list: WordListName): ReadonlySet<string> {
        return this.wordLists.get(list) ?? kEMPTY_TERMS;
    }

    /**
     * Expand a contraction into its words.
     *
     * Known contractions use the map: the second reading when `promising`
     * and one exists, else the first. Unknown ones are guessed from the
     * suffix. Apostrophes are stripped from guessed parts and empty parts
     * dropped, so `n't` becomes `["not"]`.
     *
     * @param word - Word to expand
     * @param promising - Prefer the most likely reading over the certain part
     */
    expandContraction(word: string, promising = true): string[] {
        return expandWith(this.contractions, word, promising);
    }

    /**
     * Whether `parent` is `child` or one of its ancestors in the tag hierarchy.
     * `*` is the parent of every tag.
     */
    isChildTag(parent: string, child: string): boolean {
        if (parent === "*") {
            return true;
        }

        const seen = new Set<string>();
        let current: string | undefined = child;
        while (current !== undefined && !seen.has(current)) {
            if (current === parent) {
                return true;
            }
            seen.add(current);
            current = this.posParents.get(current);
        }

        return false;
    }
}
