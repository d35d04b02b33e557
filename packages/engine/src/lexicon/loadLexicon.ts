/**
 * @fileoverview Lexicon Loader
 *
 * Loads the lexical resources from a YAML file:
 *
 * ```yaml
 * version: "2024.1"
 * contractions:
 *   "don't": ["do not"]
 *   "he's": ["he", "he is"]
 * pos_tags:
 *   VBD: VB
 * word_lists:
 *   second_person: [you, your]
 *   ...
 * categories:
 *   FALSE_URGENCY:
 *     weight: 0.6
 *     terms:
 *       - right now
 *       - { phrase: act fast, weight: 0.7, tags: [VB, RB] }
 *       - "{ hurr(y|ied|ies) }"
 * ```
 *
 * A term written `{ expr }` is a regular expression matched, without
 * case, against one whole word. It takes at most one tag.
 *
 * Every problem found is collected and reported in one ResourceLoadError.
 *
 * @module @slant/engine/lexicon/loadLexicon
 */

import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { parse as parseYaml } from "yaml";
import { CATEGORY_INFO, PATTERN_CATEGORIES, isPatternCategory, type PatternCategory } from "../contracts/PatternCategory.js";
import { ResourceLoadError, describeError } from "../contracts/errors.js";
import {
    LexicalResourceStore,
    WORD_LISTS,
    expandWith,
    type CueTable,
    type LexiconEntry,
    type WordListName,
} from "./LexicalResourceStore.js";
import { normalizeTerm, splitWords } from "./normalize.js";

const kDEFAULT_LEXICON = "../../lexicons/default.yml";

const kPATTERN_TERM = /^\{\s*(.+?)\s*\}$/su;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === "string");
}

function isWeight(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value) && value > 0 && value <= 1;
}

/**
 * Path of the lexicon shipped with the engine package.
 */
export function defaultLexiconPath(): string {
    return resolve(dirname(fileURLToPath(import.meta.url)), kDEFAULT_LEXICON);
}

/**
 * Load and validate a lexicon file.
 *
 * @param filePath - Path to the lexicon YAML
 * @throws ResourceLoadError if the file is missing, unreadable or invalid
 */
export function loadLexicalResources(filePath: string): LexicalResourceStore {
    if (!existsSync(filePath)) {
        throw new ResourceLoadError(`Lexicon file not found: ${filePath}`, { source: filePath });
    }

    let content: string;
    try {
        content = readFileSync(filePath, "utf-8");
    }
    catch (error) {
        throw new ResourceLoadError(`Lexicon file could not be read: ${describeError(error)}`, {
            source: filePath,
            cause : error,
        });
    }

    return parseLexicalResources(content, filePath);
}

export function loadDefaultLexicalResources(): LexicalResourceStore {
    return loadLexicalResources(defaultLexiconPath());
}

/**
 * Parse lexicon YAML text.
 *
 * @param text - YAML document
 * @param source - Label used in error messages
 */
export function parseLexicalResources(text: string, source = "<inline>"): LexicalResourceStore {
    let raw: unknown;
    try {
        raw = parseYaml(text);
    }
    catch (error) {
        throw new ResourceLoadError(`Lexicon is not valid YAML: ${describeError(error)}`, {
            source,
            cause: error,
        });
    }

    return buildLexicalResources(raw, source);
}

/**
 * Validate an already parsed lexicon object and build the store.
 *
 * @param raw - Parsed lexicon document
 * @param source - Label used in error messages
 */
export function buildLexicalResources(raw: unknown, source = "<inline>"): LexicalResourceStore {
    const issues: string[] = [];

    if (!isRecord(raw)) {
        throw new ResourceLoadError("Invalid lexicon format: expected a mapping at the top level", {
            source,
            issues: ["top level is not a mapping"],
        });
    }

    const version = typeof raw.version === "string" || typeof raw.version === "number"
        ? String(raw.version)
        : "unversioned";

    const contractions = readContractions(raw.contractions, issues);
    const posParents = readPosTags(raw.pos_tags, issues);
    const wordLists = readWordLists(raw.word_lists, issues);
    const cueTables = readCategories(raw.categories, contractions, issues);

    if (issues.length > 0) {
        throw new ResourceLoadError(`Invalid lexicon ${source}: ${issues.join(" | ")}`, { source, issues });
    }

    return new LexicalResourceStore({ version, contractions, posParents, wordLists, cueTables });
}

function readContractions(value: unknown, issues: string[]): Map<string, readonly string[]> {
    const contractions = new Map<string, readonly string[]>();

    if (!isRecord(value)) {
        issues.push("contractions: missing or not a mapping");
        return contractions;
    }

    for (const [word, readings] of Object.entries(value)) {
        if (typeof readings === "string") {
            contractions.set(normalizeTerm(word), [normalizeTerm(readings)]);
        }
        else if (isStringArray(readings) && readings.length > 0) {
            contractions.set(normalizeTerm(word), readings.map(normalizeTerm));
        }
        else {
            issues.push(`contractions.${word}: expected a reading or a list of readings`);
        }
    }

    return contractions;
}

function readPosTags(value: unknown, issues: string[]): Map<string, string> {
    const parents = new Map<string, string>();

    if (value === undefined || value === null) {
        return parents;
    }
    if (!isRecord(value)) {
        issues.push("pos_tags: expected a mapping of tag to parent tag");
        return parents;
    }

    for (const [tag, parent] of Object.entries(value)) {
        if (typeof parent !== "string" || !parent) {
            issues.push(`pos_tags.${tag}: parent must be a tag name`);
        }
        else {
            parents.set(tag, parent);
        }
    }

    for (const tag of parents.keys()) {
        const seen = new Set<string>();
        let current: string | undefined = tag;
        while (current !== undefined) {
            if (seen.has(current)) {
                issues.push(`pos_tags: cycle through ${tag}`);
                break;
            }
            seen.add(current);
            current = parents.get(current);
        }
    }

    return parents;
}

function readWordLists(value: unknown, issues: string[]): Record<WordListName, readonly string[]> {
    const lists: Record<WordListName, readonly string[]> = {
        second_person: [],
        negation     : [],
        conditional  : [],
        future_modal : [],
        intensifier  : [],
        hedge        : [],
        absolute     : [],
    };

    if (!isRecord(value)) {
        issues.push("word_lists: missing or not a mapping");
        return lists;
    }

    for (const name of WORD_LISTS) {
        const words = value[name];
        if (!isStringArray(words) || words.length === 0) {
            issues.push(`word_lists.${name}: missing or empty`);
        }
        else {
            lists[name] = words.map(normalizeTerm);
        }
    }

    for (const name of Object.keys(value)) {
        if (!WORD_LISTS.some(list => list === name)) {
            issues.push(`word_lists.${name}: unknown list`);
        }
    }

    return lists;
}

function phraseWords(phrase: string, contractions: ReadonlyMap<string, readonly string[]>): string[] {
    return splitWords(phrase).flatMap(word => (word.includes("'") ? expandWith(contractions, word) : [word]));
}

function readPattern(
    expression: string,
    weight: number,
    tags: string[] | null,
    where: string,
    issues: string[]
): LexiconEntry | null {
    const key = `{ ${expression} }`;

    let pattern: RegExp;
    try {
        pattern = new RegExp(`^(?:${expression})$`, "iu");
    }
    catch (error) {
        issues.push(`${where}: invalid pattern "${key}": ${describeError(error)}`);
        return null;
    }

    if (tags && tags.length !== 1) {
        issues.push(`${where}: pattern "${key}" takes one tag but has ${tags.length}`);
        return null;
    }

    return Object.freeze({
        key,
        words: Object.freeze([]),
        tags : tags ? Object.freeze([...tags]) : null,
        weight,
        pattern,
    });
}

function readEntry(
    term: unknown,
    defaultWeight: number,
    contractions: ReadonlyMap<string, readonly string[]>,
    where: string,
    issues: string[]
): LexiconEntry | null {
    let phrase: string;
    let weight = defaultWeight;
    let tags: string[] | null = null;

    if (typeof term === "string") {
        phrase = term;
    }
    else if (isRecord(term) && typeof term.phrase === "string") {
        phrase = term.phrase;
        if (term.weight !== undefined) {
            if (!isWeight(term.weight)) {
                issues.push(`${where}: weight must be in (0, 1]`);
                return null;
            }
            weight = term.weight;
        }
        if (term.tags !== undefined) {
            if (!isStringArray(term.tags)) {
                issues.push(`${where}: tags must be a list of POS tags`);
                return null;
            }
            tags = term.tags;
        }
    }
    else {
        issues.push(`${where}: expected a phrase or { phrase, weight?, tags? }`);
        return null;
    }

    const expression = kPATTERN_TERM.exec(phrase.trim());
    if (expression) {
        return readPattern(expression[1], weight, tags, where, issues);
    }

    const words = phraseWords(phrase, contractions);
    if (words.length === 0) {
        issues.push(`${where}: empty phrase`);
        return null;
    }
    if (tags && tags.length !== words.length) {
        issues.push(`${where}: "${phrase}" has ${words.length} words but ${tags.length} tags`);
        return null;
    }

    return Object.freeze({
        key    : words.join(" "),
        words  : Object.freeze(words),
        tags   : tags ? Object.freeze([...tags]) : null,
        weight,
        pattern: null,
    });
}

function readCategories(
    value: unknown,
    contractions: ReadonlyMap<string, readonly string[]>,
    issues: string[]
): Partial<Record<PatternCategory, CueTable>> {
    const tables: Partial<Record<PatternCategory, CueTable>> = {};

    if (!isRecord(value)) {
        issues.push("categories: missing or not a mapping");
        return tables;
    }

    for (const [name, table] of Object.entries(value)) {
        if (!isPatternCategory(name)) {
            issues.push(`categories.${name}: unknown category`);
            continue;
        }
        if (!isRecord(table) || !Array.isArray(table.terms)) {
            issues.push(`categories.${name}: expected { weight, terms: [...] }`);
            continue;
        }

        const weight = table.weight ?? 0.5;
        if (!isWeight(weight)) {
            issues.push(`categories.${name}.weight must be in (0, 1]`);
            continue;
        }

        const entries: LexiconEntry[] = [];
        const seen = new Set<string>();
        table.terms.forEach((term: unknown, index: number) => {
            const entry = readEntry(term, weight, contractions, `categories.${name}.terms[${index}]`, issues);
            if (!entry) {
                return;
            }
            if (seen.has(entry.key)) {
                issues.push(`categories.${name}: duplicate term "${entry.key}"`);
                return;
            }
            seen.add(entry.key);
            entries.push(entry);
        });

        tables[name] = Object.freeze({ weight, entries: Object.freeze(entries) });
    }

    for (const category of PATTERN_CATEGORIES) {
        if (CATEGORY_INFO[category].usesLexicon && !tables[category]) {
            issues.push(`categories.${category}: missing cue table`);
        }
    }

    return tables;
}
