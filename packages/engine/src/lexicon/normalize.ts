/**
 * @fileoverview Term normalization
 *
 * Every key stored in or looked up from the lexical store goes through
 * {@link normalizeTerm}, so lexicon authors and annotators can disagree
 * on case, quote style and spacing.
 *
 * @module @slant/engine/lexicon/normalize
 */

const kCURLY_SINGLE = /[‘’‛′]/g;
const kCURLY_DOUBLE = /[“”‟″]/g;

/**
 * NFKC, curly quotes folded to ASCII, lower-cased, whitespace collapsed.
 *
 * @example
 * ```typescript
 * normalizeTerm("  Don’t   PANIC "); // "don't panic"
 * ```
 */
export function normalizeTerm(term: string): string {
    return term
        .normalize("NFKC")
        .replace(kCURLY_SINGLE, "'")
        .replace(kCURLY_DOUBLE, "\"")
        .toLowerCase()
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Split a normalized phrase into its words.
 */
export function splitWords(phrase: string): string[] {
    const normalized = normalizeTerm(phrase);
    return normalized ? normalized.split(" ") : [];
}

/**
 * True when the token carries at least one letter or digit.
 */
export function isWordText(text: string): boolean {
    return /[\p{L}\p{N}]/u.test(text);
}
