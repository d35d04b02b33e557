/**
 * @fileoverview Lexicon barrel exports
 *
 * @module @slant/engine/lexicon
 */

export {
    LexicalResourceStore,
    WORD_LISTS,
    expandWith,
} from "./LexicalResourceStore.js";
export type {
    CueTable,
    LexicalTables,
    LexiconEntry,
    WordListName,
} from "./LexicalResourceStore.js";

export {
    buildLexicalResources,
    defaultLexiconPath,
    loadDefaultLexicalResources,
    loadLexicalResources,
    parseLexicalResources,
} from "./loadLexicon.js";

export { isWordText, normalizeTerm, splitWords } from "./normalize.js";
