/**
 * @fileoverview Unit tests for the lexical resource store and its loader
 *
 * Tests cover:
 * - Normalized lookups and per-category namespaces
 * - Phrase index and token keys
 * - Contraction expansion (map, promising/secure, suffix guess)
 * - POS tag hierarchy
 * - Regex pattern entries
 * - Loader validation
 * - The shipped default lexicon
 */

import { describe, it, expect } from "vitest";
import type { Token } from "../contracts/AnnotatedDocument.js";
import { ResourceLoadError } from "../contracts/errors.js";
import {
    buildLexicalResources,
    loadDefaultLexicalResources,
    loadLexicalResources,
    parseLexicalResources,
} from "../lexicon/loadLexicon.js";
import { normalizeTerm } from "../lexicon/normalize.js";

const kLEXICON = `
version: test-1
contractions:
  "don't": ["do not"]
  "he's": ["he", "he is"]
pos_tags:
  VBD: VB
  VBZ: VB
  JJS: JJ
word_lists:
  second_person: [you, your]
  negation: [not, never]
  conditional: [if]
  future_modal: [will]
  intensifier: [very]
  hedge: [maybe]
  absolute: [always]
categories:
  LOADED_LANGUAGE:
    weight: 0.5
    terms: [regime, { phrase: slam, tags: [VB] }]
  FALSE_URGENCY:
    weight: 0.6
    terms: [right now, "don't wait", { phrase: act fast, weight: 0.9 }]
  GUILT_INDUCTION:
    weight: 0.6
    terms: [your fault]
  VAGUE_GENERALIZATION:
    weight: 0.4
    terms: [they say, regime]
  APPEAL_TO_EMOTION:
    weight: 0.5
    terms: [tragic]
  FEAR_APPEAL:
    weight: 0.55
    terms: [danger]
`;

function token(text: string, pos = "", lemma = text.toLowerCase()): Token {
    return { start: 0, end: text.length, text, lemma, pos, sentenceIndex: 0 };
}

describe("normalizeTerm", () => {
    it("should fold case, curly quotes and whitespace", () => {
        expect(normalizeTerm("  Don’t   PANIC ")).toBe("don't panic");
    });
});

describe("LexicalResourceStore", () => {
    const store = parseLexicalResources(kLEXICON, "inline-test");

    describe("lookup", () => {
        it("should match terms regardless of case and spacing", () => {
            expect(store.lookup("Right   Now", "FALSE_URGENCY")).toBe(true);
            expect(store.lookup("REGIME", "LOADED_LANGUAGE")).toBe(true);
        });

        it("should keep categories as separate namespaces", () => {
            expect(store.lookup("regime", "VAGUE_GENERALIZATION")).toBe(true);
            expect(store.lookup("danger", "LOADED_LANGUAGE")).toBe(false);
            expect(store.lookup("anything", "FALSE_DICHOTOMY")).toBe(false);
        });

        it("should store phrases with contractions expanded", () => {
            expect(store.lookup("do not wait", "FALSE_URGENCY")).toBe(true);
            expect(store.lookup("don't wait", "FALSE_URGENCY")).toBe(false);
        });

        it("should list the terms of a category", () => {
            expect([...store.termsFor("FALSE_URGENCY")].sort()).toEqual(["act fast", "do not wait", "right now"]);
            expect(store.termsFor("FALSE_DICHOTOMY").size).toBe(0);
        });

        it("should expose table weights and entry weights", () => {
            expect(store.baseWeight("FALSE_URGENCY")).toBe(0.6);
            expect(store.baseWeight("FALSE_DICHOTOMY")).toBe(0);
            expect(store.hasTable("FALSE_DICHOTOMY")).toBe(false);

            const [actFast] = store.entriesStartingWith("FALSE_URGENCY", "act");
            expect(actFast).toEqual({ key: "act fast", words: ["act", "fast"], tags: null, weight: 0.9, pattern: null });
        });

        it("should report the lexicon version", () => {
            expect(store.version).toBe("test-1");
        });
    });

    describe("pattern entries", () => {
        const patterned = parseLexicalResources(
            kLEXICON.replace("terms: [tragic]", "terms: [tragic, \"{ heart(break|broken)[a-z]* }\", { phrase: \"{ sob(s|bed)? }\", tags: [VB] }]")
        );

        it("should compile a braced term into a whole-word pattern", () => {
            const [heart, sob] = patterned.patternsFor("APPEAL_TO_EMOTION");

            expect(heart.key).toBe("{ heart(break|broken)[a-z]* }");
            expect(heart.words).toEqual([]);
            expect(heart.weight).toBe(0.5);
            expect(heart.pattern?.test("heartbreaking")).toBe(true);
            expect(heart.pattern?.test("disheartbreaking")).toBe(false);
            expect(sob.tags).toEqual(["VB"]);
        });

        it("should keep patterns out of the phrase keys", () => {
            expect([...patterned.termsFor("APPEAL_TO_EMOTION")]).toEqual(["tragic"]);
            expect(patterned.patternsFor("FEAR_APPEAL")).toEqual([]);
        });

        it("should look single words up through patterns", () => {
            expect(patterned.lookup("Heartbroken", "APPEAL_TO_EMOTION")).toBe(true);
            expect(patterned.lookup("heartbroken again", "APPEAL_TO_EMOTION")).toBe(false);
            expect(patterned.lookup("heartbroken", "FEAR_APPEAL")).toBe(false);
        });
    });

    describe("tokenKeys", () => {
        it("should put the lemma before the surface form", () => {
            expect(store.tokenKeys(token("Ruined", "VBD", "ruin"))).toEqual(["ruin", "ruined"]);
        });

        it("should add the single-word expansion of a contracted surface", () => {
            expect(store.tokenKeys(token("n't", "RB", "n't"))).toEqual(["n't", "not"]);
        });

        it("should check word lists through every key", () => {
            expect(store.inList("negation", token("n't", "RB", "n't"))).toBe(true);
            expect(store.inList("second_person", token("You", "PRP"))).toBe(true);
            expect(store.inList("hedge", token("surely"))).toBe(false);
            expect([...store.listTerms("conditional")]).toEqual(["if"]);
        });
    });

    describe("expandContraction", () => {
        it("should take the likely reading when promising", () => {
            expect(store.expandContraction("he's")).toEqual(["he", "is"]);
        });

        it("should take the secure reading when not promising", () => {
            expect(store.expandContraction("he's", false)).toEqual(["he"]);
        });

        it("should use the only reading either way", () => {
            expect(store.expandContraction("Don't", false)).toEqual(["do", "not"]);
        });

        it("should guess unknown contractions from the suffix", () => {
            expect(store.expandContraction("they'll")).toEqual(["they", "will"]);
            expect(store.expandContraction("she'd")).toEqual(["she", "would"]);
            expect(store.expandContraction("isn't")).toEqual(["is", "not"]);
        });

        it("should drop the guessed part when not promising", () => {
            expect(store.expandContraction("they'll", false)).toEqual(["they"]);
            expect(store.expandContraction("n't", false)).toEqual([]);
        });

        it("should strip apostrophes from words that are not contractions", () => {
            expect(store.expandContraction("o'clock")).toEqual(["oclock"]);
            expect(store.expandContraction("plain")).toEqual(["plain"]);
        });
    });

    describe("isChildTag", () => {
        it("should follow the tag hierarchy", () => {
            expect(store.isChildTag("VB", "VBD")).toBe(true);
            expect(store.isChildTag("VB", "VB")).toBe(true);
            expect(store.isChildTag("JJ", "JJS")).toBe(true);
            expect(store.isChildTag("VB", "NN")).toBe(false);
            expect(store.isChildTag("VBD", "VB")).toBe(false);
        });

        it("should treat * as the parent of every tag", () => {
            expect(store.isChildTag("*", "")).toBe(true);
        });
    });
});

describe("lexicon loader", () => {
    it("should collect every problem into one ResourceLoadError", () => {
        const raw = {
            contractions: {},
            pos_tags    : { VBD: "VB", VB: "VBD" },
            word_lists  : { negation: ["not"] },
            categories  : {
                FALSE_URGENCY: { weight: 1.5, terms: ["now"] },
                MADE_UP      : { weight: 0.5, terms: ["x"] },
            },
        };

        let caught: unknown;
        try {
            buildLexicalResources(raw, "broken.yml");
        }
        catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ResourceLoadError);
        if (!(caught instanceof ResourceLoadError)) {
            return;
        }
        expect(caught.source).toBe("broken.yml");
        expect(caught.issues).toContain("pos_tags: cycle through VBD");
        expect(caught.issues).toContain("word_lists.second_person: missing or empty");
        expect(caught.issues).toContain("categories.FALSE_URGENCY.weight must be in (0, 1]");
        expect(caught.issues).toContain("categories.MADE_UP: unknown category");
        expect(caught.issues).toContain("categories.GUILT_INDUCTION: missing cue table");
    });

    it("should reject a tag list that does not fit the phrase", () => {
        const text = kLEXICON.replace("{ phrase: slam, tags: [VB] }", "{ phrase: slam dunk, tags: [VB] }");

        expect(() => parseLexicalResources(text)).toThrow("\"slam dunk\" has 2 words but 1 tags");
    });

    it("should reject a pattern that is not a valid expression", () => {
        const text = kLEXICON.replace("terms: [danger]", "terms: [danger, \"{ (unclosed }\"]");

        let caught: unknown;
        try {
            parseLexicalResources(text, "patterns.yml");
        }
        catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ResourceLoadError);
        if (!(caught instanceof ResourceLoadError)) {
            return;
        }
        expect(caught.issues).toHaveLength(1);
        expect(caught.issues[0]).toMatch(/^categories\.FEAR_APPEAL\.terms\[1\]: invalid pattern "\{ \(unclosed \}": /);
    });

    it("should reject a pattern with more than one tag", () => {
        const text = kLEXICON.replace("terms: [danger]", "terms: [danger, { phrase: \"{ doom[a-z]* }\", tags: [NN, JJ] }]");

        expect(() => parseLexicalResources(text))
            .toThrow("categories.FEAR_APPEAL.terms[1]: pattern \"{ doom[a-z]* }\" takes one tag but has 2");
    });

    it("should reject a duplicate term inside one category", () => {
        const text = kLEXICON.replace("terms: [tragic]", "terms: [tragic, Tragic]");

        expect(() => parseLexicalResources(text)).toThrow("categories.APPEAL_TO_EMOTION: duplicate term \"tragic\"");
    });

    it("should reject malformed YAML", () => {
        expect(() => parseLexicalResources("categories: [unclosed", "bad.yml")).toThrow(ResourceLoadError);
    });

    it("should reject a missing file", () => {
        expect(() => loadLexicalResources("/nonexistent/lexicon.yml"))
            .toThrow("Lexicon file not found: /nonexistent/lexicon.yml");
    });
});

describe("default lexicon", () => {
    it("should load and carry a table for every lexicon category", () => {
        const store = loadDefaultLexicalResources();

        expect(store.version).toBe("1.0.0");
        expect(store.hasTable("LOADED_LANGUAGE")).toBe(true);
        expect(store.hasTable("FEAR_APPEAL")).toBe(true);
        expect(store.lookup("right now", "FALSE_URGENCY")).toBe(true);
        expect(store.lookup("before it is too late", "FALSE_URGENCY")).toBe(true);
        expect(store.expandContraction("won't")).toEqual(["will", "not"]);
    });

    it("should keep neutral scheduling words out of every table", () => {
        const store = loadDefaultLexicalResources();
        const words = ["the", "meeting", "be", "is", "schedule", "scheduled", "for", "3", "pm", "on", "tuesday"];

        for (const word of words) {
            expect(store.lookup(word, "LOADED_LANGUAGE")).toBe(false);
            expect(store.lookup(word, "FALSE_URGENCY")).toBe(false);
            expect(store.lookup(word, "GUILT_INDUCTION")).toBe(false);
            expect(store.lookup(word, "VAGUE_GENERALIZATION")).toBe(false);
            expect(store.lookup(word, "APPEAL_TO_EMOTION")).toBe(false);
            expect(store.lookup(word, "FEAR_APPEAL")).toBe(false);
        }
    });
});
