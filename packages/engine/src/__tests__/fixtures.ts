/**
 * @fileoverview Hand-built annotated documents for tests
 *
 * Token offsets are found by searching each token's surface text in the
 * sentence from the end of the previous token, so fixtures only list the
 * tokens in order.
 */

import { vi } from "vitest";
import {
    createAnnotatedDocument,
    type AnnotatedDocument,
    type SentenceInput,
    type TokenInput,
} from "../contracts/AnnotatedDocument.js";
import type { DetectorContext } from "../contracts/DetectorPlugin.js";
import { resolveEngineConfig, type EngineConfig } from "../engine/config.js";
import type { LexicalResourceStore } from "../lexicon/LexicalResourceStore.js";

/** [surface, pos, lemma?] */
export type TokenFixture = readonly [string, string, string?];

export interface SentenceFixture {
    readonly text: string;
    readonly tokens: readonly TokenFixture[];
    readonly polarity?: number;
    readonly subjectivity?: number;
    /** [entity text, type] */
    readonly entities?: ReadonlyArray<readonly [string, string]>;
}

/**
 * Build a document whose sentences are joined by single spaces.
 */
export function buildDocument(id: string, fixtures: readonly SentenceFixture[]): AnnotatedDocument {
    let text = "";
    const sentences: SentenceInput[] = [];

    for (const fixture of fixtures) {
        if (text.length > 0) {
            text += " ";
        }
        const base = text.length;
        text += fixture.text;

        let cursor = 0;
        const tokens: TokenInput[] = fixture.tokens.map(([surface, pos, lemma]) => {
            const at = fixture.text.indexOf(surface, cursor);
            if (at < 0) {
                throw new Error(`Token "${surface}" not found in "${fixture.text}"`);
            }
            cursor = at + surface.length;
            return { start: base + at, end: base + cursor, text: surface, pos, lemma: lemma ?? surface.toLowerCase() };
        });

        const entities = (fixture.entities ?? []).map(([entityText, type]) => {
            const at = fixture.text.indexOf(entityText);
            if (at < 0) {
                throw new Error(`Entity "${entityText}" not found in "${fixture.text}"`);
            }
            return { start: base + at, end: base + at + entityText.length, type };
        });

        sentences.push({
            start       : base,
            end         : base + fixture.text.length,
            tokens,
            polarity    : fixture.polarity,
            subjectivity: fixture.subjectivity,
            entities,
        });
    }

    return createAnnotatedDocument({ id, text, sentences });
}

export const SCENARIO_TEXT = "You always ruin everything, and if you don't fix this right now everyone will suffer!";

export function scenarioDocument(polarity = 0): AnnotatedDocument {
    return buildDocument("scenario", [{
        text  : SCENARIO_TEXT,
        polarity,
        tokens: [
            ["You", "PRP", "you"],
            ["always", "RB"],
            ["ruin", "VBP"],
            ["everything", "NN"],
            [",", ","],
            ["and", "CC"],
            ["if", "IN"],
            ["you", "PRP"],
            ["do", "VBP"],
            ["n't", "RB", "not"],
            ["fix", "VB"],
            ["this", "DT"],
            ["right", "RB"],
            ["now", "RB"],
            ["everyone", "NN"],
            ["will", "MD"],
            ["suffer", "VB"],
            ["!", "."],
        ],
    }]);
}

export function neutralDocument(): AnnotatedDocument {
    return buildDocument("neutral", [{
        text  : "The meeting is scheduled for 3 PM on Tuesday.",
        tokens: [
            ["The", "DT", "the"],
            ["meeting", "NN"],
            ["is", "VBZ", "be"],
            ["scheduled", "VBN", "schedule"],
            ["for", "IN"],
            ["3", "CD"],
            ["PM", "NN", "pm"],
            ["on", "IN"],
            ["Tuesday", "NNP", "tuesday"],
            [".", "."],
        ],
    }]);
}

export function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

export function createTestContext(resources: LexicalResourceStore, config: EngineConfig = {}): DetectorContext {
    return {
        resources,
        config : resolveEngineConfig(config),
        logger : createMockLogger(),
        traceId: "tr_test",
    };
}
