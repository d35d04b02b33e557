/**
 * @fileoverview Annotated Document Contract
 *
 * The immutable input of an analysis run: the original text plus the
 * annotations computed by the external NLP collaborator (sentences,
 * tokens, POS tags, lemmas, polarity, subjectivity, named entities).
 *
 * Offsets are character positions into `text`, `start` inclusive and
 * `end` exclusive.
 *
 * @module @slant/engine/contracts/AnnotatedDocument
 */

import { InvalidDocumentError } from "./errors.js";

/**
 * A half-open character range into the document text.
 */
export interface TextRange {
    readonly start: number;
    readonly end: number;
}

export interface Token extends TextRange {
    /** Surface form as it appears in the text */
    readonly text: string;

    /** Lemma; the lower-cased surface when the collaborator gave none */
    readonly lemma: string;

    /** Penn Treebank style tag; empty when unknown */
    readonly pos: string;

    /** Index of the owning sentence */
    readonly sentenceIndex: number;
}

export interface NamedEntity extends TextRange {
    readonly text: string;

    /** Entity type as reported by the collaborator (PERSON, ORG, GPE, ...) */
    readonly type: string;
}

export interface Sentence extends TextRange {
    readonly index: number;
    readonly tokens: readonly Token[];

    /** Polarity in [-1, 1]; 0 when absent */
    readonly polarity: number;

    /** Subjectivity in [0, 1]; 0 when absent */
    readonly subjectivity: number;

    readonly entities: readonly NamedEntity[];
}

export interface DocumentMetadata {
    readonly sourceFilename?: string;
    readonly format?: string;
}

export interface AnnotatedDocument {
    readonly id: string;
    readonly text: string;
    readonly sentences: readonly Sentence[];
    readonly metadata: DocumentMetadata;
}

/**
 * Token as delivered by the annotation collaborator.
 */
export interface TokenInput {
    readonly start: number;
    readonly end: number;
    readonly text?: string;
    readonly lemma?: string | null;
    readonly pos?: string | null;
}

export interface EntityInput {
    readonly start: number;
    readonly end: number;
    readonly type: string;
    readonly text?: string;
}

export interface SentenceInput {
    readonly start: number;
    readonly end: number;
    readonly tokens?: readonly TokenInput[];
    readonly polarity?: number | null;
    readonly subjectivity?: number | null;
    readonly entities?: readonly EntityInput[];
}

/**
 * Annotation payload. Optional fields default to neutral values.
 */
export interface AnnotationInput {
    readonly id: string;
    readonly text: string;
    readonly sentences?: readonly SentenceInput[];
    readonly metadata?: DocumentMetadata;
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function neutral(value: number | null | undefined, min: number, max: number): number {
    return typeof value === "number" && Number.isFinite(value) ? clamp(value, min, max) : 0;
}

function isValidRange(range: TextRange, within: TextRange): boolean {
    return Number.isInteger(range.start)
        && Number.isInteger(range.end)
        && range.start >= within.start
        && range.end <= within.end
        && range.start < range.end;
}

/**
 * Build an immutable AnnotatedDocument from a collaborator payload.
 *
 * Missing polarity/subjectivity become 0, missing entities become an
 * empty list, missing lemmas fall back to the lower-cased surface.
 *
 * @throws InvalidDocumentError when offsets do not fit the text, a token
 * or entity leaves its sentence, or sentences overlap
 */
export function createAnnotatedDocument(input: AnnotationInput): AnnotatedDocument {
    if (!input.id) {
        throw new InvalidDocumentError("Document id is required");
    }

    const whole: TextRange = { start: 0, end: input.text.length };
    const sentences: Sentence[] = [];
    let previousEnd = 0;

    (input.sentences ?? []).forEach((raw, index) => {
        if (!isValidRange(raw, whole)) {
            throw new InvalidDocumentError(
                `Sentence ${index} has invalid range [${raw.start}, ${raw.end}) for text of length ${whole.end}`
            );
        }
        if (raw.start < previousEnd) {
            throw new InvalidDocumentError(`Sentence ${index} overlaps the previous sentence`);
        }
        previousEnd = raw.end;

        const tokens = (raw.tokens ?? []).map((token, tokenIndex): Token => {
            if (!isValidRange(token, raw)) {
                throw new InvalidDocumentError(
                    `Token ${tokenIndex} of sentence ${index} lies outside the sentence`
                );
            }
            const surface = token.text ?? input.text.slice(token.start, token.end);
            return Object.freeze({
                start        : token.start,
                end          : token.end,
                text         : surface,
                lemma        : token.lemma || surface.toLowerCase(),
                pos          : token.pos ?? "",
                sentenceIndex: index,
            });
        });
        tokens.sort((a, b) => a.start - b.start);

        const entities = (raw.entities ?? []).map((entity, entityIndex): NamedEntity => {
            if (!isValidRange(entity, raw)) {
                throw new InvalidDocumentError(
                    `Entity ${entityIndex} of sentence ${index} lies outside the sentence`
                );
            }
            return Object.freeze({
                start: entity.start,
                end  : entity.end,
                text : entity.text ?? input.text.slice(entity.start, entity.end),
                type : entity.type.toUpperCase(),
            });
        });

        sentences.push(Object.freeze({
            index,
            start       : raw.start,
            end         : raw.end,
            tokens      : Object.freeze(tokens),
            polarity    : neutral(raw.polarity, -1, 1),
            subjectivity: neutral(raw.subjectivity, 0, 1),
            entities    : Object.freeze(entities),
        }));
    });

    return Object.freeze({
        id       : input.id,
        text     : input.text,
        sentences: Object.freeze(sentences),
        metadata : Object.freeze({ ...input.metadata }),
    });
}

/**
 * Index of the sentence containing `offset`, or -1.
 */
export function sentenceIndexAt(document: AnnotatedDocument, offset: number): number {
    let low = 0;
    let high = document.sentences.length - 1;

    while (low <= high) {
        const mid = (low + high) >> 1;
        const sentence = document.sentences[mid];
        if (offset < sentence.start) {
            high = mid - 1;
        }
        else if (offset >= sentence.end) {
            low = mid + 1;
        }
        else {
            return mid;
        }
    }

    return -1;
}

/**
 * Number of sentences a range touches; 0 when it starts outside every sentence.
 */
export function sentenceSpan(document: AnnotatedDocument, range: TextRange): number {
    const first = sentenceIndexAt(document, range.start);
    const last = sentenceIndexAt(document, range.end - 1);
    if (first < 0 || last < 0) {
        return 0;
    }
    return last - first + 1;
}
