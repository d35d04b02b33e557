/**
 * @fileoverview Annotation file adapter
 *
 * Reads the JSON written by the NLP annotation step and turns it into an
 * AnnotatedDocument. Shape problems are reported with the JSON path of
 * the offending field; offset problems are caught by the engine.
 *
 * @module adapters/annotation/readAnnotatedDocument
 */

import { readFileSync } from "fs";
import { basename, extname } from "path";
import {
    InvalidDocumentError,
    createAnnotatedDocument,
    describeError,
    type AnnotatedDocument,
    type AnnotationInput,
    type EntityInput,
    type SentenceInput,
    type TokenInput,
} from "@slant/engine";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walks the raw payload and throws on the first field of the wrong type.
 */
class PayloadReader {
    constructor(private readonly source: string) {}

    fail(path: string, expected: string): never {
        throw new InvalidDocumentError(`${this.source}: ${path} must be ${expected}`);
    }

    record(value: unknown, path: string): RawRecord {
        return isRecord(value) ? value : this.fail(path, "an object");
    }

    list(value: unknown, path: string): unknown[] {
        if (value === undefined || value === null) {
            return [];
        }
        return Array.isArray(value) ? value : this.fail(path, "a list");
    }

    offset(value: unknown, path: string): number {
        return typeof value === "number" && Number.isInteger(value) ? value : this.fail(path, "an integer");
    }

    optionalNumber(value: unknown, path: string): number | null {
        if (value === undefined || value === null) {
            return null;
        }
        return typeof value === "number" ? value : this.fail(path, "a number");
    }

    optionalString(value: unknown, path: string): string | undefined {
        if (value === undefined || value === null) {
            return undefined;
        }
        return typeof value === "string" ? value : this.fail(path, "a string");
    }
}

function readToken(reader: PayloadReader, value: unknown, path: string): TokenInput {
    const raw = reader.record(value, path);
    return {
        start: reader.offset(raw.start, `${path}.start`),
        end  : reader.offset(raw.end, `${path}.end`),
        text : reader.optionalString(raw.text, `${path}.text`),
        lemma: reader.optionalString(raw.lemma, `${path}.lemma`),
        pos  : reader.optionalString(raw.pos, `${path}.pos`),
    };
}

function readEntity(reader: PayloadReader, value: unknown, path: string): EntityInput {
    const raw = reader.record(value, path);
    // spaCy-style payloads call the type "label"
    const type = reader.optionalString(raw.type ?? raw.label, `${path}.type`);
    return {
        start: reader.offset(raw.start, `${path}.start`),
        end  : reader.offset(raw.end, `${path}.end`),
        type : type ?? reader.fail(`${path}.type`, "a string"),
        text : reader.optionalString(raw.text, `${path}.text`),
    };
}

function readSentence(reader: PayloadReader, value: unknown, path: string): SentenceInput {
    const raw = reader.record(value, path);
    return {
        start       : reader.offset(raw.start, `${path}.start`),
        end         : reader.offset(raw.end, `${path}.end`),
        polarity    : reader.optionalNumber(raw.polarity, `${path}.polarity`),
        subjectivity: reader.optionalNumber(raw.subjectivity, `${path}.subjectivity`),
        tokens      : reader.list(raw.tokens, `${path}.tokens`)
            .map((token, index) => readToken(reader, token, `${path}.tokens[${index}]`)),
        entities: reader.list(raw.entities, `${path}.entities`)
            .map((entity, index) => readEntity(reader, entity, `${path}.entities[${index}]`)),
    };
}

/**
 * Map a parsed annotation payload onto AnnotationInput.
 *
 * @param payload - Parsed JSON
 * @param source - Name used in error messages
 * @param fallbackId - Document id when the payload carries none
 * @throws InvalidDocumentError on a field of the wrong type
 */
export function toAnnotationInput(payload: unknown, source: string, fallbackId: string): AnnotationInput {
    const reader = new PayloadReader(source);
    const raw = reader.record(payload, "document");

    const text = typeof raw.text === "string" ? raw.text : reader.fail("text", "a string");

    const metadata: RawRecord = raw.metadata === undefined ? {} : reader.record(raw.metadata, "metadata");

    return {
        id       : reader.optionalString(raw.id, "id") || fallbackId,
        text,
        sentences: reader.list(raw.sentences, "sentences")
            .map((sentence, index) => readSentence(reader, sentence, `sentences[${index}]`)),
        metadata: {
            sourceFilename: reader.optionalString(metadata.source_filename, "metadata.source_filename") ?? source,
            format        : reader.optionalString(metadata.format, "metadata.format"),
        },
    };
}

/**
 * Read and validate one annotation file.
 *
 * @param filePath - Path to the annotation JSON
 * @throws InvalidDocumentError if the file is not valid JSON or not a valid document
 */
export function readAnnotatedDocument(filePath: string): AnnotatedDocument {
    const content = readFileSync(filePath, "utf-8");

    let payload: unknown;
    try {
        payload = JSON.parse(content);
    }
    catch (error) {
        throw new InvalidDocumentError(`${filePath} is not valid JSON: ${describeError(error)}`, { cause: error });
    }

    const fallbackId = basename(filePath, extname(filePath));
    return createAnnotatedDocument(toAnnotationInput(payload, filePath, fallbackId));
}
