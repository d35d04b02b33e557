/**
 * @fileoverview Scan runner
 *
 * Analyzes a list of annotation files one after another and writes one
 * JSON report per document.
 *
 * @module scan
 */

import {
    describeError,
    reportToJson,
    type AnnotatedDocument,
    type EngineLogger,
    type PatternEngine,
} from "@slant/engine";
import { readAnnotatedDocument } from "./adapters/annotation/index.js";

/**
 * 0: every report complete, 2: at least one degraded, 1: a file failed or
 * the scan was cancelled.
 */
export type ScanExitCode = 0 | 1 | 2;

export interface ScanOptions {
    readonly engine: PatternEngine;
    readonly logger: EngineLogger;

    /** Cancels the scan at the next detector boundary */
    readonly signal?: AbortSignal;

    /** Document reader (default: readAnnotatedDocument) */
    readonly readDocument?: (filePath: string) => AnnotatedDocument;

    /** Output sink for report JSON (default: stdout) */
    readonly write?: (text: string) => void;
}

/**
 * Logger for the command line: everything goes to stderr so stdout only
 * carries reports.
 */
export function createCliLogger(verbose: boolean): EngineLogger {
    return {
        debug: (msg, data) => {
            if (verbose) {
                console.error(`[DEBUG] ${msg}`, data ?? "");
            }
        },
        info : (msg, data) => console.error(`[INFO] ${msg}`, data ?? ""),
        warn : (msg, data) => console.error(`[WARN] ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
    };
}

/**
 * Analyze every file and write its report.
 *
 * A file that cannot be read is logged and counted as a failure; the
 * remaining files are still scanned. Cancellation stops the scan.
 */
export async function scanFiles(files: readonly string[], options: ScanOptions): Promise<ScanExitCode> {
    const { engine, logger, signal } = options;
    const readDocument = options.readDocument ?? readAnnotatedDocument;
    const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));

    let exitCode: ScanExitCode = 0;

    for (const file of files) {
        let document: AnnotatedDocument;
        try {
            document = readDocument(file);
        }
        catch (error) {
            logger.error("Failed to read document", { file, error: describeError(error) });
            exitCode = 1;
            continue;
        }

        const outcome = await engine.analyze(document, { signal });
        if (outcome.status === "cancelled") {
            logger.warn("Scan cancelled", { file, reason: outcome.reason });
            return 1;
        }

        write(reportToJson(outcome.report));
        if (outcome.report.status === "degraded" && exitCode === 0) {
            exitCode = 2;
        }
    }

    return exitCode;
}
