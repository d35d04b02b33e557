#!/usr/bin/env node
/**
 * @fileoverview slant-scan - Main Entry Point
 *
 * Reads annotated documents, runs the pattern engine on each and prints
 * the reports as JSON.
 *
 * Usage: slant-scan [--config <engine.yml>] [--verbose] <annotated.json>...
 *
 * @module slant-scan
 */

// Load .env before anything reads the environment
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import {
    PatternEngine,
    loadDefaultLexicalResources,
    loadLexicalResources,
} from "@slant/engine";
import { loadScanConfig } from "./config/index.js";
import { createCliLogger, scanFiles, type ScanExitCode } from "./scan.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface CliArgs {
    configPath: string;
    verbose: boolean;
    files: string[];
}

function parseArgs(args: readonly string[]): CliArgs {
    const parsed: CliArgs = {
        configPath: join(__dirname, "..", "config", "engine.yml"),
        verbose   : false,
        files     : [],
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "--verbose") {
            parsed.verbose = true;
        }
        else if (arg === "--config") {
            const value = args[++i];
            if (!value) {
                throw new Error("--config needs a path");
            }
            parsed.configPath = value;
        }
        else {
            parsed.files.push(arg);
        }
    }

    return parsed;
}

/**
 * Main entry point
 */
async function main(): Promise<ScanExitCode> {
    const args = parseArgs(process.argv.slice(2));
    if (args.files.length === 0) {
        console.error("Usage: slant-scan [--config <engine.yml>] [--verbose] <annotated.json>...");
        return 1;
    }

    const logger = createCliLogger(args.verbose);
    const config = loadScanConfig(args.configPath, process.env, message => logger.warn(message));
    const resources = config.lexiconPath
        ? loadLexicalResources(config.lexiconPath)
        : loadDefaultLexicalResources();

    logger.debug(`Loaded lexicon ${resources.version}`);

    const engine = new PatternEngine({ resources, config: config.engine, logger });

    // Subscribe to engine events for observability
    engine.eventBus.subscribe("detector:faulted", (event) => {
        logger.warn("Detector faulted", event.data);
    });

    engine.eventBus.subscribe("detector:skipped", (event) => {
        logger.warn("Detector skipped by deadline", event.data);
    });

    const controller = new AbortController();
    process.once("SIGINT", () => {
        console.error("\nCancelling...");
        controller.abort("interrupted");
    });

    return scanFiles(args.files, { engine, logger, signal: controller.signal });
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[FATAL] slant-scan failed:", error);
        process.exitCode = 1;
    });
