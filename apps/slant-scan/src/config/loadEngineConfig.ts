/**
 * @fileoverview Engine Configuration Loader
 *
 * Loads engine options from a snake_case YAML file and applies
 * environment overrides. Range checks are left to the engine, which
 * validates the resolved configuration at construction.
 *
 * @module config/loadEngineConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    ResourceLoadError,
    describeError,
    isPatternCategory,
    type EngineConfig,
    type PatternCategory,
    type SeverityBand,
} from "@slant/engine";

/**
 * Settings of one scan: engine options plus the lexicon to load.
 */
export interface ScanConfig {
    engine: EngineConfig;

    /** Lexicon file; null means the engine's bundled lexicon */
    lexiconPath: string | null;
}

type Warn = (message: string) => void;

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Collects type problems while the raw file is mapped.
 */
class FieldReader {
    readonly issues: string[] = [];

    number(value: unknown, key: string): number | undefined {
        if (value === undefined) {
            return undefined;
        }
        if (typeof value !== "number") {
            this.issues.push(`${key} must be a number`);
            return undefined;
        }
        return value;
    }

    perCategory<T>(value: unknown, key: string, check: (entry: unknown) => entry is T, kind: string) {
        if (value === undefined) {
            return undefined;
        }
        if (!isRecord(value)) {
            this.issues.push(`${key} must be a mapping of category to ${kind}`);
            return undefined;
        }

        const result: Partial<Record<PatternCategory, T>> = {};
        for (const [category, entry] of Object.entries(value)) {
            if (!isPatternCategory(category)) {
                this.issues.push(`${key}: unknown category "${category}"`);
            }
            else if (!check(entry)) {
                this.issues.push(`${key}.${category} must be a ${kind}`);
            }
            else {
                result[category] = entry;
            }
        }
        return result;
    }
}

const isNumber = (value: unknown): value is number => typeof value === "number";
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";

function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(entry => typeof entry === "string");
}

/** Numeric options that map one to one */
const kSCALAR_KEYS = {
    overlap_merge_threshold: "overlapMergeThreshold",
    subjectivity_threshold : "subjectivityThreshold",
    subjectivity_bonus     : "subjectivityBonus",
    polarity_threshold     : "polarityThreshold",
    hedge_damping          : "hedgeDamping",
    intensifier_boost      : "intensifierBoost",
} as const;

const kKNOWN_KEYS = new Set<string>([
    ...Object.keys(kSCALAR_KEYS),
    "category_weights",
    "per_category_enabled",
    "short_document_penalty_curve",
    "run_deadline_ms",
    "pressure_entity_types",
    "severity_bands",
    "lexicon_path",
]);

function isScalarKey(key: string): key is keyof typeof kSCALAR_KEYS {
    return key in kSCALAR_KEYS;
}

/**
 * Map the parsed snake_case file onto ScanConfig.
 *
 * @param raw - Parsed YAML document
 * @param source - File name used in messages
 * @param warn - Receives one message per ignored key
 * @throws ResourceLoadError when a known key has the wrong type
 */
export function toScanConfig(raw: unknown, source: string, warn: Warn = console.warn): ScanConfig {
    if (raw === null || raw === undefined) {
        return { engine: {}, lexiconPath: null };
    }
    if (!isRecord(raw)) {
        throw new ResourceLoadError(`Invalid config file ${source}: expected a mapping`, { source });
    }

    const reader = new FieldReader();
    const engine: {
        -readonly [K in keyof EngineConfig]: EngineConfig[K];
    } = {};

    for (const key of Object.keys(raw)) {
        if (!kKNOWN_KEYS.has(key)) {
            warn(`Ignoring unknown config key "${key}" in ${source}`);
        }
        else if (isScalarKey(key)) {
            engine[kSCALAR_KEYS[key]] = reader.number(raw[key], key);
        }
    }

    engine.categoryWeights = reader.perCategory(raw.category_weights, "category_weights", isNumber, "number");
    engine.categoryEnabled = reader.perCategory(raw.per_category_enabled, "per_category_enabled", isBoolean, "boolean");

    const curve = raw.short_document_penalty_curve;
    if (isRecord(curve)) {
        engine.shortDocumentPenalty = {
            minSentences: reader.number(curve.min_sentences, "short_document_penalty_curve.min_sentences"),
            maxFactor   : reader.number(curve.max_factor, "short_document_penalty_curve.max_factor"),
        };
    }
    else if (curve !== undefined) {
        reader.issues.push("short_document_penalty_curve must be a mapping");
    }

    if (raw.run_deadline_ms === null) {
        engine.runDeadlineMs = null;
    }
    else {
        engine.runDeadlineMs = reader.number(raw.run_deadline_ms, "run_deadline_ms");
    }

    const entityTypes = raw.pressure_entity_types;
    if (isStringList(entityTypes)) {
        engine.pressureEntityTypes = entityTypes;
    }
    else if (entityTypes !== undefined) {
        reader.issues.push("pressure_entity_types must be a list of strings");
    }

    const bands: unknown = raw.severity_bands;
    if (Array.isArray(bands)) {
        const parsed: SeverityBand[] = [];
        bands.forEach((band: unknown, index: number) => {
            if (isRecord(band) && typeof band.min === "number" && typeof band.label === "string") {
                parsed.push({ min: band.min, label: band.label });
            }
            else {
                reader.issues.push(`severity_bands[${index}] must have a numeric min and a label`);
            }
        });
        engine.severityBands = parsed;
    }
    else if (bands !== undefined) {
        reader.issues.push("severity_bands must be a list");
    }

    const lexiconPath = raw.lexicon_path;
    if (lexiconPath !== undefined && typeof lexiconPath !== "string") {
        reader.issues.push("lexicon_path must be a string");
    }

    if (reader.issues.length > 0) {
        throw new ResourceLoadError(`Invalid config file ${source}: ${reader.issues.join(" | ")}`, {
            source,
            issues: reader.issues,
        });
    }

    return {
        engine,
        lexiconPath: typeof lexiconPath === "string" ? lexiconPath : null,
    };
}

/**
 * Load a config file.
 *
 * @param filePath - Path to the engine.yml file
 * @throws ResourceLoadError if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadEngineConfig("./config/engine.yml");
 * const engine = new PatternEngine({ resources, config: config.engine });
 * ```
 */
export function loadEngineConfig(filePath: string, warn: Warn = console.warn): ScanConfig {
    if (!existsSync(filePath)) {
        throw new ResourceLoadError(`Config file not found: ${filePath}`, { source: filePath });
    }

    const content = readFileSync(filePath, "utf-8");
    let parsed: unknown;
    try {
        parsed = parseYaml(content);
    }
    catch (error) {
        throw new ResourceLoadError(`Config file ${filePath} is not valid YAML: ${describeError(error)}`, {
            source: filePath,
            cause : error,
        });
    }

    return toScanConfig(parsed, filePath, warn);
}

/**
 * Apply `SLANT_LEXICON_PATH` and `SLANT_RUN_DEADLINE_MS`.
 *
 * @throws ResourceLoadError when the deadline is not a number
 */
export function applyEnvironment(config: ScanConfig, env: NodeJS.ProcessEnv = process.env): ScanConfig {
    let result = config;

    const lexiconPath = env.SLANT_LEXICON_PATH;
    if (lexiconPath) {
        result = { ...result, lexiconPath };
    }

    const deadline = env.SLANT_RUN_DEADLINE_MS;
    if (deadline) {
        const runDeadlineMs = Number(deadline);
        if (!Number.isFinite(runDeadlineMs)) {
            throw new ResourceLoadError(`SLANT_RUN_DEADLINE_MS must be a number, got "${deadline}"`, {
                source: "environment",
            });
        }
        result = { ...result, engine: { ...result.engine, runDeadlineMs } };
    }

    return result;
}

/**
 * Load the config file when present, then apply the environment.
 * A missing file means engine defaults.
 */
export function loadScanConfig(
    filePath: string,
    env: NodeJS.ProcessEnv = process.env,
    warn: Warn = console.warn
): ScanConfig {
    if (!existsSync(filePath)) {
        warn(`Config file ${filePath} not found, using engine defaults`);
        return applyEnvironment({ engine: {}, lexiconPath: null }, env);
    }

    return applyEnvironment(loadEngineConfig(filePath, warn), env);
}
