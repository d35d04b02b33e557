/**
 * @fileoverview Engine barrel exports
 *
 * @module @slant/engine/engine
 */

export {
    PatternEngine,
    checkDetectorOutput,
    type AnalyzeOptions,
    type DetectorOutputCheck,
    type PatternEngineOptions,
} from "./PatternEngine.js";
export {
    DEFAULT_ENGINE_CONFIG,
    resolveEngineConfig,
    type EngineConfig,
    type ResolvedEngineConfig,
    type SeverityBand,
    type ShortDocumentPenaltyCurve,
} from "./config.js";
export {
    createPluginLogger,
    defaultLogger,
    generateTraceId,
    type EngineLogger,
} from "./logger.js";
