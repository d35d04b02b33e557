/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    applyEnvironment,
    loadEngineConfig,
    loadScanConfig,
    toScanConfig,
    type ScanConfig,
} from "./loadEngineConfig.js";
