/**
 * @fileoverview Engine logging
 *
 * @module @slant/engine/engine/logger
 */

import type { PluginLogger } from "../contracts/DetectorPlugin.js";

/**
 * Logger interface for the engine.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const defaultLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Generate a unique trace ID for an analysis run.
 */
export function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * Create a logger for a detector: messages are prefixed with the
 * detector id and carry the trace id.
 */
export function createPluginLogger(logger: EngineLogger, detectorId: string, traceId: string): PluginLogger {
    return {
        debug: (msg, data) => logger.debug(`[${detectorId}] ${msg}`, { ...data, traceId }),
        info : (msg, data) => logger.info(`[${detectorId}] ${msg}`, { ...data, traceId }),
        warn : (msg, data) => logger.warn(`[${detectorId}] ${msg}`, { ...data, traceId }),
        error: (msg, data) => logger.error(`[${detectorId}] ${msg}`, { ...data, traceId }),
    };
}
