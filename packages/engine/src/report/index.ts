/**
 * @fileoverview Report barrel exports
 *
 * @module @slant/engine/report
 */

export {
    buildReport,
    compareByStrength,
    reportToJson,
    serializeReport,
} from "./ReportBuilder.js";
export type {
    BuildReportOptions,
    SerializedCategory,
    SerializedMatch,
    SerializedReport,
} from "./ReportBuilder.js";
