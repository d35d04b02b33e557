/**
 * @fileoverview Contract barrel exports
 *
 * Data model, detector contract, report shapes, errors and events.
 *
 * @module @slant/engine/contracts
 */

// Annotated document
export type {
    AnnotatedDocument,
    AnnotationInput,
    DocumentMetadata,
    EntityInput,
    NamedEntity,
    Sentence,
    SentenceInput,
    TextRange,
    Token,
    TokenInput,
} from "./AnnotatedDocument.js";
export {
    createAnnotatedDocument,
    sentenceIndexAt,
    sentenceSpan,
} from "./AnnotatedDocument.js";

// Categories
export type { CategoryInfo, PatternCategory } from "./PatternCategory.js";
export {
    CATEGORY_INFO,
    PATTERN_CATEGORIES,
    categoryOrder,
    isPatternCategory,
} from "./PatternCategory.js";

// Matches
export type { PatternMatch, PatternMatchInput } from "./PatternMatch.js";
export {
    compareByPosition,
    compareStrings,
    createPatternMatch,
    overlapFraction,
    overlapLength,
} from "./PatternMatch.js";

// Detector plugin contract
export type {
    DetectorContext,
    DetectorPlugin,
    PluginLogger,
} from "./DetectorPlugin.js";
export { isDetectorPlugin } from "./DetectorPlugin.js";

// Report
export type {
    AnalysisOutcome,
    AnalysisReport,
    CategoryReport,
    CategoryScore,
    CategoryStatus,
    DetectorFaultRecord,
    FaultReason,
    ReportStatus,
} from "./Report.js";

// Errors
export {
    DetectorFault,
    InvalidDocumentError,
    InvariantViolation,
    ResourceLoadError,
    SlantError,
    describeError,
} from "./errors.js";

// EventBus contract
export type {
    AnalysisEventType,
    EventBus,
    EventHandler,
    EventPayload,
    EventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
