/**
 * @fileoverview PatternEngine
 *
 * Orchestrates one analysis run.
 *
 * Pipeline:
 * 1. Resolve category statuses from configuration
 * 2. Run every enabled detector, one at a time, in registry order
 * 3. Isolate faulty detectors (category becomes unavailable)
 * 4. Aggregate retained matches into scores
 * 5. Build the immutable report
 *
 * Between detectors the engine yields to the event loop and checks for
 * cancellation; detectors not yet started when the deadline passes are
 * skipped.
 *
 * @module @slant/engine/engine/PatternEngine
 */

import { setImmediate as yieldToEventLoop } from "timers/promises";
import { aggregate } from "../aggregate/aggregator.js";
import { sentenceSpan, type AnnotatedDocument } from "../contracts/AnnotatedDocument.js";
import type { DetectorContext, DetectorPlugin } from "../contracts/DetectorPlugin.js";
import { createEvent, type EventBus, type EventPayload } from "../contracts/EventBus.js";
import { PATTERN_CATEGORIES, type PatternCategory } from "../contracts/PatternCategory.js";
import type { PatternMatch } from "../contracts/PatternMatch.js";
import type {
    AnalysisOutcome,
    CategoryStatus,
    DetectorFaultRecord,
    FaultReason,
} from "../contracts/Report.js";
import { DetectorFault, describeError } from "../contracts/errors.js";
import { createDefaultDetectors, createDetectorRegistry } from "../detectors/registry.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { LexicalResourceStore } from "../lexicon/LexicalResourceStore.js";
import { buildReport } from "../report/ReportBuilder.js";
import { resolveEngineConfig, type EngineConfig, type ResolvedEngineConfig } from "./config.js";
import { createPluginLogger, defaultLogger, generateTraceId, type EngineLogger } from "./logger.js";

export interface PatternEngineOptions {
    /** Shared lexical resources */
    readonly resources: LexicalResourceStore;

    /** Engine options; omitted values take their defaults */
    readonly config?: EngineConfig;

    /** Detector list (default: every shipped detector) */
    readonly detectors?: readonly DetectorPlugin[];

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;

    /** Millisecond clock used for the deadline (default: Date.now) */
    readonly clock?: () => number;
}

export interface AnalyzeOptions {
    /** Cancels the run at the next detector boundary */
    readonly signal?: AbortSignal;

    readonly traceId?: string;

    /** Per-run deadline overriding `runDeadlineMs`; null disables it */
    readonly deadlineMs?: number | null;
}

export type DetectorOutputCheck =
    | { readonly valid: true; readonly matches: readonly PatternMatch[] }
    | { readonly valid: false; readonly problem: string };

/**
 * Check a detector's output against the match invariants: own category,
 * non-empty range inside the text, text equal to the range, confidence
 * in [0, 1], at most `maxSentenceSpan` sentences, no repeated range.
 */
export function checkDetectorOutput(
    document: AnnotatedDocument,
    detector: DetectorPlugin,
    output: unknown
): DetectorOutputCheck {
    const invalid = (problem: string): DetectorOutputCheck => ({ valid: false, problem });

    if (!Array.isArray(output)) {
        return invalid("output is not an array");
    }

    const maxSpan = detector.maxSentenceSpan ?? 1;
    const ranges = new Set<string>();
    const matches: PatternMatch[] = [];

    for (const [index, match] of output.entries()) {
        if (!isMatchShaped(match)) {
            return invalid(`match ${index} is not a PatternMatch`);
        }
        if (match.category !== detector.category) {
            return invalid(`match ${index} has category ${match.category}, expected ${detector.category}`);
        }
        if (!Number.isInteger(match.start) || !Number.isInteger(match.end)
            || match.start < 0 || match.end > document.text.length || match.start >= match.end) {
            return invalid(`match ${index} has invalid range [${match.start}, ${match.end})`);
        }
        if (match.text !== document.text.slice(match.start, match.end)) {
            return invalid(`match ${index} text does not match its range`);
        }
        if (!Number.isFinite(match.confidence) || match.confidence < 0 || match.confidence > 1) {
            return invalid(`match ${index} confidence ${match.confidence} is outside [0, 1]`);
        }
        const span = sentenceSpan(document, match);
        if (span < 1 || span > maxSpan) {
            return invalid(`match ${index} covers ${span} sentence(s), limit is ${maxSpan}`);
        }
        const key = `${match.start}:${match.end}`;
        if (ranges.has(key)) {
            return invalid(`duplicate match range [${match.start}, ${match.end})`);
        }
        ranges.add(key);
        matches.push(match);
    }

    return { valid: true, matches };
}

function isMatchShaped(value: unknown): value is PatternMatch {
    return (
        typeof value === "object" &&
        value !== null &&
        "category" in value && typeof value.category === "string" &&
        "start" in value && typeof value.start === "number" &&
        "end" in value && typeof value.end === "number" &&
        "text" in value && typeof value.text === "string" &&
        "confidence" in value && typeof value.confidence === "number" &&
        "detectorId" in value && typeof value.detectorId === "string"
    );
}

type DetectorRun =
    | { readonly valid: true; readonly matches: readonly PatternMatch[] }
    | { readonly valid: false; readonly reason: FaultReason; readonly fault: DetectorFault };

/**
 * PatternEngine - detects manipulation patterns in annotated documents.
 *
 * One engine can serve any number of runs, sequentially or concurrently;
 * it holds no per-run state.
 *
 * @example
 * ```typescript
 * const engine = new PatternEngine({ resources: loadDefaultLexicalResources() });
 *
 * engine.eventBus.subscribe("detector:faulted", (event) => {
 *     console.warn("Detector faulted:", event.data);
 * });
 *
 * const outcome = await engine.analyze(document, { signal: controller.signal });
 * if (outcome.status === "completed") {
 *     console.log(reportToJson(outcome.report));
 * }
 * ```
 */
export class PatternEngine {
    readonly config: ResolvedEngineConfig;
    readonly detectors: readonly DetectorPlugin[];

    /** Public access to the event bus for external subscriptions */
    readonly eventBus: EventBus;

    private readonly resources: LexicalResourceStore;
    private readonly logger: EngineLogger;
    private readonly clock: () => number;

    /**
     * @throws ResourceLoadError on invalid configuration
     * @throws InvariantViolation on a malformed detector list
     */
    constructor(options: PatternEngineOptions) {
        this.resources = options.resources;
        this.config = resolveEngineConfig(options.config);
        this.detectors = createDetectorRegistry(options.detectors ?? createDefaultDetectors());
        this.eventBus = options.eventBus ?? new InMemoryEventBus();
        this.logger = options.logger ?? defaultLogger;
        this.clock = options.clock ?? Date.now;
    }

    /**
     * Analyze one document.
     *
     * @param document - Annotated document
     * @param options - Cancellation signal, trace id, deadline
     * @returns The report, or a cancelled outcome without partial results
     * @throws InvariantViolation when the pieces of the report do not agree
     */
    async analyze(document: AnnotatedDocument, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
        const traceId = options.traceId ?? generateTraceId();
        const { signal } = options;
        const startTime = this.clock();
        const deadlineMs = options.deadlineMs === undefined ? this.config.runDeadlineMs : options.deadlineMs;
        const deadlineAt = deadlineMs === null ? null : startTime + deadlineMs;

        if (signal?.aborted) {
            return this.cancelled(document, signal, traceId);
        }

        this.emit(createEvent("analysis:started", {
            documentId: document.id,
            sentences : document.sentences.length,
            detectors : this.detectors.map(detector => detector.id),
        }, traceId));

        const statuses = this.initialStatuses();
        const collected = new Map<PatternCategory, PatternMatch[]>();
        const faults: DetectorFaultRecord[] = [];
        let deadlineExceeded = false;

        const fail = (detector: DetectorPlugin, reason: FaultReason, message: string) => {
            statuses[detector.category] = "unavailable";
            collected.delete(detector.category);
            faults.push(Object.freeze({ detectorId: detector.id, category: detector.category, reason, message }));
        };

        if (document.sentences.length === 0) {
            this.logger.debug("Empty document, detectors not run", { documentId: document.id, traceId });
        }

        for (const detector of document.sentences.length > 0 ? this.detectors : []) {
            const status = statuses[detector.category];
            if (status !== "ok") {
                continue;
            }

            if (deadlineAt !== null && this.clock() >= deadlineAt) {
                deadlineExceeded = true;
                fail(detector, "deadline", "skipped: run deadline exceeded");
                this.emit(createEvent("detector:skipped", {
                    detectorId: detector.id,
                    category  : detector.category,
                }, traceId));
                continue;
            }

            const detectorStart = this.clock();
            const context: DetectorContext = {
                resources: this.resources,
                config   : this.config,
                logger   : createPluginLogger(this.logger, detector.id, traceId),
                traceId,
            };

            const result = this.runDetector(document, detector, context);
            if (result.valid) {
                const bucket = collected.get(detector.category) ?? [];
                bucket.push(...result.matches);
                collected.set(detector.category, bucket);

                this.emit(createEvent("detector:completed", {
                    detectorId: detector.id,
                    category  : detector.category,
                    matchCount: result.matches.length,
                    duration  : this.clock() - detectorStart,
                }, traceId));
            }
            else {
                fail(detector, result.reason, result.fault.message);
                this.emit(createEvent("detector:faulted", {
                    detectorId: detector.id,
                    category  : detector.category,
                    reason    : result.reason,
                    error     : result.fault.message,
                }, traceId));
            }

            await yieldToEventLoop();
            if (signal?.aborted) {
                return this.cancelled(document, signal, traceId);
            }
        }

        const matches = PATTERN_CATEGORIES.flatMap(category =>
            statuses[category] === "ok" ? collected.get(category) ?? [] : []
        );

        const aggregation = aggregate({
            matches,
            sentenceCount: document.sentences.length,
            statuses,
            config       : this.config,
        });

        const report = buildReport(document.id, aggregation.scores, aggregation.overallScore, aggregation.retained, {
            faults,
            deadlineExceeded,
        });

        this.emit(createEvent("analysis:completed", {
            documentId  : document.id,
            status      : report.status,
            overallScore: report.overallScore,
            matchCount  : report.matches.length,
            duration    : this.clock() - startTime,
        }, traceId));

        this.logger.info("Analysis completed", {
            documentId  : document.id,
            status      : report.status,
            overallScore: report.overallScore,
            matches     : report.matches.length,
            faults      : faults.length,
            traceId,
        });

        return { status: "completed", report };
    }

    /**
     * Run one detector and check its output. Never throws.
     */
    private runDetector(
        document: AnnotatedDocument,
        detector: DetectorPlugin,
        context: DetectorContext
    ): DetectorRun {
        let output: unknown;
        try {
            output = detector.detect(document, context);
        }
        catch (error) {
            const fault = new DetectorFault(detector.id, detector.category, describeError(error), { cause: error });
            this.logger.error("Detector error", {
                detectorId: detector.id,
                category  : detector.category,
                traceId   : context.traceId,
                error     : fault.message,
            });
            return { valid: false, reason: "fault", fault };
        }

        const check = checkDetectorOutput(document, detector, output);
        if (!check.valid) {
            const fault = new DetectorFault(detector.id, detector.category, check.problem);
            this.logger.error("Detector returned invalid matches", {
                detectorId: detector.id,
                category  : detector.category,
                traceId   : context.traceId,
                error     : fault.message,
            });
            return { valid: false, reason: "invalid-output", fault };
        }

        return check;
    }

    private initialStatuses(): Record<PatternCategory, CategoryStatus> {
        const enabled = this.config.categoryEnabled;
        const status = (category: PatternCategory): CategoryStatus => (enabled[category] ? "ok" : "disabled");
        return {
            LOADED_LANGUAGE     : status("LOADED_LANGUAGE"),
            FALSE_URGENCY       : status("FALSE_URGENCY"),
            GUILT_INDUCTION     : status("GUILT_INDUCTION"),
            VAGUE_GENERALIZATION: status("VAGUE_GENERALIZATION"),
            APPEAL_TO_EMOTION   : status("APPEAL_TO_EMOTION"),
            FALSE_DICHOTOMY     : status("FALSE_DICHOTOMY"),
            FEAR_APPEAL         : status("FEAR_APPEAL"),
        };
    }

    private cancelled(document: AnnotatedDocument, signal: AbortSignal, traceId: string): AnalysisOutcome {
        const reason = signal.reason === undefined ? "aborted" : describeError(signal.reason);

        this.emit(createEvent("analysis:cancelled", { documentId: document.id, reason }, traceId));
        this.logger.info("Analysis cancelled", { documentId: document.id, reason, traceId });

        return { status: "cancelled", documentId: document.id, reason };
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
