/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow of an analysis run. Events give observability
 * without coupling callers to the engine's internals.
 *
 * - Synchronous dispatch, in emission order
 * - In-memory only
 *
 * @module @slant/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID of the analysis run */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Events emitted by `PatternEngine.analyze`.
 */
export type AnalysisEventType =
    | "analysis:started"
    | "analysis:completed"
    | "analysis:cancelled"
    | "detector:completed"
    | "detector:faulted"
    | "detector:skipped";

export type EventType = AnalysisEventType | (string & {});

export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("detector:faulted", (event) => {
 *     console.warn("Detector faulted:", event.data);
 * });
 *
 * await engine.analyze(document);
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    emit(event: EventPayload): void;

    /**
     * Subscribe to one event type, or "*" for all events.
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe and unsubscribe automatically after the first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove subscriptions for one type, or all of them.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional trace ID
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
