/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * @module @slant/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * Called when a subscriber throws. Dispatch continues with the next handler.
 */
export type HandlerErrorCallback = (error: unknown, event: EventPayload) => void;

const defaultHandlerError: HandlerErrorCallback = (error, event) => {
    console.error(`EventBus handler error for ${event.type}:`, error);
};

/**
 * In-memory EventBus implementation.
 *
 * - Synchronous dispatch: specific handlers first, then "*" handlers
 * - A throwing handler never reaches the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("analysis:completed", (event) => {
 *     console.log("Overall score:", event.data?.overallScore);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers = new Map<string, Set<EventHandler>>();
    private readonly onHandlerError: HandlerErrorCallback;

    constructor(options: { onHandlerError?: HandlerErrorCallback } = {}) {
        this.onHandlerError = options.onHandlerError ?? defaultHandlerError;
    }

    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    /**
     * @param eventType - Type to clear; "*" or undefined clears everything
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }
        // Copy so once() handlers can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.onHandlerError(error, event);
            }
        }
    }
}
