/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A simple, synchronous, in-memory event bus for a single service process.
 *
 * @module @triagekit/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { defaultLogger, errorMessage, type EngineLogger } from "../contracts/Logger.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - Handler failures, thrown or rejected, are logged and contained
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();

    constructor(private readonly logger: EngineLogger = defaultLogger) {}

    /**
     * Emit an event to all subscribers.
     *
     * Specific handlers run first, then wildcard handlers.
     */
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
        const wrappedHandler: EventHandler = (event) => {
            subscription.unsubscribe();
            return handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Get the number of handlers for a specific event type.
     * Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy: once() handlers unsubscribe themselves mid-iteration
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.reportFailure(event, error));
                }
            }
            catch (error) {
                this.reportFailure(event, error);
            }
        }
    }

    private reportFailure(event: EventPayload, error: unknown): void {
        this.logger.error("EventBus handler error", {
            eventType: event.type,
            traceId  : event.traceId,
            error    : errorMessage(error),
        });
    }
}
