/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for internal event flow within the engine.
 * Events carry observability data (what was predicted, which stage fell
 * back, when insights degraded); they are never the source of truth.
 *
 * Design decisions:
 * - Synchronous dispatch, in-memory implementation
 * - A failing handler never reaches the emitter
 * - Ordering is preserved within a single event type
 *
 * @module @triagekit/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID for correlation */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Event types emitted while serving predictions.
 */
export type PredictionEventType =
    | "prediction:created"
    | "prediction:failed"
    | "prediction:stageFallback";

/**
 * Event types emitted by the insights generator and its scheduler.
 */
export type InsightsEventType =
    | "insights:generated"
    | "insights:degraded"
    | "insights:schedulerStarted"
    | "insights:schedulerStopped";

/**
 * All known event types.
 */
export type EventType = PredictionEventType | InsightsEventType;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("prediction:created", (event) => {
 *     console.log("Predicted:", event.data);
 * });
 *
 * bus.emit(createEvent("prediction:created", { priority: "high" }, "tr_abc"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type (or all of them).
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
