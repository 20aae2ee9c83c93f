/**
 * @fileoverview Triage Engine
 *
 * Customer-support prediction core.
 *
 * The engine provides:
 * - A versioned registry of guarded scoring units
 * - A fixed-order inference chain with a configurable decision policy
 * - Time-bucketed analytics over every prediction
 * - Best-effort insight reports from an external language model
 *
 * HTTP, file system and vendor SDKs live in the host application.
 *
 * @module @triagekit/engine
 * @example
 * ```typescript
 * import {
 *     AnalyticsAggregator,
 *     InMemoryModelRegistry,
 *     InferenceOrchestrator,
 * } from "@triagekit/engine";
 *
 * const registry = new InMemoryModelRegistry();
 * // register intent, sentiment and response units
 * const orchestrator = new InferenceOrchestrator({ registry });
 * const aggregator = new AnalyticsAggregator();
 *
 * const prediction = orchestrator.infer({ message, issueType: "billing" });
 * aggregator.record(prediction, latencyMs);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Error exports
// ============================================================================

export {
    TriageError,
    ValidationError,
    ModelUnavailableError,
    ScoringError,
    PredictionUnavailableError,
    AggregatorUnavailableError,
    InsightsBackendError,
    type InsightsFailureReason,
    type TriageErrorOptions,
    type ValidationCode,
} from "./errors/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";
export * from "./registry/index.js";
export * from "./orchestrator/index.js";
export * from "./analytics/index.js";
export * from "./insights/index.js";
