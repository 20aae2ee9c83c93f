/**
 * @fileoverview Contract barrel exports
 *
 * All interfaces and types that define the triage engine contract.
 *
 * @module @triagekit/engine/contracts
 */

// Prediction request
export type { IssueType, PredictionRequest } from "./PredictionRequest.js";
export {
    ISSUE_TYPES,
    isIssueType,
    createPredictionRequest,
} from "./PredictionRequest.js";

// Model score
export type { ModelScore } from "./ModelScore.js";
export {
    NEUTRAL_LABEL,
    NEUTRAL_SCORE,
    createModelScore,
    isValidConfidence,
} from "./ModelScore.js";

// Scoring unit and registry
export type { Capability, ScoringUnit, ScoringUnitStats } from "./ScoringUnit.js";
export { CAPABILITIES } from "./ScoringUnit.js";
export type { LoadedModel, ModelRegistry } from "./ModelRegistry.js";

// Prediction
export type { Level, Prediction } from "./Prediction.js";
export { LEVELS, createPrediction } from "./Prediction.js";

// Metrics
export type {
    AnalyticsSink,
    Histogram,
    MetricBucket,
    MetricsSource,
    MetricsSummary,
} from "./MetricBucket.js";

// Insights
export type {
    InsightDraft,
    InsightPrompt,
    InsightReport,
    InsightsBackend,
    InsightSource,
    Severity,
} from "./InsightReport.js";

// Logger
export type { EngineLogger } from "./Logger.js";
export { defaultLogger, errorMessage } from "./Logger.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    InsightsEventType,
    PredictionEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
