/**
 * @fileoverview Inference Orchestrator
 *
 * Sequences the registry's scoring units into one Prediction per request.
 *
 * Pipeline (fixed order, synchronous):
 * 1. Intent unit
 * 2. Sentiment unit
 * 3. Response-template unit, then the satisfaction/priority policy
 *
 * Failure semantics:
 * - A missing model fails the whole request (PredictionUnavailableError)
 * - A unit that faults mid-evaluation is replaced by the neutral score
 *
 * @module @triagekit/engine/orchestrator/InferenceOrchestrator
 */

import type { ModelRegistry } from "../contracts/ModelRegistry.js";
import { NEUTRAL_SCORE, type ModelScore } from "../contracts/ModelScore.js";
import { createPrediction, type Prediction } from "../contracts/Prediction.js";
import { createPredictionRequest, type PredictionRequest } from "../contracts/PredictionRequest.js";
import { CAPABILITIES, type Capability } from "../contracts/ScoringUnit.js";
import { createEvent, type EventBus } from "../contracts/EventBus.js";
import { defaultLogger, errorMessage, type EngineLogger } from "../contracts/Logger.js";
import { ModelUnavailableError, PredictionUnavailableError, ScoringError } from "../errors/index.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import {
    combineConfidence,
    decidePriority,
    decideSatisfaction,
    resolveDecisionPolicy,
    type DecisionPolicy,
} from "./DecisionPolicy.js";

/**
 * Orchestrator configuration options.
 */
export interface OrchestratorConfig {
    readonly registry: ModelRegistry;

    /** Overrides of the default decision policy */
    readonly policy?: Partial<DecisionPolicy>;

    /** Pinned versions per capability (default: latest loaded) */
    readonly versions?: Partial<Record<Capability, string>>;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    readonly logger?: EngineLogger;

    /** Source of prediction timestamps */
    readonly clock?: () => Date;
}

/**
 * Generate a unique trace ID for one inference.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * InferenceOrchestrator - turns one request into one Prediction.
 *
 * @example
 * ```typescript
 * const orchestrator = new InferenceOrchestrator({ registry });
 *
 * const prediction = orchestrator.infer({
 *     message  : "I was charged twice this month",
 *     issueType: "billing",
 * });
 * ```
 */
export class InferenceOrchestrator {
    readonly policy: DecisionPolicy;

    /** Public access to the event bus for external subscriptions */
    readonly eventBus: EventBus;

    private readonly registry: ModelRegistry;
    private readonly versions: Partial<Record<Capability, string>>;
    private readonly logger: EngineLogger;
    private readonly clock: () => Date;

    constructor(config: OrchestratorConfig) {
        this.registry = config.registry;
        this.policy = resolveDecisionPolicy(config.policy);
        this.versions = { ...config.versions };
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? defaultLogger;
        this.clock = config.clock ?? (() => new Date());
    }

    /**
     * Run the scoring chain for one request.
     *
     * @throws ValidationError if the request is malformed
     * @throws PredictionUnavailableError if a required model is not loaded
     */
    infer(request: PredictionRequest): Prediction {
        const { message, issueType } = createPredictionRequest(request.message, request.issueType);
        const traceId = generateTraceId();
        const fallbacks: Capability[] = [];

        try {
            const intent = this.runStage("intent", message, issueType, traceId, fallbacks);
            const sentiment = this.runStage("sentiment", message, issueType, traceId, fallbacks);
            const response = this.runStage("response", message, issueType, traceId, fallbacks);

            const predictedSatisfaction = decideSatisfaction(sentiment, this.policy);
            const prediction = createPrediction({
                message,
                issueType,
                predictedSatisfaction,
                recommendedPriority: decidePriority(issueType, predictedSatisfaction, this.policy),
                confidence         : combineConfidence(intent, sentiment),
                intent             : intent.label,
                responseStrategy   : response.label,
            }, this.clock());

            this.eventBus.emit(createEvent("prediction:created", {
                issueType,
                satisfaction: prediction.predictedSatisfaction,
                priority    : prediction.recommendedPriority,
                confidence  : prediction.confidence,
                fallbacks,
            }, traceId));

            return prediction;
        }
        catch (error) {
            this.eventBus.emit(createEvent("prediction:failed", {
                issueType,
                error: errorMessage(error),
            }, traceId));
            throw error;
        }
    }

    /**
     * Capabilities `infer` cannot resolve right now, honouring pinned versions.
     */
    missingCapabilities(): Capability[] {
        return CAPABILITIES.filter((capability) => {
            try {
                this.registry.resolve(capability, this.versions[capability]);
                return false;
            }
            catch (error) {
                if (error instanceof ModelUnavailableError) {
                    return true;
                }
                throw error;
            }
        });
    }

    private runStage(
        capability: Capability,
        message: string,
        issueType: PredictionRequest["issueType"],
        traceId: string,
        fallbacks: Capability[]
    ): ModelScore {
        try {
            return this.registry
                .resolve(capability, this.versions[capability])
                .score(message, issueType);
        }
        catch (error) {
            if (error instanceof ModelUnavailableError) {
                throw new PredictionUnavailableError(capability, error);
            }

            if (!(error instanceof ScoringError)) {
                throw error;
            }

            fallbacks.push(capability);
            this.logger.warn("Scoring stage fell back to neutral score", {
                capability,
                unitId: error.unitId,
                traceId,
                error : error.message,
            });
            this.eventBus.emit(createEvent("prediction:stageFallback", {
                capability,
                unitId: error.unitId,
                error : error.message,
            }, traceId));

            return NEUTRAL_SCORE;
        }
    }
}
