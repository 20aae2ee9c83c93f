/**
 * @fileoverview Service composition
 *
 * Wires the engine components to each other and to the host's model
 * artifacts, insights backend and logger. Nothing here listens on a port.
 *
 * @module services
 */

import { isAbsolute, join } from "path";
import {
    AnalyticsAggregator,
    InMemoryEventBus,
    InMemoryModelRegistry,
    InferenceOrchestrator,
    InsightsGenerator,
    InsightsScheduler,
    type EngineLogger,
    type InsightsBackend,
} from "@triagekit/engine";
import type { ServiceConfig } from "./config/index.js";
import { DisabledInsightsBackend, OpenAIInsightsBackend } from "./insights/index.js";
import { loadModelArtifacts, type ArtifactLoadReport } from "./models/index.js";
import type { GatewayDeps } from "./http/index.js";

export interface Services {
    readonly eventBus: InMemoryEventBus;
    readonly registry: InMemoryModelRegistry;
    readonly orchestrator: InferenceOrchestrator;
    readonly aggregator: AnalyticsAggregator;
    readonly generator: InsightsGenerator;
    readonly scheduler: InsightsScheduler;
    readonly artifacts: ArtifactLoadReport;
}

export interface ServiceOverrides {
    /** Replaces the configured insights backend */
    readonly backend?: InsightsBackend;
}

/**
 * Pick the insights backend: OpenAI when a key is configured.
 */
export function createInsightsBackend(config: ServiceConfig): InsightsBackend {
    if (config.openai.apiKey === undefined) {
        return new DisabledInsightsBackend();
    }

    return new OpenAIInsightsBackend("openai", {
        apiKey     : config.openai.apiKey,
        model      : config.openai.model,
        temperature: config.openai.temperature,
        maxTokens  : config.openai.maxTokens,
    });
}

/**
 * Build every engine component for one process.
 *
 * @param config - Validated service configuration
 * @param serviceRoot - Directory relative model paths resolve against
 * @param logger - Logger shared by all components
 */
export function createServices(
    config: ServiceConfig,
    serviceRoot: string,
    logger: EngineLogger,
    overrides: ServiceOverrides = {}
): Services {
    const eventBus = new InMemoryEventBus(logger);

    const registry = new InMemoryModelRegistry({
        scoreBudgetMs: config.models.scoreBudgetMs,
        logger,
    });

    const modelsDir = isAbsolute(config.models.dir)
        ? config.models.dir
        : join(serviceRoot, config.models.dir);
    const artifacts = loadModelArtifacts(modelsDir, registry, logger);

    const orchestrator = new InferenceOrchestrator({
        registry,
        policy  : config.policy,
        versions: config.models.versions,
        eventBus,
        logger,
    });

    const aggregator = new AnalyticsAggregator({
        bucketWidthMs: config.analytics.bucketWidthMs,
        retentionMs  : config.analytics.retentionMs,
        logger,
    });

    const generator = new InsightsGenerator({
        backend         : overrides.backend ?? createInsightsBackend(config),
        timeoutMs       : config.insights.timeoutMs,
        maxPromptBuckets: config.insights.maxPromptBuckets,
        maxPromptChars  : config.insights.maxPromptChars,
        eventBus,
        logger,
    });

    const scheduler = new InsightsScheduler({
        generator,
        source           : aggregator,
        intervalMs       : config.insights.intervalMs,
        minNewPredictions: config.insights.minNewPredictions,
        windowMs         : config.insights.windowMs,
        logger,
    });

    return { eventBus, registry, orchestrator, aggregator, generator, scheduler, artifacts };
}

/**
 * Gateway dependencies backed by the composed services.
 */
export function gatewayDeps(services: Services, logger: EngineLogger): GatewayDeps {
    return {
        orchestrator: services.orchestrator,
        registry    : services.registry,
        sink        : services.aggregator,
        metrics     : services.aggregator,
        insights    : {
            latest  : () => services.generator.latest(),
            generate: () => services.scheduler.trigger(),
        },
        logger,
    };
}
