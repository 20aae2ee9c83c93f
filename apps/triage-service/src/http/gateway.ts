/**
 * @fileoverview Request Gateway
 *
 * Public HTTP surface of the service:
 * - POST /predict - validate, run the inference chain, hand the result to analytics
 * - GET /health - loaded models and capabilities predictions cannot resolve
 * - GET /metrics - bucketed analytics plus a summary
 * - GET /api/insights - latest insight report
 * - POST /api/insights/generate - regenerate the report now
 *
 * Errors always answer `{ error_code, message }`.
 *
 * @module http/gateway
 */

import { fastify, type FastifyError, type FastifyInstance, type FastifyRequest } from "fastify";
import {
    PredictionUnavailableError,
    TriageError,
    defaultLogger,
    errorMessage,
    summarizeBuckets,
    type AnalyticsSink,
    type Capability,
    type EngineLogger,
    type InsightReport,
    type MetricsSource,
    type ModelRegistry,
    type Prediction,
    type PredictionRequest,
} from "@triagekit/engine";
import { parsePredictBody, parseWindowMs } from "./schemas.js";
import {
    serializeBucket,
    serializeModel,
    serializePrediction,
    serializeReport,
    serializeSummary,
} from "./serialize.js";

export interface Predictor {
    infer(request: PredictionRequest): Prediction;

    /** Capabilities `infer` cannot resolve, pinned versions included */
    missingCapabilities(): Capability[];
}

export interface InsightsService {
    /** Current report, or null before the first generation finished */
    latest(): InsightReport | null;

    /** Regenerate now; resolves with a (possibly degraded) report and never rejects */
    generate(): Promise<InsightReport>;
}

export interface GatewayDeps {
    readonly orchestrator: Predictor;
    readonly registry: ModelRegistry;
    readonly sink: AnalyticsSink;
    readonly metrics: MetricsSource;
    readonly insights: InsightsService;

    /** Logger for analytics hand-off failures */
    readonly logger?: EngineLogger;

    /** Fastify request log level; false disables request logging */
    readonly logLevel?: string | false;

    /** Millisecond clock for uptime */
    readonly clock?: () => number;
}

interface ErrorBody {
    error_code: string;
    message: string;
}

function errorBody(code: string, message: string): ErrorBody {
    return { error_code: code, message };
}

/**
 * Map any error reaching Fastify onto a status and a stable body.
 */
export function toErrorResponse(error: FastifyError): { status: number; body: ErrorBody } {
    if (error instanceof PredictionUnavailableError) {
        return { status: 503, body: errorBody("prediction_unavailable", error.message) };
    }

    if (error instanceof TriageError) {
        return { status: error.statusCode, body: errorBody(error.code, error.message) };
    }

    if (error instanceof SyntaxError || error.name === "SyntaxError" || error.code === "FST_ERR_CTP_EMPTY_JSON_BODY") {
        return { status: 400, body: errorBody("invalid_json", "Request body is not valid JSON") };
    }

    if (error.code === "FST_ERR_CTP_INVALID_MEDIA_TYPE") {
        return { status: 415, body: errorBody("unsupported_media_type", error.message) };
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
        return { status: error.statusCode, body: errorBody("invalid_request", error.message) };
    }

    return { status: 500, body: errorBody("internal_error", "Internal server error") };
}

/**
 * Build the gateway. Call `listen()` on the result to serve.
 */
export async function buildGateway(deps: GatewayDeps): Promise<FastifyInstance> {
    const logger = deps.logger ?? defaultLogger;
    const clock = deps.clock ?? Date.now;
    const startedAt = clock();

    const app = fastify({
        logger: deps.logLevel === false || deps.logLevel === undefined
            ? false
            : { level: deps.logLevel, name: "gateway" },
    });

    /**
     * Runs once the response is sent; analytics must never fail it.
     */
    function handOff(prediction: Prediction, latencyMs: number): void {
        setImmediate(() => {
            try {
                deps.sink.record(prediction, latencyMs);
            }
            catch (error) {
                logger.warn("Prediction not recorded", {
                    code : error instanceof TriageError ? error.code : undefined,
                    error: errorMessage(error),
                });
            }
        });
    }

    app.setErrorHandler((error: FastifyError, request, reply) => {
        const { status, body } = toErrorResponse(error);

        if (status >= 500) {
            request.log.error({ err: error }, "Request failed");
        }

        return reply.status(status).send(body);
    });

    app.setNotFoundHandler((request, reply) => {
        return reply.status(404).send(errorBody("not_found", `Route ${request.method} ${request.url} not found`));
    });

    const answered = new WeakMap<FastifyRequest, Prediction>();

    app.post("/predict", {
        onResponse: async (request, reply) => {
            const prediction = answered.get(request);
            if (prediction) {
                answered.delete(request);
                handOff(prediction, reply.elapsedTime);
            }
        },
    }, async (request) => {
        const prediction = deps.orchestrator.infer(parsePredictBody(request.body));
        answered.set(request, prediction);

        return serializePrediction(prediction);
    });

    app.get("/health", async () => {
        const missing = deps.orchestrator.missingCapabilities();

        return {
            status              : missing.length === 0 ? "ok" : "degraded",
            missing_capabilities: missing,
            models              : deps.registry.describe().map(serializeModel),
            uptime_s            : Math.floor((clock() - startedAt) / 1000),
        };
    });

    app.get("/metrics", async (request) => {
        const buckets = deps.metrics.snapshot(parseWindowMs(request.query));

        return {
            buckets: buckets.map(serializeBucket),
            summary: serializeSummary(summarizeBuckets(buckets)),
        };
    });

    app.get("/api/insights", async () => {
        const report = deps.insights.latest();

        if (report === null) {
            return {
                status  : "pending",
                degraded: false,
                message : "Insights are being generated",
            };
        }

        return serializeReport(report);
    });

    app.post("/api/insights/generate", async () => {
        return serializeReport(await deps.insights.generate());
    });

    return app;
}
