/**
 * @fileoverview Error taxonomy
 *
 * Every fault the engine raises on purpose. Each carries a machine-readable
 * `code` and the HTTP status a boundary should answer with.
 *
 * Propagation:
 * - ValidationError, ModelUnavailableError, PredictionUnavailableError fail the request
 * - ScoringError is absorbed by the orchestrator (neutral score)
 * - AggregatorUnavailableError is logged and dropped by the gateway
 * - InsightsBackendError degrades the last insight report
 *
 * @module @triagekit/engine/errors
 */

import type { Capability } from "../contracts/ScoringUnit.js";

/**
 * Options shared by every engine error.
 */
export interface TriageErrorOptions {
    readonly code: string;
    readonly statusCode: number;
    readonly cause?: unknown;
}

/**
 * Base class for engine errors.
 */
export class TriageError extends Error {
    readonly code: string;
    readonly statusCode: number;

    constructor(message: string, options: TriageErrorOptions) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.code = options.code;
        this.statusCode = options.statusCode;
    }
}

/**
 * Codes a ValidationError may carry.
 */
export type ValidationCode =
    | "invalid_request"
    | "empty_message"
    | "missing_issue_type"
    | "invalid_issue_type"
    | "invalid_window"
    | "invalid_metric";

/**
 * Bad request shape or values; fixable by the client.
 */
export class ValidationError extends TriageError {
    constructor(code: ValidationCode, message: string) {
        super(message, { code, statusCode: 400 });
    }
}

/**
 * A capability (or a specific version of it) has no loaded artifact.
 */
export class ModelUnavailableError extends TriageError {
    readonly capability: Capability;
    readonly version?: string;

    constructor(capability: Capability, version?: string) {
        const target = version === undefined ? capability : `${capability}@${version}`;
        super(`No model loaded for ${target}`, { code: "model_unavailable", statusCode: 503 });
        this.capability = capability;
        this.version = version;
    }
}

/**
 * A scoring unit raised, returned garbage or overran its budget mid-evaluation.
 */
export class ScoringError extends TriageError {
    readonly unitId: string;

    constructor(unitId: string, message: string, cause?: unknown) {
        super(message, { code: "scoring_error", statusCode: 500, cause });
        this.unitId = unitId;
    }
}

/**
 * The orchestrator cannot produce a prediction (a required model is missing).
 */
export class PredictionUnavailableError extends TriageError {
    readonly capability: Capability;

    constructor(capability: Capability, cause?: unknown) {
        super(`Prediction unavailable: ${capability} model is not loaded`, {
            code      : "prediction_unavailable",
            statusCode: 503,
            cause,
        });
        this.capability = capability;
    }
}

/**
 * The analytics sink cannot take records right now.
 */
export class AggregatorUnavailableError extends TriageError {
    constructor(message: string, cause?: unknown) {
        super(message, { code: "aggregator_unavailable", statusCode: 503, cause });
    }
}

/**
 * Why an insights backend call did not produce a usable draft.
 */
export type InsightsFailureReason = "timeout" | "cancelled" | "failure" | "malformed";

/**
 * The external generation service failed, timed out or replied with garbage.
 */
export class InsightsBackendError extends TriageError {
    readonly reason: InsightsFailureReason;

    constructor(reason: InsightsFailureReason, message: string, cause?: unknown) {
        super(message, { code: "insights_backend_error", statusCode: 502, cause });
        this.reason = reason;
    }
}
