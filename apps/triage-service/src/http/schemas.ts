/**
 * @fileoverview Request body and query validation
 *
 * zod schemas for the gateway's inputs. Validation failures are mapped onto
 * the engine's `ValidationError` codes so every 400 carries a stable
 * `error_code`.
 *
 * @module http/schemas
 */

import { z } from "zod";
import {
    ISSUE_TYPES,
    ValidationError,
    createPredictionRequest,
    type PredictionRequest,
} from "@triagekit/engine";

export const PredictBodySchema = z.object({
    message: z.string().refine(value => value.trim().length > 0, "message must not be empty"),
    issue_type: z.enum(ISSUE_TYPES),
});

export const MetricsQuerySchema = z.object({
    window_ms: z.string().optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toValidationError(issue: z.ZodIssue): ValidationError {
    const field = issue.path[0];
    const absent = issue.code === "invalid_type" && issue.received === "undefined";

    if (field === "message") {
        if (absent) {
            return new ValidationError("empty_message", "message is required");
        }
        if (issue.code === "invalid_type") {
            return new ValidationError("invalid_request", "message must be a string");
        }
        return new ValidationError("empty_message", "message must not be empty");
    }

    if (field === "issue_type") {
        if (absent) {
            return new ValidationError("missing_issue_type", "issue_type is required");
        }
        return new ValidationError(
            "invalid_issue_type",
            `issue_type must be one of: ${ISSUE_TYPES.join(", ")}`
        );
    }

    return new ValidationError("invalid_request", issue.message);
}

/**
 * Validate a `/predict` body.
 *
 * @throws ValidationError with the code of the first problem found
 */
export function parsePredictBody(body: unknown): PredictionRequest {
    if (!isRecord(body)) {
        throw new ValidationError("invalid_request", "request body must be a JSON object");
    }

    const result = PredictBodySchema.safeParse(body);
    if (!result.success) {
        const [issue] = result.error.issues;
        throw issue
            ? toValidationError(issue)
            : new ValidationError("invalid_request", "invalid request body");
    }

    return createPredictionRequest(result.data.message, result.data.issue_type);
}

/**
 * Read the optional `window_ms` query parameter.
 *
 * Range checks belong to the aggregator; this only rejects values that are
 * not a single number.
 */
export function parseWindowMs(query: unknown): number | undefined {
    const result = MetricsQuerySchema.safeParse(query);
    if (!result.success) {
        throw new ValidationError("invalid_window", "window_ms must be a single number");
    }

    const raw = result.data.window_ms;
    if (raw === undefined) {
        return undefined;
    }

    const windowMs = raw.trim() === "" ? Number.NaN : Number(raw);
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
        throw new ValidationError("invalid_window", `window_ms must be a positive number, got "${raw}"`);
    }

    return windowMs;
}
