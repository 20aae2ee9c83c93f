/**
 * Prediction Contract
 *
 * The decision the orchestrator derives from one request's stage scores.
 * Pure data: never mutated after creation, copied by value into analytics.
 */

import type { IssueType } from "./PredictionRequest.js";

export const LEVELS = ["low", "medium", "high"] as const;

/**
 * Three-step scale shared by satisfaction and priority.
 */
export type Level = (typeof LEVELS)[number];

/**
 * Immutable prediction.
 */
export interface Prediction {
    /** Customer message the prediction was made for */
    readonly message: string;

    /** Issue category from the request */
    readonly issueType: IssueType;

    /** Expected customer satisfaction */
    readonly predictedSatisfaction: Level;

    /** Escalation priority for the support queue */
    readonly recommendedPriority: Level;

    /** Minimum of the intent and sentiment confidences */
    readonly confidence: number;

    /** Label produced by the intent stage */
    readonly intent: string;

    /** Label produced by the response-template stage */
    readonly responseStrategy: string;

    /** ISO timestamp when the prediction was made */
    readonly timestamp: string;
}

/**
 * Factory function to create a Prediction.
 * Ensures timestamp is set and object is frozen (immutable).
 */
export function createPrediction(
    fields: Omit<Prediction, "timestamp">,
    timestamp: Date = new Date()
): Prediction {
    return Object.freeze({
        ...fields,
        timestamp: timestamp.toISOString(),
    });
}
