/**
 * Model Score
 *
 * The result of one scoring unit evaluating one message.
 * Produced once per model call and treated as read-only after creation.
 */

/**
 * Output of a ScoringUnit.
 *
 * @example
 * ```typescript
 * { label: "negative", confidence: 0.92 }
 * { label: "account_access", confidence: 0.64 }
 * ```
 */
export interface ModelScore {
    /** Label chosen by the model (routing key for the decision policy) */
    readonly label: string;

    /** Confidence between 0.0 and 1.0 */
    readonly confidence: number;
}

/**
 * Label used when a stage could not be scored.
 */
export const NEUTRAL_LABEL = "unknown";

/**
 * Whether a number is a usable confidence value.
 */
export function isValidConfidence(value: number): boolean {
    return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Factory function to create a ModelScore.
 * Ensures the object is frozen (immutable).
 *
 * @throws RangeError if the confidence is outside [0, 1] or the label is empty
 */
export function createModelScore(label: string, confidence: number): ModelScore {
    if (label.length === 0) {
        throw new RangeError("Model score label must not be empty");
    }

    if (!isValidConfidence(confidence)) {
        throw new RangeError(`Model score confidence out of range: ${confidence}`);
    }

    return Object.freeze({ label, confidence });
}

/**
 * Substituted for a stage whose scoring unit failed mid-evaluation.
 */
export const NEUTRAL_SCORE: ModelScore = createModelScore(NEUTRAL_LABEL, 0);
