/**
 * Prediction Request Contract
 *
 * The inbound shape the orchestrator evaluates. Issue types are a closed set:
 * anything outside it is rejected at the boundary, never mapped to "general".
 */

import { ValidationError } from "../errors/index.js";

/**
 * Every issue type a request may carry.
 */
export const ISSUE_TYPES = [
    "general",
    "account_access",
    "billing",
    "shipping",
    "technical_support",
    "complaint",
    "compliment",
] as const;

export type IssueType = (typeof ISSUE_TYPES)[number];

/**
 * A single customer message awaiting prediction.
 */
export interface PredictionRequest {
    /** Customer message text (non-empty after trimming) */
    readonly message: string;

    /** Issue category selected by the customer */
    readonly issueType: IssueType;
}

/**
 * Type guard for issue types.
 */
export function isIssueType(value: unknown): value is IssueType {
    return ISSUE_TYPES.some(issueType => issueType === value);
}

/**
 * Create a frozen PredictionRequest, rejecting blank messages and unknown issue types.
 *
 * @throws ValidationError with code `empty_message` or `invalid_issue_type`
 */
export function createPredictionRequest(message: string, issueType: string): PredictionRequest {
    if (message.trim().length === 0) {
        throw new ValidationError("empty_message", "message must not be empty");
    }

    if (!isIssueType(issueType)) {
        throw new ValidationError(
            "invalid_issue_type",
            `issue_type must be one of: ${ISSUE_TYPES.join(", ")}`
        );
    }

    return Object.freeze({ message, issueType });
}
