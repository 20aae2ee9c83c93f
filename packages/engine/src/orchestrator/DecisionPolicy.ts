/**
 * @fileoverview Decision Policy
 *
 * Maps stage scores to satisfaction and priority levels. Every threshold and
 * label set is configuration: model outputs vary across replaceable units.
 *
 * @module @triagekit/engine/orchestrator/DecisionPolicy
 */

import type { IssueType } from "../contracts/PredictionRequest.js";
import type { ModelScore } from "../contracts/ModelScore.js";
import type { Level } from "../contracts/Prediction.js";

export interface DecisionPolicy {
    /** Minimum sentiment confidence for a low/high satisfaction call */
    readonly satisfactionThreshold: number;

    /** Sentiment labels that mean an unhappy customer */
    readonly negativeLabels: readonly string[];

    /** Sentiment labels that mean a happy customer */
    readonly positiveLabels: readonly string[];

    /** Issue types escalated to high priority when satisfaction is low */
    readonly escalationIssueTypes: readonly IssueType[];
}

export const DEFAULT_DECISION_POLICY: DecisionPolicy = Object.freeze<DecisionPolicy>({
    satisfactionThreshold: 0.5,
    negativeLabels       : ["negative"],
    positiveLabels       : ["positive"],
    escalationIssueTypes : ["complaint", "account_access"],
});

/**
 * Merge overrides onto the default policy.
 *
 * @throws RangeError if the threshold is outside [0, 1]
 */
export function resolveDecisionPolicy(overrides: Partial<DecisionPolicy> = {}): DecisionPolicy {
    const policy = { ...DEFAULT_DECISION_POLICY, ...overrides };

    if (!Number.isFinite(policy.satisfactionThreshold)
        || policy.satisfactionThreshold < 0
        || policy.satisfactionThreshold > 1) {
        throw new RangeError(`satisfactionThreshold must be within [0, 1], got ${policy.satisfactionThreshold}`);
    }

    return Object.freeze(policy);
}

export function decideSatisfaction(sentiment: ModelScore, policy: DecisionPolicy): Level {
    if (sentiment.confidence < policy.satisfactionThreshold) {
        return "medium";
    }

    if (policy.negativeLabels.includes(sentiment.label)) {
        return "low";
    }

    if (policy.positiveLabels.includes(sentiment.label)) {
        return "high";
    }

    return "medium";
}

export function decidePriority(issueType: IssueType, satisfaction: Level, policy: DecisionPolicy): Level {
    if (satisfaction === "low" && policy.escalationIssueTypes.includes(issueType)) {
        return "high";
    }

    return satisfaction === "high" ? "low" : "medium";
}

/**
 * The chain is only as confident as its weakest stage.
 */
export function combineConfidence(intent: ModelScore, sentiment: ModelScore): number {
    return Math.min(intent.confidence, sentiment.confidence);
}
