/**
 * Scoring Unit Contract
 *
 * The minimal callable contract a model must satisfy to take part in the
 * inference chain. Each model family (lexicon, response template, ...) is a
 * separate implementation; the registry hands out units by capability.
 *
 * Design principles:
 * - Synchronous: the chain is short and CPU-light
 * - Pure: no side effects beyond the unit's own counters
 * - Bounded: must return within the registry's time budget
 */

import type { IssueType } from "./PredictionRequest.js";
import type { ModelScore } from "./ModelScore.js";

/**
 * Every model role the chain knows about.
 */
export const CAPABILITIES = ["intent", "sentiment", "response"] as const;

/**
 * A named model role.
 */
export type Capability = (typeof CAPABILITIES)[number];

/**
 * Scoring unit interface.
 *
 * @example
 * ```typescript
 * const shoutingDetector: ScoringUnit = {
 *     id        : "sentiment-caps@1",
 *     capability: "sentiment",
 *     version   : "1",
 *     family    : "heuristic",
 *     score(message) {
 *         const shouting = message === message.toUpperCase();
 *         return createModelScore(shouting ? "negative" : "neutral", shouting ? 0.7 : 0.4);
 *     },
 * };
 * ```
 */
export interface ScoringUnit {
    /** Unique identifier (usually `<capability>-<family>@<version>`) */
    readonly id: string;

    /** Role this unit fills in the chain */
    readonly capability: Capability;

    /** Artifact version */
    readonly version: string;

    /** Model family that produced this unit */
    readonly family: string;

    /**
     * Score a message.
     *
     * @param message - Customer message text
     * @param issueType - Issue category selected by the customer
     */
    score(message: string, issueType: IssueType): ModelScore;
}

/**
 * Counters a guarded unit keeps about its own calls.
 */
export interface ScoringUnitStats {
    readonly calls: number;
    readonly failures: number;
    readonly lastDurationMs: number | null;
}
