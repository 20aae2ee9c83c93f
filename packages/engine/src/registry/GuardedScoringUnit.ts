/**
 * @fileoverview Guarded Scoring Unit
 *
 * Wraps a loaded scoring unit so that whatever happens inside it surfaces as
 * a `ScoringError`: thrown faults, malformed scores and budget overruns alike.
 * Also keeps the unit's call counters.
 *
 * @module @triagekit/engine/registry/GuardedScoringUnit
 */

import type { IssueType } from "../contracts/PredictionRequest.js";
import { createModelScore, type ModelScore } from "../contracts/ModelScore.js";
import type { Capability, ScoringUnit, ScoringUnitStats } from "../contracts/ScoringUnit.js";
import { errorMessage } from "../contracts/Logger.js";
import { ScoringError } from "../errors/index.js";

export class GuardedScoringUnit implements ScoringUnit {
    readonly id: string;
    readonly capability: Capability;
    readonly version: string;
    readonly family: string;

    private calls = 0;
    private failures = 0;
    private lastDurationMs: number | null = null;

    /**
     * @param inner - The unit to guard
     * @param budgetMs - Longest a single `score()` call may take
     * @param clock - Millisecond clock (injectable for tests)
     */
    constructor(
        private readonly inner: ScoringUnit,
        private readonly budgetMs: number,
        private readonly clock: () => number = () => performance.now()
    ) {
        this.id = inner.id;
        this.capability = inner.capability;
        this.version = inner.version;
        this.family = inner.family;
    }

    score(message: string, issueType: IssueType): ModelScore {
        this.calls++;
        const started = this.clock();

        let raw: ModelScore;
        try {
            raw = this.inner.score(message, issueType);
        }
        catch (error) {
            this.lastDurationMs = this.clock() - started;
            throw this.fail(`Scoring unit ${this.id} failed: ${errorMessage(error)}`, error);
        }

        const duration = this.clock() - started;
        this.lastDurationMs = duration;

        if (duration > this.budgetMs) {
            throw this.fail(
                `Scoring unit ${this.id} took ${duration.toFixed(1)}ms (budget ${this.budgetMs}ms)`
            );
        }

        try {
            return createModelScore(raw.label, raw.confidence);
        }
        catch (error) {
            throw this.fail(`Scoring unit ${this.id} returned an invalid score: ${errorMessage(error)}`, error);
        }
    }

    /**
     * Snapshot of this unit's counters.
     */
    get stats(): ScoringUnitStats {
        return {
            calls         : this.calls,
            failures      : this.failures,
            lastDurationMs: this.lastDurationMs,
        };
    }

    private fail(message: string, cause?: unknown): ScoringError {
        this.failures++;
        return new ScoringError(this.id, message, cause);
    }
}
