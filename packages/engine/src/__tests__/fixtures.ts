/**
 * @fileoverview Shared test fixtures
 *
 * @module @triagekit/engine/__tests__/fixtures
 */

import { vi } from "vitest";
import type { EngineLogger } from "../contracts/Logger.js";
import { createModelScore, type ModelScore } from "../contracts/ModelScore.js";
import { createPrediction, type Prediction } from "../contracts/Prediction.js";
import type { Capability, ScoringUnit } from "../contracts/ScoringUnit.js";
import { InMemoryModelRegistry } from "../registry/InMemoryModelRegistry.js";

/**
 * Logger whose methods are spies and print nothing.
 */
export function silentLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    } satisfies EngineLogger;
}

/**
 * Scoring unit that always returns the same score.
 */
export function stubUnit(
    capability: Capability,
    label: string,
    confidence: number,
    version = "1.0.0"
): ScoringUnit {
    const score: ModelScore = createModelScore(label, confidence);

    return {
        id    : `${capability}-stub@${version}`,
        capability,
        version,
        family: "stub",
        score : vi.fn(() => score),
    };
}

/**
 * Scoring unit whose score() throws.
 */
export function throwingUnit(capability: Capability, version = "1.0.0"): ScoringUnit {
    return {
        id    : `${capability}-broken@${version}`,
        capability,
        version,
        family: "stub",
        score : () => {
            throw new Error("model exploded");
        },
    };
}

/**
 * Registry holding the given units.
 */
export function registryWith(...units: ScoringUnit[]): InMemoryModelRegistry {
    const registry = new InMemoryModelRegistry({ logger: silentLogger() });
    for (const unit of units) {
        registry.register(unit);
    }
    return registry;
}

export function makePrediction(overrides: Partial<Omit<Prediction, "timestamp">> = {}): Prediction {
    return createPrediction({
        message              : "Where is my parcel?",
        issueType            : "shipping",
        predictedSatisfaction: "medium",
        recommendedPriority  : "medium",
        confidence           : 0.5,
        intent               : "shipping",
        responseStrategy     : "share_tracking_update",
        ...overrides,
    }, new Date("2026-03-02T10:00:00.000Z"));
}
