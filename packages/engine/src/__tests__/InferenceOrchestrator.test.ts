/**
 * @fileoverview Unit tests for InferenceOrchestrator and the decision policy
 *
 * Tests cover:
 * - Satisfaction and priority mapping
 * - Confidence combination
 * - Neutral-score substitution for faulty units
 * - Missing models failing the request
 * - Event emission
 *
 * @module @triagekit/engine/__tests__/InferenceOrchestrator
 */

import { describe, it, expect, vi } from "vitest";
import { InferenceOrchestrator } from "../orchestrator/InferenceOrchestrator.js";
import {
    DEFAULT_DECISION_POLICY,
    decidePriority,
    decideSatisfaction,
    resolveDecisionPolicy,
} from "../orchestrator/DecisionPolicy.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createModelScore } from "../contracts/ModelScore.js";
import { ISSUE_TYPES } from "../contracts/PredictionRequest.js";
import { PredictionUnavailableError, ValidationError } from "../errors/index.js";
import { registryWith, silentLogger, stubUnit, throwingUnit } from "./fixtures.js";

const FIXED_NOW = new Date("2026-03-02T10:00:00.000Z");

function orchestratorFor(
    sentimentLabel: string,
    sentimentConfidence: number,
    intentConfidence = 0.8
): InferenceOrchestrator {
    return new InferenceOrchestrator({
        registry: registryWith(
            stubUnit("intent", "account_access", intentConfidence),
            stubUnit("sentiment", sentimentLabel, sentimentConfidence),
            stubUnit("response", "account_recovery_steps", 0.9),
        ),
        eventBus: new InMemoryEventBus(silentLogger()),
        logger  : silentLogger(),
        clock   : () => FIXED_NOW,
    });
}

describe("DecisionPolicy", () => {
    // Scenario: Threshold boundary is inclusive
    it("should call satisfaction low at exactly the threshold", () => {
        expect(decideSatisfaction(createModelScore("negative", 0.5), DEFAULT_DECISION_POLICY)).toBe("low");
        expect(decideSatisfaction(createModelScore("negative", 0.49), DEFAULT_DECISION_POLICY)).toBe("medium");
        expect(decideSatisfaction(createModelScore("positive", 0.5), DEFAULT_DECISION_POLICY)).toBe("high");
        expect(decideSatisfaction(createModelScore("neutral", 0.99), DEFAULT_DECISION_POLICY)).toBe("medium");
    });

    // Scenario: Label sets are configuration
    it("should honour custom label sets and threshold", () => {
        const policy = resolveDecisionPolicy({
            satisfactionThreshold: 0.8,
            negativeLabels       : ["angry", "sad"],
        });

        expect(decideSatisfaction(createModelScore("sad", 0.85), policy)).toBe("low");
        expect(decideSatisfaction(createModelScore("angry", 0.7), policy)).toBe("medium");
        expect(decideSatisfaction(createModelScore("negative", 0.95), policy)).toBe("medium");
    });

    it("should reject a threshold outside [0, 1]", () => {
        expect(() => resolveDecisionPolicy({ satisfactionThreshold: 1.5 })).toThrow(RangeError);
    });

    // Scenario: Priority table
    it("should escalate only escalation issue types with low satisfaction", () => {
        expect(decidePriority("complaint", "low", DEFAULT_DECISION_POLICY)).toBe("high");
        expect(decidePriority("account_access", "low", DEFAULT_DECISION_POLICY)).toBe("high");
        expect(decidePriority("billing", "low", DEFAULT_DECISION_POLICY)).toBe("medium");
        expect(decidePriority("complaint", "high", DEFAULT_DECISION_POLICY)).toBe("low");
        expect(decidePriority("complaint", "medium", DEFAULT_DECISION_POLICY)).toBe("medium");
    });
});

describe("InferenceOrchestrator", () => {
    describe("infer", () => {
        // Scenario: Full chain produces a prediction
        it("should combine the three stages into a prediction", () => {
            const prediction = orchestratorFor("negative", 0.93).infer({
                message  : "I cannot log into my account and I am very frustrated!",
                issueType: "account_access",
            });

            expect(prediction).toEqual({
                message              : "I cannot log into my account and I am very frustrated!",
                issueType            : "account_access",
                predictedSatisfaction: "low",
                recommendedPriority  : "high",
                confidence           : 0.8,
                intent               : "account_access",
                responseStrategy     : "account_recovery_steps",
                timestamp            : "2026-03-02T10:00:00.000Z",
            });
            expect(Object.isFrozen(prediction)).toBe(true);
        });

        // Scenario: Confidence is the weakest link, for every pairing
        it("should report the minimum of intent and sentiment confidence", () => {
            const pairs: [number, number][] = [[0.2, 0.9], [0.9, 0.2], [0.55, 0.55], [0, 1]];

            for (const [intent, sentiment] of pairs) {
                const prediction = orchestratorFor("neutral", sentiment, intent)
                    .infer({ message: "hello", issueType: "general" });
                expect(prediction.confidence).toBe(Math.min(intent, sentiment));
            }
        });

        // Scenario: Strongly negative complaint
        it("should give high priority to a strongly negative complaint", () => {
            const prediction = orchestratorFor("negative", 0.97)
                .infer({ message: "This is unacceptable", issueType: "complaint" });

            expect(prediction.recommendedPriority).toBe("high");
        });

        // Scenario: Happy customer
        it("should give low priority to a confidently positive message", () => {
            const prediction = orchestratorFor("positive", 0.9)
                .infer({ message: "Thanks, all sorted", issueType: "compliment" });

            expect(prediction.predictedSatisfaction).toBe("high");
            expect(prediction.recommendedPriority).toBe("low");
        });

        // Scenario: Every issue type is accepted
        it("should accept every known issue type", () => {
            const orchestrator = orchestratorFor("neutral", 0.6);

            for (const issueType of ISSUE_TYPES) {
                expect(orchestrator.infer({ message: "hello", issueType }).issueType).toBe(issueType);
            }
        });

        // Scenario: Blank message bypassing the gateway
        it("should reject a blank message", () => {
            expect(() => orchestratorFor("neutral", 0.6).infer({ message: "   ", issueType: "general" }))
                .toThrow(ValidationError);
        });
    });

    describe("failure semantics", () => {
        // Scenario: A faulty sentiment unit is replaced by the neutral score
        it("should substitute the neutral score when a unit faults", () => {
            const bus = new InMemoryEventBus(silentLogger());
            const fallbackHandler = vi.fn();
            bus.subscribe("prediction:stageFallback", fallbackHandler);

            const orchestrator = new InferenceOrchestrator({
                registry: registryWith(
                    stubUnit("intent", "complaint", 0.8),
                    throwingUnit("sentiment"),
                    stubUnit("response", "apologize_and_escalate", 0.9),
                ),
                eventBus: bus,
                logger  : silentLogger(),
            });

            const prediction = orchestrator.infer({ message: "meh", issueType: "complaint" });

            expect(prediction.predictedSatisfaction).toBe("medium");
            expect(prediction.recommendedPriority).toBe("medium");
            expect(prediction.confidence).toBe(0);
            expect(fallbackHandler).toHaveBeenCalledWith(expect.objectContaining({
                data: expect.objectContaining({ capability: "sentiment", unitId: "sentiment-broken@1.0.0" }),
            }));
        });

        // Scenario: A faulty response unit yields the neutral strategy label
        it("should report the neutral label for a faulty response stage", () => {
            const orchestrator = new InferenceOrchestrator({
                registry: registryWith(
                    stubUnit("intent", "billing", 0.7),
                    stubUnit("sentiment", "neutral", 0.6),
                    throwingUnit("response"),
                ),
                eventBus: new InMemoryEventBus(silentLogger()),
                logger  : silentLogger(),
            });

            const prediction = orchestrator.infer({ message: "invoice question", issueType: "billing" });

            expect(prediction.responseStrategy).toBe("unknown");
            expect(prediction.confidence).toBe(0.6);
        });

        // Scenario: A missing model fails the whole request
        it("should fail with PredictionUnavailableError when a model is missing", () => {
            const bus = new InMemoryEventBus(silentLogger());
            const failedHandler = vi.fn();
            bus.subscribe("prediction:failed", failedHandler);

            const orchestrator = new InferenceOrchestrator({
                registry: registryWith(
                    stubUnit("intent", "billing", 0.7),
                    stubUnit("sentiment", "neutral", 0.6),
                ),
                eventBus: bus,
                logger  : silentLogger(),
            });

            expect(() => orchestrator.infer({ message: "hello", issueType: "billing" }))
                .toThrow(PredictionUnavailableError);
            expect(failedHandler).toHaveBeenCalledTimes(1);
        });

        // Scenario: The cause is attached
        it("should attach the missing-model error as cause", () => {
            const orchestrator = new InferenceOrchestrator({
                registry: registryWith(),
                eventBus: new InMemoryEventBus(silentLogger()),
                logger  : silentLogger(),
            });

            try {
                orchestrator.infer({ message: "hello", issueType: "general" });
                expect.unreachable("infer should throw");
            }
            catch (error) {
                expect(error).toBeInstanceOf(PredictionUnavailableError);
                if (error instanceof PredictionUnavailableError) {
                    expect(error.capability).toBe("intent");
                    expect(error.cause).toBeInstanceOf(Error);
                }
            }
        });

        // Scenario: Pinned version that is not loaded
        it("should honour pinned versions", () => {
            const orchestrator = new InferenceOrchestrator({
                registry: registryWith(
                    stubUnit("intent", "billing", 0.7),
                    stubUnit("sentiment", "neutral", 0.6),
                    stubUnit("response", "billing_followup", 0.9),
                ),
                versions: { sentiment: "2.0.0" },
                eventBus: new InMemoryEventBus(silentLogger()),
                logger  : silentLogger(),
            });

            expect(() => orchestrator.infer({ message: "hello", issueType: "billing" }))
                .toThrow("Prediction unavailable: sentiment model is not loaded");
            expect(orchestrator.missingCapabilities()).toEqual(["sentiment"]);
        });

        // Scenario: Nothing missing
        it("should list no missing capabilities when every stage resolves", () => {
            expect(orchestratorFor("neutral", 0.6).missingCapabilities()).toEqual([]);
        });

        // Scenario: Capability with no model at all
        it("should list capabilities with no loaded model", () => {
            const orchestrator = new InferenceOrchestrator({
                registry: registryWith(stubUnit("intent", "billing", 0.7)),
                eventBus: new InMemoryEventBus(silentLogger()),
                logger  : silentLogger(),
            });

            expect(orchestrator.missingCapabilities()).toEqual(["sentiment", "response"]);
        });
    });

    describe("events", () => {
        // Scenario: Success emits prediction:created with a trace id
        it("should emit prediction:created with a trace id", () => {
            const orchestrator = orchestratorFor("negative", 0.9);
            const handler = vi.fn();
            orchestrator.eventBus.subscribe("prediction:created", handler);

            orchestrator.infer({ message: "Locked out again", issueType: "account_access" });

            expect(handler).toHaveBeenCalledWith(expect.objectContaining({
                type   : "prediction:created",
                traceId: expect.stringMatching(/^tr_/),
                data   : expect.objectContaining({ priority: "high", fallbacks: [] }),
            }));
        });
    });
});
