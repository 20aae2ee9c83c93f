/**
 * @fileoverview Unit tests for InsightsGenerator, the prompt builder and severity rules
 *
 * Tests cover:
 * - Fresh reports from the backend
 * - Timeout, failure and malformed replies degrading the report
 * - Idempotence on an unchanged snapshot
 * - Superseded and cancelled generations never replacing the latest report
 * - Prompt size bounds
 *
 * @module @triagekit/engine/__tests__/InsightsGenerator
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { InsightsGenerator } from "../insights/InsightsGenerator.js";
import { buildInsightPrompt } from "../insights/prompt.js";
import { buildFallbackDraft, determineSeverity } from "../insights/fallback.js";
import { AnalyticsAggregator } from "../analytics/AnalyticsAggregator.js";
import { summarizeBuckets } from "../analytics/summarize.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { InsightsBackendError } from "../errors/index.js";
import type { InsightDraft, InsightPrompt, InsightsBackend } from "../contracts/InsightReport.js";
import type { MetricBucket } from "../contracts/MetricBucket.js";
import type { Prediction } from "../contracts/Prediction.js";
import { makePrediction, silentLogger } from "./fixtures.js";

const GENERATED_AT = new Date("2026-03-02T12:00:00.000Z");
const MINUTE = 60_000;

const DRAFT: InsightDraft = {
    title          : "Billing pressure",
    summaryText    : "Billing questions dominate. Satisfaction is steady.",
    keyFindings    : ["3 billing cases"],
    alerts         : [],
    recommendations: ["Publish a refund FAQ", "Staff the billing queue"],
};

type CompleteFn = (prompt: InsightPrompt, signal: AbortSignal) => Promise<InsightDraft>;

function stubBackend(complete: CompleteFn) {
    return {
        id      : "stub",
        complete: vi.fn(complete),
    } satisfies InsightsBackend;
}

function snapshotOf(predictions: Prediction[], perMinute = predictions.length): readonly MetricBucket[] {
    let now = Date.parse("2026-03-02T10:00:00.000Z");
    const aggregator = new AnalyticsAggregator({ clock: () => now, logger: silentLogger() });

    predictions.forEach((prediction, index) => {
        if (index > 0 && index % perMinute === 0) {
            now += MINUTE;
        }
        aggregator.record(prediction, 20);
    });

    return aggregator.snapshot();
}

function generatorFor(backend: InsightsBackend, timeoutMs = 5000): InsightsGenerator {
    return new InsightsGenerator({
        backend,
        timeoutMs,
        eventBus: new InMemoryEventBus(silentLogger()),
        logger  : silentLogger(),
        clock   : () => GENERATED_AT,
    });
}

const BILLING = [
    makePrediction({ issueType: "billing" }),
    makePrediction({ issueType: "billing" }),
    makePrediction({ issueType: "billing", recommendedPriority: "high", predictedSatisfaction: "low" }),
];

describe("InsightsGenerator", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    describe("generate", () => {
        // Scenario: Healthy backend
        it("should build a fresh report from the backend draft", async () => {
            const backend = stubBackend(async () => DRAFT);
            const generator = generatorFor(backend);

            const report = await generator.generate(snapshotOf(BILLING));

            expect(report).toEqual({
                generatedAt       : "2026-03-02T12:00:00.000Z",
                title             : "Billing pressure",
                summaryText       : "Billing questions dominate. Satisfaction is steady.",
                keyFindings       : ["3 billing cases"],
                alerts            : [],
                recommendations   : ["Publish a refund FAQ", "Staff the billing queue"],
                severity          : "medium",
                basedOnBucketCount: 1,
                dataPoints        : 3,
                degraded          : false,
                source            : "backend",
            });
            expect(generator.latest()).toBe(report);
            expect(Object.isFrozen(report)).toBe(true);
        });

        // Scenario: Prompt carries the snapshot
        it("should pass a prompt describing the snapshot", async () => {
            const backend = stubBackend(async () => DRAFT);

            await generatorFor(backend).generate(snapshotOf(BILLING));

            const [prompt] = backend.complete.mock.calls[0] ?? [];
            expect(prompt?.user).toContain("- Total interactions analyzed: 3 across 1 time buckets");
            expect(prompt?.user).toContain("- billing: 3 cases");
            expect(prompt?.system).toContain("\"key_findings\"");
        });

        // Scenario: Simulated backend timeout after a good report
        it("should return the previous report marked degraded when the backend times out", async () => {
            vi.useFakeTimers();
            let call = 0;
            const backend = stubBackend(() => {
                call++;
                return call === 1 ? Promise.resolve(DRAFT) : new Promise<InsightDraft>(() => {});
            });
            const generator = generatorFor(backend, 5000);

            const first = await generator.generate(snapshotOf(BILLING));
            const pending = generator.generate(snapshotOf([...BILLING, makePrediction()]));
            await vi.advanceTimersByTimeAsync(5000);
            const second = await pending;

            expect(second).toEqual({ ...first, degraded: true });
            expect(generator.latest()).toEqual({ ...first, degraded: true });
            expect(backend.complete.mock.calls[1]?.[1].aborted).toBe(true);
        });

        // Scenario: Backend down with no report yet
        it("should fall back to a rule-based degraded report when nothing was generated before", async () => {
            const backend = stubBackend(async () => {
                throw new Error("connection refused");
            });
            const generator = generatorFor(backend);

            const report = await generator.generate(snapshotOf(BILLING));

            expect(report.degraded).toBe(true);
            expect(report.source).toBe("fallback");
            expect(report.dataPoints).toBe(3);
            expect(report.summaryText).toBe("Analyzed 3 customer interactions: 33.3% high priority, 33.3% low satisfaction.");
            expect(report.alerts).toEqual(["High priority spike: 33.3% of cases need urgent attention"]);
        });

        // Scenario: Backend replies with an empty summary
        it("should treat an empty summary as a backend failure", async () => {
            const generator = generatorFor(stubBackend(async () => ({ ...DRAFT, summaryText: "  " })));

            const report = await generator.generate(snapshotOf(BILLING));

            expect(report.degraded).toBe(true);
            expect(report.source).toBe("fallback");
        });

        // Scenario: Degradation is announced on the bus
        it("should emit insights:degraded with the failure reason", async () => {
            const bus = new InMemoryEventBus(silentLogger());
            const handler = vi.fn();
            bus.subscribe("insights:degraded", handler);
            const generator = new InsightsGenerator({
                backend : stubBackend(async () => {
                    throw new InsightsBackendError("malformed", "not JSON");
                }),
                eventBus: bus,
                logger  : silentLogger(),
            });

            await generator.generate(snapshotOf(BILLING));

            expect(handler).toHaveBeenCalledWith(expect.objectContaining({
                data: { reason: "malformed", source: "fallback" },
            }));
        });

        // Scenario: No predictions yet
        it("should not call the backend for an empty snapshot", async () => {
            const backend = stubBackend(async () => DRAFT);
            const generator = generatorFor(backend);

            const report = await generator.generate([]);

            expect(backend.complete).not.toHaveBeenCalled();
            expect(report.degraded).toBe(false);
            expect(report.source).toBe("fallback");
            expect(report.keyFindings).toEqual(["No data to analyze"]);
        });
    });

    describe("idempotence", () => {
        // Scenario: Unchanged snapshot, same generator
        it("should reuse the fresh report for an unchanged snapshot", async () => {
            const backend = stubBackend(async () => DRAFT);
            const generator = generatorFor(backend);
            const snapshot = snapshotOf(BILLING);

            const first = await generator.generate(snapshot);
            const second = await generator.generate(snapshot);

            expect(second).toBe(first);
            expect(backend.complete).toHaveBeenCalledTimes(1);
        });

        // Scenario: Unchanged snapshot, varying text
        it("should produce structurally equal reports for the same snapshot", async () => {
            const wordings = ["Billing leads.", "Most tickets concern billing."];
            const reports = await Promise.all(wordings.map(summaryText =>
                generatorFor(stubBackend(async () => ({ ...DRAFT, summaryText }))).generate(snapshotOf(BILLING))
            ));

            const structure = reports.map(report => ({
                severity          : report.severity,
                basedOnBucketCount: report.basedOnBucketCount,
                dataPoints        : report.dataPoints,
                degraded          : report.degraded,
                source            : report.source,
            }));
            expect(structure[0]).toEqual(structure[1]);
        });

        // Scenario: A degraded report is retried on the same snapshot
        it("should call the backend again when the cached report is degraded", async () => {
            let fail = true;
            const backend = stubBackend(async () => {
                if (fail) {
                    throw new Error("down");
                }
                return DRAFT;
            });
            const generator = generatorFor(backend);
            const snapshot = snapshotOf(BILLING);

            await generator.generate(snapshot);
            fail = false;
            const report = await generator.generate(snapshot);

            expect(report.degraded).toBe(false);
            expect(backend.complete).toHaveBeenCalledTimes(2);
        });
    });

    describe("latest-report slot", () => {
        // Scenario: An older generation finishing last does not win
        it("should not let a superseded generation overwrite a newer report", async () => {
            let releaseSlow: (draft: InsightDraft) => void = () => {};
            const slow = new Promise<InsightDraft>((resolve) => {
                releaseSlow = resolve;
            });
            let call = 0;
            const backend = stubBackend(() => {
                call++;
                return call === 1 ? slow : Promise.resolve({ ...DRAFT, title: "Newer" });
            });
            const generator = generatorFor(backend);

            const older = generator.generate(snapshotOf(BILLING));
            const newer = await generator.generate(snapshotOf([...BILLING, makePrediction()]));
            releaseSlow({ ...DRAFT, title: "Older" });
            const olderReport = await older;

            expect(olderReport.title).toBe("Older");
            expect(generator.latest()).toBe(newer);
            expect(generator.latest()?.title).toBe("Newer");
        });

        // Scenario: cancel() abandons the in-flight call
        it("should abandon in-flight generations on cancel without touching the slot", async () => {
            const backend = stubBackend(() => new Promise<InsightDraft>(() => {}));
            const generator = generatorFor(backend);

            const pending = generator.generate(snapshotOf(BILLING));
            generator.cancel();
            const report = await pending;

            expect(report.degraded).toBe(true);
            expect(generator.latest()).toBeNull();
            expect(backend.complete.mock.calls[0]?.[1].aborted).toBe(true);
        });

        // Scenario: Caller aborts through its own signal
        it("should stop waiting when the caller's signal fires", async () => {
            const backend = stubBackend(() => new Promise<InsightDraft>(() => {}));
            const generator = generatorFor(backend);
            const controller = new AbortController();

            const pending = generator.generate(snapshotOf(BILLING), { signal: controller.signal });
            controller.abort();
            const report = await pending;

            expect(report.degraded).toBe(true);
            expect(report.source).toBe("fallback");
            expect(generator.latest()).toBeNull();
        });

        // Scenario: Caller aborts while a fresh report is published
        it("should keep the fresh report when the caller's signal fires", async () => {
            let call = 0;
            const backend = stubBackend(() => {
                call++;
                return call === 1 ? Promise.resolve(DRAFT) : new Promise<InsightDraft>(() => {});
            });
            const generator = generatorFor(backend);
            const fresh = await generator.generate(snapshotOf(BILLING));
            const controller = new AbortController();

            const pending = generator.generate(snapshotOf([...BILLING, makePrediction()]), { signal: controller.signal });
            controller.abort();
            await pending;

            expect(generator.latest()).toBe(fresh);
            expect(generator.latest()?.degraded).toBe(false);
        });
    });
});

describe("buildInsightPrompt", () => {
    // Scenario: Long history is cut to the newest buckets that fit
    it("should keep the prompt within its character budget, newest buckets first to survive", () => {
        const predictions = Array.from({ length: 40 }, () => makePrediction());
        const snapshot = snapshotOf(predictions, 1);
        const summary = summarizeBuckets(snapshot);

        const prompt = buildInsightPrompt(snapshot, summary, { maxPromptBuckets: 60, maxPromptChars: 1200 });

        expect(prompt.user.length).toBeLessThanOrEqual(1200);
        expect(prompt.user).toContain("2026-03-02T10:39:00.000Z");
        expect(prompt.user).not.toContain("2026-03-02T10:00:00.000Z");
        expect(prompt.user).toContain("- Total interactions analyzed: 40 across 40 time buckets");
    });

    // Scenario: Bucket count bound
    it("should list at most maxPromptBuckets buckets", () => {
        const snapshot = snapshotOf(Array.from({ length: 10 }, () => makePrediction()), 1);

        const prompt = buildInsightPrompt(snapshot, summarizeBuckets(snapshot), {
            maxPromptBuckets: 3,
            maxPromptChars  : 10_000,
        });

        expect(prompt.user.match(/ n=1 /g)).toHaveLength(3);
        expect(prompt.user).toContain("2026-03-02T10:07:00.000Z");
        expect(prompt.user).not.toContain("2026-03-02T10:06:00.000Z");
    });
});

describe("determineSeverity", () => {
    function severityFor(high: number, low: number, total = 10) {
        const predictions = Array.from({ length: total }, (_, index) => makePrediction({
            recommendedPriority  : index < high ? "high" : "medium",
            predictedSatisfaction: index < low ? "low" : "medium",
        }));
        return determineSeverity(summarizeBuckets(snapshotOf(predictions)));
    }

    it("should rate high above 40% high priority or 50% low satisfaction", () => {
        expect(severityFor(5, 0)).toBe("high");
        expect(severityFor(0, 6)).toBe("high");
    });

    it("should rate medium above 20% high priority or 30% low satisfaction", () => {
        expect(severityFor(3, 0)).toBe("medium");
        expect(severityFor(0, 4)).toBe("medium");
    });

    it("should rate low otherwise", () => {
        expect(severityFor(2, 3)).toBe("low");
        expect(determineSeverity(summarizeBuckets([]))).toBe("low");
    });
});

describe("buildFallbackDraft", () => {
    it("should recommend reviewing escalations above 20% high priority", () => {
        const predictions = Array.from({ length: 4 }, (_, index) => makePrediction({
            recommendedPriority: index === 0 ? "high" : "low",
        }));

        const draft = buildFallbackDraft(summarizeBuckets(snapshotOf(predictions)));

        expect(draft.recommendations).toEqual([
            "Continue monitoring customer satisfaction trends",
            "Review high priority case resolution processes",
        ]);
        expect(draft.keyFindings).toContain("High priority cases: 1 (25.0%)");
    });
});
