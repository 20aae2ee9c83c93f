/**
 * @fileoverview Insights Generator
 *
 * Turns a metrics snapshot into an InsightReport through an external
 * language-model backend.
 *
 * Guarantees:
 * - generate() never throws: a failed, slow or malformed backend call
 *   degrades the previous report (or a rule-based one) instead
 * - The latest-report slot is replaced by a single assignment, only with a
 *   fully built report, and only by the most recently started generation
 * - An unchanged snapshot returns the cached fresh report without a backend call
 *
 * @module @triagekit/engine/insights/InsightsGenerator
 */

import type {
    InsightDraft,
    InsightReport,
    InsightsBackend,
    InsightSource,
} from "../contracts/InsightReport.js";
import type { MetricBucket, MetricsSummary } from "../contracts/MetricBucket.js";
import { createEvent, type EventBus } from "../contracts/EventBus.js";
import { defaultLogger, errorMessage, type EngineLogger } from "../contracts/Logger.js";
import { InsightsBackendError, type InsightsFailureReason } from "../errors/index.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { summarizeBuckets } from "../analytics/summarize.js";
import { buildFallbackDraft, DEFAULT_REPORT_TITLE, determineSeverity } from "./fallback.js";
import { buildInsightPrompt, type PromptLimits } from "./prompt.js";

/**
 * Generator configuration options.
 */
export interface InsightsGeneratorConfig {
    readonly backend: InsightsBackend;

    /** Backend call timeout in milliseconds (default: 5000) */
    readonly timeoutMs?: number;

    /** Most recent buckets listed in the prompt (default: 60) */
    readonly maxPromptBuckets?: number;

    /** Prompt size bound in characters (default: 4000) */
    readonly maxPromptChars?: number;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    readonly logger?: EngineLogger;

    /** Source of report timestamps */
    readonly clock?: () => Date;
}

export interface GenerateOptions {
    /** Abandons the backend call when fired */
    readonly signal?: AbortSignal;
}

/**
 * Settle with `work`, or reject with the signal's reason as soon as it fires.
 */
export function raceWithAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        if (signal.aborted) {
            reject(signal.reason);
            return;
        }

        const onAbort = (): void => reject(signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });

        work.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(error);
            }
        );
    });
}

function failureReason(error: unknown): InsightsFailureReason {
    return error instanceof InsightsBackendError ? error.reason : "failure";
}

function fingerprint(snapshot: readonly MetricBucket[]): string {
    return JSON.stringify(snapshot);
}

/**
 * InsightsGenerator - best-effort natural-language summaries.
 *
 * @example
 * ```typescript
 * const generator = new InsightsGenerator({ backend, timeoutMs: 5000 });
 *
 * const report = await generator.generate(aggregator.snapshot());
 * if (report.degraded) {
 *     console.warn("Serving a stale report");
 * }
 * ```
 */
export class InsightsGenerator {
    /** Public access to the event bus for external subscriptions */
    readonly eventBus: EventBus;

    private current: InsightReport | null = null;
    private currentFingerprint: string | null = null;
    private ticket = 0;
    private readonly inFlight: Set<AbortController> = new Set();

    private readonly backend: InsightsBackend;
    private readonly timeoutMs: number;
    private readonly limits: PromptLimits;
    private readonly logger: EngineLogger;
    private readonly clock: () => Date;

    constructor(config: InsightsGeneratorConfig) {
        this.backend = config.backend;
        this.timeoutMs = config.timeoutMs ?? 5000;
        this.limits = {
            maxPromptBuckets: config.maxPromptBuckets ?? 60,
            maxPromptChars  : config.maxPromptChars ?? 4000,
        };
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? defaultLogger;
        this.clock = config.clock ?? (() => new Date());
    }

    /**
     * The most recently published report, or null before the first one.
     */
    latest(): InsightReport | null {
        return this.current;
    }

    /**
     * Build a report for `snapshot`. Never rejects.
     */
    async generate(snapshot: readonly MetricBucket[], options: GenerateOptions = {}): Promise<InsightReport> {
        const print = fingerprint(snapshot);
        if (this.current && !this.current.degraded && this.currentFingerprint === print) {
            return this.current;
        }

        const ticket = ++this.ticket;
        const summary = summarizeBuckets(snapshot);

        if (summary.totalPredictions === 0) {
            const report = this.buildReport(buildFallbackDraft(summary), summary, "fallback", false);
            this.publish(ticket, report, print);
            return report;
        }

        const controller = new AbortController();
        const timer = setTimeout(() => {
            controller.abort(new InsightsBackendError("timeout", `Insights backend timed out after ${this.timeoutMs}ms`));
        }, this.timeoutMs);
        const onCallerAbort = (): void => {
            controller.abort(new InsightsBackendError("cancelled", "Insights generation cancelled"));
        };
        if (options.signal?.aborted) {
            onCallerAbort();
        }
        options.signal?.addEventListener("abort", onCallerAbort, { once: true });
        this.inFlight.add(controller);

        try {
            const prompt = buildInsightPrompt(snapshot, summary, this.limits);
            const draft = await raceWithAbort(this.backend.complete(prompt, controller.signal), controller.signal);

            if (draft.summaryText.trim().length === 0) {
                throw new InsightsBackendError("malformed", "Insights backend returned an empty summary");
            }

            const report = this.buildReport(draft, summary, "backend", false);
            this.publish(ticket, report, print);
            return report;
        }
        catch (error) {
            return this.degrade(ticket, summary, error);
        }
        finally {
            clearTimeout(timer);
            options.signal?.removeEventListener("abort", onCallerAbort);
            this.inFlight.delete(controller);
        }
    }

    /**
     * Abandon every in-flight generation. Abandoned generations still resolve
     * (degraded) but never replace the latest report. A caller's signal
     * firing has the same effect on that one generation.
     */
    cancel(): void {
        this.ticket++;
        for (const controller of this.inFlight) {
            controller.abort(new InsightsBackendError("cancelled", "Insights generation cancelled"));
        }
    }

    private degrade(ticket: number, summary: MetricsSummary, error: unknown): InsightReport {
        const reason = failureReason(error);
        const previous = this.current;
        const report = previous
            ? Object.freeze({ ...previous, degraded: true })
            : this.buildReport(buildFallbackDraft(summary), summary, "fallback", true);

        // Abandoned runs answer their caller but leave the slot alone
        if (reason === "cancelled") {
            this.logger.info("Insights generation abandoned", { backend: this.backend.id, ticket });
            return report;
        }

        this.logger.warn("Insights backend unavailable, degrading report", {
            backend    : this.backend.id,
            reason,
            error      : errorMessage(error),
            hasPrevious: previous !== null,
        });

        this.eventBus.emit(createEvent("insights:degraded", {
            reason,
            source: report.source,
        }));
        this.publish(ticket, report, null);
        return report;
    }

    private publish(ticket: number, report: InsightReport, print: string | null): void {
        if (ticket !== this.ticket) {
            this.logger.debug("Discarding superseded insight report", { ticket, latestTicket: this.ticket });
            return;
        }

        this.current = report;
        this.currentFingerprint = print;

        if (!report.degraded) {
            this.eventBus.emit(createEvent("insights:generated", {
                source    : report.source,
                severity  : report.severity,
                dataPoints: report.dataPoints,
            }));
        }
    }

    private buildReport(
        draft: InsightDraft,
        summary: MetricsSummary,
        source: InsightSource,
        degraded: boolean
    ): InsightReport {
        const title = draft.title?.trim();

        return Object.freeze({
            generatedAt       : this.clock().toISOString(),
            title             : title ? title : DEFAULT_REPORT_TITLE,
            summaryText       : draft.summaryText.trim(),
            keyFindings       : Object.freeze([...draft.keyFindings]),
            alerts            : Object.freeze([...draft.alerts]),
            recommendations   : Object.freeze([...draft.recommendations]),
            severity          : determineSeverity(summary),
            basedOnBucketCount: summary.bucketCount,
            dataPoints        : summary.totalPredictions,
            degraded,
            source,
        });
    }
}
