/**
 * @fileoverview Insights Scheduler
 *
 * Recurring task that feeds the generator fresh snapshots. Owns an
 * AbortController for its lifetime: stop() clears the timer and abandons
 * whatever generation is in flight.
 *
 * A tick regenerates only when no report exists, the last one is degraded,
 * or at least `minNewPredictions` predictions arrived since the last run.
 * Overlapping ticks and triggers share the in-flight run.
 *
 * @module @triagekit/engine/insights/InsightsScheduler
 */

import type { InsightReport } from "../contracts/InsightReport.js";
import type { MetricsSource } from "../contracts/MetricBucket.js";
import { createEvent, type EventBus } from "../contracts/EventBus.js";
import { defaultLogger, errorMessage, type EngineLogger } from "../contracts/Logger.js";
import { InsightsBackendError } from "../errors/index.js";
import type { InsightsGenerator } from "./InsightsGenerator.js";

/**
 * Scheduler configuration options.
 */
export interface InsightsSchedulerConfig {
    readonly generator: InsightsGenerator;
    readonly source: MetricsSource;

    /** Tick interval in milliseconds (default: 60000) */
    readonly intervalMs?: number;

    /** New predictions needed before a tick regenerates (default: 5) */
    readonly minNewPredictions?: number;

    /** Snapshot window handed to the generator (default: everything retained) */
    readonly windowMs?: number;

    /** Defaults to the generator's event bus */
    readonly eventBus?: EventBus;

    readonly logger?: EngineLogger;
}

export class InsightsScheduler {
    private readonly generator: InsightsGenerator;
    private readonly source: MetricsSource;
    private readonly intervalMs: number;
    private readonly minNewPredictions: number;
    private readonly windowMs: number | undefined;
    private readonly eventBus: EventBus;
    private readonly logger: EngineLogger;

    private running = false;
    private timer: NodeJS.Timeout | null = null;
    private controller: AbortController | null = null;
    private inFlight: Promise<InsightReport> | null = null;
    private recordedAtLastRun: number | null = null;

    constructor(config: InsightsSchedulerConfig) {
        this.generator = config.generator;
        this.source = config.source;
        this.intervalMs = config.intervalMs ?? 60_000;
        this.minNewPredictions = config.minNewPredictions ?? 5;
        this.windowMs = config.windowMs;
        this.eventBus = config.eventBus ?? config.generator.eventBus;
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Start ticking. The first tick runs immediately.
     */
    start(): void {
        if (this.running) {
            this.logger.warn("Insights scheduler already running");
            return;
        }

        this.running = true;
        this.controller = new AbortController();

        this.runTick();
        this.timer = setInterval(() => this.runTick(), this.intervalMs);

        this.eventBus.emit(createEvent("insights:schedulerStarted", { intervalMs: this.intervalMs }));
        this.logger.info("Insights scheduler started", {
            intervalMs       : this.intervalMs,
            minNewPredictions: this.minNewPredictions,
        });
    }

    /**
     * Stop ticking and abandon the in-flight generation.
     */
    stop(): void {
        if (!this.running) {
            return;
        }

        this.running = false;

        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }

        this.controller?.abort(new InsightsBackendError("cancelled", "Insights scheduler stopped"));
        this.controller = null;
        this.generator.cancel();

        this.eventBus.emit(createEvent("insights:schedulerStopped"));
        this.logger.info("Insights scheduler stopped");
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Regenerate if enough has changed since the last run.
     *
     * @returns The new report, or null when the tick was skipped
     */
    async tick(): Promise<InsightReport | null> {
        if (!this.isDue()) {
            return null;
        }

        return this.run();
    }

    /**
     * Regenerate now, whether or not the scheduler is running.
     */
    trigger(): Promise<InsightReport> {
        return this.run();
    }

    private runTick(): void {
        this.tick().catch((error: unknown) => {
            this.logger.error("Insights tick failed", { error: errorMessage(error) });
        });
    }

    private isDue(): boolean {
        const latest = this.generator.latest();
        if (latest === null || latest.degraded || this.recordedAtLastRun === null) {
            return true;
        }

        return this.source.totalRecorded - this.recordedAtLastRun >= this.minNewPredictions;
    }

    private run(): Promise<InsightReport> {
        if (this.inFlight) {
            return this.inFlight;
        }

        this.recordedAtLastRun = this.source.totalRecorded;
        const snapshot = this.source.snapshot(this.windowMs);

        const run = this.generator
            .generate(snapshot, { signal: this.controller?.signal })
            .finally(() => {
                this.inFlight = null;
            });
        this.inFlight = run;
        return run;
    }
}
