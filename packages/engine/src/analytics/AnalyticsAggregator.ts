/**
 * @fileoverview Analytics Aggregator
 *
 * Rolls predictions into fixed-width time buckets.
 *
 * Concurrency model: each bucket is an immutable value. `record` builds the
 * next version of the one bucket it touches and swaps it into the map in a
 * single assignment, so a `snapshot` taken at any point sees every bucket
 * either before or after an update, never in between. Writers never wait on
 * readers.
 *
 * Retention is lazy: expired buckets are dropped on the next `record` or
 * `snapshot`, there is no sweep timer.
 *
 * @module @triagekit/engine/analytics/AnalyticsAggregator
 */

import type {
    AnalyticsSink,
    MetricBucket,
    MetricsSource,
    MetricsSummary,
} from "../contracts/MetricBucket.js";
import { isValidConfidence } from "../contracts/ModelScore.js";
import type { Prediction } from "../contracts/Prediction.js";
import { defaultLogger, type EngineLogger } from "../contracts/Logger.js";
import { AggregatorUnavailableError, ValidationError } from "../errors/index.js";
import { alignWindowStart, appendToBucket, emptyBucket } from "./buckets.js";
import { summarizeBuckets } from "./summarize.js";

/**
 * Aggregator configuration options.
 */
export interface AggregatorConfig {
    /** Bucket width in milliseconds (default: 60000) */
    readonly bucketWidthMs?: number;

    /** How long a bucket is kept, in milliseconds (default: 24h) */
    readonly retentionMs?: number;

    /** Epoch-millisecond clock (default: Date.now) */
    readonly clock?: () => number;

    readonly logger?: EngineLogger;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * AnalyticsAggregator - in-memory, time-bucketed prediction metrics.
 *
 * @example
 * ```typescript
 * const aggregator = new AnalyticsAggregator({ bucketWidthMs: 60_000 });
 *
 * aggregator.record(prediction, 42);
 * const lastHour = aggregator.snapshot(60 * 60_000);
 * const summary = aggregator.summarize(lastHour);
 * ```
 */
export class AnalyticsAggregator implements AnalyticsSink, MetricsSource {
    readonly bucketWidthMs: number;
    readonly retentionMs: number;

    private buckets: Map<number, MetricBucket> = new Map();
    private recorded = 0;
    private closed = false;
    private readonly clock: () => number;
    private readonly logger: EngineLogger;

    constructor(config: AggregatorConfig = {}) {
        this.bucketWidthMs = config.bucketWidthMs ?? 60_000;
        this.retentionMs = config.retentionMs ?? DAY_MS;
        this.clock = config.clock ?? Date.now;
        this.logger = config.logger ?? defaultLogger;

        if (!(this.bucketWidthMs > 0) || !(this.retentionMs > 0)) {
            throw new RangeError("bucketWidthMs and retentionMs must be positive");
        }
    }

    record(prediction: Prediction, latencyMs: number): void {
        if (this.closed) {
            throw new AggregatorUnavailableError("Analytics aggregator is closed");
        }

        if (!Number.isFinite(latencyMs) || latencyMs < 0) {
            throw new ValidationError("invalid_metric", `latency must be a non-negative number, got ${latencyMs}`);
        }

        if (!isValidConfidence(prediction.confidence)) {
            throw new ValidationError("invalid_metric", `confidence must be within [0, 1], got ${prediction.confidence}`);
        }

        const now = this.clock();
        this.evict(now);

        const start = alignWindowStart(now, this.bucketWidthMs);
        const current = this.buckets.get(start) ?? emptyBucket(start, this.bucketWidthMs);
        this.buckets.set(start, appendToBucket(current, prediction, latencyMs));
        this.recorded++;
    }

    snapshot(windowMs?: number): readonly MetricBucket[] {
        if (windowMs !== undefined && (!Number.isFinite(windowMs) || windowMs <= 0)) {
            throw new ValidationError("invalid_window", `window must be a positive number of milliseconds, got ${windowMs}`);
        }

        const now = this.clock();
        this.evict(now);

        const entries = [...this.buckets.entries()];
        const visible = windowMs === undefined
            ? entries
            : entries.filter(([start]) => start + this.bucketWidthMs > now - windowMs);

        return Object.freeze(
            visible
                .sort(([a], [b]) => a - b)
                .map(([, bucket]) => bucket)
        );
    }

    summarize(buckets: readonly MetricBucket[] = this.snapshot()): MetricsSummary {
        return summarizeBuckets(buckets);
    }

    /**
     * Drop every bucket. `totalRecorded` is kept.
     */
    reset(): void {
        this.buckets = new Map();
        this.logger.info("Analytics reset");
    }

    /**
     * Stop accepting records; reads keep working.
     */
    close(): void {
        this.closed = true;
    }

    get totalRecorded(): number {
        return this.recorded;
    }

    /** Number of buckets currently held */
    get size(): number {
        return this.buckets.size;
    }

    private evict(now: number): void {
        const horizon = now - this.retentionMs;
        let evicted = 0;

        for (const start of this.buckets.keys()) {
            if (start < horizon) {
                this.buckets.delete(start);
                evicted++;
            }
        }

        if (evicted > 0) {
            this.logger.debug("Evicted expired buckets", { evicted, remaining: this.buckets.size });
        }
    }
}
