/**
 * Metric Bucket Contract
 *
 * Time-windowed aggregate of predictions. Buckets are owned by the
 * AnalyticsAggregator; everything outside it only ever sees frozen copies.
 */

import type { IssueType } from "./PredictionRequest.js";
import type { Level, Prediction } from "./Prediction.js";

/**
 * Count per key.
 */
export type Histogram<K extends string> = Readonly<Record<K, number>>;

/**
 * Aggregate of every prediction recorded in one fixed-width window.
 */
export interface MetricBucket {
    /** ISO timestamp of the window start (aligned to the bucket width) */
    readonly windowStart: string;

    /** Window width in milliseconds */
    readonly widthMs: number;

    /** Number of predictions recorded */
    readonly count: number;

    readonly satisfactionHistogram: Histogram<Level>;
    readonly priorityHistogram: Histogram<Level>;
    readonly issueTypeHistogram: Histogram<IssueType>;

    /** Streaming mean of prediction confidence */
    readonly avgConfidence: number;

    /** Streaming mean of gateway latency */
    readonly avgLatencyMs: number;
}

/**
 * Totals across a snapshot of buckets.
 */
export interface MetricsSummary {
    readonly bucketCount: number;
    readonly totalPredictions: number;
    readonly satisfactionHistogram: Histogram<Level>;
    readonly priorityHistogram: Histogram<Level>;
    readonly issueTypeHistogram: Histogram<IssueType>;
    readonly avgConfidence: number;
    readonly avgLatencyMs: number;

    /** Share of predictions with high priority (0.0 - 1.0) */
    readonly highPriorityRate: number;

    /** Share of predictions with low satisfaction (0.0 - 1.0) */
    readonly lowSatisfactionRate: number;

    /** Most frequent issue types, most frequent first (at most three, zero counts dropped) */
    readonly topIssueTypes: readonly { readonly issueType: IssueType; readonly count: number }[];

    /** Start of the oldest bucket, or null for an empty snapshot */
    readonly firstWindowStart: string | null;

    /** Start of the newest bucket, or null for an empty snapshot */
    readonly lastWindowStart: string | null;
}

/**
 * Read access to the aggregated metrics.
 */
export interface MetricsSource {
    /**
     * Ordered (oldest first) frozen copy of the current buckets.
     *
     * @param windowMs - Only buckets overlapping the last `windowMs` milliseconds
     */
    snapshot(windowMs?: number): readonly MetricBucket[];

    /** Monotonic count of predictions ever recorded (survives eviction) */
    readonly totalRecorded: number;
}

/**
 * Write side of the analytics pipeline, fed by the gateway after each response.
 */
export interface AnalyticsSink {
    /**
     * Fold one prediction into the current bucket.
     *
     * @throws ValidationError if latency or confidence is not a finite number
     * @throws AggregatorUnavailableError if the sink cannot take records
     */
    record(prediction: Prediction, latencyMs: number): void;
}
