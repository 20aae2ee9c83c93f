/**
 * @fileoverview Bucket arithmetic
 *
 * Pure functions that build the next version of a bucket. Nothing here
 * mutates its input: every result is a new frozen object.
 *
 * @module @triagekit/engine/analytics/buckets
 */

import type { Histogram, MetricBucket } from "../contracts/MetricBucket.js";
import type { Level, Prediction } from "../contracts/Prediction.js";
import type { IssueType } from "../contracts/PredictionRequest.js";

export function emptyLevelHistogram(): Histogram<Level> {
    return Object.freeze({ low: 0, medium: 0, high: 0 });
}

export function emptyIssueTypeHistogram(): Histogram<IssueType> {
    return Object.freeze({
        general          : 0,
        account_access   : 0,
        billing          : 0,
        shipping         : 0,
        technical_support: 0,
        complaint        : 0,
        compliment       : 0,
    });
}

/**
 * Copy of `histogram` with `key` raised by `amount`.
 */
export function bump<K extends string>(histogram: Histogram<K>, key: K, amount = 1): Histogram<K> {
    return Object.freeze({ ...histogram, [key]: histogram[key] + amount });
}

/**
 * Start (epoch ms) of the window containing `timeMs`.
 */
export function alignWindowStart(timeMs: number, widthMs: number): number {
    return Math.floor(timeMs / widthMs) * widthMs;
}

export function emptyBucket(windowStartMs: number, widthMs: number): MetricBucket {
    return Object.freeze({
        windowStart          : new Date(windowStartMs).toISOString(),
        widthMs,
        count                : 0,
        satisfactionHistogram: emptyLevelHistogram(),
        priorityHistogram    : emptyLevelHistogram(),
        issueTypeHistogram   : emptyIssueTypeHistogram(),
        avgConfidence        : 0,
        avgLatencyMs         : 0,
    });
}

/**
 * Streaming mean after adding the n-th sample.
 */
export function nextMean(mean: number, sample: number, n: number): number {
    return mean + (sample - mean) / n;
}

/**
 * Next version of `bucket` with one more prediction folded in.
 */
export function appendToBucket(bucket: MetricBucket, prediction: Prediction, latencyMs: number): MetricBucket {
    const count = bucket.count + 1;

    return Object.freeze({
        ...bucket,
        count,
        satisfactionHistogram: bump(bucket.satisfactionHistogram, prediction.predictedSatisfaction),
        priorityHistogram    : bump(bucket.priorityHistogram, prediction.recommendedPriority),
        issueTypeHistogram   : bump(bucket.issueTypeHistogram, prediction.issueType),
        avgConfidence        : nextMean(bucket.avgConfidence, prediction.confidence, count),
        avgLatencyMs         : nextMean(bucket.avgLatencyMs, latencyMs, count),
    });
}
