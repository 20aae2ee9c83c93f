/**
 * @fileoverview Snapshot summary
 *
 * Totals across a list of buckets, used by the insights prompt, the fallback
 * report and the metrics endpoint.
 *
 * @module @triagekit/engine/analytics/summarize
 */

import type { MetricBucket, MetricsSummary } from "../contracts/MetricBucket.js";
import { LEVELS } from "../contracts/Prediction.js";
import { ISSUE_TYPES } from "../contracts/PredictionRequest.js";
import { bump, emptyIssueTypeHistogram, emptyLevelHistogram } from "./buckets.js";

const TOP_ISSUE_TYPES = 3;

export function summarizeBuckets(buckets: readonly MetricBucket[]): MetricsSummary {
    let satisfactionHistogram = emptyLevelHistogram();
    let priorityHistogram = emptyLevelHistogram();
    let issueTypeHistogram = emptyIssueTypeHistogram();
    let total = 0;
    let confidenceSum = 0;
    let latencySum = 0;

    for (const bucket of buckets) {
        total += bucket.count;
        confidenceSum += bucket.avgConfidence * bucket.count;
        latencySum += bucket.avgLatencyMs * bucket.count;

        for (const level of LEVELS) {
            satisfactionHistogram = bump(satisfactionHistogram, level, bucket.satisfactionHistogram[level]);
            priorityHistogram = bump(priorityHistogram, level, bucket.priorityHistogram[level]);
        }
        for (const issueType of ISSUE_TYPES) {
            issueTypeHistogram = bump(issueTypeHistogram, issueType, bucket.issueTypeHistogram[issueType]);
        }
    }

    // Stable sort keeps ISSUE_TYPES order among ties
    const topIssueTypes = ISSUE_TYPES
        .map(issueType => ({ issueType, count: issueTypeHistogram[issueType] }))
        .filter(entry => entry.count > 0)
        .sort((a, b) => b.count - a.count)
        .slice(0, TOP_ISSUE_TYPES);

    return Object.freeze({
        bucketCount        : buckets.length,
        totalPredictions   : total,
        satisfactionHistogram,
        priorityHistogram,
        issueTypeHistogram,
        avgConfidence      : total === 0 ? 0 : confidenceSum / total,
        avgLatencyMs       : total === 0 ? 0 : latencySum / total,
        highPriorityRate   : total === 0 ? 0 : priorityHistogram.high / total,
        lowSatisfactionRate: total === 0 ? 0 : satisfactionHistogram.low / total,
        topIssueTypes,
        firstWindowStart   : buckets.at(0)?.windowStart ?? null,
        lastWindowStart    : buckets.at(-1)?.windowStart ?? null,
    });
}
