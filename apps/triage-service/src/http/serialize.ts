/**
 * @fileoverview Wire format
 *
 * The engine works in camelCase; clients see snake_case.
 *
 * @module http/serialize
 */

import type {
    InsightReport,
    LoadedModel,
    MetricBucket,
    MetricsSummary,
    Prediction,
} from "@triagekit/engine";

export function serializePrediction(prediction: Prediction) {
    return {
        message               : prediction.message,
        issue_type            : prediction.issueType,
        predicted_satisfaction: prediction.predictedSatisfaction,
        recommended_priority  : prediction.recommendedPriority,
        confidence            : prediction.confidence,
        intent                : prediction.intent,
        response_strategy     : prediction.responseStrategy,
        timestamp             : prediction.timestamp,
    };
}

export function serializeBucket(bucket: MetricBucket) {
    return {
        window_start          : bucket.windowStart,
        width_ms              : bucket.widthMs,
        count                 : bucket.count,
        satisfaction_histogram: bucket.satisfactionHistogram,
        priority_histogram    : bucket.priorityHistogram,
        issue_type_histogram  : bucket.issueTypeHistogram,
        avg_confidence        : bucket.avgConfidence,
        avg_latency_ms        : bucket.avgLatencyMs,
    };
}

export function serializeSummary(summary: MetricsSummary) {
    return {
        bucket_count          : summary.bucketCount,
        total_predictions     : summary.totalPredictions,
        satisfaction_histogram: summary.satisfactionHistogram,
        priority_histogram    : summary.priorityHistogram,
        issue_type_histogram  : summary.issueTypeHistogram,
        avg_confidence        : summary.avgConfidence,
        avg_latency_ms        : summary.avgLatencyMs,
        high_priority_rate    : summary.highPriorityRate,
        low_satisfaction_rate : summary.lowSatisfactionRate,
        top_issue_types       : summary.topIssueTypes.map(({ issueType, count }) => ({ issue_type: issueType, count })),
        first_window_start    : summary.firstWindowStart,
        last_window_start     : summary.lastWindowStart,
    };
}

export function serializeReport(report: InsightReport) {
    return {
        status               : "ready",
        generated_at         : report.generatedAt,
        title                : report.title,
        summary_text         : report.summaryText,
        key_findings         : report.keyFindings,
        alerts               : report.alerts,
        recommendations      : report.recommendations,
        severity             : report.severity,
        based_on_bucket_count: report.basedOnBucketCount,
        data_points          : report.dataPoints,
        degraded             : report.degraded,
        source               : report.source,
    };
}

export function serializeModel(model: LoadedModel) {
    return {
        capability: model.capability,
        version   : model.version,
        id        : model.id,
    };
}
