/**
 * @fileoverview Rule-based insight text
 *
 * Used when no generated report exists yet and the backend is unavailable,
 * and for snapshots with no predictions at all.
 *
 * @module @triagekit/engine/insights/fallback
 */

import type { InsightDraft, Severity } from "../contracts/InsightReport.js";
import type { MetricsSummary } from "../contracts/MetricBucket.js";

export const DEFAULT_REPORT_TITLE = "Customer Service Analytics Summary";

function percent(rate: number): string {
    return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Severity of a snapshot, from its priority and satisfaction rates.
 */
export function determineSeverity(summary: MetricsSummary): Severity {
    if (summary.totalPredictions === 0) {
        return "low";
    }

    if (summary.highPriorityRate > 0.4 || summary.lowSatisfactionRate > 0.5) {
        return "high";
    }

    if (summary.highPriorityRate > 0.2 || summary.lowSatisfactionRate > 0.3) {
        return "medium";
    }

    return "low";
}

export function buildFallbackDraft(summary: MetricsSummary): InsightDraft {
    const total = summary.totalPredictions;

    if (total === 0) {
        return {
            title          : DEFAULT_REPORT_TITLE,
            summaryText    : "No customer interactions recorded yet. Insights appear once requests are processed.",
            keyFindings    : ["No data to analyze"],
            alerts         : [],
            recommendations: ["Begin collecting customer interaction data"],
        };
    }

    const highPriority = percent(summary.highPriorityRate);
    const lowSatisfaction = percent(summary.lowSatisfactionRate);

    const alerts: string[] = [];
    if (summary.highPriorityRate > 0.3) {
        alerts.push(`High priority spike: ${highPriority} of cases need urgent attention`);
    }
    if (summary.lowSatisfactionRate > 0.4) {
        alerts.push(`Satisfaction concern: ${lowSatisfaction} of customers predicted unsatisfied`);
    }

    const keyFindings = [
        `Total interactions processed: ${total}`,
        `High priority cases: ${summary.priorityHistogram.high} (${highPriority})`,
        `Low satisfaction predictions: ${summary.satisfactionHistogram.low} (${lowSatisfaction})`,
    ];
    const topIssue = summary.topIssueTypes.at(0);
    if (topIssue) {
        keyFindings.push(`Most frequent issue type: ${topIssue.issueType} (${topIssue.count})`);
    }

    return {
        title      : DEFAULT_REPORT_TITLE,
        summaryText: `Analyzed ${total} customer interactions: ${highPriority} high priority, ${lowSatisfaction} low satisfaction.`,
        keyFindings,
        alerts,
        recommendations: [
            "Continue monitoring customer satisfaction trends",
            summary.highPriorityRate > 0.2
                ? "Review high priority case resolution processes"
                : "Maintain current service levels",
        ],
    };
}
