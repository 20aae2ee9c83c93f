/**
 * @fileoverview Insight prompt builder
 *
 * Formats a metrics snapshot into a size-bounded prompt. Totals cover the
 * whole snapshot; per-bucket lines are limited to the most recent buckets
 * that fit within the character budget.
 *
 * @module @triagekit/engine/insights/prompt
 */

import type { InsightPrompt } from "../contracts/InsightReport.js";
import type { MetricBucket, MetricsSummary } from "../contracts/MetricBucket.js";

export interface PromptLimits {
    /** Most recent buckets listed individually */
    readonly maxPromptBuckets: number;

    /** Upper bound on the user message length */
    readonly maxPromptChars: number;
}

export const INSIGHT_SYSTEM_PROMPT = [
    "You are an expert customer service analyst.",
    "Analyze the support metrics you are given and write one concise business summary.",
    "Respond ONLY with a JSON object of this exact shape:",
    "{",
    "  \"title\": \"Short report title\",",
    "  \"summary\": \"Two-sentence overview of the current situation\",",
    "  \"key_findings\": [\"Finding with specific numbers\"],",
    "  \"alerts\": [\"Issue requiring immediate attention (empty array if none)\"],",
    "  \"recommendations\": [\"Specific actionable recommendation, most important first\"]",
    "}",
].join("\n");

function percent(rate: number): string {
    return `${(rate * 100).toFixed(1)}%`;
}

function formatBucket(bucket: MetricBucket): string {
    const sat = bucket.satisfactionHistogram;
    const prio = bucket.priorityHistogram;
    return `${bucket.windowStart} n=${bucket.count}`
        + ` satisfaction(low/medium/high)=${sat.low}/${sat.medium}/${sat.high}`
        + ` priority(low/medium/high)=${prio.low}/${prio.medium}/${prio.high}`
        + ` confidence=${bucket.avgConfidence.toFixed(2)} latency=${bucket.avgLatencyMs.toFixed(1)}ms`;
}

function formatOverview(summary: MetricsSummary): string {
    const topIssues = summary.topIssueTypes.length === 0
        ? "- none"
        : summary.topIssueTypes.map(entry => `- ${entry.issueType}: ${entry.count} cases`).join("\n");

    return [
        "OVERALL METRICS:",
        `- Total interactions analyzed: ${summary.totalPredictions} across ${summary.bucketCount} time buckets`,
        `- High priority cases: ${summary.priorityHistogram.high} (${percent(summary.highPriorityRate)})`,
        `- Low satisfaction predictions: ${summary.satisfactionHistogram.low} (${percent(summary.lowSatisfactionRate)})`,
        `- Average confidence: ${summary.avgConfidence.toFixed(2)}`,
        `- Average handling latency: ${summary.avgLatencyMs.toFixed(1)}ms`,
        "",
        "TOP ISSUE TYPES:",
        topIssues,
    ].join("\n");
}

/**
 * Build the prompt for one snapshot.
 *
 * @param snapshot - Buckets, oldest first
 * @param summary - Totals of the same snapshot
 */
export function buildInsightPrompt(
    snapshot: readonly MetricBucket[],
    summary: MetricsSummary,
    limits: PromptLimits
): InsightPrompt {
    const overview = formatOverview(summary);
    const heading = "\n\nRECENT BUCKETS (oldest first):\n";

    // Newest first until the budget runs out, then back to chronological order
    const lines: string[] = [];
    let used = overview.length + heading.length;
    const recent = snapshot.slice(-limits.maxPromptBuckets).reverse();
    for (const bucket of recent) {
        const line = formatBucket(bucket);
        if (used + line.length + 1 > limits.maxPromptChars) {
            break;
        }
        lines.unshift(line);
        used += line.length + 1;
    }

    const user = lines.length === 0
        ? overview
        : `${overview}${heading}${lines.join("\n")}`;

    return {
        system: INSIGHT_SYSTEM_PROMPT,
        user  : user.slice(0, limits.maxPromptChars),
    };
}
