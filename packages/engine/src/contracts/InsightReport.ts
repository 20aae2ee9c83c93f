/**
 * Insight Report Contract
 *
 * Natural-language summary of the aggregated metrics. A report is built from a
 * read-only snapshot, is immutable once produced and is superseded (never
 * merged) by the next one.
 */

export type Severity = "low" | "medium" | "high";

/**
 * Where the report text came from.
 */
export type InsightSource = "backend" | "fallback";

/**
 * Immutable insight report.
 */
export interface InsightReport {
    /** ISO timestamp of generation */
    readonly generatedAt: string;

    readonly title: string;

    /** Short overview paragraph */
    readonly summaryText: string;

    readonly keyFindings: readonly string[];

    /** Issues needing immediate attention (may be empty) */
    readonly alerts: readonly string[];

    /** Actionable recommendations, most important first */
    readonly recommendations: readonly string[];

    /** Severity derived from the metrics, not from the generated text */
    readonly severity: Severity;

    /** Number of buckets in the snapshot the report was built from */
    readonly basedOnBucketCount: number;

    /** Number of predictions in that snapshot */
    readonly dataPoints: number;

    /** True when retained past its freshness because the backend failed */
    readonly degraded: boolean;

    readonly source: InsightSource;
}

/**
 * Text fields returned by an insights backend.
 */
export interface InsightDraft {
    readonly title?: string;
    readonly summaryText: string;
    readonly keyFindings: readonly string[];
    readonly alerts: readonly string[];
    readonly recommendations: readonly string[];
}

/**
 * Prompt handed to an insights backend.
 */
export interface InsightPrompt {
    /** Instructions, including the expected reply format */
    readonly system: string;

    /** Bounded description of the metrics */
    readonly user: string;
}

/**
 * External natural-language generation service.
 *
 * Implementations must honour the abort signal; the generator also stops
 * waiting once it fires.
 */
export interface InsightsBackend {
    readonly id: string;

    /**
     * Produce the text of a report.
     *
     * @throws InsightsBackendError (or any error) on failure
     */
    complete(prompt: InsightPrompt, signal: AbortSignal): Promise<InsightDraft>;
}
