/**
 * Backend used when no language model is configured. Every call fails, so
 * the generator serves rule-based reports.
 */

import { InsightsBackendError, type InsightDraft, type InsightsBackend } from "@triagekit/engine";

export class DisabledInsightsBackend implements InsightsBackend {
    readonly id = "disabled";

    async complete(): Promise<InsightDraft> {
        throw new InsightsBackendError("failure", "No insights backend configured (set OPENAI_API_KEY)");
    }
}
