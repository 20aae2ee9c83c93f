/**
 * @fileoverview Insights barrel exports
 *
 * @module @triagekit/engine/insights
 */

export {
    InsightsGenerator,
    raceWithAbort,
    type GenerateOptions,
    type InsightsGeneratorConfig,
} from "./InsightsGenerator.js";
export { InsightsScheduler, type InsightsSchedulerConfig } from "./InsightsScheduler.js";
export { DEFAULT_REPORT_TITLE, buildFallbackDraft, determineSeverity } from "./fallback.js";
export { INSIGHT_SYSTEM_PROMPT, buildInsightPrompt, type PromptLimits } from "./prompt.js";
