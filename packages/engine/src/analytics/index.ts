/**
 * @fileoverview Analytics barrel exports
 *
 * @module @triagekit/engine/analytics
 */

export { AnalyticsAggregator, type AggregatorConfig } from "./AnalyticsAggregator.js";
export { summarizeBuckets } from "./summarize.js";
