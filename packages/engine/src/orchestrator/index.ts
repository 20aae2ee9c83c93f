/**
 * @fileoverview Orchestrator barrel exports
 *
 * @module @triagekit/engine/orchestrator
 */

export {
    DEFAULT_DECISION_POLICY,
    combineConfidence,
    decidePriority,
    decideSatisfaction,
    resolveDecisionPolicy,
    type DecisionPolicy,
} from "./DecisionPolicy.js";
export { InferenceOrchestrator, type OrchestratorConfig } from "./InferenceOrchestrator.js";
