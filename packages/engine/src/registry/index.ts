/**
 * @fileoverview Registry barrel exports
 *
 * @module @triagekit/engine/registry
 */

export { GuardedScoringUnit } from "./GuardedScoringUnit.js";
export {
    InMemoryModelRegistry,
    compareVersions,
    type ModelRegistryConfig,
} from "./InMemoryModelRegistry.js";
