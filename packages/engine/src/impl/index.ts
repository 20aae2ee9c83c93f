/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @triagekit/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
