/**
 * @fileoverview Model Registry Contract
 *
 * Lookup of named, versioned scoring units by capability.
 *
 * @module @triagekit/engine/contracts/ModelRegistry
 */

import type { Capability, ScoringUnit } from "./ScoringUnit.js";

/**
 * One loaded artifact, as reported by `describe()`.
 */
export interface LoadedModel {
    readonly capability: Capability;
    readonly version: string;
    readonly id: string;
    readonly family: string;
}

/**
 * ModelRegistry interface.
 */
export interface ModelRegistry {
    /**
     * Resolve the scoring unit for a capability.
     *
     * @param capability - Model role to resolve
     * @param version - Exact version; the highest loaded version when omitted
     * @throws ModelUnavailableError if nothing matching is loaded
     */
    resolve(capability: Capability, version?: string): ScoringUnit;

    /**
     * List the required capabilities that have no loaded artifact.
     */
    missingCapabilities(required?: readonly Capability[]): Capability[];

    /**
     * List every loaded artifact, ordered by capability then version.
     */
    describe(): LoadedModel[];
}
