/**
 * @fileoverview In-Memory Model Registry
 *
 * Holds every loaded scoring unit, keyed by capability and version.
 * Units are guarded on registration, so callers only ever receive
 * `GuardedScoringUnit`s.
 *
 * @module @triagekit/engine/registry/InMemoryModelRegistry
 */

import type { LoadedModel, ModelRegistry } from "../contracts/ModelRegistry.js";
import {
    CAPABILITIES,
    type Capability,
    type ScoringUnit,
    type ScoringUnitStats,
} from "../contracts/ScoringUnit.js";
import { defaultLogger, type EngineLogger } from "../contracts/Logger.js";
import { ModelUnavailableError } from "../errors/index.js";
import { GuardedScoringUnit } from "./GuardedScoringUnit.js";

/**
 * Registry configuration options.
 */
export interface ModelRegistryConfig {
    /** Longest a single score() call may take, in ms (default: 250) */
    readonly scoreBudgetMs?: number;

    /** Millisecond clock used to time score() calls */
    readonly clock?: () => number;

    readonly logger?: EngineLogger;
}

/**
 * Order two version strings, numeric segments compared as numbers ("1.10" > "1.9").
 */
export function compareVersions(a: string, b: string): number {
    return a.localeCompare(b, undefined, { numeric: true, sensitivity: "base" });
}

/**
 * In-memory ModelRegistry implementation.
 *
 * @example
 * ```typescript
 * const registry = new InMemoryModelRegistry({ scoreBudgetMs: 100 });
 * registry.register(sentimentUnit);
 *
 * const unit = registry.resolve("sentiment");
 * const score = unit.score("Thanks, that fixed it!", "technical_support");
 * ```
 */
export class InMemoryModelRegistry implements ModelRegistry {
    private readonly units: Map<Capability, Map<string, GuardedScoringUnit>> = new Map();
    private readonly scoreBudgetMs: number;
    private readonly clock: (() => number) | undefined;
    private readonly logger: EngineLogger;

    constructor(config: ModelRegistryConfig = {}) {
        this.scoreBudgetMs = config.scoreBudgetMs ?? 250;
        this.clock = config.clock;
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Register a scoring unit.
     *
     * @throws Error if the same capability/version is already registered
     */
    register(unit: ScoringUnit): void {
        let versions = this.units.get(unit.capability);
        if (!versions) {
            versions = new Map();
            this.units.set(unit.capability, versions);
        }

        if (versions.has(unit.version)) {
            throw new Error(`Model already registered: ${unit.capability}@${unit.version}`);
        }

        versions.set(unit.version, new GuardedScoringUnit(unit, this.scoreBudgetMs, this.clock));
        this.logger.info("Model registered", {
            capability: unit.capability,
            version   : unit.version,
            id        : unit.id,
            family    : unit.family,
        });
    }

    /**
     * Remove a capability/version.
     *
     * @returns True if something was removed
     */
    unregister(capability: Capability, version: string): boolean {
        const versions = this.units.get(capability);
        if (!versions?.delete(version)) {
            return false;
        }

        if (versions.size === 0) {
            this.units.delete(capability);
        }

        this.logger.info("Model unregistered", { capability, version });
        return true;
    }

    resolve(capability: Capability, version?: string): GuardedScoringUnit {
        const versions = this.units.get(capability);

        if (version !== undefined) {
            const unit = versions?.get(version);
            if (!unit) {
                throw new ModelUnavailableError(capability, version);
            }
            return unit;
        }

        const latest = this.sortedVersions(capability).at(-1);
        const unit = latest === undefined ? undefined : versions?.get(latest);
        if (!unit) {
            throw new ModelUnavailableError(capability);
        }

        return unit;
    }

    missingCapabilities(required: readonly Capability[] = CAPABILITIES): Capability[] {
        return required.filter(capability => (this.units.get(capability)?.size ?? 0) === 0);
    }

    describe(): LoadedModel[] {
        const models: LoadedModel[] = [];

        for (const capability of CAPABILITIES) {
            for (const version of this.sortedVersions(capability)) {
                const unit = this.units.get(capability)?.get(version);
                if (unit) {
                    models.push({ capability, version, id: unit.id, family: unit.family });
                }
            }
        }

        return models;
    }

    /**
     * Counters of a resolved unit.
     *
     * @throws ModelUnavailableError if nothing matching is loaded
     */
    stats(capability: Capability, version?: string): ScoringUnitStats {
        return this.resolve(capability, version).stats;
    }

    private sortedVersions(capability: Capability): string[] {
        return [...(this.units.get(capability)?.keys() ?? [])].sort(compareVersions);
    }
}
