/**
 * @fileoverview Model artifact loader
 *
 * Reads `<dir>/<capability>/<version>.json`, validates each file and
 * registers the matching scoring unit. A broken artifact is logged and
 * skipped, so the capability shows up as missing on /health instead of
 * taking the service down.
 *
 * @module models/loadModelArtifacts
 */

import { existsSync, readdirSync, readFileSync } from "fs";
import { basename, extname, join } from "path";
import {
    CAPABILITIES,
    errorMessage,
    type EngineLogger,
    type ScoringUnit,
} from "@triagekit/engine";
import { ModelArtifactSchema, type ModelArtifact } from "./artifacts.js";
import { LexiconScoringUnit } from "./LexiconScoringUnit.js";
import { ResponseTemplateUnit } from "./ResponseTemplateUnit.js";

/**
 * Anything units can be registered with.
 */
export interface UnitSink {
    register(unit: ScoringUnit): void;
}

export interface SkippedArtifact {
    readonly file: string;
    readonly reason: string;
}

export interface ArtifactLoadReport {
    /** Ids of the registered units */
    readonly loaded: string[];
    readonly skipped: SkippedArtifact[];
}

/**
 * Build the scoring unit for an artifact's family.
 */
export function createScoringUnit(artifact: ModelArtifact): ScoringUnit {
    switch (artifact.family) {
        case "lexicon":
            return new LexiconScoringUnit(artifact);
        case "response_template":
            return new ResponseTemplateUnit(artifact);
    }
}

/**
 * Parse and validate one artifact file.
 *
 * @throws Error if the file is not valid JSON or fails the schema
 */
export function readModelArtifact(filePath: string): ModelArtifact {
    const content = readFileSync(filePath, "utf-8");
    const result = ModelArtifactSchema.safeParse(JSON.parse(content));

    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid model artifact: ${issues}`);
    }

    return result.data;
}

/**
 * Load every artifact under `dir` into `registry`.
 *
 * @example
 * ```typescript
 * const registry = new InMemoryModelRegistry();
 * const report = loadModelArtifacts("./models", registry, logger);
 * console.log(`Loaded ${report.loaded.length} models`);
 * ```
 */
export function loadModelArtifacts(dir: string, registry: UnitSink, logger: EngineLogger): ArtifactLoadReport {
    const loaded: string[] = [];
    const skipped: SkippedArtifact[] = [];

    if (!existsSync(dir)) {
        logger.warn("Model directory not found", { dir });
        return { loaded, skipped };
    }

    for (const capability of CAPABILITIES) {
        const capabilityDir = join(dir, capability);
        if (!existsSync(capabilityDir)) {
            continue;
        }

        const files = readdirSync(capabilityDir)
            .filter(file => extname(file) === ".json")
            .sort();

        for (const file of files) {
            const filePath = join(capabilityDir, file);
            const version = basename(file, ".json");

            try {
                const artifact = readModelArtifact(filePath);
                if (artifact.capability !== capability || artifact.version !== version) {
                    throw new Error(
                        `Artifact declares ${artifact.capability}@${artifact.version} but is stored as ${capability}@${version}`
                    );
                }

                const unit = createScoringUnit(artifact);
                registry.register(unit);
                loaded.push(unit.id);
            }
            catch (error) {
                const reason = errorMessage(error);
                skipped.push({ file: filePath, reason });
                logger.error("Skipping model artifact", { file: filePath, error: reason });
            }
        }
    }

    return { loaded, skipped };
}
