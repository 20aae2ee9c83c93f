/**
 * @fileoverview Model artifact schemas
 *
 * Artifacts are JSON files written by the training pipeline, one per
 * `(capability, version)`. The `family` field picks the scoring-unit
 * implementation.
 *
 * @module models/artifacts
 */

import { z } from "zod";
import { CAPABILITIES, ISSUE_TYPES } from "@triagekit/engine";

const weight = z.number().finite();

const LabelWeightsSchema = z.object({
    bias : weight.default(0),
    terms: z.record(z.string().min(1), weight).default({}),
});

export const LexiconArtifactSchema = z.object({
    family    : z.literal("lexicon"),
    capability: z.enum(CAPABILITIES),
    version   : z.string().min(1),
    labels    : z
        .record(z.string().min(1), LabelWeightsSchema)
        .refine(labels => Object.keys(labels).length >= 2, "a lexicon needs at least two labels"),

    /** Extra logit per issue type and label */
    issueTypeBias: z.record(z.enum(ISSUE_TYPES), z.record(z.string(), weight)).default({}),
});

const ScoreSchema = z.object({
    label     : z.string().min(1),
    confidence: z.number().min(0).max(1),
});

const ResponseRuleSchema = ScoreSchema.extend({
    issueTypes: z.array(z.enum(ISSUE_TYPES)).min(1).optional(),
    anyTerms  : z.array(z.string().min(1)).min(1).optional(),
});

export const ResponseTemplateArtifactSchema = z.object({
    family    : z.literal("response_template"),
    capability: z.enum(CAPABILITIES),
    version   : z.string().min(1),

    /** Evaluated in order; the first match wins */
    rules  : z.array(ResponseRuleSchema),
    default: ScoreSchema,
});

export const ModelArtifactSchema = z.discriminatedUnion("family", [
    LexiconArtifactSchema,
    ResponseTemplateArtifactSchema,
]);

export type LexiconArtifact = z.infer<typeof LexiconArtifactSchema>;
export type ResponseTemplateArtifact = z.infer<typeof ResponseTemplateArtifactSchema>;
export type ResponseRule = z.infer<typeof ResponseRuleSchema>;
export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;
