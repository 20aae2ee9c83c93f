/**
 * @fileoverview Lexicon Scoring Unit
 *
 * Linear bag-of-words model: each label has a bias and per-term weights,
 * the logits are turned into probabilities with a softmax and the top label
 * wins. Ties go to the label listed first in the artifact.
 *
 * @module models/LexiconScoringUnit
 */

import {
    ISSUE_TYPES,
    createModelScore,
    type Capability,
    type IssueType,
    type ModelScore,
    type ScoringUnit,
} from "@triagekit/engine";
import type { LexiconArtifact } from "./artifacts.js";
import { tokenize } from "./tokenize.js";

interface LabelModel {
    readonly label: string;
    readonly bias: number;
    readonly terms: ReadonlyMap<string, number>;
}

/**
 * Probabilities for a list of logits.
 */
export function softmax(logits: readonly number[]): number[] {
    const max = Math.max(...logits);
    const exps = logits.map(logit => Math.exp(logit - max));
    const sum = exps.reduce((total, value) => total + value, 0);
    return exps.map(value => value / sum);
}

export class LexiconScoringUnit implements ScoringUnit {
    readonly id: string;
    readonly capability: Capability;
    readonly version: string;
    readonly family = "lexicon";

    private readonly labels: readonly LabelModel[];
    private readonly issueTypeBias: ReadonlyMap<IssueType, ReadonlyMap<string, number>>;

    constructor(artifact: LexiconArtifact) {
        this.capability = artifact.capability;
        this.version = artifact.version;
        this.id = `${artifact.capability}-lexicon@${artifact.version}`;

        this.labels = Object.entries(artifact.labels).map(([label, weights]) => ({
            label,
            bias : weights.bias,
            terms: new Map(Object.entries(weights.terms)),
        }));

        const bias = new Map<IssueType, ReadonlyMap<string, number>>();
        for (const issueType of ISSUE_TYPES) {
            const perLabel = artifact.issueTypeBias[issueType];
            if (perLabel) {
                bias.set(issueType, new Map(Object.entries(perLabel)));
            }
        }
        this.issueTypeBias = bias;
    }

    score(message: string, issueType: IssueType): ModelScore {
        const tokens = tokenize(message);
        const bias = this.issueTypeBias.get(issueType);

        const logits = this.labels.map(model => tokens.reduce(
            (logit, token) => logit + (model.terms.get(token) ?? 0),
            model.bias + (bias?.get(model.label) ?? 0)
        ));
        const probabilities = softmax(logits);

        let best = 0;
        probabilities.forEach((probability, index) => {
            if (probability > (probabilities[best] ?? 0)) {
                best = index;
            }
        });

        const winner = this.labels[best];
        if (!winner) {
            throw new Error(`Lexicon ${this.id} has no labels`);
        }

        return createModelScore(winner.label, probabilities[best] ?? 0);
    }
}
