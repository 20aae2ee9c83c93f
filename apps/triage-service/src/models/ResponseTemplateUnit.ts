/**
 * @fileoverview Response Template Unit
 *
 * Picks a response strategy from an ordered rule list. A rule matches when
 * every condition it sets holds: the issue type is listed, and at least one
 * of its terms occurs in the message. The first matching rule wins; no match
 * yields the artifact's default.
 *
 * @module models/ResponseTemplateUnit
 */

import {
    createModelScore,
    type Capability,
    type IssueType,
    type ModelScore,
    type ScoringUnit,
} from "@triagekit/engine";
import type { ResponseRule, ResponseTemplateArtifact } from "./artifacts.js";
import { tokenize } from "./tokenize.js";

function matches(rule: ResponseRule, issueType: IssueType, tokens: ReadonlySet<string>): boolean {
    if (rule.issueTypes && !rule.issueTypes.includes(issueType)) {
        return false;
    }

    if (rule.anyTerms && !rule.anyTerms.some(term => tokens.has(term.toLowerCase()))) {
        return false;
    }

    return true;
}

export class ResponseTemplateUnit implements ScoringUnit {
    readonly id: string;
    readonly capability: Capability;
    readonly version: string;
    readonly family = "response_template";

    constructor(private readonly artifact: ResponseTemplateArtifact) {
        this.capability = artifact.capability;
        this.version = artifact.version;
        this.id = `${artifact.capability}-template@${artifact.version}`;
    }

    score(message: string, issueType: IssueType): ModelScore {
        const tokens = new Set(tokenize(message));
        const rule = this.artifact.rules.find(candidate => matches(candidate, issueType, tokens));
        const chosen = rule ?? this.artifact.default;

        return createModelScore(chosen.label, chosen.confidence);
    }
}
