/**
 * OpenAI-based insights backend
 *
 * Sends the bounded metrics prompt to a chat model in JSON mode and
 * validates the reply before it reaches the generator.
 */

import OpenAI from "openai";
import { z } from "zod";
import {
    InsightsBackendError,
    errorMessage,
    type InsightDraft,
    type InsightPrompt,
    type InsightsBackend,
} from "@triagekit/engine";

/**
 * Configuration options for the OpenAI backend
 */
export interface OpenAIInsightsBackendConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Model to use (default: gpt-4o-mini) */
    model?: string;

    /** Temperature for responses (default: 0.3) */
    temperature?: number;

    /** Maximum tokens for response (default: 600) */
    maxTokens?: number;
}

/**
 * Shape the system prompt asks the model for
 */
const DraftReplySchema = z.object({
    title          : z.string().optional(),
    summary        : z.string().min(1),
    key_findings   : z.array(z.string()).default([]),
    alerts         : z.array(z.string()).default([]),
    recommendations: z.array(z.string()).min(1),
});

/**
 * Turn the model's reply text into a draft.
 *
 * @throws InsightsBackendError with reason `malformed`
 */
export function parseDraftReply(content: string | null | undefined): InsightDraft {
    if (!content) {
        throw new InsightsBackendError("malformed", "No response from OpenAI");
    }

    let json: unknown;
    try {
        json = JSON.parse(content);
    }
    catch (error) {
        throw new InsightsBackendError("malformed", "OpenAI reply is not valid JSON", error);
    }

    const result = DraftReplySchema.safeParse(json);
    if (!result.success) {
        throw new InsightsBackendError(
            "malformed",
            `OpenAI reply has the wrong shape: ${result.error.issues.map(issue => issue.path.join(".")).join(", ")}`
        );
    }

    return {
        title          : result.data.title,
        summaryText    : result.data.summary,
        keyFindings    : result.data.key_findings,
        alerts         : result.data.alerts,
        recommendations: result.data.recommendations,
    };
}

/**
 * OpenAI-based insights backend implementation
 */
export class OpenAIInsightsBackend implements InsightsBackend {
    readonly id: string;

    private client: OpenAI;
    private config: Required<Omit<OpenAIInsightsBackendConfig, "apiKey">>;

    constructor(id: string = "openai", config: OpenAIInsightsBackendConfig = {}) {
        this.id = id;

        this.client = new OpenAI({
            apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
        });

        this.config = {
            model      : config.model ?? "gpt-4o-mini",
            temperature: config.temperature ?? 0.3,
            maxTokens  : config.maxTokens ?? 600,
        };
    }

    async complete(prompt: InsightPrompt, signal: AbortSignal): Promise<InsightDraft> {
        let content: string | null | undefined;

        try {
            const response = await this.client.chat.completions.create({
                model          : this.config.model,
                temperature    : this.config.temperature,
                max_tokens     : this.config.maxTokens,
                response_format: { type: "json_object" },
                messages       : [
                    { role: "system", content: prompt.system },
                    { role: "user", content: prompt.user },
                ],
            }, {
                signal,
                // Timeouts belong to the generator
                maxRetries: 0,
            });

            content = response.choices[0]?.message?.content;
        }
        catch (error) {
            if (signal.aborted) {
                throw new InsightsBackendError("cancelled", "OpenAI request aborted", error);
            }
            throw new InsightsBackendError("failure", `OpenAI request failed: ${errorMessage(error)}`, error);
        }

        return parseDraftReply(content);
    }
}
