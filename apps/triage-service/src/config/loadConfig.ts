/**
 * @fileoverview Service configuration loader
 *
 * Reads `config/service.yml`, applies environment overrides and validates
 * the result. Every field has a default, so an empty file is a valid
 * configuration.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { CAPABILITIES, ISSUE_TYPES, errorMessage } from "@triagekit/engine";

const port = z.coerce.number().int().min(0).max(65535);
const positiveInt = z.coerce.number().int().positive();

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const ServiceConfigSchema = z.object({
    logLevel: z.enum(LOG_LEVELS).default("info"),

    server: z.object({
        host: z.string().min(1).default("0.0.0.0"),
        port: port.default(8000),
    }).default({}),

    proxy: z.object({
        host       : z.string().min(1).default("0.0.0.0"),
        port       : port.default(8080),
        upstreamUrl: z.string().url().default("http://127.0.0.1:8000"),
        timeoutMs  : positiveInt.default(10_000),
    }).default({}),

    models: z.object({
        dir          : z.string().min(1).default("models"),
        scoreBudgetMs: positiveInt.default(250),
        versions     : z.record(z.enum(CAPABILITIES), z.string().min(1)).default({}),
    }).default({}),

    policy: z.object({
        satisfactionThreshold: z.coerce.number().min(0).max(1).default(0.5),
        negativeLabels       : z.array(z.string().min(1)).default(["negative"]),
        positiveLabels       : z.array(z.string().min(1)).default(["positive"]),
        escalationIssueTypes : z.array(z.enum(ISSUE_TYPES)).default(["complaint", "account_access"]),
    }).default({}),

    analytics: z.object({
        bucketWidthMs: positiveInt.default(60_000),
        retentionMs  : positiveInt.default(24 * 60 * 60 * 1000),
    }).default({}),

    insights: z.object({
        intervalMs       : positiveInt.default(60_000),
        minNewPredictions: positiveInt.default(5),
        timeoutMs        : positiveInt.default(5000),
        maxPromptBuckets : positiveInt.default(60),
        maxPromptChars   : positiveInt.default(4000),
        windowMs         : positiveInt.optional(),
    }).default({}),

    openai: z.object({
        apiKey     : z.string().min(1).optional(),
        model      : z.string().min(1).default("gpt-4o-mini"),
        temperature: z.coerce.number().min(0).max(2).default(0.3),
        maxTokens  : positiveInt.default(600),
    }).default({}),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
    const value = raw[key];
    return isRecord(value) ? value : {};
}

/**
 * Blank variables count as unset.
 */
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

/**
 * Layer environment overrides onto the raw file contents.
 */
export function applyEnvironment(raw: RawSection, env: NodeJS.ProcessEnv): RawSection {
    const server = section(raw, "server");
    const proxy = section(raw, "proxy");
    const models = section(raw, "models");
    const policy = section(raw, "policy");
    const insights = section(raw, "insights");
    const openai = section(raw, "openai");

    return {
        ...raw,
        logLevel: envValue(env, "LOG_LEVEL") ?? raw.logLevel,
        server  : { ...server, port: envValue(env, "PORT") ?? server.port },
        proxy   : {
            ...proxy,
            port       : envValue(env, "PROXY_PORT") ?? proxy.port,
            upstreamUrl: envValue(env, "GATEWAY_URL") ?? proxy.upstreamUrl,
        },
        models  : { ...models, dir: envValue(env, "MODELS_DIR") ?? models.dir },
        policy  : {
            ...policy,
            satisfactionThreshold: envValue(env, "SATISFACTION_THRESHOLD") ?? policy.satisfactionThreshold,
        },
        insights: { ...insights, intervalMs: envValue(env, "INSIGHTS_INTERVAL_MS") ?? insights.intervalMs },
        openai  : {
            ...openai,
            apiKey: envValue(env, "OPENAI_API_KEY") ?? openai.apiKey,
            model : envValue(env, "OPENAI_MODEL") ?? openai.model,
        },
    };
}

/**
 * Validate raw configuration with environment overrides applied.
 *
 * @throws Error listing every invalid field
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const result = ServiceConfigSchema.safeParse(applyEnvironment(isRecord(raw) ? raw : {}, env));

    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid service configuration: ${issues}`);
    }

    return result.data;
}

/**
 * Load the service configuration from a YAML file.
 *
 * @param filePath - Path to service.yml
 * @param env - Environment to read overrides from
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/service.yml");
 * console.log(config.server.port); // 8000
 * ```
 */
export function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Configuration file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (parsed !== null && parsed !== undefined && !isRecord(parsed)) {
        throw new Error("Invalid configuration file format: expected a mapping at the top level");
    }

    return parseConfig(parsed, env);
}

/**
 * Load the configuration, falling back to defaults (plus environment) when
 * the file is missing or invalid.
 */
export function loadConfigWithFallback(
    filePath: string,
    env: NodeJS.ProcessEnv = process.env,
    warn: (message: string) => void = console.warn
): ServiceConfig {
    try {
        return loadConfig(filePath, env);
    }
    catch (error) {
        warn(`Failed to load configuration from ${filePath}: ${errorMessage(error)}`);
        return parseConfig({}, env);
    }
}
