/**
 * @fileoverview Routing Proxy
 *
 * Browser-facing relay in front of the gateway. Adds CORS and forwards
 * requests unchanged; upstream status, body and content type come back
 * verbatim. Stateless, no retries.
 *
 * @module http/proxy
 */

import { fastify, type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import axios, { type AxiosInstance } from "axios";
import { errorMessage } from "@triagekit/engine";

export interface ProxyOptions {
    /** Base URL of the gateway, e.g. http://127.0.0.1:8000 */
    readonly upstreamUrl: string;

    /** Upstream request timeout in milliseconds (default: 10000) */
    readonly timeoutMs?: number;

    /** Fastify request log level; false disables request logging */
    readonly logLevel?: string | false;

    /** Preconfigured HTTP client (default: axios instance for upstreamUrl) */
    readonly http?: AxiosInstance;
}

export const RELAYED_ROUTES = [
    { method: "POST", url: "/predict" },
    { method: "GET", url: "/health" },
    { method: "GET", url: "/metrics" },
    { method: "GET", url: "/api/insights" },
    { method: "POST", url: "/api/insights/generate" },
] as const;

export function createUpstreamClient(upstreamUrl: string, timeoutMs = 10_000): AxiosInstance {
    return axios.create({
        baseURL          : upstreamUrl,
        timeout          : timeoutMs,
        responseType     : "text",
        transformResponse: [(data: unknown) => data],
        validateStatus   : () => true,
    });
}

export async function buildProxy(options: ProxyOptions): Promise<FastifyInstance> {
    const http = options.http ?? createUpstreamClient(options.upstreamUrl, options.timeoutMs);

    const app = fastify({
        logger: options.logLevel === false || options.logLevel === undefined
            ? false
            : { level: options.logLevel, name: "proxy" },
    });

    await app.register(cors, {
        origin        : "*",
        methods       : ["GET", "POST", "OPTIONS"],
        allowedHeaders: ["Content-Type"],
    });

    // Bodies are relayed as raw text; the gateway does the parsing
    app.removeAllContentTypeParsers();
    app.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
        done(null, body);
    });

    async function relay(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const contentType = request.headers["content-type"];

        try {
            const upstream = await http.request<string>({
                method : request.method,
                url    : request.url,
                data   : typeof request.body === "string" ? request.body : undefined,
                headers: contentType === undefined ? {} : { "Content-Type": contentType },
            });

            const upstreamType = upstream.headers["content-type"];
            if (typeof upstreamType === "string") {
                reply.header("content-type", upstreamType);
            }

            return reply.status(upstream.status).send(upstream.data);
        }
        catch (error) {
            request.log.warn({ err: error }, "Upstream request failed");

            return reply.status(502).send({
                error_code: "upstream_unavailable",
                message   : `Gateway unreachable: ${errorMessage(error)}`,
            });
        }
    }

    for (const route of RELAYED_ROUTES) {
        app.route({ method: route.method, url: route.url, handler: relay });
    }

    app.setNotFoundHandler((request, reply) => {
        return reply.status(404).send({
            error_code: "not_found",
            message   : `Route ${request.method} ${request.url} not found`,
        });
    });

    return app;
}
