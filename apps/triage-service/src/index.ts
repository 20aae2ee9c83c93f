/**
 * @fileoverview Triage Service - Main Entry Point
 *
 * Starts the prediction gateway and the CORS proxy in one process:
 * 1. Load configuration (service.yml + environment)
 * 2. Load model artifacts into the registry
 * 3. Compose orchestrator, analytics and insights
 * 4. Listen on the gateway and proxy ports
 *
 * @module triage-service
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { errorMessage } from "@triagekit/engine";
import { loadConfigWithFallback } from "./config/index.js";
import { createLogger, toEngineLogger } from "./logging/index.js";
import { buildGateway, buildProxy } from "./http/index.js";
import { createServices, gatewayDeps } from "./services.js";

// Service root: the directory holding config/ and models/
const __filename = fileURLToPath(import.meta.url);
const SERVICE_ROOT = join(dirname(__filename), "..");

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const config = loadConfigWithFallback(join(SERVICE_ROOT, "config", "service.yml"));
    const rootLogger = createLogger(config.logLevel);
    const logger = toEngineLogger(rootLogger);

    const services = createServices(config, SERVICE_ROOT, logger);
    const { eventBus, orchestrator, scheduler, aggregator, artifacts } = services;

    logger.info("Model artifacts loaded", {
        loaded : artifacts.loaded,
        skipped: artifacts.skipped.length,
    });

    const missing = orchestrator.missingCapabilities();
    if (missing.length > 0) {
        logger.warn("Serving degraded: capabilities without a model", { missing });
    }

    // Subscribe to engine events for observability
    eventBus.subscribe("prediction:stageFallback", (event) => {
        logger.warn("Scoring stage fell back to the neutral score", { traceId: event.traceId, ...event.data });
    });

    eventBus.subscribe("prediction:failed", (event) => {
        logger.error("Prediction failed", { traceId: event.traceId, ...event.data });
    });

    eventBus.subscribe("insights:generated", (event) => {
        logger.info("Insight report generated", { ...event.data });
    });

    eventBus.subscribe("insights:degraded", (event) => {
        logger.warn("Insight report degraded", { ...event.data });
    });

    const gateway = await buildGateway({
        ...gatewayDeps(services, logger),
        logLevel: config.logLevel,
    });

    const proxy = await buildProxy({
        upstreamUrl: config.proxy.upstreamUrl,
        timeoutMs  : config.proxy.timeoutMs,
        logLevel   : config.logLevel,
    });

    // Handle graceful shutdown
    let stopping = false;
    async function shutdown(signal: string): Promise<void> {
        if (stopping) {
            return;
        }
        stopping = true;
        logger.info("Shutting down", { signal });

        scheduler.stop();
        aggregator.close();
        await Promise.all([proxy.close(), gateway.close()]);
    }

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.on(signal, () => {
            shutdown(signal)
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error("Shutdown failed", { error: errorMessage(error) });
                    process.exit(1);
                });
        });
    }

    await gateway.listen({ host: config.server.host, port: config.server.port });
    await proxy.listen({ host: config.proxy.host, port: config.proxy.port });

    scheduler.start();

    logger.info("Triage service is running", {
        gateway: `${config.server.host}:${config.server.port}`,
        proxy  : `${config.proxy.host}:${config.proxy.port}`,
    });
}

main().catch((error: unknown) => {
    console.error("[FATAL] Failed to start triage service:", error);
    process.exit(1);
});
