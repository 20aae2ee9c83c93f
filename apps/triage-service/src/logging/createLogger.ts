/**
 * @fileoverview Service logger
 *
 * One pino logger for the process, adapted to the engine's logger contract.
 *
 * @module logging/createLogger
 */

import { pino, type Logger } from "pino";
import type { EngineLogger } from "@triagekit/engine";
import type { ServiceConfig } from "../config/index.js";

export function createLogger(level: ServiceConfig["logLevel"], name = "triage-service"): Logger {
    return pino({ name, level });
}

/**
 * Expose a pino logger through the EngineLogger interface.
 * Structured data goes into the log record, not the message.
 */
export function toEngineLogger(logger: Logger): EngineLogger {
    return {
        debug: (message, data) => logger.debug(data ?? {}, message),
        info : (message, data) => logger.info(data ?? {}, message),
        warn : (message, data) => logger.warn(data ?? {}, message),
        error: (message, data) => logger.error(data ?? {}, message),
    };
}
