/**
 * @fileoverview Logger Contract
 *
 * Structured logger shared by every engine component. Hosts adapt their own
 * logger (pino, console, ...) to this shape.
 *
 * @module @triagekit/engine/contracts/Logger
 */

/**
 * Logger interface for the engine.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const defaultLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Render an unknown thrown value for a log entry.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
