/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    LOG_LEVELS,
    ServiceConfigSchema,
    applyEnvironment,
    loadConfig,
    loadConfigWithFallback,
    parseConfig,
    type ServiceConfig,
} from "./loadConfig.js";
