export { createLogger, toEngineLogger } from "./createLogger.js";
