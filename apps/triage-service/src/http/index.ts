/**
 * @fileoverview HTTP barrel exports
 *
 * @module http
 */

export {
    buildGateway,
    toErrorResponse,
    type GatewayDeps,
    type InsightsService,
    type Predictor,
} from "./gateway.js";
export { buildProxy, createUpstreamClient, RELAYED_ROUTES, type ProxyOptions } from "./proxy.js";
export { parsePredictBody, parseWindowMs, PredictBodySchema } from "./schemas.js";
export {
    serializeBucket,
    serializeModel,
    serializePrediction,
    serializeReport,
    serializeSummary,
} from "./serialize.js";
