export { DisabledInsightsBackend } from "./DisabledInsightsBackend.js";
export {
    OpenAIInsightsBackend,
    parseDraftReply,
    type OpenAIInsightsBackendConfig,
} from "./OpenAIInsightsBackend.js";
