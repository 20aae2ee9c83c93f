/**
 * @fileoverview Model families barrel exports
 *
 * @module models
 */

export {
    ModelArtifactSchema,
    type LexiconArtifact,
    type ModelArtifact,
    type ResponseTemplateArtifact,
} from "./artifacts.js";
export { LexiconScoringUnit, softmax } from "./LexiconScoringUnit.js";
export { ResponseTemplateUnit } from "./ResponseTemplateUnit.js";
export {
    createScoringUnit,
    loadModelArtifacts,
    readModelArtifact,
    type ArtifactLoadReport,
    type UnitSink,
} from "./loadModelArtifacts.js";
