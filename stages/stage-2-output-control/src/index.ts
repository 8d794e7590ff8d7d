export {
  cleanCandidate,
  extractJson,
  isPlainObject,
  recoverStructure,
  stripMarkdownCodeBlock,
} from "./parse.js";
export type { ContainerShape, ExtractResult } from "./parse.js";
export {
  collectViolations,
  renderReceived,
  renderViolation,
  renderViolations,
} from "./validate.js";
export { createSchemaModel } from "./schema.js";
export { SchemaValidationError } from "./errors.js";
export { prepareSeeds } from "./seeds.js";
export type { JsonSchema, SchemaModel, SchemaViolation } from "./types.js";
