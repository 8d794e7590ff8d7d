export * from "./stages/stage-0-engine/src/index.js";
export * from "./stages/stage-1-similarity/src/index.js";
export * from "./stages/stage-2-output-control/src/index.js";
export * from "./stages/stage-3-symbolic-value/src/index.js";
export * from "./stages/stage-4-repair-loops/src/index.js";
export * from "./stages/stage-5-streaming/src/index.js";
export {
  buildEngineRegistryFromConfig,
  EMBEDDING_MODEL_MAP,
  loadGlobalConfig,
  NEUROSYMBOLIC_MODEL_MAP,
  type GlobalConfig,
  type ModelMap,
  type RegistryBuildOptions,
} from "./config/index.js";
