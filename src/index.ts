export { ConfigError, InvalidParameterError } from "./core/errors";
export { getConfig, type PoolIRConfig, resetConfig, resolveConfig } from "./config";
export {
  type CompilationTarget,
  compareTargets,
  type Dim,
  type DType,
  EARLIEST_TARGET,
  isCompilationTarget,
  LATEST_TARGET,
  type Shape,
  TARGETS,
  type TensorType,
} from "./ir/types";
export { type PoolDefaults, poolDefaults, resolvePoolParams } from "./pool/defaults";
export { explainPool, inferPoolType } from "./pool/infer";
export { createPoolNode, resetNodeIdCounter } from "./pool/node-factory";
export { padAmounts, pooledExtent, samePadTotal, spatialOutShape } from "./pool/spatial";
export * from "./pool/types";
export {
  normalizePadType,
  type ValidatedPool,
  validatePoolInput,
  validatePoolParams,
  validateSpatialParams,
} from "./pool/validate";
