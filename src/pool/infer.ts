import { getConfig } from "../config";
import { formatShape, withSpatial } from "../core/shape";
import type { TensorType } from "../ir/types";
import { resolvePoolParams } from "./defaults";
import { padAmounts, spatialOutShape } from "./spatial";
import type { PoolExplanation, PoolInferOptions, PoolNode } from "./types";
import { validatePoolParams } from "./validate";

/**
 * Resolve, validate and shape-infer a pooling node without touching its
 * output cache. Returns the intermediate results alongside the output type.
 */
export function explainPool(
  node: PoolNode,
  options?: PoolInferOptions,
): PoolExplanation {
  const config = getConfig();
  const target = options?.target ?? config.target;
  const trace = options?.trace ?? config.trace;

  const resolved = resolvePoolParams(node);
  const { padType, spatialIn } = validatePoolParams(
    resolved,
    node.input,
    target,
  );
  const { kernelSizes, strides, pad, ceilMode } = resolved.params;
  const amounts = padAmounts(padType, spatialIn, kernelSizes, strides, pad);
  const spatialOut = spatialOutShape(
    padType,
    spatialIn,
    kernelSizes,
    strides,
    pad,
    ceilMode,
  );
  const outputType: TensorType = {
    dtype: node.input.dtype,
    shape: withSpatial(node.input.shape, spatialOut),
  };

  if (trace) {
    console.log(
      `[pool-infer] node=${node.id} op=${node.op} target=${target} in=${formatShape(node.input.shape)} kernel=${formatShape(kernelSizes)} strides=${formatShape(strides)} pad_type=${padType} ceil=${ceilMode} out=${formatShape(outputType.shape)}`,
    );
  }

  return { resolved, padType, padAmounts: amounts, outputType };
}

/**
 * Output tensor type of a pooling node. The result is cached on
 * `node.outputType` together with the target it was validated for; later
 * calls for the same target return the cached type, and a different target
 * runs inference again.
 *
 * @throws InvalidParameterError when the parameters, input type or target
 * do not form a compilable pooling op
 */
export function inferPoolType(
  node: PoolNode,
  options?: PoolInferOptions,
): TensorType {
  const config = getConfig();
  const target = options?.target ?? config.target;
  if (node.outputType && node.outputTarget === target) {
    if (options?.trace ?? config.trace) {
      console.log(
        `[pool-infer] node=${node.id} op=${node.op} target=${target} cached out=${formatShape(node.outputType.shape)}`,
      );
    }
    return node.outputType;
  }
  const { outputType } = explainPool(node, { ...options, target });
  node.outputType = outputType;
  node.outputTarget = target;
  return outputType;
}
