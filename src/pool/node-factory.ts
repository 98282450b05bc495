import type { TensorType } from "../ir/types";
import type { AvgPoolAttrs, PoolAttrs, PoolNode, PoolOpKind } from "./types";

// ============================================================================
// Node ID Counter
// ============================================================================

let nextNodeId = 1;

export function resetNodeIdCounter(): void {
  nextNodeId = 1;
}

/**
 * Build a pooling node with a fresh id. `excludePaddingFromAverage` is kept
 * only for `avg_pool`.
 */
export function createPoolNode(
  op: PoolOpKind,
  input: TensorType,
  attrs: AvgPoolAttrs,
): PoolNode {
  const id = nextNodeId++;
  // Copies keep later edits by the caller out of the node.
  const shared = {
    id,
    input: { dtype: input.dtype, shape: input.shape.slice() },
  };
  const base: PoolAttrs = {
    kernelSizes: attrs.kernelSizes.slice(),
    strides: attrs.strides?.slice(),
    padType: attrs.padType,
    pad: attrs.pad?.slice(),
    ceilMode: attrs.ceilMode,
  };
  switch (op) {
    case "avg_pool":
      return {
        ...shared,
        op,
        attrs: {
          ...base,
          excludePaddingFromAverage: attrs.excludePaddingFromAverage,
        },
      };
    case "l2_pool":
      return { ...shared, op, attrs: base };
    case "max_pool":
      return { ...shared, op, attrs: base };
  }
}
