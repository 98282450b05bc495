import type { PoolNode, ResolvedPool, ResolvedPoolParams } from "./types";

export type PoolDefaults = {
  strides: number[];
  pad: number[];
  ceilMode: boolean;
};

/**
 * Defaults for the optional pooling attributes, derived from the input rank:
 * unit strides, zero padding on both sides of every spatial dim, floor
 * rounding.
 */
export function poolDefaults(rank: number): PoolDefaults {
  const spatialDims = Math.max(rank - 2, 0);
  return {
    strides: new Array<number>(spatialDims).fill(1),
    pad: new Array<number>(2 * spatialDims).fill(0),
    ceilMode: false,
  };
}

/**
 * Merge defaults into a node's attributes. Returns fresh arrays; the node
 * itself is left as it was.
 */
export function resolvePoolParams(node: PoolNode): ResolvedPool {
  const defaults = poolDefaults(node.input.shape.length);
  const { attrs } = node;
  const params: ResolvedPoolParams = {
    kernelSizes: attrs.kernelSizes.slice(),
    strides: attrs.strides ? attrs.strides.slice() : defaults.strides,
    padType: attrs.padType,
    pad: attrs.pad ? attrs.pad.slice() : defaults.pad,
    ceilMode: attrs.ceilMode ?? defaults.ceilMode,
    padGiven: attrs.pad !== undefined,
  };

  switch (node.op) {
    case "avg_pool":
      return {
        op: "avg_pool",
        params,
        excludePaddingFromAverage: node.attrs.excludePaddingFromAverage ?? false,
      };
    case "l2_pool":
      return { op: "l2_pool", params };
    case "max_pool":
      return { op: "max_pool", params };
  }
}
