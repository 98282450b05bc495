import type { CompilationTarget, DType, TensorType } from "../ir/types";

export type PadType = "valid" | "same" | "custom" | "same_lower";

export const PAD_TYPES: readonly PadType[] = [
  "valid",
  "same",
  "custom",
  "same_lower",
];

export type PoolOpKind = "avg_pool" | "l2_pool" | "max_pool";

export const POOL_OPS: readonly PoolOpKind[] = ["avg_pool", "l2_pool", "max_pool"];

/** Element types every pooling op accepts for its input. */
export const POOL_TYPE_DOMAIN: readonly DType[] = ["fp16", "fp32"];

/**
 * Pooling attributes as bound on a node. Optional fields left undefined are
 * "unset" and receive defaults derived from the input rank.
 */
export type PoolAttrs = {
  kernelSizes: number[];
  strides?: number[];
  /** Compared case-insensitively against the known pad types. */
  padType: string;
  /** `pad[2i]`, `pad[2i + 1]` are the amounts before and after spatial dim i. */
  pad?: number[];
  ceilMode?: boolean;
};

export type AvgPoolAttrs = PoolAttrs & {
  /** Leave padded positions out of the averaging denominator. */
  excludePaddingFromAverage?: boolean;
};

type NodeBase = {
  id: number;
  input: TensorType;
  /** Filled by inference. */
  outputType?: TensorType;
  /** Target `outputType` was validated against. */
  outputTarget?: CompilationTarget;
};

export type AvgPoolNode = NodeBase & { op: "avg_pool"; attrs: AvgPoolAttrs };
export type L2PoolNode = NodeBase & { op: "l2_pool"; attrs: PoolAttrs };
export type MaxPoolNode = NodeBase & { op: "max_pool"; attrs: PoolAttrs };

export type PoolNode = AvgPoolNode | L2PoolNode | MaxPoolNode;

/** Attributes after defaulting; every optional base field is present. */
export type ResolvedPoolParams = {
  kernelSizes: number[];
  strides: number[];
  padType: string;
  pad: number[];
  ceilMode: boolean;
  /** Whether `pad` came from the node rather than from defaults. */
  padGiven: boolean;
};

export type ResolvedPool =
  | {
      op: "avg_pool";
      params: ResolvedPoolParams;
      excludePaddingFromAverage: boolean;
    }
  | { op: "l2_pool"; params: ResolvedPoolParams }
  | { op: "max_pool"; params: ResolvedPoolParams };

export type PoolInferOptions = {
  target?: CompilationTarget;
  trace?: boolean;
};

export type PoolExplanation = {
  resolved: ResolvedPool;
  padType: PadType;
  /** `[before, after]` per spatial dim. */
  padAmounts: Array<[number, number]>;
  outputType: TensorType;
};
