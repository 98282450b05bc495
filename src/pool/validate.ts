import { InvalidParameterError } from "../core/errors";
import { formatShape, isConcreteDim, isSymbolic } from "../core/shape";
import { type CompilationTarget, EARLIEST_TARGET, type TensorType } from "../ir/types";
import {
  PAD_TYPES,
  POOL_TYPE_DOMAIN,
  type PadType,
  type PoolOpKind,
  type ResolvedPool,
  type ResolvedPoolParams,
} from "./types";

const MIN_RANK = 3;
const MAX_RANK = 5;

function fail(op: PoolOpKind, message: string): never {
  throw new InvalidParameterError(`${op}: ${message}`);
}

function formatList(values: readonly number[]): string {
  return `[${values.join(", ")}]`;
}

/**
 * Check the input tensor type: element type in the pooling type domain,
 * rank 3..5, and concrete spatial extents. Batch and channel may be symbolic.
 * Returns the spatial extents.
 */
export function validatePoolInput(op: PoolOpKind, input: TensorType): number[] {
  if (!POOL_TYPE_DOMAIN.includes(input.dtype)) {
    fail(
      op,
      `input element type must be one of ${POOL_TYPE_DOMAIN.join(", ")}, got ${input.dtype}`,
    );
  }
  const rank = input.shape.length;
  if (rank < MIN_RANK || rank > MAX_RANK) {
    fail(
      op,
      `input rank must be between ${MIN_RANK} and ${MAX_RANK}, got ${rank} for shape ${formatShape(input.shape)}`,
    );
  }
  const spatial: number[] = [];
  input.shape.forEach((dim, i) => {
    if (i < 2 && isSymbolic(dim)) {
      if (dim.length === 0) {
        fail(op, `input dim ${i} has an empty symbol`);
      }
      return;
    }
    if (!isConcreteDim(dim)) {
      fail(
        op,
        `input dim ${i} must be a non-negative integer, got ${String(dim)} in ${formatShape(input.shape)}`,
      );
    }
    if (i >= 2) {
      spatial.push(dim);
    }
  });
  return spatial;
}

function checkLengthAndRange(
  op: PoolOpKind,
  name: string,
  values: readonly number[],
  expectedLength: number,
  min: number,
): void {
  if (values.length !== expectedLength) {
    fail(
      op,
      `${name} must have length ${expectedLength}, got ${values.length} (${formatList(values)})`,
    );
  }
  for (const value of values) {
    if (!Number.isInteger(value) || value < min) {
      const bound = min === 0 ? "non-negative" : "positive";
      fail(op, `${name} must be ${bound} integers, got ${formatList(values)}`);
    }
  }
}

/** Lengths and ranges of kernel sizes, strides and pad against the spatial rank. */
export function validateSpatialParams(
  op: PoolOpKind,
  params: ResolvedPoolParams,
  spatialDims: number,
): void {
  checkLengthAndRange(op, "kernel_sizes", params.kernelSizes, spatialDims, 1);
  checkLengthAndRange(op, "strides", params.strides, spatialDims, 1);
  checkLengthAndRange(op, "pad", params.pad, 2 * spatialDims, 0);
}

/** Lower-case and check a raw pad type attribute. */
export function normalizePadType(op: PoolOpKind, raw: string): PadType {
  const lowered = raw.toLowerCase();
  const padType = PAD_TYPES.find((candidate) => candidate === lowered);
  if (padType === undefined) {
    fail(
      op,
      `unrecognized pad_type "${raw}", expected one of ${PAD_TYPES.join(", ")}`,
    );
  }
  return padType;
}

/** Constraints one operator adds on top of the shared pooling contract. */
function validateVariant(resolved: ResolvedPool, spatialDims: number): void {
  switch (resolved.op) {
    case "l2_pool":
      if (spatialDims > 2) {
        fail(
          resolved.op,
          `only 1D or 2D pooling is supported, got ${spatialDims} spatial dims`,
        );
      }
      return;
    case "avg_pool":
    case "max_pool":
      return;
  }
}

export type ValidatedPool = {
  padType: PadType;
  spatialIn: number[];
};

/**
 * Run the validation cascade over defaulted parameters. The first failing
 * check throws `InvalidParameterError`.
 */
export function validatePoolParams(
  resolved: ResolvedPool,
  input: TensorType,
  target: CompilationTarget,
): ValidatedPool {
  const { op, params } = resolved;
  const spatialIn = validatePoolInput(op, input);
  const spatialDims = spatialIn.length;
  validateSpatialParams(op, params, spatialDims);
  validateVariant(resolved, spatialDims);

  const padType = normalizePadType(op, params.padType);

  if (params.ceilMode) {
    if (spatialDims > 2) {
      fail(
        op,
        `ceil_mode is only supported for 1D or 2D pooling, got ${spatialDims} spatial dims`,
      );
    }
    if (padType === "same") {
      fail(op, "ceil_mode must be false when pad_type is same");
    }
    if (params.padGiven) {
      for (let i = 0; i < spatialDims; i += 1) {
        if (params.pad[2 * i] !== params.pad[2 * i + 1]) {
          fail(
            op,
            `padding must be symmetric when ceil_mode is true, got pad ${formatList(params.pad)} (dim ${i}: ${params.pad[2 * i]} before, ${params.pad[2 * i + 1]} after)`,
          );
        }
      }
    }
  }

  // Compared after lower-casing, so "SAME_LOWER" is rejected too.
  if (target === EARLIEST_TARGET && padType === "same_lower") {
    fail(op, `pad_type same_lower is not supported on target ${target}`);
  }

  return { padType, spatialIn };
}
