export type DType = "fp16" | "fp32" | "int8" | "int32" | "bool";

/** A concrete extent, or a symbol naming an extent unknown until runtime. */
export type Dim = number | string;

export type Shape = Dim[];

export type TensorType = {
  dtype: DType;
  shape: Shape;
};

/**
 * Compilation targets in release order. The earliest target lacks some
 * padding modes that later ones accept.
 */
export const TARGETS = ["opset15", "opset16", "opset17", "opset18"] as const;

export type CompilationTarget = (typeof TARGETS)[number];

export const EARLIEST_TARGET: CompilationTarget = TARGETS[0];
export const LATEST_TARGET: CompilationTarget = TARGETS[TARGETS.length - 1];

export function isCompilationTarget(value: string): value is CompilationTarget {
  return TARGETS.some((target) => target === value);
}

/** Negative when `a` predates `b`, zero when equal. */
export function compareTargets(
  a: CompilationTarget,
  b: CompilationTarget,
): number {
  return TARGETS.indexOf(a) - TARGETS.indexOf(b);
}
