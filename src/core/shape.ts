/**
 * Pure shape helpers over possibly-symbolic dims.
 *
 * Zero dependencies; importable from any layer.
 */

import type { Dim, Shape } from "../ir/types";

export function isSymbolic(dim: Dim): dim is string {
  return typeof dim === "string";
}

export function isConcreteDim(dim: Dim): dim is number {
  return typeof dim === "number" && Number.isInteger(dim) && dim >= 0;
}

export function formatShape(shape: readonly Dim[]): string {
  return `[${shape.join(", ")}]`;
}

/** Leading batch and channel dims followed by `spatial`. */
export function withSpatial(shape: Shape, spatial: number[]): Shape {
  return [...shape.slice(0, 2), ...spatial];
}
