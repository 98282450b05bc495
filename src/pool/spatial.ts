import type { PadType } from "./types";

/**
 * Total padding that makes a floor-mode window count come out to
 * `ceil(inDim / stride)`.
 */
export function samePadTotal(inDim: number, kernel: number, stride: number): number {
  const outDim = Math.ceil(inDim / stride);
  return Math.max((outDim - 1) * stride + kernel - inDim, 0);
}

/**
 * Per spatial dim `[before, after]` padding.
 *
 * `same` places an odd remainder after the dim, `same_lower` before it.
 * `custom` reads `pad` verbatim; `valid` pads nothing.
 */
export function padAmounts(
  padType: PadType,
  inShape: readonly number[],
  kernelSizes: readonly number[],
  strides: readonly number[],
  pad: readonly number[],
): Array<[number, number]> {
  return inShape.map((inDim, i): [number, number] => {
    switch (padType) {
      case "valid":
        return [0, 0];
      case "custom":
        return [pad[2 * i], pad[2 * i + 1]];
      case "same": {
        const total = samePadTotal(inDim, kernelSizes[i], strides[i]);
        const before = Math.floor(total / 2);
        return [before, total - before];
      }
      case "same_lower": {
        const total = samePadTotal(inDim, kernelSizes[i], strides[i]);
        const before = Math.ceil(total / 2);
        return [before, total - before];
      }
    }
  });
}

/**
 * Output extent of one spatial dim.
 *
 * Ceil mode drops the last window when it would start inside the trailing
 * padding. Zero or negative extents are returned as computed.
 */
export function pooledExtent(
  inDim: number,
  kernel: number,
  stride: number,
  before: number,
  after: number,
  ceilMode: boolean,
): number {
  const total = before + after;
  const span = inDim + total - kernel;
  if (!ceilMode) {
    return Math.floor(span / stride) + 1;
  }
  let outDim = Math.ceil(span / stride) + 1;
  if ((outDim - 1) * stride >= inDim + before && total > 0) {
    outDim -= 1;
  }
  return outDim;
}

/** Output extents for all spatial dims. */
export function spatialOutShape(
  padType: PadType,
  inShape: readonly number[],
  kernelSizes: readonly number[],
  strides: readonly number[],
  pad: readonly number[],
  ceilMode: boolean,
): number[] {
  const amounts = padAmounts(padType, inShape, kernelSizes, strides, pad);
  return inShape.map((inDim, i) =>
    pooledExtent(
      inDim,
      kernelSizes[i],
      strides[i],
      amounts[i][0],
      amounts[i][1],
      ceilMode,
    ),
  );
}
