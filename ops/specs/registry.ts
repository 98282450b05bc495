import type { OpOptionsDefaults, OpSpec } from "./types";

const POOL_DEFAULTS: OpOptionsDefaults = { ceilMode: false };

export const OP_SPECS: OpSpec[] = [
  {
    name: "avg_pool",
    optionsDefaults: { ...POOL_DEFAULTS, excludePaddingFromAverage: false },
    minTarget: "opset15",
    cases: [
      {
        name: "valid 1d, stride 2",
        input: { dtype: "fp32", shape: [1, 3, 10] },
        attrs: { kernelSizes: [3], strides: [2], padType: "valid" },
        expectation: "match",
        outShape: [1, 3, 4],
      },
      {
        name: "same 2d keeps extents under unit stride",
        input: { dtype: "fp32", shape: [2, 4, 7, 9] },
        attrs: { kernelSizes: [3, 3], padType: "same" },
        expectation: "match",
        outShape: [2, 4, 7, 9],
      },
      {
        name: "ceil mode drops a window starting in the padding",
        input: { dtype: "fp32", shape: [1, 1, 5] },
        attrs: {
          kernelSizes: [2],
          strides: [2],
          padType: "custom",
          pad: [1, 1],
          ceilMode: true,
        },
        expectation: "match",
        outShape: [1, 1, 3],
      },
      {
        name: "excluding padding leaves the shape alone",
        input: { dtype: "fp16", shape: [1, 2, 6, 6] },
        attrs: {
          kernelSizes: [2, 2],
          strides: [2, 2],
          padType: "valid",
          excludePaddingFromAverage: true,
        },
        expectation: "match",
        outShape: [1, 2, 3, 3],
      },
      {
        name: "symbolic batch and channel pass through",
        input: { dtype: "fp16", shape: ["N", "C", 8] },
        attrs: { kernelSizes: [2], strides: [2], padType: "valid" },
        expectation: "match",
        outShape: ["N", "C", 4],
      },
      {
        name: "ceil mode on 3d pooling",
        input: { dtype: "fp32", shape: [1, 1, 4, 4, 4] },
        attrs: { kernelSizes: [2, 2, 2], padType: "valid", ceilMode: true },
        expectation: "expected_failure",
        error: "ceil_mode is only supported for 1D or 2D pooling",
      },
    ],
  },
  {
    name: "l2_pool",
    optionsDefaults: POOL_DEFAULTS,
    minTarget: "opset15",
    cases: [
      {
        name: "valid 2d, stride 2",
        input: { dtype: "fp32", shape: [1, 3, 8, 8] },
        attrs: { kernelSizes: [2, 2], strides: [2, 2], padType: "valid" },
        expectation: "match",
        outShape: [1, 3, 4, 4],
      },
      {
        name: "3d pooling",
        input: { dtype: "fp32", shape: [1, 1, 4, 4, 4] },
        attrs: { kernelSizes: [2, 2, 2], padType: "valid" },
        expectation: "expected_failure",
        error: "only 1D or 2D pooling is supported",
      },
    ],
  },
  {
    name: "max_pool",
    optionsDefaults: POOL_DEFAULTS,
    minTarget: "opset15",
    cases: [
      {
        name: "same_lower on a later target",
        input: { dtype: "fp32", shape: [1, 1, 5] },
        attrs: { kernelSizes: [2], padType: "same_lower" },
        target: "opset16",
        expectation: "match",
        outShape: [1, 1, 5],
      },
      {
        name: "same_lower on the earliest target",
        input: { dtype: "fp32", shape: [1, 1, 5] },
        attrs: { kernelSizes: [2], padType: "same_lower" },
        target: "opset15",
        expectation: "expected_failure",
        error: "same_lower is not supported on target opset15",
      },
      {
        name: "pad type is case-insensitive",
        input: { dtype: "fp32", shape: [1, 3, 10] },
        attrs: { kernelSizes: [3], strides: [2], padType: "VALID" },
        expectation: "match",
        outShape: [1, 3, 4],
      },
      {
        name: "valid ceil mode without correction",
        input: { dtype: "fp32", shape: [1, 1, 5] },
        attrs: { kernelSizes: [3], strides: [2], padType: "valid", ceilMode: true },
        expectation: "match",
        outShape: [1, 1, 2],
      },
      {
        name: "kernel wider than the input yields an empty dim",
        input: { dtype: "fp32", shape: [1, 1, 2] },
        attrs: { kernelSizes: [3], padType: "valid" },
        expectation: "match",
        outShape: [1, 1, 0],
      },
      {
        name: "ceil mode with same padding",
        input: { dtype: "fp32", shape: [1, 1, 6] },
        attrs: { kernelSizes: [2], padType: "same", ceilMode: true },
        expectation: "expected_failure",
        error: "ceil_mode must be false when pad_type is same",
      },
      {
        name: "ceil mode with asymmetric padding",
        input: { dtype: "fp32", shape: [1, 1, 5] },
        attrs: { kernelSizes: [2], padType: "custom", pad: [0, 1], ceilMode: true },
        expectation: "expected_failure",
        error: "padding must be symmetric when ceil_mode is true",
      },
      {
        name: "unknown pad type",
        input: { dtype: "fp32", shape: [1, 1, 5] },
        attrs: { kernelSizes: [2], padType: "reflect" },
        expectation: "expected_failure",
        error: 'unrecognized pad_type "reflect"',
      },
    ],
  },
];
