import type { AvgPoolAttrs, PoolOpKind } from "../../src/pool/types";
import type { CompilationTarget, Dim, TensorType } from "../../src/ir/types";

type OpCaseBase = {
  name: string;
  input: TensorType;
  attrs: AvgPoolAttrs;
  target?: CompilationTarget;
};

export type OpCase =
  | (OpCaseBase & { expectation: "match"; outShape: Dim[] })
  | (OpCaseBase & {
      expectation: "expected_failure";
      /** Substring of the error message. */
      error: string;
    });

/** Values an unset attribute takes that do not depend on the input rank. */
export type OpOptionsDefaults = {
  ceilMode: boolean;
  excludePaddingFromAverage?: boolean;
};

export type OpSpec = {
  name: PoolOpKind;
  optionsDefaults: OpOptionsDefaults;
  /** Earliest target the op compiles for at all. */
  minTarget: CompilationTarget;
  cases: OpCase[];
};
