import { ConfigError } from "./core/errors";
import {
  type CompilationTarget,
  isCompilationTarget,
  LATEST_TARGET,
  TARGETS,
} from "./ir/types";

export type PoolIRConfig = {
  /** Target used when a caller does not pass one. */
  target: CompilationTarget;
  /** Log each inference through console.log. */
  trace: boolean;
};

type Env = Record<string, string | undefined>;

const processEnv: Env = typeof process !== "undefined" ? process.env : {};

/**
 * Read configuration from the environment.
 *
 * - `POOL_IR_TARGET`: default compilation target (default: latest)
 * - `POOL_IR_TRACE=1`: enable trace logging
 */
export function resolveConfig(env: Env = processEnv): PoolIRConfig {
  const rawTarget = env.POOL_IR_TARGET?.trim();
  let target = LATEST_TARGET;
  if (rawTarget) {
    if (!isCompilationTarget(rawTarget)) {
      throw new ConfigError(
        `POOL_IR_TARGET must be one of ${TARGETS.join(", ")}, got "${rawTarget}"`,
      );
    }
    target = rawTarget;
  }
  return { target, trace: env.POOL_IR_TRACE === "1" };
}

let cached: PoolIRConfig | null = null;

/** Environment configuration, read on first use. */
export function getConfig(): PoolIRConfig {
  if (!cached) {
    cached = resolveConfig();
  }
  return cached;
}

/** Drop the cached configuration so the next `getConfig` re-reads the environment. */
export function resetConfig(): void {
  cached = null;
}
