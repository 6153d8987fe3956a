import { CompatibilityMode, isCompatibilityMode } from "./compatibility";
import { ConfigurationError } from "./errors";

/**
 * Sink for registry diagnostics. `console` satisfies it.
 */
export type Logger = Pick<Console, "warn" | "debug">;

/**
 * Options accepted when building a registry.
 */
export interface PicklerOptions {
  /** Field-count tolerance on decode. Defaults to TAGPICKLE_COMPATIBILITY, then NONE. */
  compatibility?: CompatibilityMode;
  /** Maximum nesting of structured values. Defaults to TAGPICKLE_MAX_DEPTH, then 512. */
  maxDepth?: number;
  logger?: Logger;
}

/**
 * Options with every default applied.
 */
export interface ResolvedOptions {
  readonly compatibility: CompatibilityMode;
  readonly maxDepth: number;
  readonly logger: Logger;
}

export const COMPATIBILITY_ENV = "TAGPICKLE_COMPATIBILITY";
export const MAX_DEPTH_ENV = "TAGPICKLE_MAX_DEPTH";
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Applies defaults to `options`, reading the environment for anything unset.
 * @throws ConfigurationError on an unknown mode or a non-positive depth
 */
export function resolveOptions(
  options: PicklerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedOptions {
  return {
    compatibility: options.compatibility ?? compatibilityFromEnv(env),
    maxDepth: checkDepth(options.maxDepth ?? maxDepthFromEnv(env), "maxDepth"),
    logger: options.logger ?? console,
  };
}

function compatibilityFromEnv(env: NodeJS.ProcessEnv): CompatibilityMode {
  const raw = env[COMPATIBILITY_ENV];
  if (raw === undefined || raw === "") {
    return CompatibilityMode.NONE;
  }
  const value = raw.trim().toUpperCase();
  if (!isCompatibilityMode(value)) {
    throw new ConfigurationError(
      `${COMPATIBILITY_ENV}=${raw} is not one of ${Object.values(CompatibilityMode).join(", ")}`
    );
  }
  return value;
}

function maxDepthFromEnv(env: NodeJS.ProcessEnv): number {
  const raw = env[MAX_DEPTH_ENV];
  if (raw === undefined || raw === "") {
    return DEFAULT_MAX_DEPTH;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${MAX_DEPTH_ENV}=${raw} is not a positive integer`);
  }
  return checkDepth(Number(raw.trim()), MAX_DEPTH_ENV);
}

function checkDepth(depth: number, source: string): number {
  if (!Number.isSafeInteger(depth) || depth < 1) {
    throw new ConfigurationError(`${source} must be a positive integer, got ${depth}`);
  }
  return depth;
}
