import type { EncodeOptions } from "./types.js";
import { InvalidOptionsError } from "./errors.js";
import { isLogThreshold, type LogThreshold } from "./logger.js";
import { DEFAULT_MAX_ATTEMPTS } from "./placer.js";

export const DEFAULT_LINE_MAX = 10;
export const DEFAULT_TOTAL_MAX = 30;

export interface ResolvedEncodeOptions {
  lineMax: number;
  totalMax: number;
  maxAttempts: number;
}

/** Settings the CLI takes from the environment before applying flags. */
export interface TokenGridConfig extends ResolvedEncodeOptions {
  logLevel: LogThreshold;
}

/** Fill in defaults and validate the grid geometry. */
export function resolveEncodeOptions(options: EncodeOptions = {}): ResolvedEncodeOptions {
  const resolved = {
    lineMax: options.lineMax ?? DEFAULT_LINE_MAX,
    totalMax: options.totalMax ?? DEFAULT_TOTAL_MAX,
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
  };
  requireInteger("lineMax", resolved.lineMax, 1);
  requireInteger("totalMax", resolved.totalMax, 0);
  requireInteger("maxAttempts", resolved.maxAttempts, 0);
  return resolved;
}

/**
 * Read TOKENGRID_LINE_MAX, TOKENGRID_TOTAL_MAX, TOKENGRID_MAX_ATTEMPTS and
 * TOKENGRID_LOG_LEVEL. Unset or empty variables fall back to the defaults.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): TokenGridConfig {
  const logLevel = env.TOKENGRID_LOG_LEVEL || "warn";
  if (!isLogThreshold(logLevel)) {
    throw new InvalidOptionsError(`TOKENGRID_LOG_LEVEL must be one of debug, info, warn, error, silent; got "${logLevel}"`);
  }

  return {
    ...resolveEncodeOptions({
      lineMax: envInt(env, "TOKENGRID_LINE_MAX"),
      totalMax: envInt(env, "TOKENGRID_TOTAL_MAX"),
      maxAttempts: envInt(env, "TOKENGRID_MAX_ATTEMPTS"),
    }),
    logLevel,
  };
}

/** Parse a whole decimal number, as given on the command line or in env. */
export function parseIntStrict(name: string, raw: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new InvalidOptionsError(`${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function envInt(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name];
  return raw ? parseIntStrict(name, raw) : undefined;
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidOptionsError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}
