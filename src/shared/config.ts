/**
 * SPC Configuration Module
 *
 * Resolves engine defaults from explicit options, then environment
 * variables, then built-in defaults:
 * - SPC_GROUP_COUNT_LIMIT: retained groups per engine ("none" = unbounded)
 * - SPC_SIGMA_MULTIPLE:    control limit width in sigmas (default 3)
 * - SPC_ROUNDING_SCALE:    decimal places for reported values (unset = exact)
 * - SPC_ROUNDING_MODE:     HALF_UP, HALF_EVEN, ... (default HALF_UP)
 * - SPC_LOG_LEVEL:         silent | info | debug (default silent)
 */

import { z } from "zod";
import { DEFAULT_SIGMA_MULTIPLE } from "../engines/formulas/common.js";
import { RoundingPolicySchema, parseRoundingMode } from "../rounding/rounding.js";
import { SpcError, fromZodError } from "./errors.js";
import type { RoundingPolicy } from "./types.js";

export type LogLevel = "silent" | "info" | "debug";

export interface SpcConfig {
  groupCountLimit?: number;
  sigmaMultiple: number;
  rounding?: RoundingPolicy;
  logLevel: LogLevel;
}

export const SpcConfigSchema = z.object({
  groupCountLimit: z.number().int().positive().optional(),
  sigmaMultiple: z.number().finite().positive(),
  rounding: RoundingPolicySchema.optional(),
  logLevel: z.enum(["silent", "info", "debug"]),
});

/**
 * Parse a log level from a CLI argument and/or environment variable.
 * CLI argument takes priority. Unknown values fall back to "silent".
 */
export function parseLogLevel(cliArg?: string, envVar?: string): LogLevel {
  const raw = (cliArg ?? envVar ?? "silent").trim().toLowerCase();
  if (raw === "debug") return "debug";
  if (raw === "info") return "info";
  return "silent";
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new SpcError("INVALID_CONFIGURATION", `${name} must be a number, got "${raw}"`, { [name]: raw });
  }
  return value;
}

function groupCountLimitFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "" || normalized === "none" || normalized === "unbounded") return undefined;
  return parseNumber("SPC_GROUP_COUNT_LIMIT", raw);
}

function roundingFromEnv(scaleRaw: string | undefined, modeRaw: string | undefined): RoundingPolicy | undefined {
  if (scaleRaw === undefined || scaleRaw.trim() === "") return undefined;
  const scale = parseNumber("SPC_ROUNDING_SCALE", scaleRaw);
  const mode = modeRaw === undefined ? "HALF_UP" : parseRoundingMode(modeRaw);
  if (!mode) {
    throw new SpcError("INVALID_CONFIGURATION", `SPC_ROUNDING_MODE "${modeRaw}" is not a rounding mode`, {
      SPC_ROUNDING_MODE: modeRaw,
    });
  }
  return { scale, mode };
}

/**
 * Build a validated configuration. Keys present in `overrides` win even when
 * their value is undefined, so `{ rounding: undefined }` disables rounding
 * regardless of the environment.
 */
export function loadSpcConfig(
  overrides: Partial<SpcConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): SpcConfig {
  const candidate: SpcConfig = {
    groupCountLimit:
      "groupCountLimit" in overrides ? overrides.groupCountLimit : groupCountLimitFromEnv(env.SPC_GROUP_COUNT_LIMIT),
    sigmaMultiple:
      overrides.sigmaMultiple ??
      (env.SPC_SIGMA_MULTIPLE !== undefined
        ? parseNumber("SPC_SIGMA_MULTIPLE", env.SPC_SIGMA_MULTIPLE)
        : DEFAULT_SIGMA_MULTIPLE),
    rounding: "rounding" in overrides ? overrides.rounding : roundingFromEnv(env.SPC_ROUNDING_SCALE, env.SPC_ROUNDING_MODE),
    logLevel: overrides.logLevel ?? parseLogLevel(undefined, env.SPC_LOG_LEVEL),
  };

  const parsed = SpcConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw fromZodError("INVALID_CONFIGURATION", "Invalid SPC configuration", parsed.error);
  }
  return parsed.data;
}
