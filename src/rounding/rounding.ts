import { z } from "zod";
import { fromZodError } from "../shared/errors.js";
import type { RoundingMode, RoundingPolicy } from "../shared/types.js";

export const ROUNDING_MODES = [
  "UP",
  "DOWN",
  "CEILING",
  "FLOOR",
  "HALF_UP",
  "HALF_DOWN",
  "HALF_EVEN",
] as const satisfies readonly RoundingMode[];

export const RoundingPolicySchema = z.object({
  scale: z.number().int().min(0).max(15),
  mode: z.enum(ROUNDING_MODES),
});

export function createRoundingPolicy(scale: number, mode: RoundingMode = "HALF_UP"): RoundingPolicy {
  const parsed = RoundingPolicySchema.safeParse({ scale, mode });
  if (!parsed.success) {
    throw fromZodError("INVALID_CONFIGURATION", "Invalid rounding policy", parsed.error);
  }
  return Object.freeze(parsed.data);
}

/**
 * Parse a rounding mode name. Case-insensitive; "-" and " " are read as "_",
 * and a leading "ROUND_" is dropped so "round-half-up" works too.
 */
export function parseRoundingMode(raw: string): RoundingMode | undefined {
  const normalized = raw.trim().toUpperCase().replace(/[-\s]/g, "_").replace(/^ROUND_/, "");
  return ROUNDING_MODES.find((mode) => mode === normalized);
}

/**
 * Round a value to `policy.scale` decimal places.
 *
 * Works on the shortest decimal representation of the double (the digits
 * `String(value)` would print), so 0.725 rounds HALF_UP to 0.73 even though
 * the stored binary value is slightly below 0.725. Non-finite values pass
 * through unchanged.
 */
export function roundValue(value: number, policy: RoundingPolicy): number {
  if (!Number.isFinite(value) || value === 0) return value;

  const negative = value < 0;
  const [mantissa, exponentPart] = Math.abs(value).toExponential().split("e");
  const digits = mantissa.replace(".", "");
  const exponent = Number(exponentPart);

  // digits[0..keep) survive; the rest are discarded
  const keep = exponent + 1 + policy.scale;
  if (keep >= digits.length) return value;

  const kept = keep > 0 ? digits.slice(0, keep) : "";
  const discarded = keep >= 0 ? digits.slice(keep) : "0".repeat(-keep) + digits;

  const hasRemainder = /[1-9]/.test(discarded);
  const first = Number(discarded[0]);
  const tailNonZero = /[1-9]/.test(discarded.slice(1));
  const halfComparison = first > 5 || (first === 5 && tailNonZero) ? 1 : first === 5 ? 0 : -1;
  const lastKept = kept.length > 0 ? Number(kept[kept.length - 1]) : 0;

  let increment: boolean;
  switch (policy.mode) {
    case "UP":
      increment = hasRemainder;
      break;
    case "DOWN":
      increment = false;
      break;
    case "CEILING":
      increment = hasRemainder && !negative;
      break;
    case "FLOOR":
      increment = hasRemainder && negative;
      break;
    case "HALF_UP":
      increment = halfComparison >= 0;
      break;
    case "HALF_DOWN":
      increment = halfComparison > 0;
      break;
    case "HALF_EVEN":
      increment = halfComparison > 0 || (halfComparison === 0 && lastKept % 2 === 1);
      break;
  }

  const magnitude = BigInt(kept || "0") + (increment ? 1n : 0n);
  if (magnitude === 0n) return 0;
  const rounded = Number(`${magnitude}e-${policy.scale}`);
  return negative ? -rounded : rounded;
}

/** Apply an optional policy; identity when none is configured. */
export function applyRounding(value: number, policy: RoundingPolicy | undefined): number {
  return policy ? roundValue(value, policy) : value;
}

export function roundSeries(values: readonly number[], policy: RoundingPolicy | undefined): number[] {
  return values.map((v) => applyRounding(v, policy));
}
