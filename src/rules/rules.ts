import { z } from "zod";
import { fromZodError } from "../shared/errors.js";
import type { SpcRule } from "../shared/types.js";

// ── Builders (canonical Western Electric / Nelson defaults) ────────

/** `count` consecutive points beyond `sigma`, on either side. */
export function rule1Beyond3Sigma(count = 1, sigma = 3): SpcRule {
  return { kind: "RULE_1_BEYOND_3_SIGMA", count, sigma };
}

/** `count` out of `window` consecutive points beyond `sigma`, same side. */
export function rule2Of3Beyond2Sigma(count = 2, window = 3, sigma = 2): SpcRule {
  return { kind: "RULE_2_OF_3_BEYOND_2_SIGMA", count, window, sigma };
}

export function rule4Of5Beyond1Sigma(count = 4, window = 5, sigma = 1): SpcRule {
  return { kind: "RULE_4_OF_5_BEYOND_1_SIGMA", count, window, sigma };
}

/** `window` consecutive points strictly rising or strictly falling. */
export function rule6PointsUpOrDown(window = 6): SpcRule {
  return { kind: "RULE_6_POINTS_UP_OR_DOWN", window };
}

export function rule8PointsAboveOrBelowCenter(window = 8): SpcRule {
  return { kind: "RULE_8_POINTS_ABOVE_OR_BELOW_CENTER", window };
}

export function rule9PointsOnSameSideOfCenter(window = 9): SpcRule {
  return { kind: "RULE_9_POINTS_ON_SAME_SIDE_OF_CENTER", window };
}

/** `window` consecutive points whose side of the center line flips every step. */
export function rule14PointsOscillating(window = 14): SpcRule {
  return { kind: "RULE_14_POINTS_OSCILLATING", window };
}

/** `window` consecutive points all closer than `sigma` to the center line. */
export function rule15PointsWithin1Sigma(window = 15, sigma = 1): SpcRule {
  return { kind: "RULE_15_POINTS_WITHIN_1_SIGMA", window, sigma };
}

/** The four Western Electric zone rules (kinds 1, 2, 4 and 8). */
export function westernElectricRules(): SpcRule[] {
  return [rule1Beyond3Sigma(), rule2Of3Beyond2Sigma(), rule4Of5Beyond1Sigma(), rule8PointsAboveOrBelowCenter()];
}

/** The eight Nelson-style rules with their default parameters. */
export function nelsonRules(): SpcRule[] {
  return [
    rule1Beyond3Sigma(),
    rule9PointsOnSameSideOfCenter(),
    rule6PointsUpOrDown(),
    rule14PointsOscillating(),
    rule2Of3Beyond2Sigma(),
    rule4Of5Beyond1Sigma(),
    rule15PointsWithin1Sigma(),
    rule8PointsAboveOrBelowCenter(),
  ];
}

// ── Validation ─────────────────────────────────────────────────────

const Window = z.number().int().min(1);
const Sigma = z.number().finite().positive();

export const SpcRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("RULE_1_BEYOND_3_SIGMA"), count: Window, sigma: Sigma }),
  z.object({ kind: z.literal("RULE_2_OF_3_BEYOND_2_SIGMA"), count: Window, window: Window, sigma: Sigma }),
  z.object({ kind: z.literal("RULE_4_OF_5_BEYOND_1_SIGMA"), count: Window, window: Window, sigma: Sigma }),
  z.object({ kind: z.literal("RULE_6_POINTS_UP_OR_DOWN"), window: Window.min(2) }),
  z.object({ kind: z.literal("RULE_8_POINTS_ABOVE_OR_BELOW_CENTER"), window: Window }),
  z.object({ kind: z.literal("RULE_9_POINTS_ON_SAME_SIDE_OF_CENTER"), window: Window }),
  z.object({ kind: z.literal("RULE_14_POINTS_OSCILLATING"), window: Window.min(2) }),
  z.object({ kind: z.literal("RULE_15_POINTS_WITHIN_1_SIGMA"), window: Window, sigma: Sigma }),
]).superRefine((rule, ctx) => {
  if ("window" in rule && "count" in rule && rule.count > rule.window) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["count"],
      message: `count (${rule.count}) must not exceed window (${rule.window})`,
    });
  }
});

/**
 * Check a rule's parameters. Throws INVALID_CONFIGURATION for a window
 * below its minimum, a trigger count larger than the window, or a
 * non-positive sigma.
 */
export function validateRule(rule: SpcRule): SpcRule {
  const parsed = SpcRuleSchema.safeParse(rule);
  if (!parsed.success) {
    throw fromZodError("INVALID_CONFIGURATION", `Invalid rule ${rule.kind}`, parsed.error);
  }
  return parsed.data;
}

// ── Descriptions ───────────────────────────────────────────────────

export function describeRule(rule: SpcRule): string {
  switch (rule.kind) {
    case "RULE_1_BEYOND_3_SIGMA":
      return rule.count === 1
        ? `1 point beyond ${rule.sigma} sigma from the center line`
        : `${rule.count} consecutive points beyond ${rule.sigma} sigma from the center line`;
    case "RULE_2_OF_3_BEYOND_2_SIGMA":
    case "RULE_4_OF_5_BEYOND_1_SIGMA":
      return `${rule.count} out of ${rule.window} consecutive points beyond ${rule.sigma} sigma on the same side`;
    case "RULE_6_POINTS_UP_OR_DOWN":
      return `${rule.window} consecutive points continuously rising or falling`;
    case "RULE_8_POINTS_ABOVE_OR_BELOW_CENTER":
    case "RULE_9_POINTS_ON_SAME_SIDE_OF_CENTER":
      return `${rule.window} consecutive points on the same side of the center line`;
    case "RULE_14_POINTS_OSCILLATING":
      return `${rule.window} consecutive points alternating above and below the center line`;
    case "RULE_15_POINTS_WITHIN_1_SIGMA":
      return `${rule.window} consecutive points within ${rule.sigma} sigma of the center line`;
  }
}
