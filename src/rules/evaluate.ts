import type { RuleValidationResult, RuleViolation, SpcRule } from "../shared/types.js";
import { describeRule, validateRule } from "./rules.js";

type WindowTest = (window: readonly number[]) => boolean;

const above = (d: number, limit: number) => d > limit;
const below = (d: number, limit: number) => d < -limit;

function isStrictlyIncreasing(window: readonly number[]): boolean {
  for (let i = 1; i < window.length; i++) {
    if (!(window[i] > window[i - 1])) return false;
  }
  return true;
}

function isStrictlyDecreasing(window: readonly number[]): boolean {
  for (let i = 1; i < window.length; i++) {
    if (!(window[i] < window[i - 1])) return false;
  }
  return true;
}

function isAlternatingSides(window: readonly number[]): boolean {
  for (let i = 1; i < window.length; i++) {
    const prev = window[i - 1];
    const cur = window[i];
    if (!((prev > 0 && cur < 0) || (prev < 0 && cur > 0))) return false;
  }
  return true;
}

function allOnOneSide(window: readonly number[]): boolean {
  return window.every((d) => d > 0) || window.every((d) => d < 0);
}

/** Window size and pass/fail test for a validated rule. */
function windowTest(rule: SpcRule): { size: number; test: WindowTest } {
  switch (rule.kind) {
    case "RULE_1_BEYOND_3_SIGMA": {
      const { sigma } = rule;
      return { size: rule.count, test: (w) => w.every((d) => Math.abs(d) > sigma) };
    }
    case "RULE_2_OF_3_BEYOND_2_SIGMA":
    case "RULE_4_OF_5_BEYOND_1_SIGMA": {
      const { count, sigma } = rule;
      return {
        size: rule.window,
        test: (w) =>
          w.filter((d) => above(d, sigma)).length >= count || w.filter((d) => below(d, sigma)).length >= count,
      };
    }
    case "RULE_6_POINTS_UP_OR_DOWN":
      return { size: rule.window, test: (w) => isStrictlyIncreasing(w) || isStrictlyDecreasing(w) };
    case "RULE_8_POINTS_ABOVE_OR_BELOW_CENTER":
    case "RULE_9_POINTS_ON_SAME_SIDE_OF_CENTER":
      return { size: rule.window, test: allOnOneSide };
    case "RULE_14_POINTS_OSCILLATING":
      return { size: rule.window, test: isAlternatingSides };
    case "RULE_15_POINTS_WITHIN_1_SIGMA": {
      const { sigma } = rule;
      return { size: rule.window, test: (w) => w.every((d) => Math.abs(d) < sigma) };
    }
  }
}

/**
 * Slide a rule's window one point at a time across the series and record a
 * violation at the last index of every window that trips it. Overlapping
 * windows each produce their own violation. A series shorter than the
 * window yields none.
 */
export function evaluateRule(sigmaDistances: readonly number[], rule: SpcRule): RuleViolation[] {
  const { size, test } = windowTest(validateRule(rule));
  const violations: RuleViolation[] = [];

  for (let end = size - 1; end < sigmaDistances.length; end++) {
    const start = end - size + 1;
    if (test(sigmaDistances.slice(start, end + 1))) {
      violations.push({
        rule: rule.kind,
        windowEndIndex: end,
        pointIndices: Array.from({ length: size }, (_, i) => start + i),
      });
    }
  }

  return violations;
}

/**
 * Evaluate every rule over a standardized series. Results come back in the
 * order the rules were supplied. Rules are validated up front, so an
 * invalid rule fails the whole call before any rule is evaluated.
 */
export function applyRuleValidation(
  sigmaDistances: readonly number[],
  rules: readonly SpcRule[],
): RuleValidationResult[] {
  const validated = rules.map(validateRule);
  return validated.map((rule) => {
    const violations = evaluateRule(sigmaDistances, rule);
    return {
      rule,
      description: describeRule(rule),
      violations,
      passed: violations.length === 0,
    };
  });
}
