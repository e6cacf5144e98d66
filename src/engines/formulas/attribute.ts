import { mean, sum } from "../../analytics/stats.js";
import type { ChartLimits } from "../../shared/types.js";
import type { AttributeEntry } from "../samples.js";
import { emptyLimits, symmetricLimits } from "./common.js";
import type { LimitContext } from "./common.js";

/**
 * Limits for a rate chart whose standard error depends on each group's size
 * (P, U). Every point gets its own limits; the scalar limits use the mean
 * group size.
 */
function steppedLimits(params: {
  cl: number;
  processSigma: number;
  points: number[];
  sizes: number[];
  sigmaMultiple: number;
  standardError: (size: number) => number;
}): ChartLimits {
  const { cl, processSigma, points, sizes, sigmaMultiple, standardError } = params;
  const k = sigmaMultiple;

  const sigmaSeries = sizes.map(standardError);
  const uclSeries = sigmaSeries.map((s) => cl + k * s);
  const lclSeries = sigmaSeries.map((s) => Math.max(0, cl - k * s));

  const sigma = standardError(mean(sizes));
  return {
    cl,
    ucl: cl + k * sigma,
    lcl: Math.max(0, cl - k * sigma),
    sigma,
    processSigma,
    points,
    uclSeries,
    lclSeries,
    sigmaSeries,
  };
}

/**
 * P chart: fraction defective, p̄ = Σd / Σn, limits p̄ ± k·√(p̄(1−p̄)/nᵢ).
 */
export function pLimits(entries: readonly AttributeEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const pBar = sum(entries.map((e) => e.defects)) / sum(entries.map((e) => e.size));
  const spread = pBar * (1 - pBar);
  return steppedLimits({
    cl: pBar,
    processSigma: Math.sqrt(spread),
    points: entries.map((e) => e.defects / e.size),
    sizes: entries.map((e) => e.size),
    sigmaMultiple: ctx.sigmaMultiple,
    standardError: (n) => Math.sqrt(spread / n),
  });
}

/**
 * NP chart: number defective with constant n, CL = n·p̄, limits
 * CL ± k·√(n·p̄(1−p̄)).
 */
export function npLimits(entries: readonly AttributeEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const n = ctx.subgroupSize;
  const counts = entries.map((e) => e.defects);
  const pBar = sum(counts) / (entries.length * n);
  const cl = n * pBar;
  return symmetricLimits({
    cl,
    sigma: Math.sqrt(cl * (1 - pBar)),
    processSigma: Math.sqrt(pBar * (1 - pBar)),
    points: counts,
    sigmaMultiple: ctx.sigmaMultiple,
    floorAtZero: true,
  });
}

/** C chart: defects per group, limits c̄ ± k·√c̄. */
export function cLimits(entries: readonly AttributeEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const counts = entries.map((e) => e.defects);
  const cBar = mean(counts);
  return symmetricLimits({
    cl: cBar,
    sigma: Math.sqrt(cBar),
    processSigma: Math.sqrt(cBar),
    points: counts,
    sigmaMultiple: ctx.sigmaMultiple,
    floorAtZero: true,
  });
}

/**
 * U chart: defects per inspection unit, ū = Σc / Σn, limits ū ± k·√(ū/nᵢ).
 */
export function uLimits(entries: readonly AttributeEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const uBar = sum(entries.map((e) => e.defects)) / sum(entries.map((e) => e.size));
  return steppedLimits({
    cl: uBar,
    processSigma: Math.sqrt(uBar),
    points: entries.map((e) => e.defects / e.size),
    sizes: entries.map((e) => e.size),
    sigmaMultiple: ctx.sigmaMultiple,
    standardError: (n) => Math.sqrt(uBar / n),
  });
}
