import { mean } from "../../analytics/stats.js";
import { getControlConstants } from "../../constants/control_constants.js";
import type { ChartLimits } from "../../shared/types.js";
import type { SubgroupEntry } from "../samples.js";
import { DEFAULT_SIGMA_MULTIPLE, emptyLimits, factorLimits, symmetricLimits } from "./common.js";
import type { LimitContext } from "./common.js";

/**
 * Xbar-R: CL = mean of subgroup means, limits CL ± A2·R̄.
 */
export function xbarRLimits(entries: readonly SubgroupEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const c = getControlConstants(ctx.subgroupSize);
  const cl = mean(entries.map((e) => e.mean));
  const rBar = mean(entries.map((e) => e.range));
  return symmetricLimits({
    cl,
    // A2·R̄ is the 3-sigma half-width, so one sigma is a third of it
    sigma: (c.A2 * rBar) / DEFAULT_SIGMA_MULTIPLE,
    processSigma: rBar / c.d2,
    points: entries.map((e) => e.mean),
    sigmaMultiple: ctx.sigmaMultiple,
  });
}

/**
 * Xbar-S: CL = mean of subgroup means, limits CL ± A3·S̄.
 */
export function xbarSLimits(entries: readonly SubgroupEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const c = getControlConstants(ctx.subgroupSize);
  const cl = mean(entries.map((e) => e.mean));
  const sBar = mean(entries.map((e) => e.stdDev));
  return symmetricLimits({
    cl,
    sigma: (c.A3 * sBar) / DEFAULT_SIGMA_MULTIPLE,
    processSigma: sBar / c.c4,
    points: entries.map((e) => e.mean),
    sigmaMultiple: ctx.sigmaMultiple,
  });
}

/** R chart: CL = R̄, UCL = D4·R̄, LCL = D3·R̄. */
export function rLimits(entries: readonly SubgroupEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const c = getControlConstants(ctx.subgroupSize);
  const rBar = mean(entries.map((e) => e.range));
  return factorLimits({
    center: rBar,
    upperFactor: c.D4,
    lowerFactor: c.D3,
    processSigma: rBar / c.d2,
    points: entries.map((e) => e.range),
    sigmaMultiple: ctx.sigmaMultiple,
  });
}

/** S chart: CL = S̄, UCL = B4·S̄, LCL = B3·S̄. */
export function sLimits(entries: readonly SubgroupEntry[], ctx: LimitContext): ChartLimits {
  if (entries.length === 0) return emptyLimits();
  const c = getControlConstants(ctx.subgroupSize);
  const sBar = mean(entries.map((e) => e.stdDev));
  return factorLimits({
    center: sBar,
    upperFactor: c.B4,
    lowerFactor: c.B3,
    processSigma: sBar / c.c4,
    points: entries.map((e) => e.stdDev),
    sigmaMultiple: ctx.sigmaMultiple,
  });
}
