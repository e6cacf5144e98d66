import { mean, range } from "../../analytics/stats.js";
import { getControlConstants } from "../../constants/control_constants.js";
import type { ChartLimits } from "../../shared/types.js";
import { DEFAULT_SIGMA_MULTIPLE, emptyLimits, factorLimits, symmetricLimits } from "./common.js";
import type { LimitContext } from "./common.js";

/**
 * Apply `reduce` to every complete window of `span` consecutive values.
 * The first span − 1 values have no window and produce nothing.
 */
export function slidingWindows(
  values: readonly number[],
  span: number,
  reduce: (window: readonly number[]) => number,
): number[] {
  const out: number[] = [];
  for (let end = span - 1; end < values.length; end++) {
    out.push(reduce(values.slice(end - span + 1, end + 1)));
  }
  return out;
}

export function movingRanges(values: readonly number[], span: number): number[] {
  return slidingWindows(values, span, range);
}

export function movingAverages(values: readonly number[], span: number): number[] {
  return slidingWindows(values, span, mean);
}

/**
 * Individuals (X) chart: CL = x̄, σ̂ = MR̄/d2, limits CL ± k·σ̂.
 * With fewer values than the span there is no moving range yet, so σ̂ = 0.
 */
export function individualsLimits(values: readonly number[], ctx: LimitContext): ChartLimits {
  if (values.length === 0) return emptyLimits();
  const c = getControlConstants(ctx.span);
  const ranges = movingRanges(values, ctx.span);
  const sigma = ranges.length > 0 ? mean(ranges) / c.d2 : 0;
  return symmetricLimits({
    cl: mean(values),
    sigma,
    processSigma: sigma,
    points: [...values],
    sigmaMultiple: ctx.sigmaMultiple,
  });
}

/** Moving range chart: CL = MR̄, UCL = D4·MR̄, LCL = D3·MR̄. */
export function movingRangeLimits(values: readonly number[], ctx: LimitContext): ChartLimits {
  const ranges = movingRanges(values, ctx.span);
  if (ranges.length === 0) return emptyLimits();
  const c = getControlConstants(ctx.span);
  const mrBar = mean(ranges);
  return factorLimits({
    center: mrBar,
    upperFactor: c.D4,
    lowerFactor: c.D3,
    processSigma: mrBar / c.d2,
    points: ranges,
    sigmaMultiple: ctx.sigmaMultiple,
  });
}

/**
 * Moving average chart: each complete window of `span` values is charted
 * like an Xbar subgroup. CL = mean of the window means, limits
 * CL ± A2(span)·R̄ where R̄ is the mean window range.
 */
export function movingAverageLimits(values: readonly number[], ctx: LimitContext): ChartLimits {
  const averages = movingAverages(values, ctx.span);
  if (averages.length === 0) return emptyLimits();
  const c = getControlConstants(ctx.span);
  const rBar = mean(movingRanges(values, ctx.span));
  return symmetricLimits({
    cl: mean(averages),
    sigma: (c.A2 * rBar) / DEFAULT_SIGMA_MULTIPLE,
    processSigma: rBar / c.d2,
    points: averages,
    sigmaMultiple: ctx.sigmaMultiple,
  });
}
