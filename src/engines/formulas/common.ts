import type { ChartLimits } from "../../shared/types.js";

export const DEFAULT_SIGMA_MULTIPLE = 3;

export interface LimitContext {
  /** Subgroup size (variables charts) or default inspection size (attribute charts) */
  subgroupSize: number;
  /** Moving range span / moving average window (individual-value charts) */
  span: number;
  sigmaMultiple: number;
}

/** Limits of a chart with no plotted point yet. */
export function emptyLimits(): ChartLimits {
  return {
    cl: NaN,
    ucl: NaN,
    lcl: NaN,
    sigma: NaN,
    processSigma: NaN,
    points: [],
    uclSeries: [],
    lclSeries: [],
    sigmaSeries: [],
  };
}

/**
 * Limits that are the same for every plotted point: cl ± k·sigma,
 * with the lower limit optionally floored at zero.
 */
export function symmetricLimits(params: {
  cl: number;
  sigma: number;
  processSigma: number;
  points: number[];
  sigmaMultiple: number;
  floorAtZero?: boolean;
}): ChartLimits {
  const { cl, sigma, processSigma, points, sigmaMultiple } = params;
  const ucl = cl + sigmaMultiple * sigma;
  const rawLcl = cl - sigmaMultiple * sigma;
  const lcl = params.floorAtZero ? Math.max(0, rawLcl) : rawLcl;
  return {
    cl,
    ucl,
    lcl,
    sigma,
    processSigma,
    points,
    uclSeries: points.map(() => ucl),
    lclSeries: points.map(() => lcl),
    sigmaSeries: points.map(() => sigma),
  };
}

/**
 * Limits for a non-negative statistic (range, standard deviation) charted
 * with published factor pairs such as D3/D4 or B3/B4.
 *
 * At the default 3-sigma multiple the published factors are used as is.
 * Any other multiple scales the upper factor's excess over one, since
 * upper − 1 = 3·(sigma of the statistic)/(its mean).
 */
export function factorLimits(params: {
  center: number;
  upperFactor: number;
  lowerFactor: number;
  processSigma: number;
  points: number[];
  sigmaMultiple: number;
}): ChartLimits {
  const { center, upperFactor, lowerFactor, processSigma, points, sigmaMultiple } = params;
  const sigma = (center * (upperFactor - 1)) / DEFAULT_SIGMA_MULTIPLE;

  let ucl: number;
  let lcl: number;
  if (sigmaMultiple === DEFAULT_SIGMA_MULTIPLE) {
    ucl = upperFactor * center;
    lcl = lowerFactor * center;
  } else {
    ucl = center + sigmaMultiple * sigma;
    lcl = Math.max(0, center - sigmaMultiple * sigma);
  }

  return {
    cl: center,
    ucl,
    lcl,
    sigma,
    processSigma,
    points,
    uclSeries: points.map(() => ucl),
    lclSeries: points.map(() => lcl),
    sigmaSeries: points.map(() => sigma),
  };
}
