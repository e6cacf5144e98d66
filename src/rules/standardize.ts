import type { ChartLimits, StandardizedPoint } from "../shared/types.js";

/**
 * Express each plotted point as a distance from the center line in units of
 * that point's standard error. A zero standard error puts points on the
 * center line at 0 and every other point at ±Infinity.
 */
export function standardize(
  limits: Pick<ChartLimits, "cl" | "points" | "sigmaSeries">,
): StandardizedPoint[] {
  return limits.points.map((value, index) => {
    const deviation = value - limits.cl;
    const sigma = limits.sigmaSeries[index];
    let sigmaDistance: number;
    if (sigma > 0) {
      sigmaDistance = deviation / sigma;
    } else if (deviation === 0) {
      sigmaDistance = 0;
    } else {
      sigmaDistance = deviation > 0 ? Infinity : -Infinity;
    }
    return { index, sigmaDistance };
  });
}

/** Just the sigma distances, in point order. */
export function sigmaDistances(limits: Pick<ChartLimits, "cl" | "points" | "sigmaSeries">): number[] {
  return standardize(limits).map((p) => p.sigmaDistance);
}
