import { SpcError } from "../shared/errors.js";

/**
 * Descriptive statistics over plain number arrays.
 * Empty input yields NaN rather than 0 so that an absent statistic is never
 * mistaken for a measured zero.
 */

/**
 * Arithmetic mean, summed left to right.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/** Sum of (v − mean)^order over the values. */
function centralSum(values: readonly number[], order: number): number {
  const avg = mean(values);
  return values.reduce((acc, v) => acc + (v - avg) ** order, 0);
}

/**
 * Sample variance (n − 1 denominator).
 * A single value has no spread, so it yields 0.
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  if (values.length === 1) return 0;
  return centralSum(values, 2) / (values.length - 1);
}

export function stdDev(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

/** Population variance (n denominator). */
export function populationVariance(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return centralSum(values, 2) / values.length;
}

export function populationStdDev(values: readonly number[]): number {
  return Math.sqrt(populationVariance(values));
}

export function min(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => (b < a ? b : a));
}

export function max(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => (b > a ? b : a));
}

/**
 * Calculate range (max − min).
 */
export function range(values: readonly number[]): number {
  return max(values) - min(values);
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/** Smallest magnitude, as a non-negative number. */
export function absMin(values: readonly number[]): number {
  return min(values.map(Math.abs));
}

export function absMax(values: readonly number[]): number {
  return max(values.map(Math.abs));
}

/** exp of the mean log. A negative value gives NaN, a zero gives 0. */
export function geometricMean(values: readonly number[]): number {
  return Math.exp(mean(values.map(Math.log)));
}

/** n / Σ(1/v). NaN when any value is negative. */
export function harmonicMean(values: readonly number[]): number {
  if (values.length === 0 || values.some((v) => v < 0)) return NaN;
  return values.length / values.reduce((acc, v) => acc + 1 / v, 0);
}

/** Root mean square. */
export function quadraticMean(values: readonly number[]): number {
  return Math.sqrt(mean(values.map((v) => v * v)));
}

/**
 * Population skewness m3 / m2^1.5. NaN for empty or constant input.
 */
export function skewness(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const m2 = centralSum(values, 2) / values.length;
  const m3 = centralSum(values, 3) / values.length;
  return m3 / m2 ** 1.5;
}

/**
 * Excess kurtosis m4 / m2² − 3, so a normal distribution scores 0.
 */
export function kurtosis(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const m2 = centralSum(values, 2) / values.length;
  const m4 = centralSum(values, 4) / values.length;
  return m4 / (m2 * m2) - 3;
}

function pairedLength(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length) {
    throw new SpcError("SAMPLE_SIZE_MISMATCH", `Paired series differ in length: ${x.length} and ${y.length}`, {
      xLength: x.length,
      yLength: y.length,
    });
  }
  return x.length;
}

function comoment(x: readonly number[], y: readonly number[]): number {
  const mx = mean(x);
  const my = mean(y);
  return x.reduce((acc, xi, i) => acc + (xi - mx) * (y[i] - my), 0);
}

/** Sample covariance (n − 1). NaN below two pairs. */
export function covariance(x: readonly number[], y: readonly number[]): number {
  const n = pairedLength(x, y);
  if (n < 2) return NaN;
  return comoment(x, y) / (n - 1);
}

export function populationCovariance(x: readonly number[], y: readonly number[]): number {
  const n = pairedLength(x, y);
  if (n === 0) return NaN;
  return comoment(x, y) / n;
}

/**
 * Least-squares slope of a line through the origin, Σxy / Σx².
 * When every x is 0 the best constant, mean(y), is returned instead.
 */
export function slope(x: readonly number[], y: readonly number[]): number {
  pairedLength(x, y);
  const sxx = x.reduce((acc, xi) => acc + xi * xi, 0);
  if (sxx === 0) return mean(y);
  return x.reduce((acc, xi, i) => acc + xi * y[i], 0) / sxx;
}
