import { describe, it, expect } from "vitest";
import {
  absMax,
  absMin,
  covariance,
  geometricMean,
  harmonicMean,
  kurtosis,
  max,
  mean,
  median,
  min,
  populationCovariance,
  populationStdDev,
  populationVariance,
  quadraticMean,
  range,
  skewness,
  slope,
  stdDev,
  sum,
  variance,
} from "../src/analytics/stats.js";
import { SpcError } from "../src/shared/errors.js";

describe("Statistics", () => {
  it("mean of empty array is NaN", () => {
    expect(mean([])).toBeNaN();
  });

  it("mean calculates correctly", () => {
    expect(mean([1, 2, 3, 4, 5])).toBe(3);
    expect(mean([10, 20, 30])).toBe(20);
  });

  it("stdDev of identical values is 0", () => {
    expect(stdDev([5, 5, 5, 5])).toBe(0);
  });

  it("stdDev of a single value is 0 and of nothing is NaN", () => {
    expect(stdDev([7])).toBe(0);
    expect(stdDev([])).toBeNaN();
  });

  it("stdDev uses the sample (n − 1) denominator", () => {
    // squared deviations from 5 sum to 32; 32 / 7
    const values = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(stdDev(values)).toBeCloseTo(Math.sqrt(32 / 7), 12);
  });

  it("min, max and range", () => {
    expect(min([3, -1, 4])).toBe(-1);
    expect(max([3, -1, 4])).toBe(4);
    expect(range([3, -1, 4])).toBe(5);
    expect(range([])).toBeNaN();
  });

  it("median handles odd and even lengths", () => {
    expect(median([5, 1, 3])).toBe(3);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("sum of empty array is 0", () => {
    expect(sum([])).toBe(0);
    expect(sum([1, 2, 3])).toBe(6);
  });

  it("sample and population variance differ in the denominator", () => {
    expect(variance([1, 2, 3, 4, 5])).toBe(2.5);
    expect(populationVariance([1, 2, 3, 4, 5])).toBe(2);
    expect(populationStdDev([1, 2, 3, 4, 5])).toBe(Math.SQRT2);
    expect(variance([4])).toBe(0);
    expect(populationVariance([])).toBeNaN();
  });

  it("geometric, harmonic and quadratic means", () => {
    expect(geometricMean([1, 2, 4])).toBeCloseTo(2, 12);
    expect(geometricMean([0, 5])).toBe(0);
    expect(geometricMean([-1, 4])).toBeNaN();
    expect(harmonicMean([1, 2, 4])).toBeCloseTo(3 / 1.75, 12);
    expect(harmonicMean([1, -2])).toBeNaN();
    expect(quadraticMean([3, 4])).toBeCloseTo(Math.sqrt(12.5), 12);
    expect(quadraticMean([])).toBeNaN();
  });

  it("skewness and excess kurtosis use population moments", () => {
    expect(skewness([1, 2, 3, 4, 5])).toBe(0);
    expect(skewness([0, 0, 3])).toBeCloseTo(Math.SQRT1_2, 12);
    expect(kurtosis([1, 2, 3, 4, 5])).toBeCloseTo(-1.3, 12);
    expect(skewness([2, 2, 2])).toBeNaN();
  });

  it("covariance, sample and population", () => {
    expect(covariance([1, 2, 3], [2, 4, 6])).toBe(2);
    expect(populationCovariance([1, 2, 3], [2, 4, 6])).toBeCloseTo(4 / 3, 12);
    expect(covariance([1], [2])).toBeNaN();
    expect(populationCovariance([], [])).toBeNaN();
    expect(() => covariance([1, 2], [1])).toThrow(SpcError);
  });

  it("slope through the origin falls back to the mean of y", () => {
    expect(slope([1, 2, 3], [2, 4, 6])).toBe(2);
    expect(slope([0, 0], [3, 5])).toBe(4);
  });

  it("absMin and absMax compare magnitudes", () => {
    expect(absMin([-3, 2, -5])).toBe(2);
    expect(absMax([-3, 2, -5])).toBe(5);
    expect(absMax([])).toBeNaN();
  });
});
