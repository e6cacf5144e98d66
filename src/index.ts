/**
 * SPC Chart Engine: Barrel Export
 */

export type {
  ChartType,
  SubgroupChartType,
  AttributeChartType,
  IndividualChartType,
  RoundingMode,
  RoundingPolicy,
  AttributeCount,
  Sample,
  DerivedValue,
  ChartLimits,
  SpcRule,
  SpcRuleKind,
  StandardizedPoint,
  RuleViolation,
  RuleValidationResult,
  SeriesSummary,
} from "./shared/types.js";
export { CHART_TYPES, isSubgroupChart, isAttributeChart, isIndividualChart } from "./shared/types.js";

export {
  mean,
  median,
  min,
  max,
  range,
  sum,
  variance,
  stdDev,
  populationVariance,
  populationStdDev,
  absMin,
  absMax,
  geometricMean,
  harmonicMean,
  quadraticMean,
  skewness,
  kurtosis,
  covariance,
  populationCovariance,
  slope,
} from "./analytics/stats.js";

export { SpcError, isSpcError } from "./shared/errors.js";
export type { SpcErrorCode } from "./shared/errors.js";

export { loadSpcConfig, parseLogLevel } from "./shared/config.js";
export type { SpcConfig, LogLevel } from "./shared/config.js";

export { createRoundingPolicy, parseRoundingMode, roundValue, applyRounding } from "./rounding/rounding.js";

export { getControlConstants, supportedSubgroupSizes, isSupportedSubgroupSize } from "./constants/control_constants.js";
export type { ControlConstants } from "./constants/control_constants.js";

export { ChartEngine, createChartEngine, DEFAULT_SPAN } from "./engines/engine.js";
export type { ChartEngineOptions } from "./engines/engine.js";
export { computeLimits } from "./engines/limits.js";

export {
  rule1Beyond3Sigma,
  rule2Of3Beyond2Sigma,
  rule4Of5Beyond1Sigma,
  rule6PointsUpOrDown,
  rule8PointsAboveOrBelowCenter,
  rule9PointsOnSameSideOfCenter,
  rule14PointsOscillating,
  rule15PointsWithin1Sigma,
  westernElectricRules,
  nelsonRules,
  validateRule,
  describeRule,
} from "./rules/rules.js";
export { applyRuleValidation, evaluateRule } from "./rules/evaluate.js";
export { standardize, sigmaDistances } from "./rules/standardize.js";

export { SpcMonitor } from "./monitor/monitor.js";
export type { SpcMonitorOptions, IngestResult } from "./monitor/monitor.js";
