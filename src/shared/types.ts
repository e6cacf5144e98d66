// ── Chart identifiers ──────────────────────────────────────────────

/** Variables charts built from fixed-size subgroups */
export type SubgroupChartType = "XBAR_R" | "XBAR_S" | "R" | "S";

/** Attribute charts built from defect counts */
export type AttributeChartType = "P" | "NP" | "C" | "U";

/** Charts built from one value per observation */
export type IndividualChartType = "INDIVIDUALS" | "MOVING_RANGE" | "MOVING_AVERAGE";

export type ChartType = SubgroupChartType | AttributeChartType | IndividualChartType;

export const CHART_TYPES = [
  "XBAR_R",
  "XBAR_S",
  "R",
  "S",
  "P",
  "NP",
  "C",
  "U",
  "INDIVIDUALS",
  "MOVING_RANGE",
  "MOVING_AVERAGE",
] as const satisfies readonly ChartType[];

export function isSubgroupChart(chartType: ChartType): chartType is SubgroupChartType {
  return chartType === "XBAR_R" || chartType === "XBAR_S" || chartType === "R" || chartType === "S";
}

export function isAttributeChart(chartType: ChartType): chartType is AttributeChartType {
  return chartType === "P" || chartType === "NP" || chartType === "C" || chartType === "U";
}

export function isIndividualChart(chartType: ChartType): chartType is IndividualChartType {
  return chartType === "INDIVIDUALS" || chartType === "MOVING_RANGE" || chartType === "MOVING_AVERAGE";
}

// ── Rounding ───────────────────────────────────────────────────────

export type RoundingMode =
  | "UP"
  | "DOWN"
  | "CEILING"
  | "FLOOR"
  | "HALF_UP"
  | "HALF_DOWN"
  | "HALF_EVEN";

export interface RoundingPolicy {
  /** Number of decimal places kept */
  scale: number;
  mode: RoundingMode;
}

// ── Samples ────────────────────────────────────────────────────────

/** Defect tally for one inspected group (P, NP, C, U charts) */
export interface AttributeCount {
  defects: number;
  /** Items inspected (P, NP) or inspection units (U) */
  size?: number;
}

export type Sample = number | readonly number[] | AttributeCount;

// ── Derived values (one per accepted sample) ───────────────────────

export type DerivedValue =
  | { chartType: "XBAR_R"; value: number; mean: number; range: number }
  | { chartType: "XBAR_S"; value: number; mean: number; stdDev: number }
  | { chartType: "R"; value: number; range: number }
  | { chartType: "S"; value: number; stdDev: number }
  | { chartType: "P"; value: number; proportion: number; size: number }
  | { chartType: "NP"; value: number; count: number; proportion: number; size: number }
  | { chartType: "C"; value: number; count: number }
  | { chartType: "U"; value: number; count: number; rate: number; size: number }
  | { chartType: "INDIVIDUALS"; value: number }
  | { chartType: "MOVING_RANGE"; value: number | null; movingRange: number | null }
  | { chartType: "MOVING_AVERAGE"; value: number | null; movingAverage: number | null };

/** Center line and control limits, scalar plus per-point */
export interface ChartLimits {
  cl: number;
  ucl: number;
  lcl: number;
  /** Standard error of the plotted statistic at the scalar limits */
  sigma: number;
  /** Estimated standard deviation of the underlying process */
  processSigma: number;
  /** Plotted statistic, one entry per plotted point */
  points: number[];
  uclSeries: number[];
  lclSeries: number[];
  /** Standard error of each plotted point (varies with group size on P/U) */
  sigmaSeries: number[];
}

// ── Rules ──────────────────────────────────────────────────────────

export type SpcRule =
  | { kind: "RULE_1_BEYOND_3_SIGMA"; count: number; sigma: number }
  | { kind: "RULE_2_OF_3_BEYOND_2_SIGMA"; count: number; window: number; sigma: number }
  | { kind: "RULE_4_OF_5_BEYOND_1_SIGMA"; count: number; window: number; sigma: number }
  | { kind: "RULE_6_POINTS_UP_OR_DOWN"; window: number }
  | { kind: "RULE_8_POINTS_ABOVE_OR_BELOW_CENTER"; window: number }
  | { kind: "RULE_9_POINTS_ON_SAME_SIDE_OF_CENTER"; window: number }
  | { kind: "RULE_14_POINTS_OSCILLATING"; window: number }
  | { kind: "RULE_15_POINTS_WITHIN_1_SIGMA"; window: number; sigma: number };

export type SpcRuleKind = SpcRule["kind"];

/** A point expressed in sigma units from the center line */
export interface StandardizedPoint {
  index: number;
  sigmaDistance: number;
}

/** Evidence for one out-of-control signal */
export interface RuleViolation {
  rule: SpcRuleKind;
  windowEndIndex: number;
  pointIndices: number[];
}

export interface RuleValidationResult {
  rule: SpcRule;
  description: string;
  violations: RuleViolation[];
  passed: boolean;
}

// ── Summaries ──────────────────────────────────────────────────────

/** Descriptive statistics of a chart's plotted series */
export interface SeriesSummary {
  count: number;
  average: number;
  median: number;
  min: number;
  max: number;
  range: number;
  /** Sample standard deviation (n − 1) */
  stdDev: number;
}
