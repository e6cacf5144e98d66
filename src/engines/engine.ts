import { z } from "zod";
import { max, mean, median, min, range, stdDev } from "../analytics/stats.js";
import { isSupportedSubgroupSize, supportedSubgroupSizes } from "../constants/control_constants.js";
import { applyRounding, RoundingPolicySchema, roundSeries } from "../rounding/rounding.js";
import { applyRuleValidation } from "../rules/evaluate.js";
import { standardize } from "../rules/standardize.js";
import { SpcError, fromZodError } from "../shared/errors.js";
import type {
  ChartLimits,
  ChartType,
  DerivedValue,
  RoundingPolicy,
  RuleValidationResult,
  Sample,
  SeriesSummary,
  SpcRule,
  StandardizedPoint,
} from "../shared/types.js";
import { CHART_TYPES, isIndividualChart, isSubgroupChart } from "../shared/types.js";
import { DEFAULT_SIGMA_MULTIPLE } from "./formulas/common.js";
import { movingAverages, movingRanges } from "./formulas/individual.js";
import { RingBuffer } from "./history.js";
import { computeLimits } from "./limits.js";
import { isAttributeEntry, isIndividualEntry, isSubgroupEntry, parseSample } from "./samples.js";
import type { AttributeEntry, HistoryEntry, SubgroupEntry } from "./samples.js";

export const DEFAULT_SPAN = 2;

export interface ChartEngineOptions {
  chartType: ChartType;
  /**
   * Measurements per subgroup (Xbar/R/S), items or units inspected per group
   * (P/NP/C/U; the default when a sample omits its size), or 1 for
   * individual-value charts.
   */
  subgroupSize: number;
  /** Moving range span or moving average window (individual-value charts only) */
  span?: number;
  /** Oldest groups are evicted once this many are retained */
  groupCountLimit?: number;
  rounding?: RoundingPolicy;
  sigmaMultiple?: number;
}

const ChartEngineOptionsSchema = z.object({
  chartType: z.enum(CHART_TYPES),
  subgroupSize: z.number().int().positive(),
  span: z.number().int().min(2).optional(),
  groupCountLimit: z.number().int().positive().optional(),
  rounding: RoundingPolicySchema.optional(),
  sigmaMultiple: z.number().finite().positive().optional(),
});

function unsupported(what: string, n: number): SpcError {
  const { min, max } = supportedSubgroupSizes();
  return new SpcError(
    "UNSUPPORTED_SUBGROUP_SIZE",
    `No control chart constants for ${what} ${n} (supported: ${min}..${max})`,
    { [what]: n },
  );
}

/**
 * Control chart statistics engine for one monitored characteristic.
 *
 * Samples go in through `addData`; center line, limits and series are
 * recomputed from the retained history on the next read. Stored history is
 * never rounded: the rounding policy applies to values on their way out.
 * Before any plotted point exists, `cl()`, `ucl()` and `lcl()` return NaN.
 */
export class ChartEngine {
  readonly chartType: ChartType;
  readonly subgroupSize: number;
  readonly span: number;
  readonly sigmaMultiple: number;

  private history: RingBuffer<HistoryEntry>;
  private rounding: RoundingPolicy | undefined;
  private cached: ChartLimits | undefined;
  private evicted = 0;
  private limit: number | undefined;

  constructor(options: ChartEngineOptions) {
    const parsed = ChartEngineOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw fromZodError("INVALID_CONFIGURATION", `Invalid ${options.chartType} engine options`, parsed.error);
    }
    const opts = parsed.data;
    const { chartType, subgroupSize } = opts;

    if (isIndividualChart(chartType)) {
      if (subgroupSize !== 1) {
        throw new SpcError(
          "INVALID_CONFIGURATION",
          `${chartType} charts take one value per sample; subgroup size must be 1, got ${subgroupSize}`,
          { chartType, subgroupSize },
        );
      }
      const span = opts.span ?? DEFAULT_SPAN;
      if (!isSupportedSubgroupSize(span)) throw unsupported("span", span);
      this.span = span;
    } else {
      if (opts.span !== undefined) {
        throw new SpcError("INVALID_CONFIGURATION", `span only applies to individual-value charts, not ${chartType}`, {
          chartType,
          span: opts.span,
        });
      }
      if (isSubgroupChart(chartType)) {
        if (subgroupSize === 1) {
          throw new SpcError(
            "INVALID_CONFIGURATION",
            `${chartType} charts need subgroups of at least 2; use INDIVIDUALS for single values`,
            { chartType, subgroupSize },
          );
        }
        if (!isSupportedSubgroupSize(subgroupSize)) throw unsupported("subgroupSize", subgroupSize);
      }
      this.span = 1;
    }

    this.chartType = chartType;
    this.subgroupSize = subgroupSize;
    this.sigmaMultiple = opts.sigmaMultiple ?? DEFAULT_SIGMA_MULTIPLE;
    this.rounding = opts.rounding;
    this.limit = opts.groupCountLimit;
    this.history = new RingBuffer<HistoryEntry>(this.retainedFor(this.limit));
  }

  // ── Configuration ──────────────────────────────────────────────────

  /** Cap on plotted points; moving charts retain span − 1 extra observations to fill the first window. */
  get groupCountLimit(): number | undefined {
    return this.limit;
  }

  get roundingPolicy(): RoundingPolicy | undefined {
    return this.rounding;
  }

  /**
   * Change the retention cap. Excess oldest observations are evicted at once.
   * Returns the number of observations evicted.
   */
  setGroupCountLimit(limit: number | undefined): number {
    const parsed = z.number().int().positive().optional().safeParse(limit);
    if (!parsed.success) throw fromZodError("INVALID_CONFIGURATION", "Invalid groupCountLimit", parsed.error);
    const { buffer, dropped } = this.history.resize(this.retainedFor(limit));
    this.limit = limit;
    this.history = buffer;
    this.evicted += dropped.length;
    if (dropped.length > 0) this.cached = undefined;
    return dropped.length;
  }

  setRounding(policy: RoundingPolicy | undefined): void {
    if (policy !== undefined) {
      const parsed = RoundingPolicySchema.safeParse(policy);
      if (!parsed.success) throw fromZodError("INVALID_CONFIGURATION", "Invalid rounding policy", parsed.error);
    }
    this.rounding = policy;
  }

  // ── Ingestion ──────────────────────────────────────────────────────

  /**
   * Absorb one sample. Validation happens before anything is stored, so a
   * thrown SpcError leaves the engine untouched.
   */
  addData(sample: Sample): DerivedValue {
    const entry = parseSample(this.chartType, sample, this.subgroupSize);
    if (this.history.push(entry) !== undefined) this.evicted++;
    this.cached = undefined;
    return this.derive(entry);
  }

  /** Observations currently retained. */
  get length(): number {
    return this.history.length;
  }

  /** Observations evicted by the cap since construction. */
  get evictedCount(): number {
    return this.evicted;
  }

  /**
   * Offset from a retained observation's position to its plotted point:
   * the first span − 1 observations of a moving chart have no point.
   */
  get pointOffset(): number {
    return this.chartType === "MOVING_RANGE" || this.chartType === "MOVING_AVERAGE" ? this.span - 1 : 0;
  }

  // ── Limits ─────────────────────────────────────────────────────────

  cl(): number {
    return this.round(this.limits().cl);
  }

  ucl(): number {
    return this.round(this.limits().ucl);
  }

  lcl(): number {
    return this.round(this.limits().lcl);
  }

  /** Standard error of the plotted statistic. */
  sigma(): number {
    return this.round(this.limits().sigma);
  }

  /** Estimated process standard deviation (σ̂). */
  processSigma(): number {
    return this.round(this.limits().processSigma);
  }

  /** Rounded copy of every computed value. */
  snapshot(): ChartLimits {
    const l = this.limits();
    return {
      cl: this.round(l.cl),
      ucl: this.round(l.ucl),
      lcl: this.round(l.lcl),
      sigma: this.round(l.sigma),
      processSigma: this.round(l.processSigma),
      points: this.roundAll(l.points),
      uclSeries: this.roundAll(l.uclSeries),
      lclSeries: this.roundAll(l.lclSeries),
      sigmaSeries: this.roundAll(l.sigmaSeries),
    };
  }

  // ── Series ─────────────────────────────────────────────────────────

  /** The plotted statistic, one entry per point. */
  points(): number[] {
    return this.roundAll(this.limits().points);
  }

  uclSeries(): number[] {
    return this.roundAll(this.limits().uclSeries);
  }

  lclSeries(): number[] {
    return this.roundAll(this.limits().lclSeries);
  }

  /** Subgroup means (Xbar/R/S charts). */
  averages(): number[] {
    return this.roundAll(this.subgroups().map((e) => e.mean));
  }

  /** Subgroup ranges (Xbar/R/S charts). */
  ranges(): number[] {
    return this.roundAll(this.subgroups().map((e) => e.range));
  }

  /** Subgroup sample standard deviations (Xbar/R/S charts). */
  stdDevs(): number[] {
    return this.roundAll(this.subgroups().map((e) => e.stdDev));
  }

  minimums(): number[] {
    return this.roundAll(this.subgroups().map((e) => e.min));
  }

  maximums(): number[] {
    return this.roundAll(this.subgroups().map((e) => e.max));
  }

  /** Defect counts (attribute charts). */
  counts(): number[] {
    return this.roundAll(this.attributes().map((e) => e.defects));
  }

  /** Inspection sizes (attribute charts). */
  sizes(): number[] {
    return this.roundAll(this.attributes().map((e) => e.size));
  }

  /** Defects per item or per unit (P and U charts). */
  proportions(): number[] {
    return this.roundAll(this.attributes().map((e) => e.defects / e.size));
  }

  /** Raw observations (individual-value charts). */
  values(): number[] {
    return this.roundAll(this.individuals());
  }

  /** Moving ranges over the configured span (individual-value charts). */
  movingRanges(): number[] {
    return this.roundAll(movingRanges(this.individuals(), this.span));
  }

  /** Moving averages over the configured span (individual-value charts). */
  movingAverages(): number[] {
    return this.roundAll(movingAverages(this.individuals(), this.span));
  }

  /**
   * Descriptive statistics of the plotted series: the raw values on an
   * Individuals chart, the moving ranges or moving averages on the moving
   * charts, the plotted statistic elsewhere. NaN fields until a point exists.
   */
  summary(): SeriesSummary {
    const points = this.limits().points;
    return {
      count: points.length,
      average: this.round(mean(points)),
      median: this.round(median(points)),
      min: this.round(min(points)),
      max: this.round(max(points)),
      range: this.round(range(points)),
      stdDev: this.round(stdDev(points)),
    };
  }

  // ── Rules ──────────────────────────────────────────────────────────

  /** Plotted points in sigma units from the center line (unrounded). */
  standardized(): StandardizedPoint[] {
    return standardize(this.limits());
  }

  applyRuleValidation(rules: readonly SpcRule[]): RuleValidationResult[] {
    return applyRuleValidation(
      this.standardized().map((p) => p.sigmaDistance),
      rules,
    );
  }

  // ── Internals ──────────────────────────────────────────────────────

  private retainedFor(limit: number | undefined): number | undefined {
    return limit === undefined ? undefined : limit + this.pointOffset;
  }

  private limits(): ChartLimits {
    if (!this.cached) {
      this.cached = computeLimits(this.chartType, this.history.toArray(), {
        subgroupSize: this.subgroupSize,
        span: this.span,
        sigmaMultiple: this.sigmaMultiple,
      });
    }
    return this.cached;
  }

  private subgroups(): SubgroupEntry[] {
    return this.history.toArray().filter(isSubgroupEntry);
  }

  private attributes(): AttributeEntry[] {
    return this.history.toArray().filter(isAttributeEntry);
  }

  private individuals(): number[] {
    return this.history
      .toArray()
      .filter(isIndividualEntry)
      .map((e) => e.value);
  }

  private round(value: number): number {
    return applyRounding(value, this.rounding);
  }

  private roundAll(values: readonly number[]): number[] {
    return roundSeries(values, this.rounding);
  }

  /** The most recent `span` observations, or null until that many exist. */
  private latestWindow(): number[] | null {
    const values = this.individuals();
    return values.length >= this.span ? values.slice(values.length - this.span) : null;
  }

  private derive(entry: HistoryEntry): DerivedValue {
    const r = (v: number) => this.round(v);

    if (entry.kind === "subgroup") {
      switch (this.chartType) {
        case "XBAR_R":
          return { chartType: "XBAR_R", value: r(entry.mean), mean: r(entry.mean), range: r(entry.range) };
        case "XBAR_S":
          return { chartType: "XBAR_S", value: r(entry.mean), mean: r(entry.mean), stdDev: r(entry.stdDev) };
        case "R":
          return { chartType: "R", value: r(entry.range), range: r(entry.range) };
        case "S":
          return { chartType: "S", value: r(entry.stdDev), stdDev: r(entry.stdDev) };
      }
    } else if (entry.kind === "attribute") {
      const rate = r(entry.defects / entry.size);
      switch (this.chartType) {
        case "P":
          return { chartType: "P", value: rate, proportion: rate, size: entry.size };
        case "NP":
          return {
            chartType: "NP",
            value: r(entry.defects),
            count: r(entry.defects),
            proportion: rate,
            size: entry.size,
          };
        case "C":
          return { chartType: "C", value: r(entry.defects), count: r(entry.defects) };
        case "U":
          return { chartType: "U", value: rate, count: r(entry.defects), rate, size: entry.size };
      }
    } else {
      const window = this.latestWindow();
      switch (this.chartType) {
        case "INDIVIDUALS":
          return { chartType: "INDIVIDUALS", value: r(entry.value) };
        case "MOVING_RANGE": {
          const movingRange = window ? r(range(window)) : null;
          return { chartType: "MOVING_RANGE", value: movingRange, movingRange };
        }
        case "MOVING_AVERAGE": {
          const movingAverage = window ? r(mean(window)) : null;
          return { chartType: "MOVING_AVERAGE", value: movingAverage, movingAverage };
        }
      }
    }
    throw new SpcError("INVALID_SAMPLE", `Sample does not belong to a ${this.chartType} chart`, {
      chartType: this.chartType,
    });
  }
}

/** Shorthand for `new ChartEngine({ chartType, subgroupSize, ...options })`. */
export function createChartEngine(
  chartType: ChartType,
  subgroupSize: number,
  options: Omit<ChartEngineOptions, "chartType" | "subgroupSize"> = {},
): ChartEngine {
  return new ChartEngine({ chartType, subgroupSize, ...options });
}
