/**
 * SpcMonitor: streaming front end for one monitored characteristic.
 *
 * Feeds each sample into a ChartEngine, re-runs the configured rules over
 * the whole plotted series, and reports the signals whose window closes at
 * the new point.
 */

import { ChartEngine } from "../engines/engine.js";
import { westernElectricRules, validateRule } from "../rules/rules.js";
import { loadSpcConfig } from "../shared/config.js";
import type { LogLevel, SpcConfig } from "../shared/config.js";
import type { ChartType, DerivedValue, RuleValidationResult, RuleViolation, Sample, SpcRule } from "../shared/types.js";

export interface SpcMonitorOptions {
  /** Name of the monitored process parameter, used in logs */
  characteristic: string;
  chartType: ChartType;
  subgroupSize: number;
  span?: number;
  /** Defaults to the four Western Electric rules */
  rules?: SpcRule[];
  /** Defaults to loadSpcConfig() */
  config?: SpcConfig;
}

export interface IngestResult {
  derived: DerivedValue;
  /** Index of the new plotted point, or null when the sample produced none yet */
  pointIndex: number | null;
  /** Violations whose window ends at the new point */
  signals: RuleViolation[];
}

const LEVEL_ORDER: Record<LogLevel, number> = { silent: 0, info: 1, debug: 2 };

export class SpcMonitor {
  readonly characteristic: string;
  readonly engine: ChartEngine;
  readonly rules: readonly SpcRule[];
  private logLevel: LogLevel;

  constructor(options: SpcMonitorOptions) {
    const config = options.config ?? loadSpcConfig();
    this.characteristic = options.characteristic;
    this.logLevel = config.logLevel;
    this.rules = (options.rules ?? westernElectricRules()).map(validateRule);
    this.engine = new ChartEngine({
      chartType: options.chartType,
      subgroupSize: options.subgroupSize,
      span: options.span,
      groupCountLimit: config.groupCountLimit,
      rounding: config.rounding,
      sigmaMultiple: config.sigmaMultiple,
    });
  }

  /**
   * Add one sample and report the signals it closes. A rejected sample
   * throws SpcError and leaves the monitor unchanged.
   */
  ingest(sample: Sample): IngestResult {
    const evictedBefore = this.engine.evictedCount;
    const derived = this.engine.addData(sample);

    if (this.engine.evictedCount > evictedBefore) {
      this.log("debug", `  · ${this.characteristic}: group count limit ${this.engine.groupCountLimit} reached, oldest observation evicted`);
    }

    const results = this.evaluate();

    if (derived.value === null) {
      this.log("debug", `  · ${this.characteristic}: waiting for ${this.engine.span} values before the first point`);
      return { derived, pointIndex: null, signals: [] };
    }

    const pointIndex = this.engine.points().length - 1;
    const closing = results.flatMap((result) =>
      result.violations.filter((v) => v.windowEndIndex === pointIndex).map((violation) => ({ result, violation })),
    );

    this.log(
      "debug",
      `  · ${this.characteristic} point ${pointIndex}: ${derived.value} ` +
        `(CL ${this.engine.cl()}, UCL ${this.engine.ucl()}, LCL ${this.engine.lcl()})`,
    );
    for (const { result, violation } of closing) {
      this.log("info", `  ⚠ ${this.characteristic}: ${violation.rule} at point ${pointIndex} (${result.description})`);
    }

    return { derived, pointIndex, signals: closing.map((c) => c.violation) };
  }

  /** Evaluate every configured rule over the full plotted series. */
  evaluate(): RuleValidationResult[] {
    return this.engine.applyRuleValidation(this.rules);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string): void {
    if (LEVEL_ORDER[this.logLevel] >= LEVEL_ORDER[level]) console.log(message);
  }
}
