import { z } from "zod";
import { max, mean, min, range, stdDev } from "../analytics/stats.js";
import { SpcError, formatZodIssues } from "../shared/errors.js";
import type { AttributeChartType, ChartType, Sample } from "../shared/types.js";
import { isAttributeChart, isSubgroupChart } from "../shared/types.js";

// ── History entries ────────────────────────────────────────────────

/** Summary of one accepted subgroup (Xbar-R, Xbar-S, R, S) */
export interface SubgroupEntry {
  kind: "subgroup";
  mean: number;
  range: number;
  stdDev: number;
  min: number;
  max: number;
}

/** Defects found in one inspected group (P, NP, C, U) */
export interface AttributeEntry {
  kind: "attribute";
  defects: number;
  size: number;
}

/** One raw observation (Individuals, Moving Range, Moving Average) */
export interface IndividualEntry {
  kind: "individual";
  value: number;
}

export type HistoryEntry = SubgroupEntry | AttributeEntry | IndividualEntry;

export function isSubgroupEntry(e: HistoryEntry): e is SubgroupEntry {
  return e.kind === "subgroup";
}

export function isAttributeEntry(e: HistoryEntry): e is AttributeEntry {
  return e.kind === "attribute";
}

export function isIndividualEntry(e: HistoryEntry): e is IndividualEntry {
  return e.kind === "individual";
}

// ── Schemas ────────────────────────────────────────────────────────

const MeasurementSchema = z.number().finite();

const SubgroupSchema = z.array(MeasurementSchema);

const IndividualSchema = z.union([MeasurementSchema, z.array(MeasurementSchema)]);

const AttributeCountSchema = z.union([
  z.number().finite().nonnegative(),
  z.object({
    defects: z.number().finite().nonnegative(),
    size: z.number().finite().positive().optional(),
  }),
]);

function invalidSample(chartType: ChartType, error: z.ZodError): SpcError {
  const issues = formatZodIssues(error);
  return new SpcError("INVALID_SAMPLE", `${chartType} sample rejected: ${issues.join("; ")}`, {
    chartType,
    issues,
  });
}

// ── Parsing ────────────────────────────────────────────────────────

/**
 * Validate a raw sample for the given chart and reduce it to the entry the
 * engine keeps in its history. Throws SpcError without side effects.
 */
export function parseSample(chartType: ChartType, sample: Sample, subgroupSize: number): HistoryEntry {
  if (isSubgroupChart(chartType)) return parseSubgroup(chartType, sample, subgroupSize);
  if (isAttributeChart(chartType)) return parseAttribute(chartType, sample, subgroupSize);
  return parseIndividual(chartType, sample);
}

function parseSubgroup(chartType: ChartType, sample: Sample, subgroupSize: number): SubgroupEntry {
  if (Array.isArray(sample) && sample.length === 0) {
    throw new SpcError("EMPTY_SAMPLE", `${chartType} subgroup is empty`, { chartType });
  }
  const parsed = SubgroupSchema.safeParse(sample);
  if (!parsed.success) throw invalidSample(chartType, parsed.error);

  const values = parsed.data;
  if (values.length !== subgroupSize) {
    throw new SpcError(
      "SAMPLE_SIZE_MISMATCH",
      `${chartType} subgroup has ${values.length} values, expected ${subgroupSize}`,
      { chartType, expected: subgroupSize, actual: values.length },
    );
  }

  return {
    kind: "subgroup",
    mean: mean(values),
    range: range(values),
    stdDev: stdDev(values),
    min: min(values),
    max: max(values),
  };
}

function parseAttribute(chartType: AttributeChartType, sample: Sample, subgroupSize: number): AttributeEntry {
  const parsed = AttributeCountSchema.safeParse(sample);
  if (!parsed.success) throw invalidSample(chartType, parsed.error);

  const defects = typeof parsed.data === "number" ? parsed.data : parsed.data.defects;
  const size = typeof parsed.data === "number" ? subgroupSize : parsed.data.size ?? subgroupSize;

  // NP and C charts assume every group has the same inspection size
  if ((chartType === "NP" || chartType === "C") && size !== subgroupSize) {
    throw new SpcError(
      "INVALID_CONFIGURATION",
      `${chartType} chart requires a constant size of ${subgroupSize}, got ${size}`,
      { chartType, expected: subgroupSize, actual: size },
    );
  }

  if (chartType === "P" || chartType === "NP") {
    if (!Number.isInteger(defects) || !Number.isInteger(size)) {
      throw new SpcError("INVALID_SAMPLE", `${chartType} defects and size must be whole numbers`, {
        chartType,
        defects,
        size,
      });
    }
    if (defects > size) {
      throw new SpcError("INVALID_SAMPLE", `${chartType} defects (${defects}) exceed group size (${size})`, {
        chartType,
        defects,
        size,
      });
    }
  } else if (!Number.isInteger(defects)) {
    // U sizes may be fractional inspection units; counts never are
    throw new SpcError("INVALID_SAMPLE", `${chartType} defects must be a whole number, got ${defects}`, {
      chartType,
      defects,
    });
  }

  return { kind: "attribute", defects, size };
}

function parseIndividual(chartType: ChartType, sample: Sample): IndividualEntry {
  const parsed = IndividualSchema.safeParse(sample);
  if (!parsed.success) throw invalidSample(chartType, parsed.error);

  if (typeof parsed.data === "number") return { kind: "individual", value: parsed.data };

  if (parsed.data.length === 0) {
    throw new SpcError("EMPTY_SAMPLE", `${chartType} sample is empty`, { chartType });
  }
  if (parsed.data.length !== 1) {
    throw new SpcError(
      "SAMPLE_SIZE_MISMATCH",
      `${chartType} takes one value per sample, got ${parsed.data.length}`,
      { chartType, expected: 1, actual: parsed.data.length },
    );
  }
  return { kind: "individual", value: parsed.data[0] };
}
