/**
 * Control Chart Constants
 *
 * Factors that turn an average range or average standard deviation into
 * 3-sigma control limits, indexed by subgroup size n = 2..25:
 * - A2, A3:  Xbar limits from R̄ / S̄
 * - d2, c4:  bias corrections (σ̂ = R̄/d2 = S̄/c4)
 * - D3, D4:  R chart limits
 * - B3, B4:  S chart limits
 * - E2:      individuals limits from the average moving range (3/d2)
 */

import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { SpcError, fromZodError } from "../shared/errors.js";

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));
const TABLE_PATH = path.resolve(MODULE_DIR, "..", "..", "data", "control_constants.json");

const FACTOR_NAMES = ["A2", "A3", "d2", "D3", "D4", "B3", "B4", "c4"] as const;

const ConstantsTableSchema = z
  .object({
    minSubgroupSize: z.number().int().min(2),
    maxSubgroupSize: z.number().int(),
    factors: z.object({
      A2: z.array(z.number().nonnegative()),
      A3: z.array(z.number().nonnegative()),
      d2: z.array(z.number().positive()),
      D3: z.array(z.number().nonnegative()),
      D4: z.array(z.number().nonnegative()),
      B3: z.array(z.number().nonnegative()),
      B4: z.array(z.number().nonnegative()),
      c4: z.array(z.number().positive()),
    }),
  })
  .superRefine((table, ctx) => {
    const expected = table.maxSubgroupSize - table.minSubgroupSize + 1;
    for (const name of FACTOR_NAMES) {
      if (table.factors[name].length !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["factors", name],
          message: `expected ${expected} entries, got ${table.factors[name].length}`,
        });
      }
    }
  });

type ConstantsTable = z.infer<typeof ConstantsTableSchema>;

export interface ControlConstants {
  n: number;
  A2: number;
  A3: number;
  d2: number;
  D3: number;
  D4: number;
  B3: number;
  B4: number;
  c4: number;
  E2: number;
}

let cachedTable: ConstantsTable | undefined;
const cachedRows = new Map<number, Readonly<ControlConstants>>();

function loadTable(): ConstantsTable {
  if (cachedTable) return cachedTable;
  const raw: unknown = JSON.parse(readFileSync(TABLE_PATH, "utf-8"));
  const parsed = ConstantsTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw fromZodError("INVALID_CONFIGURATION", `Malformed constants table ${TABLE_PATH}`, parsed.error);
  }
  cachedTable = parsed.data;
  return cachedTable;
}

/** Inclusive range of subgroup sizes with published constants. */
export function supportedSubgroupSizes(): { min: number; max: number } {
  const table = loadTable();
  return { min: table.minSubgroupSize, max: table.maxSubgroupSize };
}

export function isSupportedSubgroupSize(n: number): boolean {
  const { min, max } = supportedSubgroupSizes();
  return Number.isInteger(n) && n >= min && n <= max;
}

/**
 * Look up the constants for subgroup size n.
 * Throws UNSUPPORTED_SUBGROUP_SIZE outside the published range.
 */
export function getControlConstants(n: number): Readonly<ControlConstants> {
  const cached = cachedRows.get(n);
  if (cached) return cached;

  const table = loadTable();
  if (!isSupportedSubgroupSize(n)) {
    throw new SpcError(
      "UNSUPPORTED_SUBGROUP_SIZE",
      `No control chart constants for subgroup size ${n} (supported: ${table.minSubgroupSize}..${table.maxSubgroupSize})`,
      { subgroupSize: n },
    );
  }

  const i = n - table.minSubgroupSize;
  const f = table.factors;
  const row: Readonly<ControlConstants> = Object.freeze({
    n,
    A2: f.A2[i],
    A3: f.A3[i],
    d2: f.d2[i],
    D3: f.D3[i],
    D4: f.D4[i],
    B3: f.B3[i],
    B4: f.B4[i],
    c4: f.c4[i],
    E2: 3 / f.d2[i],
  });
  cachedRows.set(n, row);
  return row;
}
