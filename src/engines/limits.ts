import type { ChartLimits, ChartType } from "../shared/types.js";
import { cLimits, npLimits, pLimits, uLimits } from "./formulas/attribute.js";
import type { LimitContext } from "./formulas/common.js";
import { individualsLimits, movingAverageLimits, movingRangeLimits } from "./formulas/individual.js";
import { rLimits, sLimits, xbarRLimits, xbarSLimits } from "./formulas/subgroup.js";
import { isAttributeEntry, isIndividualEntry, isSubgroupEntry } from "./samples.js";
import type { HistoryEntry } from "./samples.js";

/**
 * Compute center line, control limits and plotted series for a chart from
 * its full (possibly capped) history. One formula module per chart family;
 * this is the only place chart types are dispatched.
 */
export function computeLimits(
  chartType: ChartType,
  history: readonly HistoryEntry[],
  ctx: LimitContext,
): ChartLimits {
  switch (chartType) {
    case "XBAR_R":
      return xbarRLimits(history.filter(isSubgroupEntry), ctx);
    case "XBAR_S":
      return xbarSLimits(history.filter(isSubgroupEntry), ctx);
    case "R":
      return rLimits(history.filter(isSubgroupEntry), ctx);
    case "S":
      return sLimits(history.filter(isSubgroupEntry), ctx);
    case "P":
      return pLimits(history.filter(isAttributeEntry), ctx);
    case "NP":
      return npLimits(history.filter(isAttributeEntry), ctx);
    case "C":
      return cLimits(history.filter(isAttributeEntry), ctx);
    case "U":
      return uLimits(history.filter(isAttributeEntry), ctx);
    case "INDIVIDUALS":
      return individualsLimits(individualValues(history), ctx);
    case "MOVING_RANGE":
      return movingRangeLimits(individualValues(history), ctx);
    case "MOVING_AVERAGE":
      return movingAverageLimits(individualValues(history), ctx);
  }
}

function individualValues(history: readonly HistoryEntry[]): number[] {
  return history.filter(isIndividualEntry).map((e) => e.value);
}
