/**
 * Underwriting Metrics — Integration Entrypoint
 *
 * Record → RawInputs → cash-flow vector → metric set.
 */

import type { BoardRecord, MetricSet } from "./types";
import { extractRawInputs, type InputFieldMap } from "./rawInputs";
import { computeUnderwritingMetrics } from "./metrics";

// Re-export all types for consumer convenience
export type {
  AbsentReason,
  BoardRecord,
  CashflowVector,
  InputFieldKey,
  MetricName,
  MetricResult,
  MetricSet,
  MetricTrace,
  RawFieldValue,
  RawInputs,
} from "./types";
export type { Absent, Optional, Present } from "./optional";
export type { InputFieldMap } from "./rawInputs";
export type { IrrMethod, IrrOptions, IrrSolution } from "./irrSolver";

export { INPUT_FIELD_KEYS, METRIC_NAMES } from "./types";
export { absent, present } from "./optional";
export { parseNumeric } from "./numericParser";
export { extractRawInputs } from "./rawInputs";
export { buildCashflows } from "./cashflows";
export { countSignChanges, npv, solveIrr } from "./irrSolver";
export { computeUnderwritingMetrics } from "./metrics";
export { formatMetricValue } from "./format";

/**
 * Compute metrics straight from a store record.
 *
 * Pure function — deterministic, no side effects.
 */
export function computeRecordMetrics(record: BoardRecord, inputFields: InputFieldMap): MetricSet {
  return computeUnderwritingMetrics(extractRawInputs(record, inputFields));
}
