/**
 * Underwriting Metrics — Explainability Helpers
 *
 * Every metric carries its inputs and formula, and an absent metric carries
 * the reason it could not be computed.
 */

import type { AbsentReason, MetricResult } from "./types";
import { absent, present } from "./optional";

export function presentMetric(
  value: number,
  inputs: Record<string, number>,
  formula: string,
): MetricResult {
  if (!Number.isFinite(value)) {
    return { ...absent("ineligible"), inputs, formula };
  }
  return { ...present(value), inputs, formula };
}

export function absentMetric(
  reason: AbsentReason,
  inputs: Record<string, number>,
  formula: string,
): MetricResult {
  return { ...absent(reason), inputs, formula };
}

/**
 * Ratio that is present only for a strictly positive denominator.
 *
 * Zero and negative denominators are treated alike: neither yields a
 * meaningful underwriting ratio.
 */
export function ratioWhenPositive(
  numerator: number,
  denominator: number,
  scale: number,
  inputs: Record<string, number>,
  formula: string,
): MetricResult {
  if (!(denominator > 0)) {
    return absentMetric("divide_by_zero", inputs, formula);
  }
  return presentMetric((numerator / denominator) * scale, inputs, formula);
}
