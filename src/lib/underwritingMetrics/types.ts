/**
 * Underwriting Metrics — Shared Types
 *
 * Every metric is an Optional with a full audit trail (formula + inputs),
 * so an absent value always explains itself.
 */

import type { Absent, Present } from "./optional";

// ---------------------------------------------------------------------------
// Record store shapes (as seen by the engine)
// ---------------------------------------------------------------------------

/**
 * One field as delivered by the record store. `value` is the store's
 * JSON-encoded canonical payload; `text` is the human-readable rendering.
 */
export interface RawFieldValue {
  text: string | null;
  value: string | null;
}

export interface BoardRecord {
  id: string;
  name: string;
  fields: Record<string, RawFieldValue>;
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export const INPUT_FIELD_KEYS = [
  "equity_investment",
  "net_operating_income",
  "total_project_cost",
  "loan_amount",
  "market_cap_rate",
  "exit_cap_rate",
  "year_1_cf",
  "year_2_cf",
  "year_3_cf",
  "year_4_cf",
  "year_5_cf",
  "sale_proceeds",
] as const;

export type InputFieldKey = (typeof INPUT_FIELD_KEYS)[number];

export interface RawInputs {
  /** Always a non-negative magnitude; the cash-flow builder applies the sign. */
  equityInvestment: number;
  netOperatingIncome: number;
  totalProjectCost: number;
  loanAmount: number;
  /** Percent units, e.g. 5.5 for 5.5%. */
  marketCapRate: number;
  /** Percent units, e.g. 6.25 for 6.25%. */
  exitCapRate: number;
  periodCashflows: readonly [number, number, number, number, number];
  saleProceeds: number;
}

/** Period 0 outflow followed by one entry per period. */
export type CashflowVector = readonly number[];

// ---------------------------------------------------------------------------
// Metric Result
// ---------------------------------------------------------------------------

export const METRIC_NAMES = [
  "cap_rate",
  "ltv",
  "yield_on_cost",
  "spread",
  "reversion_value",
  "cash_on_cash",
  "irr",
  "equity_multiple",
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type AbsentReason =
  | "divide_by_zero"
  | "ineligible"
  | "no_sign_change"
  | "not_converged";

export interface MetricTrace {
  formula: string;
  inputs: Record<string, number>;
}

export type MetricResult = (Present<number> | Absent<AbsentReason>) & MetricTrace;

export type MetricSet = Record<MetricName, MetricResult>;
