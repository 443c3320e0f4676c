/**
 * Underwriting Metrics — Core Calculations
 *
 * Eight deterministic metrics with full explainability. A metric whose
 * precondition fails is absent, never zeroed.
 */

import type { CashflowVector, MetricResult, MetricSet, RawInputs } from "./types";
import { absentMetric, presentMetric, ratioWhenPositive } from "./explain";
import { buildCashflows } from "./cashflows";
import { solveIrr, type IrrOptions } from "./irrSolver";

const PCT = 100;

// ---------------------------------------------------------------------------
// Individual metric helpers
// ---------------------------------------------------------------------------

function computeCapRate(noi: number, totalProjectCost: number): MetricResult {
  return ratioWhenPositive(noi, totalProjectCost, PCT, { noi, totalProjectCost }, "NOI / TotalProjectCost × 100");
}

function computeLtv(loanAmount: number, totalProjectCost: number): MetricResult {
  return ratioWhenPositive(
    loanAmount,
    totalProjectCost,
    PCT,
    { loanAmount, totalProjectCost },
    "LoanAmount / TotalProjectCost × 100",
  );
}

function computeYieldOnCost(noi: number, totalProjectCost: number): MetricResult {
  return ratioWhenPositive(noi, totalProjectCost, PCT, { noi, totalProjectCost }, "NOI / TotalProjectCost × 100");
}

function computeSpread(yieldOnCost: MetricResult, marketCapRate: number): MetricResult {
  const formula = "YieldOnCost − MarketCapRate";
  if (yieldOnCost.kind === "absent") {
    return absentMetric("ineligible", { marketCapRate }, formula);
  }
  const inputs = { yieldOnCost: yieldOnCost.value, marketCapRate };
  if (!(marketCapRate > 0)) {
    return absentMetric("ineligible", inputs, formula);
  }
  return presentMetric(yieldOnCost.value - marketCapRate, inputs, formula);
}

function computeReversionValue(noi: number, exitCapRate: number): MetricResult {
  // Exit cap rate is stored in percent units
  return ratioWhenPositive(noi, exitCapRate / PCT, 1, { noi, exitCapRate }, "NOI / (ExitCapRate / 100)");
}

function computeCashOnCash(year1Cashflow: number, equity: number): MetricResult {
  return ratioWhenPositive(
    year1Cashflow,
    equity,
    PCT,
    { year1Cashflow, equity },
    "Year1CashFlow / EquityInvestment × 100",
  );
}

function computeIrr(cashflows: CashflowVector, opts?: IrrOptions): MetricResult {
  const formula = "rate r where Σ CF_t / (1+r)^t = 0, × 100";
  const inputs: Record<string, number> = {};
  cashflows.forEach((cf, t) => {
    inputs[`cf${t}`] = cf;
  });

  const solution = solveIrr(cashflows, opts);
  if (solution.kind === "absent") {
    return absentMetric(solution.reason, inputs, formula);
  }
  return presentMetric(solution.value * PCT, inputs, formula);
}

function computeEquityMultiple(cashflows: CashflowVector, equity: number): MetricResult {
  const distributions = cashflows.slice(1).reduce((sum, cf) => sum + cf, 0);
  return ratioWhenPositive(
    distributions,
    equity,
    1,
    { distributions, equity },
    "Σ CF_1..n / EquityInvestment",
  );
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

/**
 * Compute the full underwriting metric set for one record.
 *
 * Pure function — deterministic, no I/O.
 */
export function computeUnderwritingMetrics(inputs: RawInputs, irrOpts?: IrrOptions): MetricSet {
  const equity = Math.abs(inputs.equityInvestment);
  const cashflows = buildCashflows(inputs);
  const yieldOnCost = computeYieldOnCost(inputs.netOperatingIncome, inputs.totalProjectCost);

  return {
    cap_rate: computeCapRate(inputs.netOperatingIncome, inputs.totalProjectCost),
    ltv: computeLtv(inputs.loanAmount, inputs.totalProjectCost),
    yield_on_cost: yieldOnCost,
    spread: computeSpread(yieldOnCost, inputs.marketCapRate),
    reversion_value: computeReversionValue(inputs.netOperatingIncome, inputs.exitCapRate),
    cash_on_cash: computeCashOnCash(inputs.periodCashflows[0], equity),
    irr: computeIrr(cashflows, irrOpts),
    equity_multiple: computeEquityMultiple(cashflows, equity),
  };
}
