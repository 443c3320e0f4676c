import type { CashflowVector, RawInputs } from "./types";

/**
 * Assemble `[-equity, y1, y2, y3, y4, y5 + sale]`.
 *
 * The outflow sign is applied here from |equityInvestment|; the sign pattern
 * is not validated (degenerate vectors are the solver's concern).
 */
export function buildCashflows(inputs: RawInputs): CashflowVector {
  const equity = Math.abs(inputs.equityInvestment);
  const [y1, y2, y3, y4, y5] = inputs.periodCashflows;
  const outflow = equity > 0 ? -equity : 0;
  return [outflow, y1, y2, y3, y4, y5 + inputs.saleProceeds];
}
