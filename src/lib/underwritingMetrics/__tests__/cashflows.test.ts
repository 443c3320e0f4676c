import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { buildCashflows } from "../cashflows";
import { extractRawInputs } from "../rawInputs";
import type { BoardRecord, RawInputs } from "../types";

function inputs(overrides: Partial<RawInputs> = {}): RawInputs {
  return {
    equityInvestment: 0,
    netOperatingIncome: 0,
    totalProjectCost: 0,
    loanAmount: 0,
    marketCapRate: 0,
    exitCapRate: 0,
    periodCashflows: [0, 0, 0, 0, 0],
    saleProceeds: 0,
    ...overrides,
  };
}

describe("buildCashflows", () => {
  it("outflow first, sale proceeds folded into the last period", () => {
    const vector = buildCashflows(
      inputs({ equityInvestment: 100, periodCashflows: [10, 10, 10, 10, 10], saleProceeds: 50 }),
    );
    assert.deepEqual(vector, [-100, 10, 10, 10, 10, 60]);
  });

  it("applies the outflow sign regardless of the caller's sign", () => {
    const vector = buildCashflows(inputs({ equityInvestment: -100, periodCashflows: [5, 5, 5, 5, 5] }));
    assert.equal(vector[0], -100);
  });

  it("zero equity gives a zero (not negative zero) period 0", () => {
    const vector = buildCashflows(inputs({ periodCashflows: [10, 10, 10, 10, 10] }));
    assert.ok(Object.is(vector[0], 0));
    assert.equal(vector.length, 6);
  });
});

describe("extractRawInputs", () => {
  const record: BoardRecord = {
    id: "101",
    name: "Maple Court",
    fields: {
      f_eq: { text: "-250,000", value: null },
      f_noi: { text: "40,000", value: null },
      f_tpc: { text: null, value: '"500000"' },
      f_y1: { text: "20,000", value: null },
      f_y5: { text: "oops", value: null },
      f_sale: { text: "300,000", value: null },
    },
  };

  it("reads mapped fields, takes the equity magnitude", () => {
    const raw = extractRawInputs(record, {
      equity_investment: "f_eq",
      net_operating_income: "f_noi",
      total_project_cost: "f_tpc",
      year_1_cf: "f_y1",
      year_5_cf: "f_y5",
      sale_proceeds: "f_sale",
    });

    assert.equal(raw.equityInvestment, 250_000);
    assert.equal(raw.netOperatingIncome, 40_000);
    assert.equal(raw.totalProjectCost, 500_000);
    assert.deepEqual(raw.periodCashflows, [20_000, 0, 0, 0, 0]);
    assert.equal(raw.saleProceeds, 300_000);
  });

  it("unmapped inputs and missing fields read as 0", () => {
    const raw = extractRawInputs(record, { loan_amount: "f_missing" });
    assert.equal(raw.loanAmount, 0);
    assert.equal(raw.equityInvestment, 0);
    assert.equal(raw.exitCapRate, 0);
  });
});
