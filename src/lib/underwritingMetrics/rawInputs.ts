import type { BoardRecord, InputFieldKey, RawInputs } from "./types";
import { parseNumeric } from "./numericParser";

export type InputFieldMap = Partial<Record<InputFieldKey, string>>;

/**
 * Pull the scalar inputs for one record. Unmapped or missing fields read as 0.
 */
export function extractRawInputs(record: BoardRecord, inputFields: InputFieldMap): RawInputs {
  const read = (key: InputFieldKey): number => {
    const fieldId = inputFields[key];
    if (!fieldId) return 0;
    return parseNumeric(record.fields[fieldId]);
  };

  return {
    equityInvestment: Math.abs(read("equity_investment")),
    netOperatingIncome: read("net_operating_income"),
    totalProjectCost: read("total_project_cost"),
    loanAmount: read("loan_amount"),
    marketCapRate: read("market_cap_rate"),
    exitCapRate: read("exit_cap_rate"),
    periodCashflows: [
      read("year_1_cf"),
      read("year_2_cf"),
      read("year_3_cf"),
      read("year_4_cf"),
      read("year_5_cf"),
    ],
    saleProceeds: read("sale_proceeds"),
  };
}
