/**
 * Field mapping — which store field holds each logical input and output.
 *
 * Boards differ in their field ids, so the mapping is configuration, loaded
 * from JSON and validated here. Every entry is optional: an unmapped input
 * reads as 0, an unmapped output is never written.
 */

import fs from "node:fs";
import { z } from "zod";

const FieldId = z.string().trim().min(1);

const InputFieldsSchema = z
  .object({
    equity_investment: FieldId.optional(),
    net_operating_income: FieldId.optional(),
    total_project_cost: FieldId.optional(),
    loan_amount: FieldId.optional(),
    market_cap_rate: FieldId.optional(),
    exit_cap_rate: FieldId.optional(),
    year_1_cf: FieldId.optional(),
    year_2_cf: FieldId.optional(),
    year_3_cf: FieldId.optional(),
    year_4_cf: FieldId.optional(),
    year_5_cf: FieldId.optional(),
    sale_proceeds: FieldId.optional(),
  })
  .strict();

const OutputFieldsSchema = z
  .object({
    cap_rate: FieldId.optional(),
    ltv: FieldId.optional(),
    yield_on_cost: FieldId.optional(),
    spread: FieldId.optional(),
    reversion_value: FieldId.optional(),
    cash_on_cash: FieldId.optional(),
    irr: FieldId.optional(),
    equity_multiple: FieldId.optional(),
  })
  .strict();

export const FieldMapSchema = z.object({
  inputs: InputFieldsSchema,
  outputs: OutputFieldsSchema,
});

export type FieldMap = z.infer<typeof FieldMapSchema>;
export type OutputFieldMap = FieldMap["outputs"];

export class FieldMapError extends Error {
  readonly code = "FIELD_MAP_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "FieldMapError";
  }
}

export function parseFieldMap(raw: unknown): FieldMap {
  const parsed = FieldMapSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new FieldMapError(`Invalid field map: ${issues}`);
  }
  return parsed.data;
}

export function loadFieldMap(filePath: string): FieldMap {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new FieldMapError(`Cannot read field map at ${filePath}: ${msg}`);
  }
  return parseFieldMap(raw);
}
