import type { RawFieldValue } from "./types";

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseText(text: string): number | undefined {
  const cleaned = text.trim().replace(/,/g, "");
  if (!DECIMAL_LITERAL.test(cleaned)) return undefined;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : undefined;
}

function parseCanonical(payload: string): number | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch {
    return undefined;
  }
  if (typeof decoded === "number") {
    return Number.isFinite(decoded) ? decoded : undefined;
  }
  if (typeof decoded === "string") return parseText(decoded);
  return undefined;
}

/**
 * Convert a store field to a number.
 *
 * Canonical payload first, then the text rendering. Absent, empty or
 * malformed input yields 0. Never throws.
 */
export function parseNumeric(raw: RawFieldValue | string | null | undefined): number {
  if (raw === null || raw === undefined) return 0;
  if (typeof raw === "string") return parseText(raw) ?? 0;

  if (raw.value) {
    const canonical = parseCanonical(raw.value);
    if (canonical !== undefined) return canonical;
  }
  if (raw.text) return parseText(raw.text) ?? 0;
  return 0;
}
