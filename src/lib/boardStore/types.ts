import type { BoardRecord } from "../underwritingMetrics/types";

/**
 * A single output field write. `clear` empties the field on the store,
 * which is different from leaving it untouched.
 */
export type FieldWrite = { kind: "number"; value: string } | { kind: "clear" };

export type FieldWrites = Record<string, FieldWrite>;

/**
 * Opaque key-value source/sink for investment records.
 *
 * Implementations throw on failure; errors with `retryable === false` are
 * not worth retrying.
 */
export interface RecordStore {
  /** All records in scope, or null when the scope itself returned nothing. */
  fetchRecords(): Promise<BoardRecord[] | null>;
  /** Overwrite the given fields of one record. */
  writeRecord(recordId: string, writes: FieldWrites): Promise<void>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
