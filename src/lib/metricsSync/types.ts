import type { FieldWrites } from "../boardStore/types";

export type SyncLogger = Pick<Console, "log" | "warn" | "error">;

interface OutcomeBase {
  recordId: string;
  recordName: string;
}

export type SyncOutcome =
  | (OutcomeBase & { status: "updated"; writes: FieldWrites })
  | (OutcomeBase & { status: "skipped"; writes: FieldWrites })
  | (OutcomeBase & { status: "failed"; reason: string });

export type SyncOutcomeStatus = SyncOutcome["status"];

export interface SyncCounts {
  updated: number;
  skipped: number;
  failed: number;
}

export type SyncRunResult =
  | { status: "completed"; outcomes: SyncOutcome[]; counts: SyncCounts }
  | { status: "no-records"; outcomes: SyncOutcome[] }
  | { status: "failed"; reason: string; outcomes: SyncOutcome[] };
