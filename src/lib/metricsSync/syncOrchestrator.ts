/**
 * Metrics sync — fetch the board, compute every record, write results back.
 *
 * Invariants:
 * - One fetch per run; if it fails after retries the run fails and nothing is written
 * - Each record is its own transaction: a failure is recorded against that
 *   record and the loop moves on
 * - Dry-run computes the exact write map a live run would send, and sends nothing
 * - Outcomes come back in fetch order
 */

import pLimit from "p-limit";

import type { BoardRecord } from "../underwritingMetrics/types";
import type { FieldWrites, RecordStore } from "../boardStore/types";
import { computeRecordMetrics } from "../underwritingMetrics/index";
import { buildFieldWrites } from "./outputFields";
import type { FieldMap } from "./fieldMap";
import { errorMessage, withRetry, type RetryOptions, type Sleep } from "./retry";
import type { SyncCounts, SyncLogger, SyncOutcome, SyncRunResult } from "./types";

export interface MetricsSyncOptions {
  store: RecordStore;
  fieldMap: FieldMap;
  dryRun?: boolean;
  /** Attempts per store call, first try included. */
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: Sleep;
  /** Records processed at once; writes are independent per record id. */
  writeConcurrency?: number;
  logger?: SyncLogger;
}

export function countOutcomes(outcomes: SyncOutcome[]): SyncCounts {
  const counts: SyncCounts = { updated: 0, skipped: 0, failed: 0 };
  for (const o of outcomes) counts[o.status] += 1;
  return counts;
}

export class MetricsSyncOrchestrator {
  private readonly store: RecordStore;
  private readonly fieldMap: FieldMap;
  private readonly dryRun: boolean;
  private readonly writeConcurrency: number;
  private readonly logger: SyncLogger;
  private readonly retry: RetryOptions;

  constructor(opts: MetricsSyncOptions) {
    this.store = opts.store;
    this.fieldMap = opts.fieldMap;
    this.dryRun = opts.dryRun ?? false;
    this.writeConcurrency = Math.max(1, opts.writeConcurrency ?? 1);
    this.logger = opts.logger ?? console;
    this.retry = {
      maxAttempts: opts.maxAttempts,
      baseDelayMs: opts.baseDelayMs,
      sleep: opts.sleep,
      logger: this.logger,
    };
  }

  /** Pure part of the pipeline: record → output field map. */
  computeWrites(record: BoardRecord): FieldWrites {
    const metrics = computeRecordMetrics(record, this.fieldMap.inputs);
    return buildFieldWrites(metrics, this.fieldMap.outputs);
  }

  async run(): Promise<SyncRunResult> {
    let records: BoardRecord[] | null;
    try {
      records = await withRetry("fetch_records", () => this.store.fetchRecords(), this.retry);
    } catch (err: unknown) {
      const reason = errorMessage(err);
      this.logger.error("[metrics-sync] fetch failed, run aborted", { reason });
      return { status: "failed", reason, outcomes: [] };
    }

    if (!records || records.length === 0) {
      this.logger.log("[metrics-sync] no records in scope");
      return { status: "no-records", outcomes: [] };
    }

    this.logger.log("[metrics-sync] processing", {
      records: records.length,
      dryRun: this.dryRun,
      writeConcurrency: this.writeConcurrency,
    });

    const limiter = pLimit(this.writeConcurrency);
    const outcomes = await Promise.all(
      records.map((record) => limiter(() => this.processRecord(record))),
    );

    const counts = countOutcomes(outcomes);
    this.logger.log("[metrics-sync] done", counts);
    return { status: "completed", outcomes, counts };
  }

  private async processRecord(record: BoardRecord): Promise<SyncOutcome> {
    const base = { recordId: record.id, recordName: record.name };

    try {
      const writes = this.computeWrites(record);

      if (this.dryRun) {
        this.logger.log(`[metrics-sync] would update ${record.name} (${record.id})`, writes);
        return { ...base, status: "skipped", writes };
      }

      await withRetry(
        `write_record:${record.id}`,
        () => this.store.writeRecord(record.id, writes),
        this.retry,
      );
      return { ...base, status: "updated", writes };
    } catch (err: unknown) {
      const reason = errorMessage(err);
      this.logger.error(`[metrics-sync] record ${record.name} (${record.id}) failed`, { reason });
      return { ...base, status: "failed", reason };
    }
  }
}
