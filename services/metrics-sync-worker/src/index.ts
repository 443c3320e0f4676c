/**
 * metrics-sync-worker — one-shot board sync.
 *
 * Reads every item on the board, computes underwriting metrics per item and
 * writes them back. Exits 0 when every record was updated (or skipped in
 * dry-run), 1 on a failed fetch or any failed record.
 *
 * Env vars (required):
 *   MONDAY_API_KEY     — API token sent as the Authorization header
 *   MONDAY_BOARD_ID    — Board to sync
 *
 * Env vars (optional):
 *   MONDAY_API_URL     — GraphQL endpoint (default https://api.monday.com/v2)
 *   DRY_RUN            — "1" or "true": compute and log, write nothing
 *   FIELD_MAP_PATH     — Field mapping JSON (default config/board-fields.json)
 *   ITEMS_LIMIT        — Items fetched per run (default 100)
 *   MAX_ATTEMPTS       — Attempts per store call (default 5)
 *   RETRY_BASE_MS      — First backoff delay, doubled per attempt (default 1000)
 *   HTTP_TIMEOUT_MS    — Per-request timeout (default 30000)
 *   WRITE_CONCURRENCY  — Records written at once (default 1)
 */

import path from "node:path";

import { serverEnv } from "../../../src/lib/env/server";
import { GraphqlBoardStore } from "../../../src/lib/boardStore/index";
import { MetricsSyncOrchestrator, loadFieldMap } from "../../../src/lib/metricsSync/index";

async function main(): Promise<void> {
  const env = serverEnv();
  const fieldMapPath = path.resolve(process.cwd(), env.FIELD_MAP_PATH);
  const fieldMap = loadFieldMap(fieldMapPath);

  console.log("[metrics-sync-worker] starting", {
    boardId: env.MONDAY_BOARD_ID,
    apiUrl: env.MONDAY_API_URL,
    dryRun: env.DRY_RUN,
    fieldMapPath,
    itemsLimit: env.ITEMS_LIMIT,
    maxAttempts: env.MAX_ATTEMPTS,
    retryBaseMs: env.RETRY_BASE_MS,
    writeConcurrency: env.WRITE_CONCURRENCY,
  });

  const store = new GraphqlBoardStore({
    apiKey: env.MONDAY_API_KEY,
    boardId: env.MONDAY_BOARD_ID,
    apiUrl: env.MONDAY_API_URL,
    itemsLimit: env.ITEMS_LIMIT,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
  });

  const orchestrator = new MetricsSyncOrchestrator({
    store,
    fieldMap,
    dryRun: env.DRY_RUN,
    maxAttempts: env.MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_MS,
    writeConcurrency: env.WRITE_CONCURRENCY,
  });

  const result = await orchestrator.run();

  switch (result.status) {
    case "failed":
      console.error("[metrics-sync-worker] run failed:", result.reason);
      process.exitCode = 1;
      return;
    case "no-records":
      console.log("[metrics-sync-worker] nothing to do");
      return;
    case "completed":
      for (const o of result.outcomes) {
        if (o.status === "failed") {
          console.error(`[metrics-sync-worker] ${o.recordName} (${o.recordId}): ${o.reason}`);
        }
      }
      console.log("[metrics-sync-worker] finished", result.counts);
      if (result.counts.failed > 0) process.exitCode = 1;
      return;
  }
}

main().catch((err) => {
  console.error("[metrics-sync-worker] fatal:", err);
  process.exit(1);
});
