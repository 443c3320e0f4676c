export type { FieldMap, OutputFieldMap } from "./fieldMap";
export type { MetricsSyncOptions } from "./syncOrchestrator";
export type { RetryOptions, Sleep } from "./retry";
export type {
  SyncCounts,
  SyncLogger,
  SyncOutcome,
  SyncOutcomeStatus,
  SyncRunResult,
} from "./types";

export { FieldMapError, FieldMapSchema, loadFieldMap, parseFieldMap } from "./fieldMap";
export { buildFieldWrites } from "./outputFields";
export { MetricsSyncOrchestrator, countOutcomes } from "./syncOrchestrator";
export {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_ATTEMPTS,
  RetryExhaustedError,
  backoffDelayMs,
  isRetryableError,
  withRetry,
} from "./retry";
