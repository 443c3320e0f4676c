export type StoreErrorCode = "STORE_HTTP_ERROR" | "STORE_RESPONSE_ERROR";

export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly retryable: boolean;

  constructor(code: StoreErrorCode, message: string, retryable: boolean) {
    super(message);
    this.name = "StoreError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Rate limiting and gateway/server failures; everything else is final. */
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

/** Non-2xx transport response. */
export class StoreHttpError extends StoreError {
  readonly status: number;

  constructor(status: number, operation: string) {
    super("STORE_HTTP_ERROR", `${operation}: http_${status}`, RETRYABLE_STATUSES.has(status));
    this.name = "StoreHttpError";
    this.status = status;
  }
}

/** The store answered, but with GraphQL errors or an unexpected shape. */
export class StoreResponseError extends StoreError {
  constructor(message: string) {
    super("STORE_RESPONSE_ERROR", message, false);
    this.name = "StoreResponseError";
  }
}
