/**
 * Board record store over the monday.com GraphQL API.
 *
 * One query reads every item on the board with its column values; one
 * mutation per item overwrites the output columns. Retry is the caller's
 * job: this client throws StoreHttpError on non-2xx responses (retryable for
 * 429 and 5xx gateway statuses) and StoreResponseError (not retryable) on
 * GraphQL-level errors.
 */

import type { BoardRecord, RawFieldValue } from "../underwritingMetrics/types";
import type { FetchLike, FieldWrites, RecordStore } from "./types";
import { StoreHttpError, StoreResponseError } from "./errors";
import {
  BoardsDataSchema,
  ChangeColumnValuesDataSchema,
  GraphqlEnvelopeSchema,
  type ItemPayload,
} from "./schemas";

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_API_URL = "https://api.monday.com/v2";
const DEFAULT_ITEMS_LIMIT = 100;
const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

const FETCH_ITEMS_QUERY = `
  query ($boardId: [ID!], $limit: Int!) {
    boards(ids: $boardId) {
      items_page(limit: $limit) {
        items {
          id
          name
          column_values {
            id
            text
            value
            type
          }
        }
      }
    }
  }
`;

const CHANGE_COLUMN_VALUES_MUTATION = `
  mutation ($itemId: ID!, $boardId: ID!, $columnValues: JSON!) {
    change_multiple_column_values(item_id: $itemId, board_id: $boardId, column_values: $columnValues) {
      id
    }
  }
`;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface GraphqlBoardStoreOptions {
  apiKey: string;
  boardId: string;
  apiUrl?: string;
  itemsLimit?: number;
  httpTimeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Pick<Console, "warn">;
}

// ─── Wire encoding ───────────────────────────────────────────────────────────

/**
 * `{ number: "12.34" }` sets a value, `{}` clears the column.
 */
export function encodeColumnValues(writes: FieldWrites): string {
  const columns: Record<string, { number: string } | Record<string, never>> = {};
  for (const [fieldId, write] of Object.entries(writes)) {
    columns[fieldId] = write.kind === "number" ? { number: write.value } : {};
  }
  return JSON.stringify(columns);
}

function toBoardRecord(item: ItemPayload): BoardRecord {
  const fields: Record<string, RawFieldValue> = {};
  for (const cv of item.column_values ?? []) {
    fields[cv.id] = { text: cv.text ?? null, value: cv.value ?? null };
  }
  return { id: item.id, name: item.name ?? "", fields };
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class GraphqlBoardStore implements RecordStore {
  private readonly apiKey: string;
  private readonly boardId: string;
  private readonly apiUrl: string;
  private readonly itemsLimit: number;
  private readonly httpTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Pick<Console, "warn">;

  constructor(opts: GraphqlBoardStoreOptions) {
    this.apiKey = opts.apiKey;
    this.boardId = opts.boardId;
    this.apiUrl = opts.apiUrl ?? DEFAULT_API_URL;
    this.itemsLimit = opts.itemsLimit ?? DEFAULT_ITEMS_LIMIT;
    this.httpTimeoutMs = opts.httpTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = opts.logger ?? console;
  }

  async fetchRecords(): Promise<BoardRecord[] | null> {
    const data = await this.post("fetch_items", FETCH_ITEMS_QUERY, {
      boardId: [this.boardId],
      limit: this.itemsLimit,
    });

    const parsed = BoardsDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new StoreResponseError(`fetch_items: unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
    }

    const board = parsed.data.boards?.[0];
    const items = board?.items_page?.items;
    if (!items) return null;

    // A single page is read per run; a full page means the board may hold more
    if (items.length >= this.itemsLimit) {
      this.logger.warn("[board-store] item page is full, records past the limit are not synced", {
        boardId: this.boardId,
        itemsLimit: this.itemsLimit,
      });
    }
    return items.map(toBoardRecord);
  }

  async writeRecord(recordId: string, writes: FieldWrites): Promise<void> {
    const data = await this.post("change_column_values", CHANGE_COLUMN_VALUES_MUTATION, {
      itemId: recordId,
      boardId: this.boardId,
      columnValues: encodeColumnValues(writes),
    });

    const parsed = ChangeColumnValuesDataSchema.safeParse(data);
    if (!parsed.success || !parsed.data.change_multiple_column_values) {
      throw new StoreResponseError(`change_column_values: item ${recordId} was not updated`);
    }
  }

  private async post(
    operation: string,
    query: string,
    variables: Record<string, unknown>,
  ): Promise<unknown> {
    const res = await this.fetchImpl(this.apiUrl, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: this.apiKey,
      },
      body: JSON.stringify({ query, variables }),
      signal: AbortSignal.timeout(this.httpTimeoutMs),
    });

    if (!res.ok) {
      throw new StoreHttpError(res.status, operation);
    }

    const envelope = GraphqlEnvelopeSchema.safeParse(await res.json());
    if (!envelope.success) {
      throw new StoreResponseError(`${operation}: response is not a GraphQL envelope`);
    }

    const { data, errors, error_message } = envelope.data;
    if (errors && errors.length > 0) {
      throw new StoreResponseError(`${operation}: ${errors.map((e) => e.message).join("; ")}`);
    }
    if (error_message) {
      throw new StoreResponseError(`${operation}: ${error_message}`);
    }
    return data;
  }
}
