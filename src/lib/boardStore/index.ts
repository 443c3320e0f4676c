export type { FetchLike, FieldWrite, FieldWrites, RecordStore } from "./types";
export type { GraphqlBoardStoreOptions } from "./graphqlBoardStore";
export type { StoreErrorCode } from "./errors";

export { DEFAULT_API_URL, GraphqlBoardStore, encodeColumnValues } from "./graphqlBoardStore";
export { StoreError, StoreHttpError, StoreResponseError } from "./errors";
