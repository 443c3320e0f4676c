/**
 * Tagged present/absent values.
 *
 * A metric that cannot be computed is `absent` with a reason, never a
 * sentinel 0 or NaN.
 */

export type Present<T> = { kind: "present"; value: T };
export type Absent<R extends string = string> = { kind: "absent"; reason: R };
export type Optional<T, R extends string = string> = Present<T> | Absent<R>;

export function present<T>(value: T): Present<T> {
  return { kind: "present", value };
}

export function absent<R extends string>(reason: R): Absent<R> {
  return { kind: "absent", reason };
}
