/**
 * Result Type
 *
 * Tagged success/failure union for validation helpers that report errors
 * as values instead of throwing.
 */

export interface Ok<T> {
  readonly _tag: "Ok";
  readonly value: T;
}

export interface Err<E> {
  readonly _tag: "Err";
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { _tag: "Ok", value };
}

export function err<E>(error: E): Err<E> {
  return { _tag: "Err", error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === "Ok";
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === "Err";
}
