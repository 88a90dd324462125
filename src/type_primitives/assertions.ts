/***
 * Branded casts.
 *
 * validate_and_cast() checks a value only in dev builds (__DEV__); a
 * production build returns it branded as-is. unsafe_cast() checks
 * nothing, for values whose type the caller already knows, such as an
 * event handed to a handler bound to its class.
 *
 ***/

import { ID_ERROR, IdError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new IdError(ID_ERROR.MALFORMED_ID, err_message, { value });
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
