/***
 * IdError — Thrown when a value is rejected as a branded id.
 *
 * Not operational: a malformed id is a caller bug, not a state the
 * store or dispatcher can recover from.
 *
 ***/

import { AppError } from "utils/error";

export enum ID_ERROR {
  MALFORMED_ID = "MALFORMED_ID",
}

export class IdError extends AppError {
  constructor(
    public readonly category: ID_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
