export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ECS_ERROR {
  // duplicate registration
  ENTITY_ALREADY_OWNED = "ENTITY_ALREADY_OWNED",
  DUPLICATE_COMPONENT = "DUPLICATE_COMPONENT",
  DUPLICATE_STATE = "DUPLICATE_STATE",
  DUPLICATE_SYSTEM = "DUPLICATE_SYSTEM",
  KEY_FUNCTION_ALREADY_SET = "KEY_FUNCTION_ALREADY_SET",
  DUPLICATE_TAG_TYPE = "DUPLICATE_TAG_TYPE",
  // not found
  ENTITY_NOT_FOUND = "ENTITY_NOT_FOUND",
  COMPONENT_NOT_FOUND = "COMPONENT_NOT_FOUND",
  STATE_NOT_FOUND = "STATE_NOT_FOUND",
  SYSTEM_NOT_FOUND = "SYSTEM_NOT_FOUND",
  // invalid configuration
  INVALID_BINDING = "INVALID_BINDING",
  EMPTY_QUERY = "EMPTY_QUERY",
  INVALID_QUERY = "INVALID_QUERY",
  UNTYPED_VALUE = "UNTYPED_VALUE",
  // ordering failure
  PRIORITY_NOT_COMPARABLE = "PRIORITY_NOT_COMPARABLE",
  // lifecycle misuse
  MISSING_CONTEXT = "MISSING_CONTEXT",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}

/** Narrow to an ECSError of one category. */
export function is_ecs_error_of(
  error: unknown,
  category: ECS_ERROR,
): error is ECSError {
  return error instanceof ECSError && error.category === category;
}
