/**
 * Custom error classes for prayer notification scheduling and dispatch
 *
 * Each error carries a stable `code` and the HTTP status it maps to when it
 * reaches an API handler.
 */

/**
 * The delayed task queue already holds a task with this name.
 * Proof that the notification is scheduled; callers treat it as success.
 */
export class TaskAlreadyExistsError extends Error {
  public readonly code = 'TASK_ALREADY_EXISTS';
  public readonly statusCode = 409;

  constructor(public readonly taskName: string, options?: { cause?: unknown }) {
    super(`Task "${taskName}" already exists`, options);
    this.name = 'TaskAlreadyExistsError';
    Object.setPrototypeOf(this, TaskAlreadyExistsError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      taskName: this.taskName,
    };
  }
}

/**
 * A read from the schedule, preference, following or subscriber store failed
 */
export class StoreReadError extends Error {
  public readonly code = 'STORE_READ_FAILED';
  public readonly statusCode = 503;

  constructor(
    public readonly operation: string,
    public readonly keys: Record<string, string>,
    options?: { cause?: unknown }
  ) {
    super(`Store read failed: ${operation}`, options);
    this.name = 'StoreReadError';
    Object.setPrototypeOf(this, StoreReadError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      operation: this.operation,
      keys: this.keys,
    };
  }
}

/**
 * A push request arrived without one of its required fields
 */
export class MissingFieldsError extends Error {
  public readonly code = 'MISSING_FIELDS';
  public readonly statusCode = 400;

  constructor(public readonly fields: string[]) {
    super(`Missing required fields: ${fields.join(', ')}`);
    this.name = 'MissingFieldsError';
    Object.setPrototypeOf(this, MissingFieldsError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      fields: this.fields,
    };
  }
}

/**
 * The push gateway rejected or failed a send
 */
export class PushDispatchError extends Error {
  public readonly code = 'DISPATCH_FAILED';
  public readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PushDispatchError';
    Object.setPrototypeOf(this, PushDispatchError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
    };
  }
}

/**
 * A request arrived without valid credentials
 */
export class AuthenticationError extends Error {
  public readonly code = 'UNAUTHORIZED';
  public readonly statusCode = 401;

  constructor(message: string = 'Authentication required') {
    super(message);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * A request body was not valid JSON
 */
export class InvalidJsonError extends Error {
  public readonly code = 'INVALID_JSON';
  public readonly statusCode = 400;

  constructor() {
    super('Invalid JSON in request body');
    this.name = 'InvalidJsonError';
    Object.setPrototypeOf(this, InvalidJsonError.prototype);
  }
}

/**
 * Normalize anything thrown into an Error
 */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
