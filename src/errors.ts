import type { EntityName } from "./types";

export type ErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "RECORD_TOO_LARGE"
  | "PAYLOAD_TOO_LARGE"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "BAD_REQUEST"
  | "INTERNAL_ERROR";

export type ErrorDetails = Record<string, unknown>;

/** Base for every error the service raises on purpose. */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly details: ErrorDetails | undefined;

  constructor(code: ErrorCode, status: number, message: string, details?: ErrorDetails) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.status = status;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends AppError {
  readonly entity: EntityName;

  /** A numeric key reads as `<entity> id:<key>`, a string key is used as written. */
  constructor(entity: EntityName, key: number | string, details?: ErrorDetails) {
    const subject = typeof key === "number" ? `id:${key}` : key;
    super("NOT_FOUND", 404, `${entity} ${subject} does not exist`, details);
    this.entity = entity;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super("INVALID_INPUT", 400, message, details);
  }
}

/** Raised by a store before writing a row larger than its size bound. */
export class RecordTooLargeError extends AppError {
  constructor(table: string, size: number, limit: number) {
    super(
      "RECORD_TOO_LARGE",
      413,
      `${table} row is ${size} bytes, limit is ${limit}`,
      { table, size, limit }
    );
  }
}
