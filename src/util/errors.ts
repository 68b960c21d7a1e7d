// util/errors.ts

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "EMPTY_UPDATE"
  | "INVALID_IDENTIFIER"
  | "SLUG_CONFLICT"
  | "CATEGORY_NOT_FOUND"
  | "NOT_FOUND"
  | "MISSING_TOKEN"
  | "INVALID_TOKEN"
  | "SESSION_EXPIRED"
  | "INVALID_CREDENTIALS"
  | "STORE_UNAVAILABLE"
  | "INTERNAL_ERROR";

/**
 * Base class for every error a route can surface to the client.
 * The error middleware turns it into `{ success: false, code, message, field? }`.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: ErrorCode,
    public readonly field?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, field?: string) {
    super(message, 400, "VALIDATION_ERROR", field);
  }
}

export class EmptyUpdateError extends AppError {
  constructor() {
    super("No fields to update", 400, "EMPTY_UPDATE");
  }
}

export class InvalidIdentifierError extends AppError {
  constructor() {
    super("Invalid id", 400, "INVALID_IDENTIFIER", "id");
  }
}

// Unique-slug violations are reported as 400, not 409.
export class ConflictError extends AppError {
  constructor(message: string, field?: string) {
    super(message, 400, "SLUG_CONFLICT", field);
  }
}

export class CategoryNotFoundError extends AppError {
  constructor() {
    super("Category does not exist", 400, "CATEGORY_NOT_FOUND", "category_slug");
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export type UnauthorizedCode =
  | "MISSING_TOKEN"
  | "INVALID_TOKEN"
  | "SESSION_EXPIRED"
  | "INVALID_CREDENTIALS";

const UNAUTHORIZED_MESSAGES: Record<UnauthorizedCode, string> = {
  MISSING_TOKEN: "Missing admin token",
  INVALID_TOKEN: "Invalid token",
  SESSION_EXPIRED: "Session expired",
  INVALID_CREDENTIALS: "Invalid credentials",
};

export class UnauthorizedError extends AppError {
  constructor(code: UnauthorizedCode) {
    super(UNAUTHORIZED_MESSAGES[code], 401, code);
  }
}

export class StoreUnavailableError extends AppError {
  constructor() {
    super("Database not available", 503, "STORE_UNAVAILABLE");
  }
}
