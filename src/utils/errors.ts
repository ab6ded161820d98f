export type SyncErrorCode =
  | "RATE_LIMITED"
  | "TIMEOUT"
  | "NETWORK"
  | "AUTH_INVALID"
  | "TOKEN_REFRESH_FAILED"
  | "MISSING_CREDENTIALS"
  | "API_ERROR"
  | "MALFORMED_RECORD"
  | "USER_NOT_FOUND";

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly status?: number;

  constructor(code: SyncErrorCode, message: string, status?: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Rate limits, timeouts and dropped connections. Resolved by the next scheduled cycle. */
export class TransientApiError extends SyncError {}

/** Credential rejected or unrefreshable. Aborts the sync of one user only. */
export class AuthError extends SyncError {}

export class ApiError extends SyncError {}

/** A single activity or effort payload that could not be parsed or stored. */
export class MalformedRecordError extends SyncError {
  constructor(message: string) {
    super("MALFORMED_RECORD", message);
  }
}

export class UserNotFoundError extends SyncError {
  constructor(userId: number) {
    super("USER_NOT_FOUND", `User ${userId} not found or inactive`);
  }
}

export class SchemaVersionError extends Error {
  constructor(found: number, expected: number) {
    super(`Database schema version ${found} does not match expected version ${expected}`);
    this.name = "SchemaVersionError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function rateLimited(): TransientApiError {
  return new TransientApiError("RATE_LIMITED", "Strava API rate limit exceeded. Will retry on next sync.", 429);
}

export function authInvalid(): AuthError {
  return new AuthError("AUTH_INVALID", "Authentication failed. Token may be invalid.", 401);
}

export function apiError(status: number): ApiError {
  return new ApiError("API_ERROR", `API error: ${status}`, status);
}

/** Fetch rejects with a TimeoutError (AbortSignal.timeout) or AbortError when a request runs out of time. */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export function isStopCondition(error: unknown): boolean {
  return error instanceof AuthError || (error instanceof TransientApiError && error.code === "RATE_LIMITED");
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
