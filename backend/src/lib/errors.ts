/** Base for domain errors. Keeps the prototype chain intact for instanceof. */
export class DomainError extends Error {
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends DomainError {}

/** The uploaded plan cannot be read as a task table. */
export class PlanFormatError extends ValidationError {}

export class NoPlanLoadedError extends DomainError {
  constructor() {
    super("No project plan loaded. Upload a plan first.");
  }
}

/** The holiday calendar never yields a working day within the scan bound. */
export class CalendarConfigurationError extends DomainError {}

export class ConfigError extends DomainError {}

export type ErrorCode = "INVALID_INPUT" | "NOT_FOUND" | "NO_PLAN" | "INTERNAL_ERROR";

export type ApiErrorPayload = {
  error: { code: ErrorCode; message: string; details?: Record<string, unknown> };
};

export function apiError(code: ErrorCode, message: string, details?: Record<string, unknown>): ApiErrorPayload {
  return { error: { code, message, ...(details != null && { details }) } };
}

/** Maps an error to the HTTP status and payload the routes send. */
export function toHttpError(err: unknown): { status: number; payload: ApiErrorPayload } {
  if (err instanceof NoPlanLoadedError) {
    return { status: 409, payload: apiError("NO_PLAN", err.message) };
  }
  if (err instanceof ValidationError) {
    return { status: 400, payload: apiError("INVALID_INPUT", err.message, err.details) };
  }
  const message = err instanceof Error ? err.message : "Server error";
  return { status: 500, payload: apiError("INTERNAL_ERROR", message) };
}
