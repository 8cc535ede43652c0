export type AppErrorCode =
  | "VALIDATION_ERROR"
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "REQUEST_TOO_LARGE"
  | "RATE_LIMITED"
  | "SERVICE_UNAVAILABLE"
  | "TIMEOUT"
  | "INTERNAL_ERROR"
  | "DEPENDENCY_FAILED"
  | "RESOURCE_FAILED"
  | "PREFLIGHT_FAILED"
  | "EXPRESSION_ERROR";

const STATUS_BY_CODE: Record<AppErrorCode, number> = {
  VALIDATION_ERROR: 400,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  REQUEST_TOO_LARGE: 413,
  RATE_LIMITED: 429,
  SERVICE_UNAVAILABLE: 503,
  TIMEOUT: 504,
  INTERNAL_ERROR: 500,
  DEPENDENCY_FAILED: 500,
  RESOURCE_FAILED: 500,
  PREFLIGHT_FAILED: 500,
  EXPRESSION_ERROR: 500
};

export function statusForCode(code: AppErrorCode): number {
  return STATUS_BY_CODE[code];
}

export interface AppErrorOptions {
  resourceId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Error carrying a wire code and HTTP status. Anything thrown out of a request
 * handler that is not an AppError is rendered as INTERNAL_ERROR.
 */
export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly statusCode: number;
  readonly resourceId?: string;
  readonly details: Record<string, unknown>;
  /** Stack of the wrapped failure, only rendered in debug mode. */
  stackTrace?: string;

  constructor(code: AppErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusForCode(code);
    this.resourceId = options.resourceId;
    this.details = options.details ?? {};
  }

  withDetails(details: Record<string, unknown>): AppError {
    const next = new AppError(this.code, this.message, {
      resourceId: this.resourceId,
      details: {
        ...this.details,
        ...details
      },
      cause: this.cause
    });
    next.stackTrace = this.stackTrace;
    return next;
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

export class WorkflowParseError extends Error {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, message: string, issues: string[] = []) {
    super(message);
    this.name = "WorkflowParseError";
    this.filePath = filePath;
    this.issues = issues;
  }
}

export class PackageExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PackageExtractionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
