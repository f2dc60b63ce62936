export enum ErrorCode {
  // Authentication errors
  SUBJECT_MISSING = "SUBJECT_MISSING",

  // Authorization errors
  ACCESS_DENIED = "ACCESS_DENIED",

  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // Resource errors
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",

  // System errors
  INTERNAL_SERVER_ERROR = "INTERNAL_SERVER_ERROR",
  POLICY_STORE_UNAVAILABLE = "POLICY_STORE_UNAVAILABLE",
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: unknown,
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  static fromErrorCode(
    code: ErrorCode,
    message?: string,
    details?: unknown,
  ): AppError {
    const errorConfig = ERROR_STATUS_MAP[code];
    return new AppError(
      code,
      message || errorConfig.defaultMessage,
      errorConfig.statusCode,
      true,
      details,
    );
  }
}

// Status code mapping for error codes
const ERROR_STATUS_MAP: Record<
  ErrorCode,
  { statusCode: number; defaultMessage: string }
> = {
  [ErrorCode.SUBJECT_MISSING]: {
    statusCode: 401,
    defaultMessage: "Authenticated subject is required",
  },
  [ErrorCode.ACCESS_DENIED]: {
    statusCode: 403,
    defaultMessage: "Access denied",
  },
  [ErrorCode.VALIDATION_ERROR]: {
    statusCode: 400,
    defaultMessage: "Validation failed",
  },
  [ErrorCode.RESOURCE_NOT_FOUND]: {
    statusCode: 404,
    defaultMessage: "Resource not found",
  },
  [ErrorCode.INTERNAL_SERVER_ERROR]: {
    statusCode: 500,
    defaultMessage: "Internal server error",
  },
  [ErrorCode.POLICY_STORE_UNAVAILABLE]: {
    statusCode: 503,
    defaultMessage: "Authorization decision could not be evaluated",
  },
};
