import { Request, Response, NextFunction } from "express";
import { AppError, ErrorCode } from "../errors/AppError";
import { ResponseStatus } from "../errors/ResponseStatus";
import {
  PolicyStoreUnavailableError,
  ValidationError,
} from "../../modules/authz/errors/AuthorizationError";
import { logger } from "../logger";

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  logger.logError(error, { method: req.method, url: req.originalUrl });

  if (error instanceof AppError) {
    return res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      ...(error.details !== undefined ? { details: error.details } : {}),
    });
  }

  if (error instanceof ValidationError) {
    return res.status(ResponseStatus.BAD_REQUEST).json({
      error: error.message,
      code: ErrorCode.VALIDATION_ERROR,
      details: error.issues,
    });
  }

  // The decision could not be evaluated; this is neither allow nor deny
  if (error instanceof PolicyStoreUnavailableError) {
    const appError = AppError.fromErrorCode(ErrorCode.POLICY_STORE_UNAVAILABLE);
    return res.status(appError.statusCode).json({
      error: appError.message,
      code: appError.code,
    });
  }

  // Raised by express.json() for unparseable bodies
  if (error instanceof SyntaxError) {
    return res.status(ResponseStatus.BAD_REQUEST).json({
      error: "Malformed JSON body",
      code: ErrorCode.VALIDATION_ERROR,
    });
  }

  res.status(ResponseStatus.INTERNAL_SERVER_ERROR).json({
    error: "Internal server error",
    code: ErrorCode.INTERNAL_SERVER_ERROR,
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(ResponseStatus.NOT_FOUND).json({
    error: "Route not found",
    code: ErrorCode.RESOURCE_NOT_FOUND,
    path: req.path,
    method: req.method,
  });
};
