import { Request, Response, NextFunction } from "express";
import { ZodSchema } from "zod";
import { AppError, ErrorCode } from "../errors/AppError";

/**
 * Validate `{ body, params, query }` of the request against `schema`.
 */
export const validateRequest = (schema: ZodSchema) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse({
      body: req.body,
      params: req.params,
      query: req.query,
    });

    if (!result.success) {
      return next(
        AppError.fromErrorCode(
          ErrorCode.VALIDATION_ERROR,
          undefined,
          result.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
          ),
        ),
      );
    }
    next();
  };
};
