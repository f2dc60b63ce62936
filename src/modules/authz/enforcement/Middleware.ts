/**
 * Authorization Enforcement Middleware
 *
 * Guards an express route with a decision from the AuthorizationService.
 * The authenticated subject is read from `req.user`, which the
 * authentication layer in front of this middleware is expected to set.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import type { AttributeMap } from "../../../domain/value-objects/Condition";
import type { Scope } from "../../../domain/value-objects/Scope";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import { logger } from "../../../shared/logger";
import { AuthorizationService } from "../service/AuthorizationService";
import type {
  AuthorizationContext,
  Decision,
} from "../types/authorization";

// ============================================================================
// Express Request Extension
// ============================================================================

declare global {
  namespace Express {
    interface Request {
      user?: {
        id: string;
        /** Pre-verified identity claims, exposed as `subject.*` attributes */
        claims?: AttributeMap;
      };
      authorizationDecision?: Decision;
    }
  }
}

export interface RequirePermissionOptions {
  /** Extra `resource.*` attributes, e.g. the loaded entity's owner */
  resourceAttributes?: (req: Request) => AttributeMap;
}

/**
 * Build the attribute context for a request: claims as `subject.*`, route
 * params as `resource.*`, and the client address and method as
 * `environment.*`.
 */
export function buildRequestContext(
  req: Request,
  options: RequirePermissionOptions = {},
): AuthorizationContext {
  const environment: AttributeMap = { method: req.method };
  if (req.ip) {
    environment.ip = req.ip;
  }

  return {
    subject: req.user?.claims ?? {},
    resource: {
      ...req.params,
      ...(options.resourceAttributes ? options.resourceAttributes(req) : {}),
    },
    environment,
  };
}

/**
 * 401 without an authenticated subject, 403 on any outcome other than
 * Allowed, and the store outage is passed on to the error handler (503).
 */
export function requirePermission(
  service: AuthorizationService,
  resource: string,
  action: string,
  scope: Scope,
  options: RequirePermissionOptions = {},
): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    const subjectId = req.user?.id;
    if (!subjectId) {
      return next(AppError.fromErrorCode(ErrorCode.SUBJECT_MISSING));
    }

    try {
      const decision = await service.authorize({
        subjectId,
        resource,
        action,
        scope,
        context: buildRequestContext(req, options),
      });
      req.authorizationDecision = decision;

      if (!decision.allowed) {
        logger.info("Access denied", {
          subjectId,
          resource,
          action,
          scope,
          outcome: decision.outcome,
          reason: decision.reason,
        });
        // Denied and DeniedDegraded look the same to the caller
        return next(AppError.fromErrorCode(ErrorCode.ACCESS_DENIED));
      }

      next();
    } catch (error) {
      next(error);
    }
  };
}
