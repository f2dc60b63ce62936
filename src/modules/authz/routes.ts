/**
 * Authorization Routes
 *
 * - POST /authorize  - evaluate a decision
 * - POST /invalidate - drop cached state (204)
 * - GET  /stats      - decision and cache counters
 */

import { Router } from "express";
import { validateRequest } from "../../shared/middleware/validation";
import { AuthorizationController } from "./controller";
import { authorizeSchema, invalidateSchema } from "./schemas";
import { AuthorizationService } from "./service/AuthorizationService";

export function createAuthorizationRouter(
  authorizationService: AuthorizationService,
): Router {
  const router = Router();
  const controller = new AuthorizationController(authorizationService);

  router.post(
    "/authorize",
    validateRequest(authorizeSchema),
    controller.authorize.bind(controller),
  );
  router.post(
    "/invalidate",
    validateRequest(invalidateSchema),
    controller.invalidate.bind(controller),
  );
  router.get("/stats", controller.stats.bind(controller));

  return router;
}
