/**
 * Health Check Routes
 *
 * - GET /health/live  - Liveness probe
 * - GET /health/ready - Readiness probe (policy store reachable)
 * - GET /health       - Store, cache and remote evaluator status
 */

import { Router, Request, Response, NextFunction } from "express";
import { HealthController } from "./health.controller";

export function createHealthRoutes(healthController: HealthController): Router {
  const router = Router();

  router.get("/live", (req: Request, res: Response) => {
    healthController.liveness(req, res);
  });

  router.get("/ready", (req: Request, res: Response, next: NextFunction) => {
    healthController.readiness(req, res).catch(next);
  });

  router.get("/", (req: Request, res: Response, next: NextFunction) => {
    healthController.detailed(req, res).catch(next);
  });

  return router;
}
