import express from "express";
import cors from "cors";
import { AuthorizationService, createAuthorizationRouter } from "./modules/authz";
import {
  HealthController,
  HealthDependencies,
  createHealthRoutes,
} from "./modules/health";
import { config } from "./shared/config";
import { logger } from "./shared/logger";
import { errorHandler, notFoundHandler } from "./shared/middleware/errorHandler";

export interface AppDependencies {
  authorizationService: AuthorizationService;
  health: HealthDependencies;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(express.json());

  if (config.corsEnabled) {
    const corsOptions: cors.CorsOptions = {
      origin: (origin, callback) => {
        // Non-browser clients send no origin
        if (!origin || config.corsAllowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        logger.warn("CORS origin rejected", { origin });
        callback(new Error("Not allowed by CORS"));
      },
      methods: ["GET", "POST"],
    };
    app.use(cors(corsOptions));
  }

  // Request logging
  app.use((req, res, next) => {
    const startTime = Date.now();
    res.on("finish", () => {
      logger.logRequest(
        {
          method: req.method,
          url: req.originalUrl,
          ...(req.ip ? { ip: req.ip } : {}),
        },
        res.statusCode,
        Date.now() - startTime,
      );
    });
    next();
  });

  app.use("/health", createHealthRoutes(new HealthController(deps.health)));
  app.use("/api/authz", createAuthorizationRouter(deps.authorizationService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
