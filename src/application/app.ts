import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import type { Container } from "inversify";
import { createVillageRoutes } from "./routes/villageRoutes";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import type { AppConfig } from "../config/config";

/**
 * Builds the Express application.
 *
 * Configures middleware, routes, and error handling for the village server.
 * Supports CORS for cross-origin requests and JSON payloads.
 *
 * @module application
 */
export function createApp(
  container: Container,
  config: Pick<AppConfig, "ALLOWED_ORIGINS">,
): Express {
  const app = express();

  app.use(
    cors({
      origin: config.ALLOWED_ORIGINS,
      credentials: config.ALLOWED_ORIGINS !== "*",
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.HTTP);
      next();
    });
  }

  app.use("/", createVillageRoutes(container));

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  app.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
      const errorMessage =
        process.env.NODE_ENV === "production"
          ? "Internal server error"
          : err.message;
      logger.error("Unhandled error:", LogCategory.HTTP, err.message);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: errorMessage });
    },
  );

  return app;
}
