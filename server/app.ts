import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppServices } from "./app-services.js";
import { registerRoutes } from "./routes.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("HTTP");

export function createApp(services: AppServices): Express {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Request logging for API calls
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        log.info(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  registerRoutes(app, services);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    log.error("❌ Unhandled error:", err);
    const message = err instanceof Error ? err.message : "Internal Server Error";
    res.status(500).json({ success: false, error: message });
  });

  return app;
}
