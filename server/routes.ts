import { Router, type Express, type NextFunction, type Request, type Response } from "express";
import type { AppServices } from "./app-services.js";
import { ToolError } from "./utils/estimation-errors.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("Routes");

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Route ToolErrors to a JSON 4xx, everything else to the error middleware
function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch((error: unknown) => {
      if (error instanceof ToolError) {
        res.status(error.status).json({ success: false, error: error.message });
        return;
      }
      next(error);
    });
  };
}

export function createApiRouter(services: AppServices): Router {
  const router = Router();
  const { dispatcher } = services;

  /**
   * List tools
   * GET /api/tools
   */
  router.get("/tools", (_req: Request, res: Response) => {
    res.json({ success: true, tools: dispatcher.listTools() });
  });

  /**
   * Call a tool; the body is the tool's arguments
   * POST /api/tools/:name
   */
  router.post(
    "/tools/:name",
    handle(async (req, res) => {
      const content = await dispatcher.callTool(req.params.name, req.body);
      res.json({ success: true, content });
    })
  );

  /**
   * Structured sale price estimate
   * POST /api/estimate
   */
  router.post(
    "/estimate",
    handle(async (req, res) => {
      const result = await dispatcher.estimate(req.body);
      res.json({ success: true, result });
    })
  );

  router.get(
    "/resources",
    handle(async (_req, res) => {
      res.json({ success: true, resources: await dispatcher.listResources() });
    })
  );

  /**
   * GET /api/resources/:kind/:id  (kind: property | investor)
   */
  router.get(
    "/resources/:kind/:id",
    handle(async (req, res) => {
      const text = await dispatcher.readResource(`${req.params.kind}://local.host/${req.params.id}`);
      res.type("application/json").send(text);
    })
  );

  return router;
}

export function registerRoutes(app: Express, services: AppServices): void {
  // Health check with cache statistics
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || "1.0.0",
      cache: services.marketData.getCacheStats(),
    });
  });

  app.use("/api", createApiRouter(services));
  log.debug("📡 API routes registered");
}
