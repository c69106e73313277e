// src/app.ts — Express application factory with request correlation and structured logging

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import cors from "cors";
import { randomUUID } from "crypto";

import healthRoutes from "./modules/health/health.controller";
import { createAnalysisRouter } from "./modules/analysis/analysis.routes";

import type { AppConfig } from "@/config/app.config";
import { withRequestContext } from "@/lib/observability/request-context";
import { describeError, log } from "@/lib/observability/logger";
import { DomainError } from "@/lib/errors/domain-error";

export type AppOptions = Pick<AppConfig, "corsOrigin" | "uploadLimitBytes">;

export function createApp(opts: AppOptions): Express {
  const app: Express = express();

  // Analysis results are computed per upload; never serve a cached 304
  app.set("etag", false);
  app.disable("x-powered-by");

  ////////////////////////////////////////////////////////////////
  // CORS (must be before routes)
  ////////////////////////////////////////////////////////////////

  app.use(
    cors({
      origin: opts.corsOrigin,
      credentials: true,
    }),
  );

  ////////////////////////////////////////////////////////////////
  // Correlation + structured logging middleware
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id")?.trim() || randomUUID();

    res.setHeader("x-request-id", requestId);

    const start = Date.now();

    withRequestContext(() => {
      log("INFO", "HTTP_REQUEST_STARTED", {
        method: req.method,
        path: req.originalUrl,
      });

      res.on("finish", () => {
        log("INFO", "HTTP_REQUEST_COMPLETED", {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start,
        });
      });

      next();
    }, requestId);
  });

  ////////////////////////////////////////////////////////////////
  // Root route
  ////////////////////////////////////////////////////////////////

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      service: "flock-records-analyzer",
      health: "/health",
      routes: ["POST /analyze", "GET /health"],
    });
  });

  ////////////////////////////////////////////////////////////////
  // Domain routes
  ////////////////////////////////////////////////////////////////

  app.use(healthRoutes);
  app.use(createAnalysisRouter({ uploadLimitBytes: opts.uploadLimitBytes }));

  ////////////////////////////////////////////////////////////////
  // 404 fallback
  ////////////////////////////////////////////////////////////////

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "Route not found" });
  });

  ////////////////////////////////////////////////////////////////
  // Global error handler (must be last)
  ////////////////////////////////////////////////////////////////

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof DomainError) {
      log("WARN", "HTTP_REQUEST_REJECTED", { code: err.code, status: err.status });
      return res.status(err.status).json(err.toBody());
    }

    log("ERROR", "HTTP_REQUEST_FAILED", describeError(err));

    return res.status(500).json({
      ok: false,
      error: "Internal Server Error",
    });
  });

  return app;
}
