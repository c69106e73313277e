// src/modules/health/health.controller.ts
// Liveness endpoint. Must never throw.

import { Router, type Request, type Response } from "express";

const router: Router = Router();

router.get("/health", (_req: Request, res: Response) => {
  res.status(200).json({
    status: "ok",
    mode: process.env.NODE_ENV ?? "unknown",
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

export default router;
