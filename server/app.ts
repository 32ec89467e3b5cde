/**
 * Express app factory - API + static frontend. No listening, no globals; tests build their own.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { registerApiRoutes, type ApiDeps } from "./routes/index.js";
import { registerSecurityMiddleware } from "./middleware/security.js";
import { registerStaticRoutes } from "./middleware/staticFiles.js";

export interface AppDeps extends ApiDeps {
  publicDir: string;
  dataDir: string;
}

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  registerSecurityMiddleware(app);
  app.use(express.json({ limit: "10mb" }));

  // API routes - mount first so /api/* is never handled by static
  registerApiRoutes(app, deps);
  registerStaticRoutes(app, { publicDir: deps.publicDir, dataDir: deps.dataDir });

  // Body parser failures (malformed JSON, oversized body) and anything else thrown past a route
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    if (status >= 500) console.error(`[Server] ${req.method} ${req.originalUrl} failed:`, err);
    res.status(status).json({ success: false, error: err instanceof Error ? err.message : "Internal server error" });
  });

  return app;
}
