/**
 * Reset and demo routes.
 */

import type { Request, Response } from "express";
import type { ResourceStore } from "../../src/lib/persistence/types.js";
import { loadDefaults, resetToDefaults } from "../../src/lib/persistence/defaults.js";
import { loadDemoResult } from "../../src/lib/demo/demoResult.js";
import { sendError, type StoreHandler } from "./http.js";

export function resetPost(defaultsPath: string): StoreHandler {
  return async (store: ResourceStore, _req: Request, res: Response) => {
    const defaults = await loadDefaults(defaultsPath);
    await resetToDefaults(store, defaults);
    console.log("[api] Reset all resources to defaults");
    res.json({ success: true });
  };
}

/** Served without a store lease. */
export function demoResultGet(demoResultPath: string) {
  return async (_req: Request, res: Response) => {
    try {
      const result = await loadDemoResult(demoResultPath);
      if (!result) return sendError(res, 404, "Demo result not available");
      res.json(result);
    } catch (e) {
      sendError(res, 500, e instanceof Error ? e.message : "Internal server error");
    }
  };
}
