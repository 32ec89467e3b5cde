/**
 * API route registration for Express.
 * Mounts all routes under /api via a dedicated router.
 */

import express, { type Express } from "express";
import type { StoreProvider } from "../../src/lib/persistence/types.js";
import type { OpenRouterOptions } from "../../src/lib/openrouter/testCall.js";
import { withStoreHandler, type StoreHandler } from "./http.js";
import * as settings from "./settings.js";
import * as prompts from "./prompts.js";
import * as models from "./models.js";
import * as history from "./history.js";
import * as admin from "./admin.js";
import * as openrouter from "./openrouter.js";

export interface ApiDeps {
  provider: StoreProvider;
  defaultsPath: string;
  demoResultPath: string;
  openRouter: OpenRouterOptions;
}

export function registerApiRoutes(app: Express, deps: ApiDeps): void {
  const api = express.Router();
  const store = (handler: StoreHandler) => withStoreHandler(deps.provider, handler);

  // Settings
  api.get("/settings", store(settings.settingsGet));
  api.post("/settings", store(settings.settingsPost));
  api.get("/settings/:key", store(settings.settingGet));
  api.post("/settings/:key", store(settings.settingPost));

  // Prompts + scales
  api.get("/prompts", store(prompts.promptsGet));
  api.post("/prompts", store(prompts.promptsPost));
  api.get("/prompts/system", store(prompts.systemPromptGet));
  api.post("/prompts/system", store(prompts.systemPromptPost));
  api.get("/prompts/scales", store(prompts.scalesGet));
  api.post("/prompts/scales", store(prompts.scalesPost));
  api.post("/prompts/scales/add", store(prompts.scaleAddPost));
  api.put("/prompts/scales/:id", store(prompts.scalePut));
  api.delete("/prompts/scales/:id", store(prompts.scaleDelete));

  // Models - ids contain "/", Express 5 wildcard needs a name
  api.get("/models", store(models.modelsGet));
  api.post("/models", store(models.modelsPost));
  api.post("/models/add", store(models.modelAddPost));
  api.put("/models/*id", store(models.modelPut));
  api.delete("/models/*id", store(models.modelDelete));

  // History
  api.get("/history", store(history.historyGet));
  api.post("/history", store(history.historyPost));
  api.post("/history/add", store(history.historyAddPost));
  api.get("/history/:id", store(history.historyEntryGet));
  api.put("/history/:id", store(history.historyEntryPut));
  api.delete("/history/:id", store(history.historyEntryDelete));

  // Admin + demo
  api.post("/reset-to-defaults", store(admin.resetPost(deps.defaultsPath)));
  api.get("/demo-result", admin.demoResultGet(deps.demoResultPath));

  // OpenRouter
  api.post("/test-openrouter", openrouter.testOpenRouterPost(deps.openRouter));

  api.use((_req, res) => {
    res.status(404).json({ success: false, error: "Not found" });
  });

  app.use("/api", api);
}
