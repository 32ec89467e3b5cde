/**
 * Models API routes. Model ids look like "provider/model", so the id param is a wildcard.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import type { ResourceStore } from "../../src/lib/persistence/types.js";
import { ModelPatchSchema, ModelSchema } from "../../src/lib/persistence/schemas.js";
import { paramId, parseBody, sendError } from "./http.js";

const ModelsBodySchema = z.object({ models: z.array(ModelSchema).default([]) });

export async function modelsGet(store: ResourceStore, _req: Request, res: Response) {
  res.json({ models: await store.models.getAll() });
}

export async function modelsPost(store: ResourceStore, req: Request, res: Response) {
  const body = parseBody(req, res, ModelsBodySchema);
  if (!body) return;
  await store.models.replaceAll(body.models);
  res.json({ success: true });
}

export async function modelAddPost(store: ResourceStore, req: Request, res: Response) {
  const model = parseBody(req, res, ModelSchema);
  if (!model) return;
  await store.models.upsertOne(model);
  res.json({ success: true });
}

export async function modelPut(store: ResourceStore, req: Request, res: Response) {
  const fields = parseBody(req, res, ModelPatchSchema);
  if (!fields) return;
  const updated = await store.models.updatePartial(paramId(req, "id"), fields);
  if (!updated) return sendError(res, 404, "Model not found");
  res.json({ success: true });
}

export async function modelDelete(store: ResourceStore, req: Request, res: Response) {
  await store.models.deleteOne(paramId(req, "id"));
  res.json({ success: true });
}
