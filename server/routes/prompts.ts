/**
 * Prompts API routes - system prompt, combined prompts document, scales.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import type { ResourceStore } from "../../src/lib/persistence/types.js";
import { ModelSchema, ScaleAddSchema, ScalePatchSchema, ScaleSchema } from "../../src/lib/persistence/schemas.js";
import { paramInt, parseBody, sendError } from "./http.js";
import { isReservedKey, settingsToObject } from "./settings.js";

const PromptsBodySchema = z
  .object({
    scales: z.array(ScaleSchema).optional(),
    models: z.array(ModelSchema).optional(),
  })
  .catchall(z.unknown());

const SystemPromptBodySchema = z.object({ systemPrompt: z.string().default("") });

const ScalesBodySchema = z.object({ scales: z.array(ScaleSchema).default([]) });

export async function promptsGet(store: ResourceStore, _req: Request, res: Response) {
  const [settings, scales, models] = await Promise.all([
    store.settings.getAll(),
    store.scales.getAll(),
    store.models.getAll(),
  ]);
  res.json({ systemPrompt: "", ...settingsToObject(settings), scales, models });
}

/** String fields become settings; scales and models, when present, replace their sets. */
export async function promptsPost(store: ResourceStore, req: Request, res: Response) {
  const body = parseBody(req, res, PromptsBodySchema);
  if (!body) return;
  const { scales, models, ...rest } = body;
  await store.transaction(async (tx) => {
    for (const [key, value] of Object.entries(rest)) {
      if (isReservedKey(key) || typeof value !== "string") continue;
      await tx.settings.upsertOne({ key, value });
    }
    if (scales) await tx.scales.replaceAll(scales);
    if (models) await tx.models.replaceAll(models);
  });
  res.json({ success: true });
}

export async function systemPromptGet(store: ResourceStore, _req: Request, res: Response) {
  const setting = await store.settings.getOne("systemPrompt");
  res.json({ systemPrompt: setting?.value ?? "" });
}

export async function systemPromptPost(store: ResourceStore, req: Request, res: Response) {
  const body = parseBody(req, res, SystemPromptBodySchema);
  if (!body) return;
  await store.settings.upsertOne({ key: "systemPrompt", value: body.systemPrompt });
  res.json({ success: true });
}

export async function scalesGet(store: ResourceStore, _req: Request, res: Response) {
  res.json({ scales: await store.scales.getAll() });
}

export async function scalesPost(store: ResourceStore, req: Request, res: Response) {
  const body = parseBody(req, res, ScalesBodySchema);
  if (!body) return;
  await store.scales.replaceAll(body.scales);
  res.json({ success: true });
}

/** Without an id the backend assigns one; an integer id makes this an upsert. */
export async function scaleAddPost(store: ResourceStore, req: Request, res: Response) {
  const body = parseBody(req, res, ScaleAddSchema);
  if (!body) return;
  const { id, ...input } = body;
  if (id !== undefined) {
    await store.scales.upsertOne({ ...input, id });
    return res.json({ success: true, id });
  }
  const newId = await store.scales.addWithGeneratedId(input);
  res.json({ success: true, id: newId });
}

export async function scalePut(store: ResourceStore, req: Request, res: Response) {
  const id = paramInt(req, "id");
  if (id === null) return sendError(res, 404, "Scale not found");
  const fields = parseBody(req, res, ScalePatchSchema);
  if (!fields) return;
  const updated = await store.scales.updatePartial(id, fields);
  if (!updated) return sendError(res, 404, "Scale not found");
  res.json({ success: true });
}

export async function scaleDelete(store: ResourceStore, req: Request, res: Response) {
  const id = paramInt(req, "id");
  if (id === null) return sendError(res, 404, "Scale not found");
  await store.scales.deleteOne(id);
  res.json({ success: true });
}
