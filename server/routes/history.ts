/**
 * History API routes - saved analysis results, newest first.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import type { ResourceStore } from "../../src/lib/persistence/types.js";
import { HistoryPayloadSchema } from "../../src/lib/persistence/schemas.js";
import { isIntegerId } from "../../src/lib/persistence/identity.js";
import { paramInt, parseBody, sendError } from "./http.js";

const HistoryListSchema = z.array(HistoryPayloadSchema);

export async function historyGet(store: ResourceStore, _req: Request, res: Response) {
  res.json(await store.history.getAll());
}

export async function historyPost(store: ResourceStore, req: Request, res: Response) {
  const entries = parseBody(req, res, HistoryListSchema);
  if (!entries) return;
  await store.history.replaceAll(entries);
  res.json({ success: true });
}

/** An integer id in the body overwrites that entry; otherwise a new id is assigned. */
export async function historyAddPost(store: ResourceStore, req: Request, res: Response) {
  const payload = parseBody(req, res, HistoryPayloadSchema);
  if (!payload) return;
  const { id } = payload;
  if (isIntegerId(id)) {
    await store.history.upsertOne({ ...payload, id });
    return res.json({ success: true, id });
  }
  const newId = await store.history.addWithGeneratedId(payload);
  res.json({ success: true, id: newId });
}

export async function historyEntryGet(store: ResourceStore, req: Request, res: Response) {
  const id = paramInt(req, "id");
  const entry = id === null ? null : await store.history.getOne(id);
  if (!entry) return sendError(res, 404, "Analysis not found");
  res.json(entry);
}

export async function historyEntryPut(store: ResourceStore, req: Request, res: Response) {
  const id = paramInt(req, "id");
  if (id === null) return sendError(res, 404, "Analysis not found");
  const fields = parseBody(req, res, HistoryPayloadSchema);
  if (!fields) return;
  const updated = await store.history.updatePartial(id, fields);
  if (!updated) return sendError(res, 404, "Analysis not found");
  res.json({ success: true });
}

export async function historyEntryDelete(store: ResourceStore, req: Request, res: Response) {
  const id = paramInt(req, "id");
  if (id === null) return sendError(res, 404, "Analysis not found");
  await store.history.deleteOne(id);
  res.json({ success: true });
}
