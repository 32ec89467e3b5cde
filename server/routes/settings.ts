/**
 * Settings API routes - key/value pairs.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import type { ResourceStore, Setting } from "../../src/lib/persistence/types.js";
import { RESERVED_DOCUMENT_KEYS } from "../../src/lib/persistence/fileStore.js";
import { paramId, parseBody, sendError } from "./http.js";

const SettingsBodySchema = z.record(z.string(), z.unknown());

const SettingValueBodySchema = z.object({
  value: z.unknown().refine((v) => v !== undefined, "value is required"),
});

/** Strings are stored as-is; anything else as its JSON text. */
export function encodeSettingValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function settingsToObject(settings: Setting[]): Record<string, string> {
  return Object.fromEntries(settings.map((s) => [s.key, s.value]));
}

export function isReservedKey(key: string): boolean {
  return RESERVED_DOCUMENT_KEYS.includes(key);
}

export async function settingsGet(store: ResourceStore, _req: Request, res: Response) {
  res.json(settingsToObject(await store.settings.getAll()));
}

export async function settingsPost(store: ResourceStore, req: Request, res: Response) {
  const body = parseBody(req, res, SettingsBodySchema);
  if (!body) return;
  const reserved = Object.keys(body).find(isReservedKey);
  if (reserved) return sendError(res, 400, `Reserved setting key: ${reserved}`);
  await store.transaction(async (tx) => {
    for (const [key, value] of Object.entries(body)) {
      await tx.settings.upsertOne({ key, value: encodeSettingValue(value) });
    }
  });
  res.json({ success: true });
}

export async function settingGet(store: ResourceStore, req: Request, res: Response) {
  const setting = await store.settings.getOne(paramId(req, "key"));
  if (!setting) return sendError(res, 404, "Setting not found");
  res.json({ key: setting.key, value: setting.value });
}

export async function settingPost(store: ResourceStore, req: Request, res: Response) {
  const key = paramId(req, "key");
  if (isReservedKey(key)) return sendError(res, 400, `Reserved setting key: ${key}`);
  const body = parseBody(req, res, SettingValueBodySchema);
  if (!body) return;
  await store.settings.upsertOne({ key, value: encodeSettingValue(body.value) });
  res.json({ success: true });
}
