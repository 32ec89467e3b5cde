/**
 * Default seeding from the static defaults document.
 * Seeds run once at boot when no scales exist, and again on every reset.
 */

import { z } from "zod";
import { getDefaultsPath } from "../../config.js";
import { isPlainObject, loadJsonDocument, parseItems } from "./jsonDocument.js";
import { ModelSchema, ScaleSchema } from "./schemas.js";
import type { Model, ResourceStore, Scale, Setting, StoreProvider } from "./types.js";
import { withStore } from "./provider.js";

/** The only settings taken from the defaults document. */
export const SEEDED_SETTING_KEYS = ["systemPrompt", "reportPrompt", "defaultModel"] as const;

export interface DefaultsDocument {
  settings: Setting[];
  scales: Scale[];
  models: Model[];
}

function emptyDefaults(): DefaultsDocument {
  return { settings: [], scales: [], models: [] };
}

export function parseDefaultsDocument(raw: unknown): DefaultsDocument | null {
  if (!isPlainObject(raw)) return null;
  const settings: Setting[] = [];
  for (const key of SEEDED_SETTING_KEYS) {
    const value = z.string().safeParse(raw[key]);
    if (value.success) settings.push({ key, value: value.data });
  }
  return {
    settings,
    scales: parseItems(raw.scales, ScaleSchema, "default scale"),
    models: parseItems(raw.models, ModelSchema, "default model"),
  };
}

/** Missing or malformed defaults seed nothing. */
export async function loadDefaults(path: string = getDefaultsPath()): Promise<DefaultsDocument> {
  const result = await loadJsonDocument(path, parseDefaultsDocument, emptyDefaults);
  if (result.source === "default") {
    console.warn(`[seed] Defaults document ${path} is ${result.reason}; nothing to seed`);
  }
  return result.value;
}

/** Writes settings, then scales and models with their explicit ids. */
export async function seedDefaults(store: ResourceStore, defaults: DefaultsDocument): Promise<void> {
  for (const setting of defaults.settings) {
    await store.settings.upsertOne(setting);
  }
  for (const scale of defaults.scales) {
    await store.scales.upsertOne(scale);
  }
  for (const model of defaults.models) {
    await store.models.upsertOne(model);
  }
}

/** Clears every resource kind and reseeds, in one transaction. */
export async function resetToDefaults(store: ResourceStore, defaults: DefaultsDocument): Promise<void> {
  await store.transaction(async (tx) => {
    await tx.clearAll();
    await seedDefaults(tx, defaults);
  });
}

/** Seeds only when the scale set is empty. Returns whether it seeded. */
export async function initializeStore(provider: StoreProvider, defaultsPath: string = getDefaultsPath()): Promise<boolean> {
  return withStore(provider, async (store) => {
    const existing = await store.scales.getAll();
    if (existing.length > 0) return false;
    const defaults = await loadDefaults(defaultsPath);
    await store.transaction((tx) => seedDefaults(tx, defaults));
    console.log(
      `[seed] Seeded ${defaults.settings.length} settings, ${defaults.scales.length} scales, ${defaults.models.length} models`
    );
    return true;
  });
}
