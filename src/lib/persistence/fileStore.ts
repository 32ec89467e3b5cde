/**
 * Document-store backend.
 * prompts.json: { ...settings, scales: [...], models: [...] }
 * history.json: [entry, ...], newest first.
 * Every operation loads and saves whole files; nothing is cached between calls.
 */

import { join } from "path";
import type {
  HistoryCollection,
  HistoryEntry,
  Model,
  ModelCollection,
  ResourceStore,
  Scale,
  ScaleCollection,
  Setting,
  SettingCollection,
} from "./types.js";
import { HistoryEntrySchema, ModelSchema, ScaleSchema } from "./schemas.js";
import { assignHistoryIds, dedupeById, definedFields, nextId, withoutId } from "./identity.js";
import { isPlainObject, loadJsonDocument, parseItems, writeJsonAtomic, type LoadResult } from "./jsonDocument.js";

export const PROMPTS_FILE = "prompts.json";
export const HISTORY_FILE = "history.json";

/** Document fields that are not settings. */
export const RESERVED_DOCUMENT_KEYS: readonly string[] = ["scales", "models"];

export interface PromptsDocument {
  settings: Setting[];
  scales: Scale[];
  models: Model[];
  /** Non-string top-level fields. Not settings, but written back unchanged. */
  extras: Record<string, unknown>;
}

export function emptyPromptsDocument(): PromptsDocument {
  return { settings: [], scales: [], models: [], extras: {} };
}

/** Top-level string fields become settings; other non-reserved fields are kept as extras. */
export function parsePromptsDocument(raw: unknown): PromptsDocument | null {
  if (!isPlainObject(raw)) return null;
  const settings: Setting[] = [];
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (RESERVED_DOCUMENT_KEYS.includes(key)) continue;
    if (typeof value === "string") settings.push({ key, value });
    else extras[key] = value;
  }
  return {
    settings,
    scales: parseItems(raw.scales, ScaleSchema, "scale"),
    models: parseItems(raw.models, ModelSchema, "model"),
    extras,
  };
}

/** A setting written under an extra's key replaces it. */
export function serializePromptsDocument(doc: PromptsDocument): Record<string, unknown> {
  const out: Record<string, unknown> = { ...doc.extras };
  for (const s of doc.settings) out[s.key] = s.value;
  out.scales = doc.scales;
  out.models = doc.models;
  return out;
}

function parseHistoryDocument(raw: unknown): HistoryEntry[] | null {
  if (!Array.isArray(raw)) return null;
  return parseItems(raw, HistoryEntrySchema, "history entry");
}

function byId(a: Scale, b: Scale): number {
  return a.id - b.id;
}

export class FileResourceStore implements ResourceStore {
  readonly settings: SettingCollection;
  readonly scales: ScaleCollection;
  readonly models: ModelCollection;
  readonly history: HistoryCollection;

  private readonly promptsPath: string;
  private readonly historyPath: string;

  constructor(dataDir: string) {
    this.promptsPath = join(dataDir, PROMPTS_FILE);
    this.historyPath = join(dataDir, HISTORY_FILE);

    this.settings = {
      getAll: async () => (await this.loadPrompts()).value.settings,
      getOne: async (key) => (await this.loadPrompts()).value.settings.find((s) => s.key === key) ?? null,
      replaceAll: (items) =>
        this.updatePrompts((doc) => {
          doc.settings = dedupeById(items, (s) => s.key);
        }),
      upsertOne: (item) =>
        this.updatePrompts((doc) => {
          doc.settings = upsertInPlace(doc.settings, item, (s) => s.key);
        }),
      deleteOne: (key) =>
        this.updatePrompts((doc) => {
          doc.settings = doc.settings.filter((s) => s.key !== key);
        }),
    };

    this.scales = {
      getAll: async () => [...(await this.loadPrompts()).value.scales].sort(byId),
      getOne: async (id) => (await this.loadPrompts()).value.scales.find((s) => s.id === id) ?? null,
      replaceAll: (items) =>
        this.updatePrompts((doc) => {
          doc.scales = dedupeById(items, (s) => s.id);
        }),
      upsertOne: (item) =>
        this.updatePrompts((doc) => {
          doc.scales = upsertInPlace(doc.scales, item, (s) => s.id);
        }),
      addWithGeneratedId: (input) =>
        this.updatePrompts((doc) => {
          const id = nextId(doc.scales.map((s) => s.id));
          doc.scales.push({ ...input, id });
          return id;
        }),
      updatePartial: (id, fields) =>
        this.updatePrompts((doc) => {
          const idx = doc.scales.findIndex((s) => s.id === id);
          if (idx < 0) return null;
          const merged: Scale = { ...doc.scales[idx], ...definedFields(fields), id };
          doc.scales[idx] = merged;
          return merged;
        }),
      deleteOne: (id) =>
        this.updatePrompts((doc) => {
          doc.scales = doc.scales.filter((s) => s.id !== id);
        }),
    };

    this.models = {
      getAll: async () => (await this.loadPrompts()).value.models,
      getOne: async (id) => (await this.loadPrompts()).value.models.find((m) => m.id === id) ?? null,
      replaceAll: (items) =>
        this.updatePrompts((doc) => {
          doc.models = dedupeById(items, (m) => m.id);
        }),
      upsertOne: (item) =>
        this.updatePrompts((doc) => {
          doc.models = upsertInPlace(doc.models, item, (m) => m.id);
        }),
      updatePartial: (id, fields) =>
        this.updatePrompts((doc) => {
          const idx = doc.models.findIndex((m) => m.id === id);
          if (idx < 0) return null;
          const merged: Model = { ...doc.models[idx], ...definedFields(fields), id };
          doc.models[idx] = merged;
          return merged;
        }),
      deleteOne: (id) =>
        this.updatePrompts((doc) => {
          doc.models = doc.models.filter((m) => m.id !== id);
        }),
    };

    this.history = {
      getAll: async () => (await this.loadHistory()).value,
      getOne: async (id) => (await this.loadHistory()).value.find((e) => e.id === id) ?? null,
      replaceAll: async (payloads) => {
        await writeJsonAtomic(this.historyPath, assignHistoryIds(payloads));
      },
      upsertOne: (entry) =>
        this.updateHistory((entries) => {
          const idx = entries.findIndex((e) => e.id === entry.id);
          if (idx >= 0) entries[idx] = entry;
          else entries.unshift(entry);
        }),
      addWithGeneratedId: (payload) =>
        this.updateHistory((entries) => {
          const id = nextId(entries.map((e) => e.id));
          entries.unshift({ ...withoutId(payload), id });
          return id;
        }),
      updatePartial: (id, fields) =>
        this.updateHistory((entries) => {
          const idx = entries.findIndex((e) => e.id === id);
          if (idx < 0) return null;
          const merged: HistoryEntry = { ...entries[idx], ...withoutId(fields), id };
          entries[idx] = merged;
          return merged;
        }),
      deleteOne: (id) =>
        this.updateHistory((entries) => {
          const idx = entries.findIndex((e) => e.id === id);
          if (idx >= 0) entries.splice(idx, 1);
        }),
    };
  }

  loadPrompts(): Promise<LoadResult<PromptsDocument>> {
    return loadJsonDocument(this.promptsPath, parsePromptsDocument, emptyPromptsDocument);
  }

  loadHistory(): Promise<LoadResult<HistoryEntry[]>> {
    return loadJsonDocument(this.historyPath, parseHistoryDocument, () => []);
  }

  async clearAll(): Promise<void> {
    await writeJsonAtomic(this.promptsPath, serializePromptsDocument(emptyPromptsDocument()));
    await writeJsonAtomic(this.historyPath, []);
  }

  /** Files are written one at a time; fn runs against this store directly. */
  async transaction<T>(fn: (store: ResourceStore) => Promise<T>): Promise<T> {
    return fn(this);
  }

  private async updatePrompts<T>(mutate: (doc: PromptsDocument) => T): Promise<T> {
    const { value: doc } = await this.loadPrompts();
    const result = mutate(doc);
    await writeJsonAtomic(this.promptsPath, serializePromptsDocument(doc));
    return result;
  }

  private async updateHistory<T>(mutate: (entries: HistoryEntry[]) => T): Promise<T> {
    const { value: entries } = await this.loadHistory();
    const result = mutate(entries);
    await writeJsonAtomic(this.historyPath, entries);
    return result;
  }
}

function upsertInPlace<T, TId>(items: T[], item: T, idOf: (item: T) => TId): T[] {
  const id = idOf(item);
  const idx = items.findIndex((i) => idOf(i) === id);
  if (idx >= 0) {
    const next = [...items];
    next[idx] = item;
    return next;
  }
  return [...items, item];
}
