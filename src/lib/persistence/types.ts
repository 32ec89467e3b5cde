/**
 * Resource Access Layer types.
 * One ResourceStore per backend; one collection per resource kind.
 */

import type { PersistenceDriver } from "./driver.js";

export interface Setting {
  key: string;
  value: string;
}

export interface Scale {
  id: number;
  name: string;
  category: string;
  enabled: boolean;
  instructions: string;
}

export type ScaleInput = Omit<Scale, "id">;

export interface Model {
  id: string;
  name: string;
  provider: string;
}

export type ModelFields = Omit<Model, "id">;

/** Analysis result. Fields besides id are whatever the client stored. */
export interface HistoryEntry {
  id: number;
  [field: string]: unknown;
}

/** History entry as written by a client; id optional. */
export type HistoryPayload = Record<string, unknown>;

/**
 * Uniform contract over a resource kind.
 * TWrite is the replace-all item type (history accepts entries without ids).
 */
export interface ResourceCollection<T, TId, TWrite = T> {
  /** Never throws on missing or corrupt storage. */
  getAll(): Promise<T[]>;
  getOne(id: TId): Promise<T | null>;
  replaceAll(items: TWrite[]): Promise<void>;
  upsertOne(item: T): Promise<void>;
  /** Absent id is a no-op. */
  deleteOne(id: TId): Promise<void>;
}

export interface PatchableCollection<T, TId, TPatch, TWrite = T> extends ResourceCollection<T, TId, TWrite> {
  /** Merges fields into the stored record. Returns null when id is unknown. */
  updatePartial(id: TId, fields: TPatch): Promise<T | null>;
}

export interface GeneratedIdCollection<TInput, TId> {
  addWithGeneratedId(item: TInput): Promise<TId>;
}

export type SettingCollection = ResourceCollection<Setting, string>;

export type ScaleCollection = PatchableCollection<Scale, number, Partial<ScaleInput>> &
  GeneratedIdCollection<ScaleInput, number>;

export type ModelCollection = PatchableCollection<Model, string, Partial<ModelFields>>;

export type HistoryCollection = PatchableCollection<HistoryEntry, number, HistoryPayload, HistoryPayload> &
  GeneratedIdCollection<HistoryPayload, number>;

export interface ResourceStore {
  readonly settings: SettingCollection;
  readonly scales: ScaleCollection;
  readonly models: ModelCollection;
  readonly history: HistoryCollection;
  /** Empties all four kinds. */
  clearAll(): Promise<void>;
  /** Runs fn atomically where the backend supports it. */
  transaction<T>(fn: (store: ResourceStore) => Promise<T>): Promise<T>;
}

/** A store handle scoped to one unit of work (one HTTP request). */
export interface StoreLease {
  store: ResourceStore;
  release(): void;
}

export interface StoreProvider {
  readonly driver: PersistenceDriver;
  acquire(): Promise<StoreLease>;
  close(): Promise<void>;
}
