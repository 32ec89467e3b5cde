/**
 * Identity helpers shared by both backends: next-id allocation,
 * de-duplication by id, and history id assignment.
 */

import type { HistoryEntry, HistoryPayload } from "./types.js";

export function isIntegerId(v: unknown): v is number {
  return typeof v === "number" && Number.isSafeInteger(v);
}

/** max(ids) + 1, or 1 for an empty set. */
export function nextId(ids: Iterable<number>): number {
  let max = 0;
  for (const id of ids) {
    if (id > max) max = id;
  }
  return max + 1;
}

/** Keeps one item per id: the position of the first occurrence, the value of the last. */
export function dedupeById<T, TId>(items: T[], idOf: (item: T) => TId): T[] {
  const byId = new Map<TId, T>();
  for (const item of items) {
    byId.set(idOf(item), item);
  }
  return [...byId.values()];
}

export function withoutId(payload: HistoryPayload): HistoryPayload {
  const rest: HistoryPayload = { ...payload };
  delete rest.id;
  return rest;
}

/**
 * Honors integer ids already present; the rest get max(explicit) + 1, + 2, ...
 * in list order. Later duplicates of an explicit id are dropped.
 */
export function assignHistoryIds(payloads: HistoryPayload[]): HistoryEntry[] {
  const explicit = payloads.map((p) => p.id).filter(isIntegerId);
  let next = nextId(explicit);
  const seen = new Set<number>();
  const out: HistoryEntry[] = [];
  for (const payload of payloads) {
    const id = isIntegerId(payload.id) ? payload.id : next++;
    if (seen.has(id)) continue;
    seen.add(id);
    out.push({ ...withoutId(payload), id });
  }
  return out;
}

/** Drops keys whose value is undefined so a spread cannot erase stored fields. */
export function definedFields<T extends object>(fields: Partial<T>): Partial<T> {
  const out: Partial<T> = { ...fields };
  for (const key in out) {
    if (out[key] === undefined) delete out[key];
  }
  return out;
}
