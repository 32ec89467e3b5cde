/**
 * Copies every resource kind from one store into another.
 * Used to move a document store into the relational backend.
 */

import type { ResourceStore } from "./types.js";

export interface TransferSummary {
  settings: number;
  scales: number;
  models: number;
  history: number;
}

/** Replace-all per kind inside one target transaction. History keeps ids and order. */
export async function copyResources(source: ResourceStore, target: ResourceStore): Promise<TransferSummary> {
  const [settings, scales, models, history] = await Promise.all([
    source.settings.getAll(),
    source.scales.getAll(),
    source.models.getAll(),
    source.history.getAll(),
  ]);
  await target.transaction(async (tx) => {
    await tx.settings.replaceAll(settings);
    await tx.scales.replaceAll(scales);
    await tx.models.replaceAll(models);
    await tx.history.replaceAll(history);
  });
  return {
    settings: settings.length,
    scales: scales.length,
    models: models.length,
    history: history.length,
  };
}
