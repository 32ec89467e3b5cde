/**
 * Relational backend. Used when PERSISTENCE_DRIVER=db.
 * Multi-statement writes run inside a transaction; explicit ids written into
 * serial columns are followed by a sequence resync.
 */

import { asc, desc, eq, sql } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import * as schema from "../db/schema.js";
import type {
  HistoryCollection,
  HistoryEntry,
  ModelCollection,
  ResourceStore,
  ScaleCollection,
  SettingCollection,
} from "./types.js";
import { assignHistoryIds, dedupeById, definedFields, withoutId } from "./identity.js";

const { settings, scales, models, history } = schema;

export type Schema = typeof schema;

type SerialTable = "scales" | "history";

function toEntry(row: { id: number; data: Record<string, unknown> }): HistoryEntry {
  return { ...row.data, id: row.id };
}

export class DbResourceStore<TQueryResult extends PgQueryResultHKT> implements ResourceStore {
  readonly settings: SettingCollection;
  readonly scales: ScaleCollection;
  readonly models: ModelCollection;
  readonly history: HistoryCollection;

  constructor(private readonly db: PgDatabase<TQueryResult, Schema>) {
    this.settings = {
      getAll: async () => db.select().from(settings).orderBy(asc(settings.key)),
      getOne: async (key) => {
        const rows = await db.select().from(settings).where(eq(settings.key, key));
        return rows[0] ?? null;
      },
      replaceAll: (items) =>
        this.atomically(async (tx) => {
          await tx.delete(settings);
          const rows = dedupeById(items, (s) => s.key);
          if (rows.length > 0) await tx.insert(settings).values(rows);
        }),
      upsertOne: async (item) => {
        await db
          .insert(settings)
          .values(item)
          .onConflictDoUpdate({ target: settings.key, set: { value: item.value } });
      },
      deleteOne: async (key) => {
        await db.delete(settings).where(eq(settings.key, key));
      },
    };

    this.scales = {
      getAll: async () => db.select().from(scales).orderBy(asc(scales.id)),
      getOne: async (id) => {
        const rows = await db.select().from(scales).where(eq(scales.id, id));
        return rows[0] ?? null;
      },
      replaceAll: (items) =>
        this.atomically(async (tx) => {
          await tx.delete(scales);
          const rows = dedupeById(items, (s) => s.id);
          if (rows.length > 0) await tx.insert(scales).values(rows);
          await resyncSequence(tx, "scales");
        }),
      upsertOne: (item) =>
        this.atomically(async (tx) => {
          const { id: _id, ...fields } = item;
          await tx.insert(scales).values(item).onConflictDoUpdate({ target: scales.id, set: fields });
          await resyncSequence(tx, "scales");
        }),
      addWithGeneratedId: async (input) => {
        const [row] = await db
          .insert(scales)
          .values({
            name: input.name,
            category: input.category,
            enabled: input.enabled,
            instructions: input.instructions,
          })
          .returning({ id: scales.id });
        if (!row) throw new Error("Insert into scales returned no id");
        return row.id;
      },
      updatePartial: async (id, fields) => {
        const patch = definedFields(fields);
        if (Object.keys(patch).length === 0) return this.scales.getOne(id);
        const rows = await db.update(scales).set(patch).where(eq(scales.id, id)).returning();
        return rows[0] ?? null;
      },
      deleteOne: async (id) => {
        await db.delete(scales).where(eq(scales.id, id));
      },
    };

    this.models = {
      getAll: async () => db.select().from(models).orderBy(asc(models.id)),
      getOne: async (id) => {
        const rows = await db.select().from(models).where(eq(models.id, id));
        return rows[0] ?? null;
      },
      replaceAll: (items) =>
        this.atomically(async (tx) => {
          await tx.delete(models);
          const rows = dedupeById(items, (m) => m.id);
          if (rows.length > 0) await tx.insert(models).values(rows);
        }),
      upsertOne: async (item) => {
        await db
          .insert(models)
          .values(item)
          .onConflictDoUpdate({ target: models.id, set: { name: item.name, provider: item.provider } });
      },
      updatePartial: async (id, fields) => {
        const patch = definedFields(fields);
        if (Object.keys(patch).length === 0) return this.models.getOne(id);
        const rows = await db.update(models).set(patch).where(eq(models.id, id)).returning();
        return rows[0] ?? null;
      },
      deleteOne: async (id) => {
        await db.delete(models).where(eq(models.id, id));
      },
    };

    this.history = {
      getAll: async () => {
        const rows = await db
          .select({ id: history.id, data: history.data })
          .from(history)
          .orderBy(desc(history.createdAt), desc(history.id));
        return rows.map(toEntry);
      },
      getOne: async (id) => {
        const rows = await db
          .select({ id: history.id, data: history.data })
          .from(history)
          .where(eq(history.id, id));
        return rows[0] ? toEntry(rows[0]) : null;
      },
      // Supplied order is newest first; created_at steps back 1ms per entry from the
      // database clock, the same clock add and upsert use.
      replaceAll: (payloads) =>
        this.atomically(async (tx) => {
          await tx.delete(history);
          const entries = assignHistoryIds(payloads);
          if (entries.length > 0) {
            await tx.insert(history).values(
              entries.map((entry, i) => ({
                id: entry.id,
                data: withoutId(entry),
                createdAt: sql`now() - ${i} * interval '1 millisecond'`,
              }))
            );
          }
          await resyncSequence(tx, "history");
        }),
      upsertOne: (entry) =>
        this.atomically(async (tx) => {
          const data = withoutId(entry);
          await tx
            .insert(history)
            .values({ id: entry.id, data })
            .onConflictDoUpdate({ target: history.id, set: { data } });
          await resyncSequence(tx, "history");
        }),
      addWithGeneratedId: async (payload) => {
        const [row] = await db
          .insert(history)
          .values({ data: withoutId(payload) })
          .returning({ id: history.id });
        if (!row) throw new Error("Insert into history returned no id");
        return row.id;
      },
      updatePartial: (id, fields) =>
        this.atomically(async (tx) => {
          const rows = await tx
            .select({ data: history.data })
            .from(history)
            .where(eq(history.id, id))
            .for("update");
          const existing = rows[0];
          if (!existing) return null;
          const data = { ...existing.data, ...withoutId(fields) };
          await tx.update(history).set({ data }).where(eq(history.id, id));
          return toEntry({ id, data });
        }),
      deleteOne: async (id) => {
        await db.delete(history).where(eq(history.id, id));
      },
    };
  }

  async clearAll(): Promise<void> {
    await this.atomically(async (tx) => {
      await tx.delete(history);
      await tx.delete(scales);
      await tx.delete(models);
      await tx.delete(settings);
      await resyncSequence(tx, "scales");
      await resyncSequence(tx, "history");
    });
  }

  transaction<T>(fn: (store: ResourceStore) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DbResourceStore(tx)));
  }

  /** Nested calls become savepoints inside the outer transaction. */
  private atomically<T>(fn: (tx: PgDatabase<TQueryResult, Schema>) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(tx));
  }
}

/**
 * Points the serial sequence at max(id) so the next generated id is max + 1.
 * With no positive id (empty, or only ids <= 0) the next generated id is 1.
 */
async function resyncSequence<TQueryResult extends PgQueryResultHKT>(
  db: PgDatabase<TQueryResult, Schema>,
  table: SerialTable
): Promise<void> {
  await db.execute(
    sql.raw(
      `SELECT setval(pg_get_serial_sequence('${table}', 'id'), GREATEST(COALESCE(MAX("id"), 1), 1), COALESCE(MAX("id") >= 1, false)) FROM "${table}"`
    )
  );
}
