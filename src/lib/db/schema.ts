/**
 * Drizzle schema for the relational backend.
 * Mirrors drizzle/0000_init.sql.
 */

import { pgTable, text, timestamp, jsonb, bigserial, boolean } from "drizzle-orm/pg-core";

/** Key-value settings (system prompt, report prompt, default model, ...). */
export const settings = pgTable("settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
});

/** Rating scales. Ids are bigserial (any safe integer) but seeds and replace-all insert explicit ids. */
export const scales = pgTable("scales", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  name: text("name").notNull(),
  category: text("category").notNull().default(""),
  enabled: boolean("enabled").notNull().default(true),
  instructions: text("instructions").notNull().default(""),
});

/** AI models, keyed by caller-supplied slug. */
export const models = pgTable("models", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  provider: text("provider").notNull().default(""),
});

/** Analysis history. data holds the entry payload without its id. */
export const history = pgTable("history", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  data: jsonb("data").$type<Record<string, unknown>>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
