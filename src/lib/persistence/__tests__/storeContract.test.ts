/**
 * Behavior both backends share: ordering, upsert without duplicates,
 * not-found results, no-op deletes, id allocation, history order.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { ResourceStore, Scale } from "../types.js";
import { STORE_BACKENDS, type OpenStore } from "./stores.js";

function scale(id: number, name: string, extra: Partial<Scale> = {}): Scale {
  return { id, name, category: "Personality", enabled: true, instructions: "", ...extra };
}

describe.each(STORE_BACKENDS)("$name store", ({ open }) => {
  let opened: OpenStore;
  let store: ResourceStore;

  beforeEach(async () => {
    opened = await open();
    store = opened.store;
  });

  afterEach(async () => {
    await opened.close();
  });

  it("starts empty", async () => {
    expect(await store.settings.getAll()).toEqual([]);
    expect(await store.scales.getAll()).toEqual([]);
    expect(await store.models.getAll()).toEqual([]);
    expect(await store.history.getAll()).toEqual([]);
    expect(await store.scales.getOne(1)).toBeNull();
    expect(await store.models.getOne("openai/gpt-4o-mini")).toBeNull();
    expect(await store.history.getOne(1)).toBeNull();
    expect(await store.settings.getOne("systemPrompt")).toBeNull();
  });

  describe("settings", () => {
    it("upsert overwrites the value for an existing key", async () => {
      await store.settings.upsertOne({ key: "systemPrompt", value: "first" });
      await store.settings.upsertOne({ key: "systemPrompt", value: "second" });
      expect(await store.settings.getAll()).toEqual([{ key: "systemPrompt", value: "second" }]);
      expect(await store.settings.getOne("systemPrompt")).toEqual({ key: "systemPrompt", value: "second" });
    });

    it("deleteOne removes the key and ignores unknown keys", async () => {
      await store.settings.upsertOne({ key: "reportPrompt", value: "r" });
      await store.settings.deleteOne("missing");
      await store.settings.deleteOne("reportPrompt");
      expect(await store.settings.getAll()).toEqual([]);
    });
  });

  describe("scales", () => {
    it("replaceAll round trip lists the set ascending by id", async () => {
      await store.scales.replaceAll([scale(3, "C"), scale(1, "A"), scale(2, "B")]);
      expect(await store.scales.getAll()).toEqual([scale(1, "A"), scale(2, "B"), scale(3, "C")]);
    });

    it("replaceAll keeps the last occurrence of a duplicated id", async () => {
      await store.scales.replaceAll([scale(1, "A"), scale(2, "B"), scale(1, "A2")]);
      expect(await store.scales.getAll()).toEqual([scale(1, "A2"), scale(2, "B")]);
    });

    it("replaceAll discards the previous set", async () => {
      await store.scales.replaceAll([scale(1, "A"), scale(2, "B")]);
      await store.scales.replaceAll([scale(5, "E")]);
      expect(await store.scales.getAll()).toEqual([scale(5, "E")]);
    });

    it("upsertOne twice with the same id leaves one record", async () => {
      await store.scales.upsertOne(scale(4, "Old"));
      await store.scales.upsertOne(scale(4, "New", { enabled: false }));
      expect(await store.scales.getAll()).toEqual([scale(4, "New", { enabled: false })]);
    });

    it("addWithGeneratedId starts at 1 and continues after explicit ids", async () => {
      const input = { name: "X", category: "Y", enabled: true, instructions: "Z" };
      expect(await store.scales.addWithGeneratedId(input)).toBe(1);
      await store.scales.replaceAll([scale(5, "E")]);
      expect(await store.scales.addWithGeneratedId(input)).toBe(6);
      expect(await store.scales.getOne(6)).toEqual({ id: 6, ...input });
    });

    it("updatePartial merges fields and keeps the id", async () => {
      await store.scales.upsertOne(scale(2, "B", { instructions: "old" }));
      const updated = await store.scales.updatePartial(2, { instructions: "new", category: undefined });
      expect(updated).toEqual(scale(2, "B", { instructions: "new" }));
      expect(await store.scales.getOne(2)).toEqual(scale(2, "B", { instructions: "new" }));
    });

    it("updatePartial on an unknown id returns null", async () => {
      expect(await store.scales.updatePartial(42, { name: "Nope" })).toBeNull();
      expect(await store.scales.getAll()).toEqual([]);
    });

    it("deleteOne removes the id and ignores unknown ids", async () => {
      await store.scales.replaceAll([scale(1, "A"), scale(2, "B")]);
      await store.scales.deleteOne(99);
      await store.scales.deleteOne(1);
      expect(await store.scales.getAll()).toEqual([scale(2, "B")]);
    });
  });

  describe("models", () => {
    it("upsertOne replaces an existing id", async () => {
      await store.models.upsertOne({ id: "openai/gpt-4o-mini", name: "Mini", provider: "OpenAI" });
      await store.models.upsertOne({ id: "openai/gpt-4o-mini", name: "GPT-4o mini", provider: "OpenAI" });
      expect(await store.models.getAll()).toEqual([
        { id: "openai/gpt-4o-mini", name: "GPT-4o mini", provider: "OpenAI" },
      ]);
    });

    it("replaceAll de-duplicates by id", async () => {
      await store.models.replaceAll([
        { id: "a/one", name: "One", provider: "A" },
        { id: "a/one", name: "One again", provider: "A" },
      ]);
      expect(await store.models.getAll()).toEqual([{ id: "a/one", name: "One again", provider: "A" }]);
    });

    it("updatePartial merges and returns null for unknown ids", async () => {
      await store.models.upsertOne({ id: "google/gemini-2.0-flash-001", name: "Gemini", provider: "" });
      expect(await store.models.updatePartial("google/gemini-2.0-flash-001", { provider: "Google" })).toEqual({
        id: "google/gemini-2.0-flash-001",
        name: "Gemini",
        provider: "Google",
      });
      expect(await store.models.updatePartial("nonexistent-id", { name: "x" })).toBeNull();
    });

    it("deleteOne of an unknown id leaves the set unchanged", async () => {
      await store.models.upsertOne({ id: "a/one", name: "One", provider: "A" });
      await store.models.deleteOne("nonexistent-id");
      expect(await store.models.getAll()).toEqual([{ id: "a/one", name: "One", provider: "A" }]);
      await store.models.deleteOne("a/one");
      expect(await store.models.getAll()).toEqual([]);
    });
  });

  describe("history", () => {
    it("lists generated entries newest first", async () => {
      const first = await store.history.addWithGeneratedId({ candidateName: "A" });
      const second = await store.history.addWithGeneratedId({ candidateName: "B", id: "ignored" });
      expect([first, second]).toEqual([1, 2]);
      expect(await store.history.getAll()).toEqual([
        { candidateName: "B", id: 2 },
        { candidateName: "A", id: 1 },
      ]);
      expect(await store.history.getOne(1)).toEqual({ candidateName: "A", id: 1 });
    });

    it("upsertOne keeps the position of an existing entry and puts a new one first", async () => {
      await store.history.addWithGeneratedId({ candidateName: "A" });
      await store.history.addWithGeneratedId({ candidateName: "B" });
      await store.history.upsertOne({ id: 1, candidateName: "A2" });
      expect((await store.history.getAll()).map((e) => e.id)).toEqual([2, 1]);
      expect(await store.history.getOne(1)).toEqual({ id: 1, candidateName: "A2" });

      await store.history.upsertOne({ id: 10, candidateName: "J" });
      expect((await store.history.getAll()).map((e) => e.id)).toEqual([10, 2, 1]);
      expect(await store.history.addWithGeneratedId({ candidateName: "K" })).toBe(11);
    });

    it("replaceAll honors caller ids, fills the rest and keeps the supplied order", async () => {
      await store.history.addWithGeneratedId({ candidateName: "old" });
      await store.history.replaceAll([{ id: 7, a: 1 }, { b: 2 }, { id: 3, c: 3 }]);
      expect(await store.history.getAll()).toEqual([
        { id: 7, a: 1 },
        { id: 8, b: 2 },
        { id: 3, c: 3 },
      ]);
    });

    it("updatePartial merges payload fields without changing the id", async () => {
      const id = await store.history.addWithGeneratedId({ candidateName: "A", score: 1 });
      expect(await store.history.updatePartial(id, { score: 2, id: 5 })).toEqual({
        candidateName: "A",
        score: 2,
        id,
      });
      expect(await store.history.getOne(id)).toEqual({ candidateName: "A", score: 2, id });
      expect(await store.history.updatePartial(99, { score: 3 })).toBeNull();
    });

    it("deleteOne removes the entry and ignores unknown ids", async () => {
      const id = await store.history.addWithGeneratedId({ candidateName: "A" });
      await store.history.deleteOne(99);
      expect(await store.history.getAll()).toHaveLength(1);
      await store.history.deleteOne(id);
      expect(await store.history.getAll()).toEqual([]);
    });
  });

  describe("id range", () => {
    const wide = 1_729_000_000_000;

    it("accepts history ids beyond 32 bits", async () => {
      await store.history.upsertOne({ id: wide, candidateName: "T" });
      expect(await store.history.getOne(wide)).toEqual({ id: wide, candidateName: "T" });

      await store.history.replaceAll([{ id: wide, a: 1 }, { b: 2 }]);
      expect(await store.history.getAll()).toEqual([
        { id: wide, a: 1 },
        { id: wide + 1, b: 2 },
      ]);
      expect(await store.history.addWithGeneratedId({ c: 3 })).toBe(wide + 2);
    });

    it("accepts scale ids beyond 32 bits", async () => {
      await store.scales.upsertOne(scale(3_000_000_000, "Wide"));
      expect(await store.scales.getAll()).toEqual([scale(3_000_000_000, "Wide")]);
      expect(
        await store.scales.addWithGeneratedId({ name: "Next", category: "", enabled: true, instructions: "" })
      ).toBe(3_000_000_001);
    });

    it("accepts zero and negative scale ids and still generates from 1", async () => {
      await store.scales.replaceAll([scale(0, "Zero"), scale(-2, "Negative")]);
      expect(await store.scales.getAll()).toEqual([scale(-2, "Negative"), scale(0, "Zero")]);
      await store.scales.upsertOne(scale(-5, "More negative"));
      expect(
        await store.scales.addWithGeneratedId({ name: "First", category: "", enabled: true, instructions: "" })
      ).toBe(1);
      expect((await store.scales.getAll()).map((s) => s.id)).toEqual([-5, -2, 0, 1]);
    });
  });

  it("clearAll empties every kind", async () => {
    await store.settings.upsertOne({ key: "systemPrompt", value: "p" });
    await store.scales.upsertOne(scale(1, "A"));
    await store.models.upsertOne({ id: "a/one", name: "One", provider: "A" });
    await store.history.addWithGeneratedId({ candidateName: "A" });
    await store.clearAll();
    expect(await store.settings.getAll()).toEqual([]);
    expect(await store.scales.getAll()).toEqual([]);
    expect(await store.models.getAll()).toEqual([]);
    expect(await store.history.getAll()).toEqual([]);
    expect(await store.scales.addWithGeneratedId({ name: "X", category: "", enabled: true, instructions: "" })).toBe(1);
  });
});
