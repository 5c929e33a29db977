import type { Client } from "@libsql/client";
import { beforeEach, describe, expect, it } from "vitest";
import { DuplicateIdError, StorageError } from "../errors.js";
import { KeywordEmbedder, memoryKnowledgeDb } from "../test-support/fakes.js";
import { KnowledgeBase } from "./knowledge-base.js";

const VOCABULARY = ["citric", "acid", "xanthan", "gum", "invoice", "quote"];

describe("KnowledgeBase", () => {
  let db: Client;
  let embedder: KeywordEmbedder;
  let kb: KnowledgeBase;

  beforeEach(async () => {
    db = await memoryKnowledgeDb();
    embedder = new KeywordEmbedder(VOCABULARY);
    kb = new KnowledgeBase(db, embedder);
  });

  async function seed(): Promise<void> {
    await kb.addProduct({
      id: "CA-105",
      name: "Citric Acid",
      description: "acidulant",
      category: "acidulants",
    });
    await kb.addProduct({
      id: "XG-415",
      name: "Xanthan Gum",
      description: "thickener",
      category: "hydrocolloids",
    });
    await kb.addCommonQuery({
      id: "q1",
      text: "quote for citric acid",
      category: "quote_request",
      confidence: 0.9,
    });
    await kb.addClassificationRecord({
      id: "h1",
      content: "invoice question",
      category: "billing_inquiry",
      confidence: 0.8,
    });
  }

  describe("ingestion", () => {
    it("stores products with their name in metadata", async () => {
      const entry = await kb.addProduct({
        id: "CA-105",
        name: "Citric Acid",
        description: "acidulant",
        category: "acidulants",
        metadata: { grade: "food" },
      });

      expect(entry).toMatchObject({
        kind: "product",
        id: "CA-105",
        content: "Citric Acid: acidulant",
        category: "acidulants",
        metadata: { name: "Citric Acid", grade: "food" },
      });
      expect(await kb.has("product", "CA-105")).toBe(true);
    });

    it("records confidence and correctness on classification records", async () => {
      const entry = await kb.addClassificationRecord({
        id: "h2",
        content: "where is my order",
        category: "order_inquiry",
        confidence: 0.6,
      });
      expect(entry.metadata).toEqual({ confidence: 0.6, wasCorrect: null });
    });

    it("rejects a duplicate id and keeps the original entry", async () => {
      await seed();

      await expect(
        kb.addProduct({
          id: "CA-105",
          name: "Citric Acid Monohydrate",
          description: "different text",
          category: "acidulants",
        })
      ).rejects.toBeInstanceOf(DuplicateIdError);

      const [top] = await kb.query("citric acid", 1, ["product"]);
      expect(top?.content).toBe("Citric Acid: acidulant");
      expect((await kb.getStats()).products).toBe(2);
    });

    it("lets exactly one of two concurrent ingestions of an id through", async () => {
      const product = {
        id: "SC-330",
        name: "Sodium Citrate",
        description: "buffering salt",
        category: "salts",
      };

      const results = await Promise.allSettled([kb.addProduct(product), kb.addProduct(product)]);

      expect(results[0]?.status).toBe("fulfilled");
      expect(results[1]).toMatchObject({
        status: "rejected",
        reason: expect.any(DuplicateIdError),
      });
      expect((await kb.getStats()).products).toBe(1);
    });

    it("allows the same id under a different kind", async () => {
      await kb.addCommonQuery({ id: "X1", text: "quote", category: "quote_request", confidence: 1 });
      await kb.addClassificationRecord({ id: "X1", content: "quote", category: "quote_request", confidence: 1 });

      expect(await kb.getStats()).toEqual({
        products: 0,
        commonQueries: 1,
        classificationRecords: 1,
      });
    });
  });

  describe("query", () => {
    it("returns the k most similar entries, most similar first", async () => {
      await seed();

      const matches = await kb.query("citric acid", 2);

      expect(matches.map((m) => m.id)).toEqual(["CA-105", "q1"]);
      expect(matches[0]?.similarity).toBeCloseTo(1, 10);
      expect(matches[1]?.similarity).toBeCloseTo(2 / Math.sqrt(6), 10);
    });

    it("never returns more than k entries and keeps similarities descending", async () => {
      await seed();

      for (const k of [1, 3, 4, 10]) {
        const matches = await kb.query("quote for xanthan gum", k);
        expect(matches.length).toBeLessThanOrEqual(k);
        for (let i = 1; i < matches.length; i++) {
          expect(matches[i - 1]?.similarity).toBeGreaterThanOrEqual(matches[i]?.similarity ?? 0);
        }
      }
    });

    it("filters by kind", async () => {
      await seed();

      const matches = await kb.query("citric acid", 5, ["common_query"]);
      expect(matches.map((m) => m.id)).toEqual(["q1"]);
    });

    it("returns nothing for k <= 0 or an empty kind list", async () => {
      await seed();

      expect(await kb.query("citric acid", 0)).toEqual([]);
      expect(await kb.query("citric acid", 3, [])).toEqual([]);
    });

    it("returns nothing from an empty store without embedding the query", async () => {
      expect(await kb.query("citric acid", 3)).toEqual([]);
      expect(embedder.calls).toBe(0);
    });

    it("sees ingestions issued before it", async () => {
      const adding = kb.addProduct({
        id: "XG-415",
        name: "Xanthan Gum",
        description: "thickener",
        category: "hydrocolloids",
      });
      const matches = await kb.query("xanthan gum", 1);
      await adding;

      expect(matches.map((m) => m.id)).toEqual(["XG-415"]);
    });

    it("re-embeds entries stored by another model before ranking", async () => {
      await seed();
      const upgraded = new KeywordEmbedder(["citric", "xanthan", "invoice"], "keyword-test-v2");
      const reopened = new KnowledgeBase(db, upgraded);

      const [top] = await reopened.query("xanthan gum", 2);

      expect(top?.id).toBe("XG-415");
      expect(top?.similarity).toBeCloseTo(1, 10);
      expect(upgraded.calls).toBe(2);

      const models = await db.execute("SELECT DISTINCT embedding_model FROM knowledge_entries");
      expect(models.rows.map((row) => row["embedding_model"])).toEqual(["keyword-test-v2"]);

      await reopened.query("xanthan gum", 2);
      expect(upgraded.calls).toBe(3);
    });
  });

  describe("reembed", () => {
    it("rewrites only entries from another model", async () => {
      await seed();
      const reopened = new KnowledgeBase(db, new KeywordEmbedder(VOCABULARY, "keyword-test-v2"));

      expect(await reopened.reembed()).toBe(4);
      expect(await reopened.reembed()).toBe(0);
      expect(await kb.getStats()).toEqual({
        products: 2,
        commonQueries: 1,
        classificationRecords: 1,
      });
    });

    it("leaves an up-to-date store alone", async () => {
      await seed();
      const before = embedder.calls;

      expect(await kb.reembed()).toBe(0);
      expect(embedder.calls).toBe(before);
    });
  });

  it("counts entries per kind", async () => {
    await seed();

    expect(await kb.getStats()).toEqual({
      products: 2,
      commonQueries: 1,
      classificationRecords: 1,
    });
  });

  it("reports database failures as StorageError", async () => {
    await seed();
    db.close();

    await expect(kb.query("citric acid", 1)).rejects.toBeInstanceOf(StorageError);
    await expect(kb.getStats()).rejects.toBeInstanceOf(StorageError);
  });
});
