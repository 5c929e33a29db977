import type { Client, InValue, Row } from "@libsql/client";
import pLimit, { type LimitFunction } from "p-limit";
import { parseJsonObject, readNumber, readText } from "../db/index.js";
import { DuplicateIdError, ProviderError, toStorageError } from "../errors.js";
import { findTopK } from "./cosine-similarity.js";
import type { Embedder } from "./embeddings.js";

export const KNOWLEDGE_KINDS = [
  "product",
  "common_query",
  "classification_record",
] as const;

export type KnowledgeKind = (typeof KNOWLEDGE_KINDS)[number];

export interface KnowledgeEntry {
  kind: KnowledgeKind;
  id: string;
  content: string;
  category: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface KnowledgeMatch extends KnowledgeEntry {
  similarity: number;
}

export interface ProductInput {
  id: string;
  name: string;
  description: string;
  category: string;
  metadata?: Record<string, unknown>;
}

export interface CommonQueryInput {
  id: string;
  text: string;
  category: string;
  confidence: number;
  metadata?: Record<string, unknown>;
}

export interface ClassificationRecordInput {
  id: string;
  content: string;
  category: string;
  confidence: number;
  wasCorrect?: boolean;
  metadata?: Record<string, unknown>;
}

export interface KnowledgeStats {
  products: number;
  commonQueries: number;
  classificationRecords: number;
}

interface StoredEntry extends KnowledgeEntry {
  embedding: number[];
}

const kindNames: ReadonlySet<string> = new Set(KNOWLEDGE_KINDS);

// Texts per embedding request when rewriting stale vectors
const REEMBED_BATCH_SIZE = 64;

export function isKnowledgeKind(value: unknown): value is KnowledgeKind {
  return typeof value === "string" && kindNames.has(value);
}

/**
 * Vector-indexed store of products, common queries and past
 * classifications. Every operation runs through one queue, so a query
 * always sees the ingestions that finished before it was issued.
 */
export class KnowledgeBase {
  private readonly queue: LimitFunction = pLimit(1);

  constructor(
    private readonly db: Client,
    private readonly embedder: Embedder
  ) {}

  async addProduct(product: ProductInput): Promise<KnowledgeEntry> {
    return this.ingest({
      kind: "product",
      id: product.id,
      content: `${product.name}: ${product.description}`,
      category: product.category,
      metadata: { name: product.name, ...product.metadata },
    });
  }

  async addCommonQuery(query: CommonQueryInput): Promise<KnowledgeEntry> {
    return this.ingest({
      kind: "common_query",
      id: query.id,
      content: query.text,
      category: query.category,
      metadata: { confidence: query.confidence, ...query.metadata },
    });
  }

  async addClassificationRecord(
    record: ClassificationRecordInput
  ): Promise<KnowledgeEntry> {
    return this.ingest({
      kind: "classification_record",
      id: record.id,
      content: record.content,
      category: record.category,
      metadata: {
        confidence: record.confidence,
        wasCorrect: record.wasCorrect ?? null,
        ...record.metadata,
      },
    });
  }

  /**
   * Nearest neighbours of `text`, most similar first, at most `k` entries.
   */
  async query(
    text: string,
    k: number,
    kinds?: readonly KnowledgeKind[]
  ): Promise<KnowledgeMatch[]> {
    if (k <= 0 || kinds?.length === 0) return [];

    return this.queue(async () => {
      await this.refreshStaleEmbeddings();
      const candidates = await this.loadCandidates(kinds);
      if (candidates.length === 0) return [];

      const [queryEmbedding] = await this.embedder.embed([text]);
      if (!queryEmbedding) return [];

      return findTopK(queryEmbedding, candidates, k).map(
        ({ item, similarity }) => ({
          kind: item.kind,
          id: item.id,
          content: item.content,
          category: item.category,
          metadata: item.metadata,
          createdAt: item.createdAt,
          similarity,
        })
      );
    });
  }

  /**
   * Rewrite the vectors of entries embedded by a different model. Queries
   * do this on their own; returns the number of entries rewritten.
   */
  async reembed(): Promise<number> {
    return this.queue(() => this.refreshStaleEmbeddings());
  }

  async has(kind: KnowledgeKind, id: string): Promise<boolean> {
    return this.queue(() => this.exists(kind, id));
  }

  async getStats(): Promise<KnowledgeStats> {
    return this.queue(async () => {
      try {
        const result = await this.db.execute(
          "SELECT kind, COUNT(*) AS count FROM knowledge_entries GROUP BY kind"
        );

        const counts = new Map<string, number>();
        for (const row of result.rows) {
          counts.set(readText(row, "kind"), readNumber(row, "count"));
        }

        return {
          products: counts.get("product") ?? 0,
          commonQueries: counts.get("common_query") ?? 0,
          classificationRecords: counts.get("classification_record") ?? 0,
        };
      } catch (error) {
        throw toStorageError("Reading knowledge base stats", error);
      }
    });
  }

  private async ingest(
    entry: Omit<KnowledgeEntry, "createdAt">
  ): Promise<KnowledgeEntry> {
    return this.queue(async () => {
      if (await this.exists(entry.kind, entry.id)) {
        throw new DuplicateIdError(entry.kind, entry.id);
      }

      const [embedding] = await this.embedder.embed([entry.content]);
      if (!embedding) {
        throw new ProviderError(
          `Embedder returned no vector for ${entry.kind}/${entry.id}`,
          this.embedder.model
        );
      }

      const createdAt = new Date().toISOString();

      try {
        await this.db.execute({
          sql: `INSERT INTO knowledge_entries
                (kind, id, content, category, metadata, embedding, embedding_model, created_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
          args: [
            entry.kind,
            entry.id,
            entry.content,
            entry.category,
            JSON.stringify(entry.metadata),
            JSON.stringify(embedding),
            this.embedder.model,
            createdAt,
          ],
        });
      } catch (error) {
        throw toStorageError(`Storing ${entry.kind}/${entry.id}`, error);
      }

      console.log(`  [knowledge] Added ${entry.kind} ${entry.id}`);
      return { ...entry, createdAt };
    });
  }

  private async exists(kind: KnowledgeKind, id: string): Promise<boolean> {
    try {
      const result = await this.db.execute({
        sql: "SELECT 1 FROM knowledge_entries WHERE kind = ? AND id = ?",
        args: [kind, id],
      });
      return result.rows.length > 0;
    } catch (error) {
      throw toStorageError(`Looking up ${kind}/${id}`, error);
    }
  }

  private async refreshStaleEmbeddings(): Promise<number> {
    let stale: Row[];
    try {
      const result = await this.db.execute({
        sql: `SELECT seq, kind, id, content FROM knowledge_entries
              WHERE embedding_model != ?
              ORDER BY seq`,
        args: [this.embedder.model],
      });
      stale = result.rows;
    } catch (error) {
      throw toStorageError("Reading stale knowledge entries", error);
    }

    for (let start = 0; start < stale.length; start += REEMBED_BATCH_SIZE) {
      const batch = stale.slice(start, start + REEMBED_BATCH_SIZE);
      const embeddings = await this.embedder.embed(
        batch.map((row) => readText(row, "content"))
      );

      for (const [index, row] of batch.entries()) {
        const label = `${readText(row, "kind")}/${readText(row, "id")}`;
        const embedding = embeddings[index];
        if (!embedding) {
          throw new ProviderError(
            `Embedder returned no vector for ${label}`,
            this.embedder.model
          );
        }

        try {
          await this.db.execute({
            sql: `UPDATE knowledge_entries
                  SET embedding = ?, embedding_model = ?
                  WHERE seq = ?`,
            args: [JSON.stringify(embedding), this.embedder.model, readNumber(row, "seq")],
          });
        } catch (error) {
          throw toStorageError(`Re-embedding ${label}`, error);
        }
      }
    }

    if (stale.length > 0) {
      console.log(
        `  [knowledge] Re-embedded ${stale.length} entries with ${this.embedder.model}`
      );
    }
    return stale.length;
  }

  private async loadCandidates(
    kinds?: readonly KnowledgeKind[]
  ): Promise<StoredEntry[]> {
    const args: InValue[] = [this.embedder.model];
    let kindFilter = "";
    if (kinds) {
      kindFilter = ` AND kind IN (${kinds.map(() => "?").join(", ")})`;
      args.push(...kinds);
    }

    try {
      const result = await this.db.execute({
        sql: `SELECT * FROM knowledge_entries
              WHERE embedding_model = ?${kindFilter}
              ORDER BY seq`,
        args,
      });
      return result.rows.map(rowToStoredEntry);
    } catch (error) {
      throw toStorageError("Reading knowledge entries", error);
    }
  }
}

function rowToStoredEntry(row: Row): StoredEntry {
  const kind = readText(row, "kind");
  if (!isKnowledgeKind(kind)) {
    throw new TypeError(`Unknown knowledge entry kind: ${kind}`);
  }

  const embedding: unknown = JSON.parse(readText(row, "embedding"));
  if (!Array.isArray(embedding) || !embedding.every((v) => typeof v === "number")) {
    throw new TypeError(`Malformed embedding for ${kind}/${readText(row, "id")}`);
  }

  return {
    kind,
    id: readText(row, "id"),
    content: readText(row, "content"),
    category: readText(row, "category"),
    metadata: parseJsonObject(readText(row, "metadata")),
    createdAt: readText(row, "created_at"),
    embedding,
  };
}
