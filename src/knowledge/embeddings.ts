import OpenAI, { APIConnectionTimeoutError } from "openai";
import { ProviderError, ProviderTimeoutError } from "../errors.js";

/**
 * Turns text into vectors for similarity search. `model` is stored with
 * each entry so vectors from different models are never compared.
 */
export interface Embedder {
  readonly model: string;
  embed(texts: readonly string[]): Promise<number[][]>;
}

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
const DEFAULT_TIMEOUT_MS = 30_000;

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly timeoutMs: number;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: [...texts],
      });

      // Order by index; the API does not promise input order
      const embeddings: number[][] = new Array(texts.length);
      for (const item of response.data) {
        embeddings[item.index] = item.embedding;
      }
      return embeddings;
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        throw new ProviderTimeoutError("openai", this.timeoutMs, { cause: error });
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Embedding request failed: ${detail}`, "openai", {
        cause: error,
      });
    }
  }
}

/**
 * Local embedder: feature-hashed bag of words, L2-normalised.
 * Used when no embedding API is configured.
 */
export class HashingEmbedder implements Embedder {
  readonly model: string;

  constructor(private readonly dimensions: number = 256) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`dimensions must be a positive integer, got ${dimensions}`);
    }
    this.model = `hashing-bow-${dimensions}`;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const index = hash % this.dimensions;
      // High bit picks the sign so collisions tend to cancel out
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[index] = (vector[index] ?? 0) + sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
