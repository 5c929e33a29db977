/**
 * In-process stand-ins for the model provider, the embedder and the
 * databases, shared by the test files.
 */

import type { Client } from "@libsql/client";
import {
  createDbClient,
  initializeFeedbackSchema,
  initializeKnowledgeSchema,
} from "../db/index.js";
import { tokenize, type Embedder } from "../knowledge/embeddings.js";
import type { GenerationRequest, LlmProvider, TextGenerator } from "../providers/types.js";

/**
 * Replays canned replies in order; an Error in the list is thrown instead.
 */
export class FakeGenerator implements TextGenerator {
  readonly provider: LlmProvider = "anthropic";
  readonly model = "fake-model";
  readonly requests: GenerationRequest[] = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error> = []) {
    this.replies = [...replies];
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("FakeGenerator has no replies left");
    }
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

/**
 * One axis per vocabulary word, valued by how often the word occurs.
 * Cosine similarities are easy to work out by hand.
 */
export class KeywordEmbedder implements Embedder {
  calls = 0;

  constructor(
    private readonly vocabulary: readonly string[],
    readonly model: string = "keyword-test"
  ) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((text) => {
      const tokens = tokenize(text);
      return this.vocabulary.map((word) => tokens.filter((t) => t === word).length);
    });
  }
}

/**
 * Fails every call, like an embedding service that is down.
 */
export class FailingEmbedder implements Embedder {
  readonly model = "keyword-test";

  async embed(): Promise<number[][]> {
    throw new Error("embedding service down");
  }
}

export async function memoryKnowledgeDb(): Promise<Client> {
  const client = createDbClient(":memory:");
  await initializeKnowledgeSchema(client);
  return client;
}

export async function memoryFeedbackDb(): Promise<Client> {
  const client = createDbClient(":memory:");
  await initializeFeedbackSchema(client);
  return client;
}

export function classificationReply(
  fields: Record<string, unknown> & { primary_category: string; confidence: number }
): string {
  return `\`\`\`json\n${JSON.stringify(fields, null, 2)}\n\`\`\``;
}
