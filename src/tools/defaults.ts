import { z } from "zod";
import { KNOWLEDGE_KINDS, type KnowledgeBase } from "../knowledge/index.js";
import { ToolRegistry } from "./registry.js";

const SearchKnowledgeBaseParams = z.object({
  query: z.string().min(1).describe("What to look up, e.g. a product name or the customer's question"),
  kind: z
    .enum(KNOWLEDGE_KINDS)
    .optional()
    .describe("Restrict results to products, common queries or past classifications"),
  limit: z.number().int().min(1).max(10).optional().describe("Maximum results (default 5)"),
});

/**
 * Registry preloaded with the tools every deployment gets.
 */
export function createDefaultTools(knowledgeBase: KnowledgeBase): ToolRegistry {
  const registry = new ToolRegistry();

  registry.register({
    name: "search_knowledge_base",
    description:
      "Search the product catalog, common customer queries and past classifications for entries similar to the query",
    parameters: SearchKnowledgeBaseParams,
    handler: async ({ query, kind, limit }) => {
      const matches = await knowledgeBase.query(
        query,
        limit ?? 5,
        kind ? [kind] : undefined
      );
      return matches.map((match) => ({
        kind: match.kind,
        id: match.id,
        category: match.category,
        content: match.content,
        similarity: Math.round(match.similarity * 1000) / 1000,
      }));
    },
  });

  return registry;
}
