/**
 * Load the sample products and common queries into the knowledge base.
 * Entries already present are skipped, so the script can be re-run;
 * entries embedded by a different model are re-embedded first.
 *
 * Usage: npx tsx scripts/seed-knowledge-base.ts [path/to/knowledge.json]
 */

import "dotenv/config";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { loadConfig } from "../src/config.js";
import { createDbClient, initializeKnowledgeSchema } from "../src/db/index.js";
import { EMAIL_CATEGORIES, createEmbedder } from "../src/triage/index.js";
import { KnowledgeBase } from "../src/knowledge/index.js";

const SeedSchema = z.object({
  products: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      description: z.string().min(1),
      category: z.string().min(1),
      metadata: z.record(z.string(), z.unknown()).optional(),
    })
  ),
  commonQueries: z.array(
    z.object({
      id: z.string().min(1),
      text: z.string().min(1),
      category: z.enum(EMAIL_CATEGORIES),
      confidence: z.number().min(0).max(1),
    })
  ),
});

const DEFAULT_SEED = fileURLToPath(new URL("../data/seed/knowledge.json", import.meta.url));

async function main() {
  const seedPath = process.argv[2] ?? DEFAULT_SEED;
  const seed = SeedSchema.parse(JSON.parse(readFileSync(seedPath, "utf8")));

  const config = loadConfig(process.env, { requireProviderKey: false });
  const db = createDbClient(config.knowledgeBasePath);
  await initializeKnowledgeSchema(db);
  const kb = new KnowledgeBase(db, createEmbedder(config));

  let added = 0;
  let skipped = 0;

  try {
    const reembedded = await kb.reembed();

    for (const product of seed.products) {
      if (await kb.has("product", product.id)) {
        skipped++;
        continue;
      }
      await kb.addProduct(product);
      added++;
    }

    for (const query of seed.commonQueries) {
      if (await kb.has("common_query", query.id)) {
        skipped++;
        continue;
      }
      await kb.addCommonQuery(query);
      added++;
    }

    const stats = await kb.getStats();
    console.log(
      `\n✅ Seeded ${added} entries (${skipped} already present, ${reembedded} re-embedded)`
    );
    console.log(
      `   products: ${stats.products}, common queries: ${stats.commonQueries}, classification records: ${stats.classificationRecords}`
    );
  } finally {
    db.close();
  }
}

main().catch((error: unknown) => {
  console.error("❌ Seeding failed:", error);
  process.exit(1);
});
