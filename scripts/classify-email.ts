/**
 * Classify a single email from the command line.
 *
 * Usage: npx tsx scripts/classify-email.ts "<subject>" "<body>" [sender]
 */

import "dotenv/config";
import { loadConfig } from "../src/config.js";
import { ClassifierError } from "../src/errors.js";
import { TriageAgent, createEmailRecord } from "../src/triage/index.js";

async function main() {
  const [subject, body, sender] = process.argv.slice(2);
  if (!subject || !body) {
    console.error('Usage: npx tsx scripts/classify-email.ts "<subject>" "<body>" [sender]');
    process.exit(1);
  }

  const agent = await TriageAgent.create(loadConfig());

  try {
    const email = createEmailRecord({
      subject,
      body,
      ...(sender !== undefined && { sender }),
      receivedAt: new Date(),
    });

    const result = await agent.classify(email);
    console.log(JSON.stringify({ emailId: agent.emailId(email), ...result }, null, 2));
  } finally {
    agent.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ClassifierError) {
    console.error(`❌ ${error.name}: ${error.message}`);
  } else {
    console.error("❌ Unexpected failure:", error);
  }
  process.exit(1);
});
