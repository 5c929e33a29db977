import type { KnowledgeMatch } from "../knowledge/index.js";
import { CATEGORY_DESCRIPTIONS, EMAIL_CATEGORIES } from "./categories.js";
import type { EmailRecord } from "./email.js";

export interface CorrectionExample {
  emailSnippet: string;
  from: string;
  to: string;
  notes: string | null;
}

export interface PromptContext {
  matches: readonly KnowledgeMatch[];
  corrections: readonly CorrectionExample[];
}

export function formatCategories(): string {
  return EMAIL_CATEGORIES.map(
    (category) => `- ${category}: ${CATEGORY_DESCRIPTIONS[category]}`
  ).join("\n");
}

/**
 * Retrieved knowledge grouped by kind; empty string when nothing was found.
 */
export function formatContext(matches: readonly KnowledgeMatch[]): string {
  const queries = matches.filter((m) => m.kind === "common_query");
  const products = matches.filter((m) => m.kind === "product");
  const history = matches.filter((m) => m.kind === "classification_record");
  const parts: string[] = [];

  if (queries.length > 0) {
    parts.push("Similar past queries:");
    for (const match of queries) {
      parts.push(`  - "${truncate(match.content, 120)}" → ${match.category}`);
    }
  }

  if (products.length > 0) {
    parts.push("Relevant products:");
    for (const match of products) {
      const name = typeof match.metadata.name === "string" ? match.metadata.name : match.id;
      parts.push(`  - ${name} (${match.category})`);
    }
  }

  if (history.length > 0) {
    parts.push("Similar past classifications:");
    for (const match of history) {
      const confidence =
        typeof match.metadata.confidence === "number"
          ? ` (confidence: ${match.metadata.confidence.toFixed(2)})`
          : "";
      parts.push(`  - Category: ${match.category}${confidence}`);
    }
  }

  return parts.join("\n");
}

export function buildSystemPrompt(context: PromptContext): string {
  let prompt = `You are an expert email classification agent for a supplier of fine chemical ingredients.

Your job is to classify incoming customer service emails into one of the following categories:

${formatCategories()}

For each email, you must:
1. Analyze the email subject and body carefully
2. Determine the primary intent of the email
3. Extract any relevant entities (product names, order numbers, quantities, etc.)
4. Assign a confidence score (0.0 to 1.0)
5. Identify any secondary categories if applicable
6. Suggest a priority level (low, normal, high, urgent)
7. Provide a recommended action or routing

Consider:
- Product inquiries about chemical ingredients, specifications, or applications
- Quote requests may include specific quantities or technical requirements
- Regulatory compliance questions are common in the chemical industry
- Technical support may involve formulation questions or usage guidance

If tools are available, use them to look up products or past queries before deciding.`;

  const contextText = formatContext(context.matches);
  if (contextText) {
    prompt += `\n\nRELEVANT CONTEXT:\n${contextText}`;
  }

  if (context.corrections.length > 0) {
    prompt += `\n\nLEARNED FROM CORRECTIONS (apply these patterns to similar emails):\n${context.corrections
      .map(
        (c) =>
          `- "${c.emailSnippet}" should be ${c.to}, not ${c.from}${c.notes ? ` (reason: ${c.notes})` : ""}`
      )
      .join("\n")}`;
  }

  return prompt;
}

export function buildClassificationPrompt(email: EmailRecord): string {
  return `Please classify this customer service email:

Subject: ${email.subject}

Body:
${email.body}
${email.sender ? `\nSender: ${email.sender}\n` : ""}
Respond with only a JSON object in this format:
{
  "primary_category": "category_name",
  "confidence": 0.95,
  "secondary_categories": ["other_category"],
  "reasoning": "Why you chose this classification",
  "extracted_entities": {
    "product_names": ["Product A"],
    "order_number": "12345",
    "quantity": "500 kg"
  },
  "recommended_action": "Route to sales team for quote preparation",
  "priority": "normal"
}`;
}

export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length <= max ? flat : `${flat.slice(0, max - 1)}…`;
}
