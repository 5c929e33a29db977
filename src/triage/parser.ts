import { z } from "zod";
import { ClassificationParseError } from "../errors.js";
import { EMAIL_CATEGORIES, PRIORITIES, escalatePriority } from "./categories.js";
import type { ClassificationResult } from "./email.js";

const category = z.string().trim().toLowerCase().pipe(z.enum(EMAIL_CATEGORIES));

const ResponseSchema = z.object({
  primary_category: category,
  // Some models quote the number
  confidence: z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number<string | number>().min(0).max(1)),
  secondary_categories: z.array(category).default([]),
  reasoning: z.string().default(""),
  extracted_entities: z.record(z.string(), z.unknown()).default({}),
  recommended_action: z.string().default(""),
  priority: z.string().trim().toLowerCase().pipe(z.enum(PRIORITIES)).default("normal"),
});

export const MANUAL_REVIEW_PREFIX = "Manual review required: ";

/**
 * Pull the JSON object out of a model reply: a fenced block if there is
 * one, otherwise the outermost braces.
 */
export function extractJson(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced?.[1] !== undefined) {
    return fenced[1].trim();
  }

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) {
    return text.slice(start, end + 1);
  }

  return text.trim();
}

export function parseClassificationResponse(
  text: string,
  classifiedAt: Date = new Date()
): ClassificationResult {
  let data: unknown;
  try {
    data = JSON.parse(extractJson(text));
  } catch (error) {
    throw new ClassificationParseError("Model response is not valid JSON", text, {
      cause: error,
    });
  }

  const parsed = ResponseSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ClassificationParseError(`Model response has the wrong shape: ${issues}`, text);
  }

  const response = parsed.data;
  const secondaryCategories = [...new Set(response.secondary_categories)].filter(
    (c) => c !== response.primary_category
  );

  return Object.freeze({
    primaryCategory: response.primary_category,
    confidence: response.confidence,
    secondaryCategories: Object.freeze(secondaryCategories),
    reasoning: response.reasoning,
    extractedEntities: Object.freeze({ ...response.extracted_entities }),
    recommendedAction: response.recommended_action,
    priority: response.priority,
    needsReview: false,
    classifiedAt: classifiedAt.toISOString(),
  });
}

/**
 * Flag results below the confidence threshold for a human: priority goes
 * up one level and the recommended action says so.
 */
export function applyReviewPolicy(
  result: ClassificationResult,
  threshold: number
): ClassificationResult {
  if (result.confidence >= threshold) {
    return result;
  }

  return Object.freeze({
    ...result,
    priority: escalatePriority(result.priority),
    recommendedAction: `${MANUAL_REVIEW_PREFIX}${result.recommendedAction || "confirm the category"}`,
    needsReview: true,
  });
}
