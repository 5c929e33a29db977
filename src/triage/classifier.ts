import pLimit from "p-limit";
import { InvalidInputError } from "../errors.js";
import type { KnowledgeBase } from "../knowledge/index.js";
import type { TextGenerator } from "../providers/index.js";
import type { ToolRegistry } from "../tools/index.js";
import { emailText, type ClassificationResult, type EmailRecord } from "./email.js";
import { applyReviewPolicy, parseClassificationResponse } from "./parser.js";
import {
  buildClassificationPrompt,
  buildSystemPrompt,
  type CorrectionExample,
} from "./prompt.js";

export interface ClassifierOptions {
  generator: TextGenerator;
  knowledgeBase: KnowledgeBase;
  tools?: ToolRegistry;
  confidenceThreshold?: number;
  contextSize?: number;
}

export interface ClassifyContext {
  corrections?: readonly CorrectionExample[];
}

export type BatchOutcome =
  | { ok: true; value: ClassificationResult }
  | { ok: false; error: unknown };

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;
export const DEFAULT_CONTEXT_SIZE = 3;

export class EmailClassifier {
  private readonly generator: TextGenerator;
  private readonly knowledgeBase: KnowledgeBase;
  private readonly tools: ToolRegistry | undefined;
  private readonly confidenceThreshold: number;
  private readonly contextSize: number;

  constructor(options: ClassifierOptions) {
    this.generator = options.generator;
    this.knowledgeBase = options.knowledgeBase;
    this.tools = options.tools;
    this.confidenceThreshold =
      options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.contextSize = options.contextSize ?? DEFAULT_CONTEXT_SIZE;
  }

  async classify(
    email: EmailRecord,
    context: ClassifyContext = {}
  ): Promise<ClassificationResult> {
    assertClassifiable(email);

    const matches =
      this.contextSize > 0
        ? await this.knowledgeBase.query(emailText(email), this.contextSize)
        : [];

    const text = await this.generator.generate({
      system: buildSystemPrompt({
        matches,
        corrections: context.corrections ?? [],
      }),
      prompt: buildClassificationPrompt(email),
      ...(this.tools && this.tools.count() > 0 && { tools: this.tools }),
    });

    return applyReviewPolicy(
      parseClassificationResponse(text),
      this.confidenceThreshold
    );
  }

  /**
   * Classify several emails concurrently. Outcomes come back in input
   * order; a failure is reported, never replaced by a default category.
   */
  async classifyBatch(
    emails: readonly EmailRecord[],
    context: ClassifyContext = {},
    concurrency: number = 5
  ): Promise<BatchOutcome[]> {
    const limit = pLimit(concurrency);

    return Promise.all(
      emails.map((email, index) =>
        limit(async (): Promise<BatchOutcome> => {
          try {
            return { ok: true, value: await this.classify(email, context) };
          } catch (error) {
            console.error(`  [triage] Failed to classify email #${index}:`, error);
            return { ok: false, error };
          }
        })
      )
    );
  }
}

function assertClassifiable(email: EmailRecord): void {
  const missing: string[] = [];
  if (typeof email.subject !== "string" || email.subject.trim() === "") {
    missing.push("subject");
  }
  if (typeof email.body !== "string" || email.body.trim() === "") {
    missing.push("body");
  }
  if (missing.length > 0) {
    throw new InvalidInputError(`Email ${missing.join(" and ")} must be non-empty`);
  }
}
