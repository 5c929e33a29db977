import type { Client } from "@libsql/client";
import pLimit from "p-limit";
import type { AgentConfig } from "../config.js";
import {
  createDbClient,
  initializeFeedbackSchema,
  initializeKnowledgeSchema,
} from "../db/index.js";
import { DuplicateIdError } from "../errors.js";
import {
  FeedbackRecorder,
  type FeedbackInput,
  type FeedbackRecord,
} from "../feedback/index.js";
import {
  HashingEmbedder,
  KnowledgeBase,
  OpenAIEmbedder,
  type Embedder,
  type KnowledgeStats,
} from "../knowledge/index.js";
import {
  createTextGenerator,
  type LlmProvider,
  type TextGenerator,
} from "../providers/index.js";
import { createDefaultTools, type ToolRegistry } from "../tools/index.js";
import { EmailClassifier, type BatchOutcome } from "./classifier.js";
import { emailId, emailText, type ClassificationResult, type EmailRecord } from "./email.js";
import { truncate, type CorrectionExample } from "./prompt.js";

export interface TriageAgentParts {
  config: AgentConfig;
  generator: TextGenerator;
  knowledgeBase: KnowledgeBase;
  feedback: FeedbackRecorder;
  tools: ToolRegistry;
  /** Closed by `close()` */
  clients?: Client[];
}

export interface AgentStatistics {
  llmProvider: LlmProvider;
  model: string;
  knowledgeBase: KnowledgeStats;
  feedbackRecords: number;
  toolsRegistered: number;
  learningEnabled: boolean;
}

// How many recent corrections are shown to the model as examples
const CORRECTION_EXAMPLES = 10;

export function createEmbedder(config: AgentConfig): Embedder {
  if (config.openaiApiKey) {
    return new OpenAIEmbedder({
      apiKey: config.openaiApiKey,
      model: config.embeddingModel,
      timeoutMs: config.providerTimeoutMs,
    });
  }
  return new HashingEmbedder();
}

/**
 * Classification plus the feedback loop: past results and corrections
 * flow back into the knowledge base and the prompt when learning is on.
 */
export class TriageAgent {
  readonly knowledgeBase: KnowledgeBase;
  readonly feedback: FeedbackRecorder;
  readonly tools: ToolRegistry;
  private readonly config: AgentConfig;
  private readonly generator: TextGenerator;
  private readonly classifier: EmailClassifier;
  private readonly clients: Client[];

  constructor(parts: TriageAgentParts) {
    this.config = parts.config;
    this.generator = parts.generator;
    this.knowledgeBase = parts.knowledgeBase;
    this.feedback = parts.feedback;
    this.tools = parts.tools;
    this.clients = parts.clients ?? [];
    this.classifier = new EmailClassifier({
      generator: parts.generator,
      knowledgeBase: parts.knowledgeBase,
      tools: parts.tools,
      confidenceThreshold: parts.config.confidenceThreshold,
      contextSize: parts.config.contextSize,
    });
  }

  static async create(config: AgentConfig): Promise<TriageAgent> {
    const knowledgeClient = createDbClient(config.knowledgeBasePath);
    await initializeKnowledgeSchema(knowledgeClient);

    const feedbackClient = createDbClient(config.feedbackLogPath);
    await initializeFeedbackSchema(feedbackClient);

    const knowledgeBase = new KnowledgeBase(knowledgeClient, createEmbedder(config));

    console.log(
      `Triage agent initialized (provider: ${config.llmProvider}, learning: ${config.enableLearning ? "on" : "off"})`
    );

    return new TriageAgent({
      config,
      generator: createTextGenerator(config),
      knowledgeBase,
      feedback: new FeedbackRecorder(feedbackClient),
      tools: createDefaultTools(knowledgeBase),
      clients: [knowledgeClient, feedbackClient],
    });
  }

  async classify(email: EmailRecord): Promise<ClassificationResult> {
    const corrections = this.config.enableLearning
      ? await this.recentCorrections()
      : [];

    const result = await this.classifier.classify(email, { corrections });

    const subject = email.subject.slice(0, 50);
    console.log(
      `  [${result.primaryCategory}] ${subject} (${Math.round(result.confidence * 100)}%)${result.needsReview ? " - needs review" : ""}`
    );

    if (this.config.enableLearning) {
      await this.recordHistory(email, result);
    }

    return result;
  }

  async classifyBatch(
    emails: readonly EmailRecord[],
    concurrency: number = 5
  ): Promise<BatchOutcome[]> {
    const limit = pLimit(concurrency);
    return Promise.all(
      emails.map((email, index) =>
        limit(async (): Promise<BatchOutcome> => {
          try {
            return { ok: true, value: await this.classify(email) };
          } catch (error) {
            console.error(`  [triage] Failed to classify email #${index}:`, error);
            return { ok: false, error };
          }
        })
      )
    );
  }

  /**
   * Always appends to the feedback log. With learning on, the corrected
   * category is also added to the knowledge base for future retrieval.
   * Once the record is appended the call resolves with it; a failed
   * knowledge-base update is logged.
   */
  async provideFeedback(input: FeedbackInput): Promise<FeedbackRecord> {
    const record = await this.feedback.provideFeedback(input);

    if (this.config.enableLearning) {
      try {
        await this.learnFromFeedback(record);
      } catch (error) {
        console.error(`  [feedback] Failed to learn from feedback #${record.id}:`, error);
      }
    }

    return record;
  }

  emailId(email: EmailRecord): string {
    return emailId(email);
  }

  async getStatistics(): Promise<AgentStatistics> {
    return {
      llmProvider: this.generator.provider,
      model: this.generator.model,
      knowledgeBase: await this.knowledgeBase.getStats(),
      feedbackRecords: await this.feedback.count(),
      toolsRegistered: this.tools.count(),
      learningEnabled: this.config.enableLearning,
    };
  }

  close(): void {
    for (const client of this.clients) {
      client.close();
    }
  }

  private async learnFromFeedback(record: FeedbackRecord): Promise<void> {
    await this.knowledgeBase.addClassificationRecord({
      id: `${record.emailId}:corrected:${record.id}`,
      content: record.emailContent,
      category: record.correctCategory,
      confidence: 1,
      wasCorrect: true,
      metadata: {
        originalCategory: record.originalCategory,
        feedbackNotes: record.notes,
      },
    });

    if (record.originalCategory !== record.correctCategory) {
      await this.knowledgeBase.addCommonQuery({
        id: `feedback:${record.emailId}:${record.id}`,
        text: record.emailContent,
        category: record.correctCategory,
        confidence: 1,
        metadata: { source: "feedback" },
      });
    }
  }

  private async recentCorrections(): Promise<CorrectionExample[]> {
    const records = await this.feedback.getRecent(CORRECTION_EXAMPLES);
    return records
      .filter((r) => r.originalCategory !== r.correctCategory)
      .map((r) => ({
        emailSnippet: truncate(r.emailContent, 80),
        from: r.originalCategory,
        to: r.correctCategory,
        notes: r.notes,
      }));
  }

  private async recordHistory(
    email: EmailRecord,
    result: ClassificationResult
  ): Promise<void> {
    const id = emailId(email);
    try {
      await this.knowledgeBase.addClassificationRecord({
        id,
        content: emailText(email),
        category: result.primaryCategory,
        confidence: result.confidence,
        metadata: {
          subject: email.subject,
          sender: email.sender ?? null,
          extractedEntities: result.extractedEntities,
        },
      });
    } catch (error) {
      if (error instanceof DuplicateIdError) {
        // Same email classified again; the first record stands
        console.log(`  [triage] History for ${id} already recorded`);
        return;
      }
      console.error(`  [triage] Failed to record history for ${id}:`, error);
    }
  }
}
