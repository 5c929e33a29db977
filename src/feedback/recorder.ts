import type { Client, Row } from "@libsql/client";
import pLimit, { type LimitFunction } from "p-limit";
import { readNullableText, readNumber, readText } from "../db/index.js";
import { InvalidInputError, toStorageError } from "../errors.js";
import { isEmailCategory, type EmailCategory } from "../triage/categories.js";
import { emailId, emailText, type EmailRecord } from "../triage/email.js";

export interface FeedbackInput {
  email: EmailRecord;
  originalCategory: EmailCategory;
  correctCategory: EmailCategory;
  /** Confidence the classifier reported for the original prediction */
  confidence: number;
  notes?: string | null;
}

export interface FeedbackRecord {
  id: number;
  emailId: string;
  emailContent: string;
  originalCategory: EmailCategory;
  correctCategory: EmailCategory;
  confidence: number;
  notes: string | null;
  createdAt: string;
}

/**
 * Append-only log of human corrections. Confirmations (original equal to
 * correct) are logged too.
 */
export class FeedbackRecorder {
  private readonly queue: LimitFunction = pLimit(1);

  constructor(private readonly db: Client) {}

  async provideFeedback(input: FeedbackInput): Promise<FeedbackRecord> {
    validateFeedback(input);

    const entry = {
      emailId: emailId(input.email),
      emailContent: emailText(input.email),
      originalCategory: input.originalCategory,
      correctCategory: input.correctCategory,
      confidence: input.confidence,
      notes: input.notes ?? null,
      createdAt: new Date().toISOString(),
    };

    return this.queue(async () => {
      try {
        const result = await this.db.execute({
          sql: `INSERT INTO feedback_log
                (email_id, email_content, original_category, correct_category,
                 confidence, notes, created_at)
                VALUES (?, ?, ?, ?, ?, ?, ?)`,
          args: [
            entry.emailId,
            entry.emailContent,
            entry.originalCategory,
            entry.correctCategory,
            entry.confidence,
            entry.notes,
            entry.createdAt,
          ],
        });

        const record = { id: Number(result.lastInsertRowid), ...entry };
        console.log(
          `  [feedback] #${record.id} ${record.originalCategory} → ${record.correctCategory}`
        );
        return record;
      } catch (error) {
        throw toStorageError("Appending feedback", error);
      }
    });
  }

  async count(): Promise<number> {
    return this.queue(async () => {
      try {
        const result = await this.db.execute("SELECT COUNT(*) AS count FROM feedback_log");
        const row = result.rows[0];
        return row ? readNumber(row, "count") : 0;
      } catch (error) {
        throw toStorageError("Counting feedback", error);
      }
    });
  }

  /**
   * Newest first.
   */
  async getRecent(limit: number = 10): Promise<FeedbackRecord[]> {
    return this.select(
      "SELECT * FROM feedback_log ORDER BY id DESC LIMIT ?",
      [limit],
      "Reading recent feedback"
    );
  }

  async getByCorrectCategory(category: EmailCategory): Promise<FeedbackRecord[]> {
    return this.select(
      "SELECT * FROM feedback_log WHERE correct_category = ? ORDER BY id DESC",
      [category],
      `Reading feedback for ${category}`
    );
  }

  private async select(
    sql: string,
    args: Array<string | number>,
    operation: string
  ): Promise<FeedbackRecord[]> {
    return this.queue(async () => {
      try {
        const result = await this.db.execute({ sql, args });
        return result.rows.map(rowToFeedbackRecord);
      } catch (error) {
        throw toStorageError(operation, error);
      }
    });
  }
}

function validateFeedback(input: FeedbackInput): void {
  if (!isEmailCategory(input.originalCategory)) {
    throw new InvalidInputError(`Unknown original category: ${String(input.originalCategory)}`);
  }
  if (!isEmailCategory(input.correctCategory)) {
    throw new InvalidInputError(`Unknown correct category: ${String(input.correctCategory)}`);
  }
  if (!Number.isFinite(input.confidence) || input.confidence < 0 || input.confidence > 1) {
    throw new InvalidInputError(`Confidence must be between 0 and 1, got ${input.confidence}`);
  }
}

function rowToFeedbackRecord(row: Row): FeedbackRecord {
  const originalCategory = readText(row, "original_category");
  const correctCategory = readText(row, "correct_category");
  if (!isEmailCategory(originalCategory) || !isEmailCategory(correctCategory)) {
    throw new TypeError(`Feedback row ${readText(row, "id")} has an unknown category`);
  }

  return {
    id: readNumber(row, "id"),
    emailId: readText(row, "email_id"),
    emailContent: readText(row, "email_content"),
    originalCategory,
    correctCategory,
    confidence: readNumber(row, "confidence"),
    notes: readNullableText(row, "notes"),
    createdAt: readText(row, "created_at"),
  };
}
