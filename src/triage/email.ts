import { createHash } from "node:crypto";
import type { EmailCategory, Priority } from "./categories.js";

export interface EmailRecord {
  readonly subject: string;
  readonly body: string;
  readonly sender?: string;
  readonly receivedAt?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface EmailRecordInput {
  subject: string;
  body: string;
  sender?: string;
  receivedAt?: string | Date;
  metadata?: Record<string, unknown>;
}

export interface ClassificationResult {
  readonly primaryCategory: EmailCategory;
  readonly confidence: number;
  readonly secondaryCategories: readonly EmailCategory[];
  readonly reasoning: string;
  readonly extractedEntities: Readonly<Record<string, unknown>>;
  readonly recommendedAction: string;
  readonly priority: Priority;
  /** Set when confidence fell below the review threshold */
  readonly needsReview: boolean;
  readonly classifiedAt: string;
}

export function createEmailRecord(input: EmailRecordInput): EmailRecord {
  const receivedAt =
    input.receivedAt instanceof Date
      ? input.receivedAt.toISOString()
      : input.receivedAt;

  return Object.freeze({
    subject: input.subject,
    body: input.body,
    ...(input.sender !== undefined && { sender: input.sender }),
    ...(receivedAt !== undefined && { receivedAt }),
    ...(input.metadata !== undefined && {
      metadata: Object.freeze({ ...input.metadata }),
    }),
  });
}

/**
 * Text used for similarity search and stored alongside feedback.
 */
export function emailText(email: EmailRecord): string {
  return `${email.subject} ${email.body}`;
}

/**
 * Stable identifier derived from the email's content.
 */
export function emailId(email: EmailRecord): string {
  return createHash("md5")
    .update(
      `${email.subject}${email.body}${email.sender ?? ""}${email.receivedAt ?? ""}`
    )
    .digest("hex");
}
