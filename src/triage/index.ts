export {
  EMAIL_CATEGORIES,
  PRIORITIES,
  CATEGORY_DESCRIPTIONS,
  isEmailCategory,
  isPriority,
  escalatePriority,
  type EmailCategory,
  type Priority,
} from "./categories.js";
export {
  createEmailRecord,
  emailId,
  emailText,
  type EmailRecord,
  type EmailRecordInput,
  type ClassificationResult,
} from "./email.js";
export {
  buildSystemPrompt,
  buildClassificationPrompt,
  formatCategories,
  formatContext,
  type CorrectionExample,
  type PromptContext,
} from "./prompt.js";
export {
  parseClassificationResponse,
  applyReviewPolicy,
  extractJson,
  MANUAL_REVIEW_PREFIX,
} from "./parser.js";
export {
  EmailClassifier,
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_CONTEXT_SIZE,
  type ClassifierOptions,
  type ClassifyContext,
  type BatchOutcome,
} from "./classifier.js";
export {
  TriageAgent,
  createEmbedder,
  type TriageAgentParts,
  type AgentStatistics,
} from "./engine.js";
