export {
  loadConfig,
  loadConfigWithDotenv,
  type AgentConfig,
  type LoadConfigOptions,
} from "./config.js";
export {
  ClassifierError,
  InvalidInputError,
  ClassificationParseError,
  ProviderError,
  ProviderTimeoutError,
  DuplicateIdError,
  StorageError,
  ConfigError,
  ToolRegistrationError,
  UnknownToolError,
  ToolArgumentError,
  ToolExecutionError,
  type ErrorCode,
} from "./errors.js";
export * from "./triage/index.js";
export * from "./knowledge/index.js";
export * from "./feedback/index.js";
export * from "./tools/index.js";
export * from "./providers/index.js";
export {
  createDbClient,
  initializeKnowledgeSchema,
  initializeFeedbackSchema,
} from "./db/index.js";
