export {
  createDbClient,
  initializeKnowledgeSchema,
  initializeFeedbackSchema,
} from "./schema.js";
export { readText, readNumber, readNullableText, parseJsonObject } from "./rows.js";
