export {
  KnowledgeBase,
  KNOWLEDGE_KINDS,
  isKnowledgeKind,
  type KnowledgeKind,
  type KnowledgeEntry,
  type KnowledgeMatch,
  type KnowledgeStats,
  type ProductInput,
  type CommonQueryInput,
  type ClassificationRecordInput,
} from "./knowledge-base.js";
export {
  OpenAIEmbedder,
  HashingEmbedder,
  tokenize,
  type Embedder,
  type OpenAIEmbedderOptions,
} from "./embeddings.js";
export { cosineSimilarity, findTopK } from "./cosine-similarity.js";
