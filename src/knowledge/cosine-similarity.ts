/**
 * Calculate cosine similarity between two embedding vectors.
 *
 * @returns Similarity between -1 and 1 (0 when either vector is all zeros)
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimensions must match: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    normA += aVal * aVal;
    normB += bVal * bVal;
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Rank candidates against a query vector, most similar first.
 * Candidates with equal similarity keep their input order.
 */
export function findTopK<T extends { embedding: readonly number[] }>(
  query: readonly number[],
  candidates: readonly T[],
  topK: number
): Array<{ item: T; similarity: number }> {
  if (topK <= 0) return [];

  return candidates
    .map((item) => ({ item, similarity: cosineSimilarity(query, item.embedding) }))
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, topK);
}
