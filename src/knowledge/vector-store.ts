import { KnowledgePassage, PassageType } from './types';

export interface VectorEntry {
  id: string;
  embedding: number[];
  metadata: {
    type: PassageType;
    content: string;
    source: string;
  };
}

interface IndexedEntry {
  unit: number[];
  metadata: VectorEntry['metadata'];
}

function norm(v: number[]): number {
  return Math.sqrt(v.reduce((sum, x) => sum + x * x, 0));
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  const denominator = norm(a) * norm(b);
  return denominator === 0 ? 0 : dot(a, b) / denominator;
}

/**
 * Brute-force cosine index over the knowledge corpus. Embeddings are
 * normalized on insert so a query costs one dot product per entry; zero
 * vectors are never indexed.
 */
export class VectorStore {
  private indexed: IndexedEntry[] = [];

  addEntries(entries: VectorEntry[]): void {
    for (const entry of entries) {
      const length = norm(entry.embedding);
      if (length === 0) continue;
      this.indexed.push({ unit: entry.embedding.map((x) => x / length), metadata: entry.metadata });
    }
  }

  clear(): void {
    this.indexed = [];
  }

  get size(): number {
    return this.indexed.length;
  }

  search(queryEmbedding: number[], topK = 5, minScore = 0.6): KnowledgePassage[] {
    const length = norm(queryEmbedding);
    if (length === 0 || topK <= 0) return [];
    const query = queryEmbedding.map((x) => x / length);

    const hits: KnowledgePassage[] = [];
    for (const { unit, metadata } of this.indexed) {
      if (unit.length !== query.length) continue;
      const relevance = dot(query, unit);
      if (relevance >= minScore) hits.push({ ...metadata, relevance });
    }
    return hits.sort((a, b) => b.relevance - a.relevance).slice(0, topK);
  }
}
