import type { ScoredDocument, ToolDocument } from '../types';

export interface IndexEntry {
  document: ToolDocument;
  embedding: number[];
}

export type DocumentPredicate = (document: ToolDocument) => boolean;

export class VectorStore {
  private readonly entries: IndexEntry[];

  constructor(entries: IndexEntry[] = []) {
    this.entries = [...entries];
  }

  getAll(): readonly IndexEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  get dimension(): number | undefined {
    return this.entries[0]?.embedding.length;
  }

  cosineSimilarity(vecA: number[], vecB: number[]): number {
    if (vecA.length !== vecB.length) {
      throw new Error('Vectors must have the same length');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < vecA.length; i++) {
      dotProduct += vecA[i] * vecB[i];
      normA += vecA[i] * vecA[i];
      normB += vecB[i] * vecB[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    return denominator === 0 ? 0 : dotProduct / denominator;
  }

  /**
   * Ranks the entries accepted by `predicate` by cosine similarity, highest
   * first, and returns at most `topK`. Equal scores keep index order.
   */
  findSimilar(queryEmbedding: number[], topK: number, predicate?: DocumentPredicate): ScoredDocument[] {
    const candidates = predicate ? this.entries.filter(entry => predicate(entry.document)) : this.entries;

    return candidates
      .map(entry => ({
        ...entry.document,
        similarity: this.cosineSimilarity(queryEmbedding, entry.embedding),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK);
  }
}
