import { describe, expect, it } from 'vitest';
import { VectorStore } from '../vectorStore';
import type { PricingModel, ToolDocument } from '../../types';

function doc(id: string, pricingModel: PricingModel): ToolDocument {
  return {
    id,
    text: `Name: ${id}`,
    metadata: { name: id, category: '', primaryTask: '', industry: '', pricingModel, website: '' },
  };
}

describe('VectorStore', () => {
  const store = new VectorStore([
    { document: doc('east', 'Free'), embedding: [1, 0] },
    { document: doc('north', 'Paid'), embedding: [0, 1] },
    { document: doc('northeast', 'Free'), embedding: [1, 1] },
    { document: doc('west', 'Freemium'), embedding: [-1, 0] },
  ]);

  it('computes cosine similarity', () => {
    expect(store.cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1);
    expect(store.cosineSimilarity([1, 0], [0, 3])).toBeCloseTo(0);
    expect(store.cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different length', () => {
    expect(() => store.cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Vectors must have the same length');
  });

  it('ranks by similarity and truncates to topK', () => {
    const results = store.findSimilar([1, 0.1], 2);

    expect(results.map(result => result.id)).toEqual(['east', 'northeast']);
    expect(results[0].similarity).toBeGreaterThan(results[1].similarity);
  });

  it('only ranks documents accepted by the predicate', () => {
    const results = store.findSimilar([0, 1], 4, document => document.metadata.pricingModel === 'Free');

    expect(results.map(result => result.id)).toEqual(['northeast', 'east']);
  });

  it('keeps index order for equal scores', () => {
    const results = store.findSimilar([0, 1], 4, document => document.id === 'east' || document.id === 'west');

    expect(results.map(result => result.id)).toEqual(['east', 'west']);
  });

  it('reports size and dimension', () => {
    expect(store.size).toBe(4);
    expect(store.dimension).toBe(2);
    expect(new VectorStore().dimension).toBeUndefined();
  });

  it('copies the entries it is built from', () => {
    const entries = [{ document: doc('solo', 'Paid'), embedding: [1, 0] }];
    const copy = new VectorStore(entries);
    entries.push({ document: doc('late', 'Free'), embedding: [0, 1] });

    expect(copy.size).toBe(1);
  });
});
