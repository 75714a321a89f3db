import { NO_FILTER, type QueryFilter, type ScoredDocument } from '../types';
import { IndexNotFoundError, InvalidArgumentError } from '../utils/errors';
import { loadIndex, type LoadedIndex } from '../utils/indexStorage';
import { log } from '../utils/logger';
import type { EmbeddingClient } from '../utils/openaiService';
import type { DocumentPredicate } from '../utils/vectorStore';

export interface RetrieverOptions {
  indexDir: string;
  embeddingClient: EmbeddingClient;
  defaultK: number;
}

export function pricingPredicate(filter: QueryFilter): DocumentPredicate | undefined {
  if (filter.pricing.length === 0) return undefined;
  const allowed = new Set(filter.pricing);
  return document => allowed.has(document.metadata.pricingModel);
}

/**
 * Nearest-neighbour lookup over the persisted index. A non-empty pricing
 * filter is applied before ranking, so fewer than `k` results come back
 * when fewer listings match it.
 */
export class ToolRetriever {
  private indexPromise: Promise<LoadedIndex> | null = null;

  constructor(private readonly options: RetrieverOptions) {}

  /** Loads the index once and shares it; a failed load is retried on the next call. */
  getIndex(): Promise<LoadedIndex> {
    if (!this.indexPromise) {
      this.indexPromise = loadIndex(this.options.indexDir).catch((error: unknown) => {
        this.indexPromise = null;
        throw error;
      });
    }
    return this.indexPromise;
  }

  async retrieve(query: string, filter: QueryFilter = NO_FILTER, k: number = this.options.defaultK): Promise<ScoredDocument[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
    }
    if (!query.trim()) {
      throw new InvalidArgumentError('Query is required and must be a non-empty string');
    }

    const { store } = await this.getIndex();
    const queryEmbedding = await this.options.embeddingClient.embedQuery(query.trim());

    if (store.dimension !== undefined && store.dimension !== queryEmbedding.length) {
      throw new IndexNotFoundError(
        `Index holds ${store.dimension}-dimension vectors but the query embedding has ${queryEmbedding.length}; rebuild the index with the current embedding model`
      );
    }

    const results = store.findSimilar(queryEmbedding, k, pricingPredicate(filter));
    log('debug', `Retrieved ${results.length} tools`, {
      k,
      pricing: filter.pricing,
      top: results.map(result => result.metadata.name),
    });
    return results;
  }
}
