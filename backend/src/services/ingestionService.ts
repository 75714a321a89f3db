import { errorMessage } from '../utils/errors';
import { IndexWriter } from '../utils/indexStorage';
import { log } from '../utils/logger';
import type { EmbeddingClient } from '../utils/openaiService';
import { loadToolRecords, toToolDocument } from '../utils/toolRecords';

export interface BuildIndexOptions {
  indexDir: string;
  embeddingClient: EmbeddingClient;
  batchSize: number;
  onProgress?: (embedded: number, total: number) => void;
}

export interface IndexSummary {
  indexDir: string;
  documentCount: number;
  skippedRows: number;
  batches: number;
  dimension: number | null;
}

/**
 * Reads the CSV, embeds every listing in batches and writes the index to
 * `indexDir`, replacing any index already there. A failing batch marks the
 * index partial and rethrows; batches written before it stay on disk.
 */
export async function buildIndex(csvPath: string, options: BuildIndexOptions): Promise<IndexSummary> {
  const { indexDir, embeddingClient, batchSize, onProgress } = options;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new Error(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const { records, skippedRows } = await loadToolRecords(csvPath);
  const documents = records.map((record, i) => toToolDocument(record, i));

  const writer = await IndexWriter.create(indexDir, {
    embeddingModel: embeddingClient.model,
    sourceCsv: csvPath,
  });

  const totalBatches = Math.ceil(documents.length / batchSize);
  log('info', `Embedding ${documents.length} tools in ${totalBatches} batch(es) of up to ${batchSize}`);

  for (let i = 0; i < documents.length; i += batchSize) {
    const batch = documents.slice(i, i + batchSize);
    const batchNum = Math.floor(i / batchSize) + 1;

    try {
      const embeddings = await embeddingClient.embedDocuments(batch.map(document => document.text));
      if (embeddings.length !== batch.length) {
        throw new Error(`Mismatch: got ${embeddings.length} embeddings for ${batch.length} documents`);
      }
      await writer.append(batch.map((document, j) => ({ document, embedding: embeddings[j] })));
    } catch (error) {
      log('error', `Batch ${batchNum}/${totalBatches} failed; keeping ${writer.documentCount} tools already written`, {
        error: errorMessage(error),
      });
      await writer.finish('partial');
      throw error;
    }

    log('info', `Completed batch ${batchNum}/${totalBatches}`);
    onProgress?.(writer.documentCount, documents.length);
  }

  const manifest = await writer.finish('complete');
  log('info', `Vector index written to ${indexDir}`, { documentCount: manifest.documentCount });

  return {
    indexDir,
    documentCount: manifest.documentCount,
    skippedRows,
    batches: totalBatches,
    dimension: manifest.dimension,
  };
}
