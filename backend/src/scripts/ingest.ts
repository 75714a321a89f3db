import { config } from '../config/env';
import { buildIndex } from '../services/ingestionService';
import { errorMessage } from '../utils/errors';
import { log } from '../utils/logger';
import { createEmbeddingClient } from '../utils/openaiService';

async function main(): Promise<void> {
  const csvPath = process.argv[2] ?? config.ingestion.csvPath;
  log('info', 'Building AI tools vector index', { csvPath, indexDir: config.indexDir });

  const summary = await buildIndex(csvPath, {
    indexDir: config.indexDir,
    embeddingClient: createEmbeddingClient(),
    batchSize: config.ingestion.batchSize,
    onProgress: (embedded, total) => {
      if (embedded === total || embedded % 1000 < config.ingestion.batchSize) {
        log('info', `Embedded ${embedded}/${total} tools`);
      }
    },
  });

  log('info', 'Ingestion finished', { ...summary });
}

main().catch((error: unknown) => {
  log('error', `Ingestion failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
