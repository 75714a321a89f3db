import { config } from './config/env';
import { createApp } from './app';
import { ChatService } from './services/chatService';
import { ToolRetriever } from './services/retriever';
import { SessionStore } from './services/sessionStore';
import { log } from './utils/logger';
import { createChatClient, createEmbeddingClient } from './utils/openaiService';

const retriever = new ToolRetriever({
  indexDir: config.indexDir,
  embeddingClient: createEmbeddingClient(),
  defaultK: config.retrievalK,
});

const chatService = new ChatService({
  retriever,
  chatClient: createChatClient(),
  historyWindow: config.historyWindow,
});

const app = createApp({ chatService, retriever, sessions: new SessionStore(config.sessions) });

// Load the index up front so a missing one shows in the logs at startup
retriever.getIndex().catch((error: unknown) => {
  log('warn', 'Vector index not loaded yet; chat requests will fail until ingestion has run', {
    error: error instanceof Error ? error.message : String(error),
  });
});

app.listen(config.port, '0.0.0.0', () => {
  log('info', `Server is running on port ${config.port}`);
  log('info', `Health check: http://localhost:${config.port}/api/health`);
});
