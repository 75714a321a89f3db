import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { createChatRouter } from './routes/chat';
import { createToolsRouter } from './routes/tools';
import type { ChatService } from './services/chatService';
import type { ToolRetriever } from './services/retriever';
import type { SessionStore } from './services/sessionStore';
import { AdvisorError, type AdvisorErrorCode } from './utils/errors';
import { log } from './utils/logger';

export interface AppDependencies {
  chatService: ChatService;
  retriever: Pick<ToolRetriever, 'getIndex'>;
  sessions: SessionStore;
}

const STATUS_BY_CODE: Record<AdvisorErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  DATA_LOAD_ERROR: 500,
  INDEX_NOT_FOUND: 503,
  EMBEDDING_SERVICE_ERROR: 502,
  GENERATION_ERROR: 502,
};

export function createApp({ chatService, retriever, sessions }: AppDependencies) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req, res, next) => {
    if (req.path.startsWith('/api/chat')) {
      log('debug', `${req.method} ${req.path}`);
    }
    next();
  });

  app.use('/api/chat', createChatRouter(chatService, sessions));
  app.use('/api/tools', createToolsRouter(retriever));

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', message: 'Server is running', sessions: sessions.size });
  });

  // Express recognises error handlers by their four parameters
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AdvisorError) {
      const status = STATUS_BY_CODE[err.code];
      log(status >= 500 ? 'error' : 'warn', err.message, { code: err.code, path: req.path });
      res.status(status).json({ error: err.message, code: err.code });
      return;
    }

    log('error', 'Unhandled error', {
      path: req.path,
      error: err instanceof Error ? err.stack ?? err.message : String(err),
    });
    res.status(500).json({ error: err instanceof Error ? err.message : 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  return app;
}
