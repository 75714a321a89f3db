import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { PRICING_MODELS } from '../types';
import { InvalidArgumentError } from '../utils/errors';
import { log } from '../utils/logger';
import type { ChatService } from '../services/chatService';
import type { SessionStore } from '../services/sessionStore';

const chatRequestSchema = z.object({
  sessionId: z.string().min(1).max(128).optional(),
  query: z.string().trim().min(1, 'Query is required and must be a non-empty string'),
  pricing: z.array(z.enum(PRICING_MODELS)).default([]),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function createChatRouter(chatService: ChatService, sessions: SessionStore) {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidArgumentError(describeIssues(parsed.error));
      }

      const { query, pricing } = parsed.data;
      const sessionId = parsed.data.sessionId ?? sessions.createId();
      log('info', 'Chat request received', { sessionId, pricing });

      const snapshot = sessions.begin(sessionId);
      const result = await chatService.answer({
        query,
        history: snapshot.history,
        filter: { pricing },
      });

      // Only a successful turn is stored, and never into a session reset while it ran
      const turns = result.history.slice(snapshot.history.length);
      const stored = sessions.append(sessionId, turns, snapshot.generation);
      if (!stored) {
        log('warn', 'Session was reset during the turn; answer not recorded', { sessionId });
      }

      res.json({
        sessionId,
        answer: result.answer,
        sources: result.sources,
        history: stored ? sessions.get(sessionId) : result.history,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId/history', (req: Request, res: Response) => {
    const { sessionId } = req.params;
    res.json({ sessionId, history: sessions.get(sessionId) });
  });

  router.post('/:sessionId/reset', (req: Request, res: Response) => {
    const { sessionId } = req.params;
    sessions.reset(sessionId);
    log('info', 'Conversation reset', { sessionId });
    res.json({ sessionId, history: sessions.get(sessionId) });
  });

  return router;
}
