import type { Server } from 'http';
import axios, { type AxiosInstance } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../../app';
import { ChatService } from '../../services/chatService';
import { SessionStore } from '../../services/sessionStore';
import { FakeChatClient } from '../../testUtils/fakes';
import { GenerationError, IndexNotFoundError } from '../../utils/errors';
import type { IndexManifest, LoadedIndex } from '../../utils/indexStorage';
import { VectorStore } from '../../utils/vectorStore';
import type { ScoredDocument } from '../../types';

const toolA: ScoredDocument = {
  id: 'tool-0',
  text: 'Name: ToolA | Category: Image | Pricing: Free',
  similarity: 0.92,
  metadata: {
    name: 'ToolA',
    category: 'Image',
    primaryTask: 'Image generation',
    industry: 'Design',
    pricingModel: 'Free',
    website: 'https://toola.example',
  },
};

const manifest: IndexManifest = {
  formatVersion: 1,
  embeddingModel: 'test-model',
  dimension: 2,
  documentCount: 2,
  status: 'complete',
  sourceCsv: 'tools.csv',
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

describe('chat API', () => {
  let server: Server;
  let client: AxiosInstance;
  let reply: string | Error;
  let sessions: SessionStore;
  let chatClient: FakeChatClient;
  const retrieve = vi.fn(async (): Promise<ScoredDocument[]> => [toolA]);

  beforeEach(async () => {
    reply = 'ToolA fits.';
    retrieve.mockClear();
    sessions = new SessionStore({ ttlMs: 60_000, maxSessions: 100 });
    chatClient = new FakeChatClient(() => reply);

    const store = new VectorStore([
      { document: toolA, embedding: [1, 0] },
      { document: { ...toolA, id: 'tool-1', metadata: { ...toolA.metadata, name: 'ToolB', pricingModel: 'Paid' } }, embedding: [0, 1] },
    ]);
    const loaded: LoadedIndex = { manifest, store };

    const app = createApp({
      chatService: new ChatService({ retriever: { retrieve }, chatClient, historyWindow: 10 }),
      retriever: { getIndex: async () => loaded },
      sessions,
    });

    await new Promise<void>(resolve => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (typeof address !== 'object' || address === null) {
      throw new Error('Server did not bind to a TCP port');
    }
    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  // Parks the next `times` retrievals until release() is called
  function holdRetrieval(times: number) {
    let release = () => {};
    const released = new Promise<void>(resolve => {
      release = resolve;
    });
    let allStarted = () => {};
    const started = new Promise<void>(resolve => {
      allStarted = resolve;
    });

    let waiting = times;
    for (let i = 0; i < times; i++) {
      retrieve.mockImplementationOnce(async () => {
        waiting--;
        if (waiting === 0) allStarted();
        await released;
        return [toolA];
      });
    }
    return { started, release: () => release() };
  }

  it('answers a first question and opens a session', async () => {
    const res = await client.post('/api/chat', { query: 'image tools', pricing: ['Free'] });

    expect(res.status).toBe(200);
    expect(typeof res.data.sessionId).toBe('string');
    expect(res.data.answer).toBe('ToolA fits.');
    expect(res.data.sources).toEqual([toolA]);
    expect(res.data.history).toEqual([
      { role: 'user', content: 'image tools' },
      { role: 'assistant', content: 'ToolA fits.' },
    ]);
    expect(retrieve).toHaveBeenCalledWith('image tools', { pricing: ['Free'] });

    const history = await client.get(`/api/chat/${res.data.sessionId}/history`);
    expect(history.data.history).toHaveLength(2);
  });

  it('threads prior turns of the same session into the prompt', async () => {
    await client.post('/api/chat', { sessionId: 'session-1', query: 'image tools' });
    reply = 'ToolB costs money.';
    const res = await client.post('/api/chat', { sessionId: 'session-1', query: 'any paid ones?' });

    expect(res.data.history).toHaveLength(4);
    expect(chatClient.requests[1].slice(1)).toEqual([
      { role: 'user', content: 'image tools' },
      { role: 'assistant', content: 'ToolA fits.' },
      { role: 'user', content: 'any paid ones?' },
    ]);
  });

  it('keeps the session history when generation fails', async () => {
    await client.post('/api/chat', { sessionId: 'session-1', query: 'image tools' });
    reply = new GenerationError('Chat completion failed: rate limited');

    const res = await client.post('/api/chat', { sessionId: 'session-1', query: 'more please' });

    expect(res.status).toBe(502);
    expect(res.data).toEqual({ error: 'Chat completion failed: rate limited', code: 'GENERATION_ERROR' });
    expect(sessions.get('session-1')).toHaveLength(2);
  });

  it('reports a missing index as unavailable', async () => {
    retrieve.mockRejectedValueOnce(new IndexNotFoundError('No vector index found'));

    const res = await client.post('/api/chat', { query: 'image tools' });

    expect(res.status).toBe(503);
    expect(res.data.code).toBe('INDEX_NOT_FOUND');
  });

  it('rejects a blank query', async () => {
    const res = await client.post('/api/chat', { query: '   ' });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      error: 'query: Query is required and must be a non-empty string',
      code: 'INVALID_ARGUMENT',
    });
    expect(retrieve).not.toHaveBeenCalled();
  });

  it('rejects unknown pricing values', async () => {
    const res = await client.post('/api/chat', { query: 'image tools', pricing: ['Cheap'] });

    expect(res.status).toBe(400);
    expect(res.data.code).toBe('INVALID_ARGUMENT');
    expect(res.data.error).toMatch(/^pricing\.0: /);
  });

  it('clears a session on reset', async () => {
    await client.post('/api/chat', { sessionId: 'session-1', query: 'image tools' });

    const reset = await client.post('/api/chat/session-1/reset');
    expect(reset.data).toEqual({ sessionId: 'session-1', history: [] });

    await client.post('/api/chat', { sessionId: 'session-1', query: 'coding tools' });
    expect(chatClient.requests[1].map(message => message.role)).toEqual(['system', 'user']);
  });

  it('does not record a turn into a session reset while it was being answered', async () => {
    await client.post('/api/chat', { sessionId: 'session-1', query: 'image tools' });
    const hold = holdRetrieval(1);

    const pending = client.post('/api/chat', { sessionId: 'session-1', query: 'more please' });
    await hold.started;
    await client.post('/api/chat/session-1/reset');
    hold.release();
    const res = await pending;

    expect(res.status).toBe(200);
    expect(res.data.answer).toBe('ToolA fits.');
    expect(sessions.get('session-1')).toEqual([]);
  });

  it('keeps both of two overlapping turns on one session', async () => {
    const hold = holdRetrieval(2);

    const first = client.post('/api/chat', { sessionId: 'session-1', query: 'first question' });
    const second = client.post('/api/chat', { sessionId: 'session-1', query: 'second question' });
    await hold.started;
    hold.release();
    await Promise.all([first, second]);

    const history = sessions.get('session-1');
    expect(history).toHaveLength(4);
    expect(
      history
        .filter(turn => turn.role === 'user')
        .map(turn => turn.content)
        .sort()
    ).toEqual(['first question', 'second question']);
  });

  it('summarises the loaded index', async () => {
    const res = await client.get('/api/tools/stats');

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      status: 'complete',
      count: 2,
      embeddingModel: 'test-model',
      dimension: 2,
      updatedAt: '2024-01-01T00:00:00.000Z',
      byPricing: { Free: 1, Freemium: 0, Paid: 1, Unknown: 0 },
    });
  });

  it('answers health checks', async () => {
    const res = await client.get('/api/health');

    expect(res.data).toEqual({ status: 'ok', message: 'Server is running', sessions: 0 });
  });
});
