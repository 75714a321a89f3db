import { describe, expect, it, vi } from 'vitest';
import { ADVISOR_INSTRUCTIONS, ChatService, buildMessages, buildSystemPrompt, formatListings } from '../chatService';
import { FakeChatClient } from '../../testUtils/fakes';
import { GenerationError } from '../../utils/errors';
import type { ConversationState, QueryFilter, ScoredDocument } from '../../types';

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

const toolB: ScoredDocument = {
  ...toolA,
  id: 'tool-1',
  text: 'Name: ToolB | Category: Video | Pricing: Paid',
  similarity: 0.4,
  metadata: { ...toolA.metadata, name: 'ToolB', pricingModel: 'Paid' },
};

const noFilter: QueryFilter = { pricing: [] };

function fakeRetriever(results: ScoredDocument[] = [toolA, toolB]) {
  return { retrieve: vi.fn(async () => results) };
}

describe('prompt assembly', () => {
  it('numbers the retrieved listings', () => {
    expect(formatListings([toolA, toolB])).toBe(
      '[1] Name: ToolA | Category: Image | Pricing: Free\n[2] Name: ToolB | Category: Video | Pricing: Paid'
    );
    expect(formatListings([])).toBe('No tool listings matched this request.');
  });

  it('mentions the pricing filter only when one is active', () => {
    expect(buildSystemPrompt([toolA], noFilter)).toBe(
      `${ADVISOR_INSTRUCTIONS}\n\nTool listings:\n[1] Name: ToolA | Category: Image | Pricing: Free`
    );
    expect(buildSystemPrompt([toolA], { pricing: ['Free', 'Freemium'] })).toBe(
      `${ADVISOR_INSTRUCTIONS}\n\nThe user only wants tools with pricing: Free, Freemium.\n\n` +
        'Tool listings:\n[1] Name: ToolA | Category: Image | Pricing: Free'
    );
  });

  it('replays only the most recent turns of history', () => {
    const history: ConversationState = [
      { role: 'user', content: 'q1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
    ];

    const messages = buildMessages('q3', history, [toolA], noFilter, 2);

    expect(messages.map(message => `${message.role}:${message.content}`).slice(1)).toEqual([
      'user:q2',
      'assistant:a2',
      'user:q3',
    ]);
    expect(messages[0].role).toBe('system');
  });
});

describe('ChatService.answer', () => {
  it('returns the answer, its sources and a history two turns longer', async () => {
    const retriever = fakeRetriever();
    const chatClient = new FakeChatClient(() => 'ToolA is a free image generator.');
    const service = new ChatService({ retriever, chatClient, historyWindow: 10 });
    const history: ConversationState = [
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello! What are you looking for?' },
    ];

    const result = await service.answer({ query: ' free image tools ', history, filter: { pricing: ['Free'] } });

    expect(result.answer).toBe('ToolA is a free image generator.');
    expect(result.sources).toEqual([toolA, toolB]);
    expect(result.history).toEqual([
      ...history,
      { role: 'user', content: 'free image tools' },
      { role: 'assistant', content: 'ToolA is a free image generator.' },
    ]);
    expect(history).toHaveLength(2);
    expect(retriever.retrieve).toHaveBeenCalledWith(' free image tools ', { pricing: ['Free'] });
  });

  it('leaves the history untouched when generation fails', async () => {
    const chatClient = new FakeChatClient(() => new GenerationError('Chat completion failed: rate limited'));
    const service = new ChatService({ retriever: fakeRetriever(), chatClient, historyWindow: 10 });
    const history: ConversationState = [
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello!' },
    ];
    const before = [...history];

    await expect(service.answer({ query: 'video tools', history, filter: noFilter })).rejects.toBeInstanceOf(
      GenerationError
    );
    expect(history).toEqual(before);
  });

  it('sends no prior turns after a reset', async () => {
    const chatClient = new FakeChatClient(() => 'Here are some tools.');
    const service = new ChatService({ retriever: fakeRetriever([toolA]), chatClient, historyWindow: 10 });

    const first = await service.answer({ query: 'image tools', history: [], filter: noFilter });
    expect(first.history).toHaveLength(2);

    // A reset hands the next turn an empty history
    await service.answer({ query: 'coding tools', history: [], filter: noFilter });

    expect(chatClient.requests[1]).toEqual([
      { role: 'system', content: buildSystemPrompt([toolA], noFilter) },
      { role: 'user', content: 'coding tools' },
    ]);
  });
});
