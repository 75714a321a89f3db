import type { ChatTurn, ConversationState, QueryFilter, ScoredDocument } from '../types';
import { log } from '../utils/logger';
import type { ChatClient, ChatMessage } from '../utils/openaiService';
import type { ToolRetriever } from './retriever';

export const ADVISOR_INSTRUCTIONS = `You are an expert AI tools advisor with knowledge of a catalogue of AI tool listings.
Answer using only the tool listings provided below. If they do not cover the question, say so instead of guessing.
Be concise and conversational.
When you recommend tools, give for each one its name, a one or two sentence description, its primary use case, its pricing model and its website.
If the user asks about cost or free options, recommend by pricing model.`;

export interface AnswerRequest {
  query: string;
  history: ConversationState;
  filter: QueryFilter;
}

export interface AnswerResult {
  answer: string;
  sources: ScoredDocument[];
  history: ConversationState;
}

export interface ChatServiceOptions {
  retriever: Pick<ToolRetriever, 'retrieve'>;
  chatClient: ChatClient;
  historyWindow: number;
}

export function formatListings(sources: ScoredDocument[]): string {
  if (sources.length === 0) {
    return 'No tool listings matched this request.';
  }
  return sources.map((source, i) => `[${i + 1}] ${source.text}`).join('\n');
}

export function buildSystemPrompt(sources: ScoredDocument[], filter: QueryFilter): string {
  const sections = [ADVISOR_INSTRUCTIONS];
  if (filter.pricing.length > 0) {
    sections.push(`The user only wants tools with pricing: ${filter.pricing.join(', ')}.`);
  }
  sections.push(`Tool listings:\n${formatListings(sources)}`);
  return sections.join('\n\n');
}

export function buildMessages(
  query: string,
  history: ConversationState,
  sources: ScoredDocument[],
  filter: QueryFilter,
  historyWindow: number
): ChatMessage[] {
  const recent = historyWindow > 0 ? history.slice(-historyWindow) : [];
  return [
    { role: 'system', content: buildSystemPrompt(sources, filter) },
    ...recent.map(turn => ({ role: turn.role, content: turn.content })),
    { role: 'user', content: query },
  ];
}

export class ChatService {
  constructor(private readonly options: ChatServiceOptions) {}

  /**
   * Runs one conversational turn. The caller's history is never modified;
   * the extended history is returned only when generation succeeds.
   */
  async answer({ query, history, filter }: AnswerRequest): Promise<AnswerResult> {
    const sources = await this.options.retriever.retrieve(query, filter);
    const trimmedQuery = query.trim();
    const messages = buildMessages(trimmedQuery, history, sources, filter, this.options.historyWindow);

    const startTime = Date.now();
    const answer = await this.options.chatClient.complete(messages);
    log('info', 'Answered chat turn', {
      sources: sources.length,
      historyTurns: history.length,
      durationMs: Date.now() - startTime,
    });

    const turns: ChatTurn[] = [
      { role: 'user', content: trimmedQuery },
      { role: 'assistant', content: answer },
    ];
    return { answer, sources, history: [...history, ...turns] };
  }
}
