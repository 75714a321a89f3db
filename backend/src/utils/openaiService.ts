import OpenAI from 'openai';
import { config, resolveOpenAIApiKey } from '../config/env';
import { EmbeddingServiceError, GenerationError, errorMessage } from './errors';
import { log } from './logger';
import { withRetry, type RetryPolicy } from './retry';

// OpenAI rejects inputs past its token limit; trimming by characters keeps us well under it.
const MAX_INPUT_CHARS = 8000;

export interface EmbeddingClient {
  readonly model: string;
  /** One request for the whole batch; vectors come back in input order. */
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatClient {
  complete(messages: ChatMessage[]): Promise<string>;
}

// The slices of the OpenAI SDK these clients touch, so tests can hand in stubs.
export interface OpenAIEmbeddingsApi {
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): PromiseLike<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIChatApi {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming
      ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

let openai: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  if (!openai) {
    openai = new OpenAI({
      apiKey: resolveOpenAIApiKey(),
      baseURL: config.openai.baseUrl,
      timeout: config.openai.timeoutMs,
      // Retries go through withRetry so both clients share one policy
      maxRetries: 0,
    });
  }
  return openai;
}

function prepareInput(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_INPUT_CHARS ? trimmed.substring(0, MAX_INPUT_CHARS) : trimmed;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly api: OpenAIEmbeddingsApi,
    readonly model: string,
    private readonly retryPolicy: RetryPolicy
  ) {}

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const input = texts.map(prepareInput);
    const startTime = Date.now();

    try {
      const vectors = await withRetry('Embedding request', this.retryPolicy, async () => {
        const response = await this.api.embeddings.create({
          model: this.model,
          input,
          encoding_format: 'float',
        });

        if (response.data.length !== input.length) {
          throw new Error(`Unexpected response: expected ${input.length} embeddings, got ${response.data.length}`);
        }

        return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
      });

      log('debug', 'OpenAI embeddings responded', { count: input.length, durationMs: Date.now() - startTime });
      return vectors;
    } catch (error) {
      throw new EmbeddingServiceError(`Failed to get embeddings: ${errorMessage(error)}`, { cause: error });
    }
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedDocuments([text]);
    return vector;
  }
}

export interface ChatClientOptions {
  model: string;
  temperature: number;
  retryPolicy: RetryPolicy;
}

export class OpenAIChatClient implements ChatClient {
  constructor(
    private readonly api: OpenAIChatApi,
    private readonly options: ChatClientOptions
  ) {}

  async complete(messages: ChatMessage[]): Promise<string> {
    log('debug', 'Sending request to OpenAI', {
      model: this.options.model,
      messageCount: messages.length,
    });

    let content: string | null | undefined;
    try {
      const response = await withRetry('Chat completion', this.options.retryPolicy, async () =>
        this.api.chat.completions.create({
          model: this.options.model,
          messages: messages.map(toOpenAIMessage),
          temperature: this.options.temperature,
        })
      );
      content = response.choices[0]?.message.content;
    } catch (error) {
      throw new GenerationError(`Chat completion failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new GenerationError('No response content from OpenAI');
    }
    return content;
  }
}

export function createEmbeddingClient(): EmbeddingClient {
  return new OpenAIEmbeddingClient(getOpenAIClient(), config.openai.embeddingModel, config.retry);
}

export function createChatClient(): ChatClient {
  return new OpenAIChatClient(getOpenAIClient(), {
    model: config.openai.chatModel,
    temperature: config.openai.temperature,
    retryPolicy: config.retry,
  });
}
