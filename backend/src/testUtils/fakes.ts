import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EmbeddingServiceError } from '../utils/errors';
import type { ChatClient, ChatMessage, EmbeddingClient } from '../utils/openaiService';

export const KEYWORDS = ['image', 'video', 'code', 'write'];

/** Bag-of-keywords vector: one dimension per keyword, counting substring hits. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map(word => lower.split(word).length - 1);
}

export class KeywordEmbeddingClient implements EmbeddingClient {
  readonly model = 'keyword-test-embedder';
  readonly batches: string[][] = [];
  readonly queries: string[] = [];

  constructor(private readonly failOnBatch?: number) {}

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.batches.push(texts);
    if (this.batches.length === this.failOnBatch) {
      throw new EmbeddingServiceError('Failed to get embeddings: quota exceeded');
    }
    return texts.map(keywordVector);
  }

  async embedQuery(text: string): Promise<number[]> {
    this.queries.push(text);
    return keywordVector(text);
  }
}

export class FakeChatClient implements ChatClient {
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly reply: (messages: ChatMessage[]) => string | Error) {}

  async complete(messages: ChatMessage[]): Promise<string> {
    this.requests.push(messages);
    const result = this.reply(messages);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

export const CSV_HEADER =
  'Name,Category,Primary Task,Short Description,Keywords,Technologies,Industry,Year Founded,Country,Website,Pricing Model';

export const THREE_TOOLS_CSV = [
  CSV_HEADER,
  'ToolA,Image,Image generation,Creates image art,"art, design",,Design,2021,USA,https://toola.example,Free',
  'ToolB,Video,Video editing,Edits video and exports image stills,,,Media,,,https://toolb.example,Paid',
  'ToolC,Code,Code completion,Writes code,,,Software,,,https://toolc.example,Free',
].join('\n');

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'tool-advisor-'));
}

export async function writeCsv(dir: string, contents: string, fileName = 'tools.csv'): Promise<string> {
  const csvPath = path.join(dir, fileName);
  await fs.writeFile(csvPath, contents, 'utf-8');
  return csvPath;
}
