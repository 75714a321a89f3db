import fs from 'fs';
import dotenv from 'dotenv';

dotenv.config();

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvAsPositiveInt(key: string, defaultValue: number): number {
  const parsed = getEnvAsNumber(key, defaultValue);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : defaultValue;
}

/**
 * The key comes from OPENAI_API_KEY, or from the file named by
 * OPENAI_API_KEY_FILE (mounted secrets). Resolved lazily so that tooling
 * which never talks to OpenAI does not need credentials.
 */
export function resolveOpenAIApiKey(): string {
  const direct = process.env.OPENAI_API_KEY;
  if (direct && direct.trim()) {
    return direct.trim();
  }

  const keyFile = process.env.OPENAI_API_KEY_FILE;
  if (keyFile) {
    const fromFile = fs.readFileSync(keyFile, 'utf-8').trim();
    if (fromFile) {
      return fromFile;
    }
    throw new Error(`OPENAI_API_KEY_FILE points at an empty file: ${keyFile}`);
  }

  throw new Error('OPENAI_API_KEY is not set in environment variables (or via OPENAI_API_KEY_FILE)');
}

export const config = {
  port: getEnvAsNumber('PORT', 3001),

  openai: {
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    embeddingModel: getEnvOrDefault('OPENAI_EMBEDDING_MODEL', 'text-embedding-3-small'),
    chatModel: getEnvOrDefault('OPENAI_CHAT_MODEL', 'gpt-4o-mini'),
    temperature: getEnvAsNumber('OPENAI_TEMPERATURE', 0.7),
    timeoutMs: getEnvAsPositiveInt('OPENAI_TIMEOUT_MS', 60000),
  },

  ingestion: {
    csvPath: getEnvOrDefault('CSV_PATH', 'data/ai_tools.csv'),
    batchSize: getEnvAsPositiveInt('EMBEDDING_BATCH_SIZE', 100),
  },

  retry: {
    maxAttempts: getEnvAsPositiveInt('EMBEDDING_MAX_ATTEMPTS', 4),
    baseDelayMs: getEnvAsPositiveInt('EMBEDDING_RETRY_BASE_MS', 500),
    maxDelayMs: getEnvAsPositiveInt('EMBEDDING_RETRY_MAX_MS', 8000),
  },

  indexDir: getEnvOrDefault('INDEX_DIR', 'vectorstore'),

  // Number of nearest listings handed to the model per turn
  retrievalK: getEnvAsPositiveInt('RETRIEVAL_K', 4),

  // Prior chat turns (single messages) replayed into each prompt
  historyWindow: getEnvAsPositiveInt('HISTORY_WINDOW', 10),

  sessions: {
    // Idle sessions are dropped after this long
    ttlMs: getEnvAsPositiveInt('SESSION_TTL_MS', 60 * 60 * 1000),
    maxSessions: getEnvAsPositiveInt('MAX_SESSIONS', 1000),
  },
};

export type Config = typeof config;
