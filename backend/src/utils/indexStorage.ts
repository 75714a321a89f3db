import fs, { type FileHandle } from 'fs/promises';
import path from 'path';
import readline from 'readline';
import { z } from 'zod';
import { PRICING_MODELS } from '../types';
import { IndexNotFoundError, errorMessage } from './errors';
import { log } from './logger';
import { VectorStore, type IndexEntry } from './vectorStore';

export const INDEX_FORMAT_VERSION = 1;
export const MANIFEST_FILE = 'manifest.json';
export const VECTORS_FILE = 'vectors.jsonl';

const manifestSchema = z.object({
  formatVersion: z.literal(INDEX_FORMAT_VERSION),
  embeddingModel: z.string(),
  dimension: z.number().int().positive().nullable(),
  documentCount: z.number().int().nonnegative(),
  // building: ingestion still running (or died mid-write); partial: a batch failed
  status: z.enum(['building', 'partial', 'complete']),
  sourceCsv: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type IndexManifest = z.infer<typeof manifestSchema>;
export type IndexStatus = IndexManifest['status'];

const metadataSchema = z.object({
  name: z.string().min(1),
  category: z.string(),
  primaryTask: z.string(),
  industry: z.string(),
  pricingModel: z.enum(PRICING_MODELS),
  website: z.string(),
  country: z.string().optional(),
  yearFounded: z.number().int().optional(),
});

const entrySchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  metadata: metadataSchema,
  embedding: z.array(z.number()).min(1),
});

export interface LoadedIndex {
  manifest: IndexManifest;
  store: VectorStore;
}

async function writeManifest(indexDir: string, manifest: IndexManifest): Promise<void> {
  const target = path.join(indexDir, MANIFEST_FILE);
  const temp = `${target}.tmp`;
  await fs.writeFile(temp, JSON.stringify(manifest, null, 2), 'utf-8');
  await fs.rename(temp, target);
}

function serializeEntry(entry: IndexEntry): string {
  return JSON.stringify({ ...entry.document, embedding: entry.embedding });
}

/**
 * Writes an index batch by batch. Every appended batch is on disk before
 * the next one is requested, so a failed run leaves the completed batches
 * readable.
 */
export class IndexWriter {
  private constructor(
    readonly indexDir: string,
    private manifest: IndexManifest
  ) {}

  /** Removes whatever index `indexDir` held and starts an empty one. */
  static async create(indexDir: string, options: { embeddingModel: string; sourceCsv: string }): Promise<IndexWriter> {
    await fs.rm(indexDir, { recursive: true, force: true });
    await fs.mkdir(indexDir, { recursive: true });
    await fs.writeFile(path.join(indexDir, VECTORS_FILE), '', 'utf-8');

    const now = new Date().toISOString();
    const manifest: IndexManifest = {
      formatVersion: INDEX_FORMAT_VERSION,
      embeddingModel: options.embeddingModel,
      dimension: null,
      documentCount: 0,
      status: 'building',
      sourceCsv: options.sourceCsv,
      createdAt: now,
      updatedAt: now,
    };
    await writeManifest(indexDir, manifest);
    return new IndexWriter(indexDir, manifest);
  }

  get documentCount(): number {
    return this.manifest.documentCount;
  }

  get dimension(): number | null {
    return this.manifest.dimension;
  }

  async append(entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;

    const dimension = this.manifest.dimension ?? entries[0].embedding.length;
    const mismatched = entries.find(entry => entry.embedding.length !== dimension);
    if (mismatched) {
      throw new Error(
        `Embedding for ${mismatched.document.id} has ${mismatched.embedding.length} dimensions, expected ${dimension}`
      );
    }

    const lines = entries.map(serializeEntry).join('\n') + '\n';
    await fs.appendFile(path.join(this.indexDir, VECTORS_FILE), lines, 'utf-8');

    this.manifest = {
      ...this.manifest,
      dimension,
      documentCount: this.manifest.documentCount + entries.length,
      updatedAt: new Date().toISOString(),
    };
    await writeManifest(this.indexDir, this.manifest);
  }

  async finish(status: Exclude<IndexStatus, 'building'>): Promise<IndexManifest> {
    this.manifest = { ...this.manifest, status, updatedAt: new Date().toISOString() };
    await writeManifest(this.indexDir, this.manifest);
    return this.manifest;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function indexMissing(indexDir: string, fileName: string, error: unknown): IndexNotFoundError {
  return new IndexNotFoundError(
    `No vector index found at ${indexDir} (${fileName}: ${errorMessage(error)}). Run "npm run ingest" first.`,
    { cause: error }
  );
}

export async function readManifest(indexDir: string): Promise<IndexManifest> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(indexDir, MANIFEST_FILE), 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) throw indexMissing(indexDir, MANIFEST_FILE, error);
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new IndexNotFoundError(`Index manifest at ${indexDir} is not valid JSON`, { cause: error });
  }

  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexNotFoundError(`Index manifest at ${indexDir} is malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}

function parseEntry(line: string, lineNumber: number): IndexEntry {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new IndexNotFoundError(`Malformed index entry at ${VECTORS_FILE}:${lineNumber}`, { cause: error });
  }

  const parsed = entrySchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexNotFoundError(`Malformed index entry at ${VECTORS_FILE}:${lineNumber}: ${parsed.error.message}`);
  }

  const { embedding, ...document } = parsed.data;
  return { document, embedding };
}

/**
 * Streams `vectors.jsonl` one entry at a time; the whole file is never held
 * as a single string. Only a missing file counts as "no index", other I/O
 * errors propagate as they are.
 */
export async function loadIndex(indexDir: string): Promise<LoadedIndex> {
  const manifest = await readManifest(indexDir);

  let handle: FileHandle;
  try {
    handle = await fs.open(path.join(indexDir, VECTORS_FILE), 'r');
  } catch (error) {
    if (isMissingFile(error)) throw indexMissing(indexDir, VECTORS_FILE, error);
    throw error;
  }

  const entries: IndexEntry[] = [];
  // The stream closes the handle once it ends or is destroyed
  const input = handle.createReadStream({ encoding: 'utf-8' });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;

  try {
    for await (const line of lines) {
      lineNumber++;
      const trimmed = line.trim();
      if (!trimmed) continue;
      entries.push(parseEntry(trimmed, lineNumber));
    }
  } finally {
    lines.close();
    input.destroy();
  }

  if (manifest.status !== 'complete') {
    log('warn', `Vector index at ${indexDir} is ${manifest.status}; serving the ${entries.length} tools it holds`);
  }
  if (entries.length !== manifest.documentCount) {
    log('warn', 'Index manifest count differs from stored entries', {
      manifestCount: manifest.documentCount,
      storedCount: entries.length,
    });
  }

  log('info', `Loaded vector index with ${entries.length} tools`, {
    indexDir,
    embeddingModel: manifest.embeddingModel,
    dimension: manifest.dimension,
  });

  return { manifest, store: new VectorStore(entries) };
}
