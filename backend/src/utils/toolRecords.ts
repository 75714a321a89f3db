import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataLoadError, errorMessage } from './errors';
import { log } from './logger';
import type { PricingModel, ToolDocument, ToolMetadata, ToolRecord } from '../types';

type ColumnKey =
  | 'name'
  | 'category'
  | 'primaryTask'
  | 'description'
  | 'keywords'
  | 'technologies'
  | 'industry'
  | 'yearFounded'
  | 'country'
  | 'website'
  | 'pricing';

// Header names are compared after normalizeHeader(); first alias found wins.
const COLUMN_ALIASES: ReadonlyArray<[ColumnKey, string[]]> = [
  ['name', ['name', 'toolname']],
  ['category', ['category']],
  ['primaryTask', ['primarytask']],
  ['description', ['shortdescription', 'description']],
  ['keywords', ['keywords']],
  ['technologies', ['technologies']],
  ['industry', ['industry']],
  ['yearFounded', ['yearfounded']],
  ['country', ['country']],
  ['website', ['website', 'url']],
  ['pricing', ['pricingmodel', 'pricing']],
];

const REQUIRED_COLUMNS: ColumnKey[] = ['name', 'description'];

const PRICING_ALIASES: Record<string, PricingModel> = {
  'free': 'Free',
  'open source': 'Free',
  'freemium': 'Freemium',
  'free trial': 'Freemium',
  'paid': 'Paid',
  'subscription': 'Paid',
  'one-time payment': 'Paid',
  'contact for pricing': 'Paid',
};

const csvRowsSchema = z.array(z.array(z.string()));

export interface ToolRecordLoadResult {
  records: ToolRecord[];
  skippedRows: number;
}

export function normalizeHeader(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function normalizePricing(raw: string | undefined): PricingModel {
  if (!raw) return 'Unknown';
  const key = raw.trim().toLowerCase().replace(/\s+/g, ' ');
  return PRICING_ALIASES[key] ?? 'Unknown';
}

export function splitList(raw: string): string[] {
  return raw
    .split(/[,;]/)
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function parseYear(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;
  const value = Number(trimmed);
  return Number.isInteger(value) ? value : undefined;
}

function resolveColumns(header: string[]): Partial<Record<ColumnKey, number>> {
  const normalized = header.map(normalizeHeader);
  const columns: Partial<Record<ColumnKey, number>> = {};

  for (const [key, aliases] of COLUMN_ALIASES) {
    for (const alias of aliases) {
      const index = normalized.indexOf(alias);
      if (index !== -1) {
        columns[key] = index;
        break;
      }
    }
  }

  return columns;
}

/**
 * Parses CSV text into tool records. Rows without a name are skipped;
 * other missing cells become empty strings.
 */
export function parseToolRecords(csvText: string, sourceName: string): ToolRecordLoadResult {
  let parsed: unknown;
  try {
    parsed = parse(csvText, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new DataLoadError(`Failed to parse CSV ${sourceName}: ${errorMessage(error)}`, { cause: error });
  }

  const rows = csvRowsSchema.safeParse(parsed);
  if (!rows.success || rows.data.length === 0) {
    throw new DataLoadError(`CSV ${sourceName} has no header row`);
  }

  const [header, ...body] = rows.data;
  const columns = resolveColumns(header);
  const missing = REQUIRED_COLUMNS.filter(key => columns[key] === undefined);
  if (missing.length > 0) {
    throw new DataLoadError(
      `CSV ${sourceName} is missing required column(s): ${missing.join(', ')} (found: ${header.join(', ')})`
    );
  }

  const records: ToolRecord[] = [];
  let skippedRows = 0;

  for (const row of body) {
    const cell = (key: ColumnKey): string => {
      const index = columns[key];
      return index === undefined ? '' : (row[index] ?? '').trim();
    };

    const name = cell('name');
    if (!name) {
      skippedRows++;
      continue;
    }

    const country = cell('country');
    const yearFounded = parseYear(cell('yearFounded'));

    records.push({
      name,
      category: cell('category'),
      primaryTask: cell('primaryTask'),
      description: cell('description'),
      keywords: splitList(cell('keywords')),
      technologies: splitList(cell('technologies')),
      industry: cell('industry'),
      ...(yearFounded !== undefined ? { yearFounded } : {}),
      ...(country ? { country } : {}),
      website: cell('website'),
      pricingModel: normalizePricing(cell('pricing')),
    });
  }

  return { records, skippedRows };
}

export async function loadToolRecords(csvPath: string): Promise<ToolRecordLoadResult> {
  log('info', `Loading AI tools dataset from ${csvPath}`);

  let csvText: string;
  try {
    csvText = await fs.readFile(csvPath, 'utf-8');
  } catch (error) {
    throw new DataLoadError(`CSV file not found or unreadable at ${csvPath}: ${errorMessage(error)}`, { cause: error });
  }

  const result = parseToolRecords(csvText, csvPath);
  log('info', `Loaded ${result.records.length} tools`, { skippedRows: result.skippedRows });
  return result;
}

export function renderToolText(record: ToolRecord): string {
  const fields: [string, string][] = [
    ['Name', record.name],
    ['Category', record.category],
    ['Primary Task', record.primaryTask],
    ['Description', record.description],
    ['Keywords', record.keywords.join(', ')],
    ['Technologies', record.technologies.join(', ')],
    ['Industry', record.industry],
    ['Pricing', record.pricingModel],
    ['Country', record.country ?? ''],
    ['Year Founded', record.yearFounded !== undefined ? String(record.yearFounded) : ''],
    ['Website', record.website],
  ];

  return fields
    .filter(([, value]) => value.length > 0)
    .map(([label, value]) => `${label}: ${value}`)
    .join(' | ');
}

export function toToolDocument(record: ToolRecord, ordinal: number): ToolDocument {
  const metadata: ToolMetadata = {
    name: record.name,
    category: record.category,
    primaryTask: record.primaryTask,
    industry: record.industry,
    pricingModel: record.pricingModel,
    website: record.website,
    ...(record.country ? { country: record.country } : {}),
    ...(record.yearFounded !== undefined ? { yearFounded: record.yearFounded } : {}),
  };

  return {
    id: `tool-${ordinal}`,
    text: renderToolText(record),
    metadata,
  };
}
