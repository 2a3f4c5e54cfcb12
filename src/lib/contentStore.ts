import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';
import { env } from '../config/env.js';
import { ContentLoadError } from './errors.js';
import { logger } from './logger.js';
import {
  ConceptTableSchema,
  InvestmentTableSchema,
  SchemeTableSchema,
  UpiGuideTableSchema,
  type Concept,
  type ContentTables,
  type InvestmentOption,
  type Scheme,
  type UpiGuideEntry,
} from '../types/content.js';

export const BUNDLED_CONTENT_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export const TABLE_FILES = {
  concepts: 'concepts.json',
  schemes: 'schemes.json',
  investments: 'investments.json',
  upiGuides: 'upi-guides.json',
} as const;

export type TableName = keyof typeof TABLE_FILES;

export type RawTables = Record<TableName, unknown>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function parseTable<T>(table: TableName, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors.map(err => ({
      field: [TABLE_FILES[table], ...err.path].join('.'),
      message: err.message,
    }));
    throw new ContentLoadError(`Content table "${table}" failed validation`, details);
  }
  return result.data;
}

function readJsonFile(dir: string, table: TableName): unknown {
  const file = path.join(dir, TABLE_FILES[table]);
  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContentLoadError(`Cannot read content file ${file}: ${reason}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContentLoadError(`Content file ${file} is not valid JSON: ${reason}`);
  }
}

/**
 * Read-only holder for the four content tables.
 *
 * Tables are validated once on construction and frozen; query components
 * receive the store by reference and never copy it.
 */
export class ContentStore {
  private readonly tables: ContentTables;

  private constructor(tables: ContentTables) {
    this.tables = deepFreeze(tables);
  }

  static fromTables(raw: RawTables): ContentStore {
    return new ContentStore({
      concepts: parseTable('concepts', ConceptTableSchema, raw.concepts),
      schemes: parseTable('schemes', SchemeTableSchema, raw.schemes),
      investments: parseTable('investments', InvestmentTableSchema, raw.investments),
      upiGuides: parseTable('upiGuides', UpiGuideTableSchema, raw.upiGuides),
    });
  }

  static load(dir: string = env.CONTENT_DIR ?? BUNDLED_CONTENT_DIR): ContentStore {
    const store = ContentStore.fromTables({
      concepts: readJsonFile(dir, 'concepts'),
      schemes: readJsonFile(dir, 'schemes'),
      investments: readJsonFile(dir, 'investments'),
      upiGuides: readJsonFile(dir, 'upiGuides'),
    });

    logger.debug({ dir, ...store.counts() }, 'Content tables loaded');
    return store;
  }

  get concepts(): readonly Concept[] {
    return this.tables.concepts;
  }

  get schemes(): readonly Scheme[] {
    return this.tables.schemes;
  }

  get investments(): readonly InvestmentOption[] {
    return this.tables.investments;
  }

  get upiGuides(): Readonly<Record<string, UpiGuideEntry>> {
    return this.tables.upiGuides;
  }

  counts(): Record<TableName, number> {
    return {
      concepts: this.tables.concepts.length,
      schemes: this.tables.schemes.length,
      investments: this.tables.investments.length,
      upiGuides: Object.keys(this.tables.upiGuides).length,
    };
  }
}

let sharedStore: ContentStore | null = null;

// Loaded on first use and kept for the life of the process.
export function getContentStore(): ContentStore {
  if (!sharedStore) {
    sharedStore = ContentStore.load();
  }
  return sharedStore;
}
