// ============================================================================
// OUTPUT STORE - Raw and enriched JSON documents on disk
// ============================================================================

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { EnrichedOutput, RawOutput } from '../../shared/types.js';
import type { OutputPaths } from '../config/AppConfig.js';
import { ConfigurationError, PersistedInputMissingError } from '../scraper/types/errors.js';

// ============================================================================
// SCHEMA DEFINITION
// ============================================================================

const stockInfoSchema = z.object({
  in_stock: z.boolean().nullable(),
  scarcity_signal: z.string().nullable(),
  raw_text: z.string(),
});

const productSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.number().nullable(),
  price_raw: z.string(),
  rating: z.number().nullable(),
  rating_raw: z.string(),
  stock_info: stockInfoSchema,
  source: z.string(),
  source_url: z.string(),
  scraped_at: z.string(),
});

const rawOutputSchema = z.object({
  metadata: z.object({
    target: z.string(),
    total_products: z.number().int().nonnegative(),
    scraped_at: z.string(),
  }),
  products: z.array(productSchema),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

/**
 * Read and validate a raw-output document
 */
export async function loadRawOutput(filePath: string): Promise<RawOutput> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new PersistedInputMissingError(filePath, error);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`${filePath} is not valid JSON`, error);
  }

  const parsed = rawOutputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid raw output in ${filePath} at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }
  return parsed.data;
}

export class OutputStore {
  private paths: OutputPaths;

  constructor(paths: OutputPaths) {
    this.paths = paths;
  }

  get rawDataPath(): string {
    return this.paths.rawData;
  }

  get enrichedDataPath(): string {
    return this.paths.enrichedData;
  }

  async saveRaw(output: RawOutput): Promise<string> {
    await writeJson(this.paths.rawData, output);
    console.log(`[OutputStore] Saved ${output.products.length} products to ${this.paths.rawData}`);
    return this.paths.rawData;
  }

  async loadRaw(): Promise<RawOutput> {
    return loadRawOutput(this.paths.rawData);
  }

  async saveEnriched(output: EnrichedOutput): Promise<string> {
    await writeJson(this.paths.enrichedData, output);
    console.log(
      `[OutputStore] Saved ${output.products.length} enriched products to ${this.paths.enrichedData}`
    );
    return this.paths.enrichedData;
  }
}
