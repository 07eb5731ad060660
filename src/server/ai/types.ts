// ============================================================================
// ENRICHMENT AI TYPES
// ============================================================================
// Prompt payloads and the parsing of model responses into categorizations

import { z } from 'zod';
import type { PriceCategory } from '../../shared/types.js';

/**
 * What the model sees of each product
 */
export interface ProductSummary {
  id: string;
  name: string;
  price: number;
  rating: number | null;
}

export interface Categorization {
  category: PriceCategory;
  reasoning: string;
}

/** Parsed model answer keyed by product id */
export type CategorizationMap = Map<string, Categorization>;

const entrySchema = z.object({
  category: z.string(),
  reasoning: z.string().nullish(),
});

const listEntrySchema = entrySchema.extend({ id: z.union([z.string(), z.number()]) });

/** Documented shape: `{ "<id>": { category, reasoning } }` */
const mapResponseSchema = z.record(z.string(), z.unknown());

/** Older shape: `{ "categorizations": [{ id, category, reasoning }] }` */
const listResponseSchema = z.object({
  categorizations: z.array(z.unknown()),
});

/**
 * Map free-form labels ("Mid Range", "high-end") onto a category
 */
export function normalizeCategory(label: string): PriceCategory | null {
  const key = label.toLowerCase().replace(/[^a-z]/g, '');
  switch (key) {
    case 'budget':
      return 'Budget';
    case 'midrange':
      return 'MidRange';
    case 'highend':
      return 'HighEnd';
    default:
      return null;
  }
}

/**
 * Strip Markdown fences and leading prose, then parse the first JSON object
 */
export function parseJsonObject(text: string): unknown {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  cleaned = cleaned.trim();

  try {
    return JSON.parse(cleaned);
  } catch {
    const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
    if (jsonMatch) {
      return JSON.parse(jsonMatch[0]);
    }
    throw new Error('No valid JSON found in response');
  }
}

/**
 * Parse a model response into categorizations.
 *
 * Malformed entries and entries whose category cannot be normalized are
 * left out, so only those products fall back to the price rule. Throws when
 * the response is not a JSON object of either accepted shape.
 */
export function parseCategorizations(text: string): CategorizationMap {
  const raw = parseJsonObject(text);
  const result: CategorizationMap = new Map();

  const add = (id: string, entry: z.infer<typeof entrySchema>) => {
    const category = normalizeCategory(entry.category);
    if (category) {
      result.set(id, { category, reasoning: entry.reasoning?.trim() || 'No reasoning provided' });
    }
  };

  const asList = listResponseSchema.safeParse(raw);
  if (asList.success) {
    for (const item of asList.data.categorizations) {
      const entry = listEntrySchema.safeParse(item);
      if (entry.success) {
        add(String(entry.data.id), entry.data);
      }
    }
    return result;
  }

  const asMap = mapResponseSchema.safeParse(raw);
  if (asMap.success) {
    for (const [id, value] of Object.entries(asMap.data)) {
      const entry = entrySchema.safeParse(value);
      if (entry.success) {
        add(id, entry.data);
      }
    }
    return result;
  }

  throw new Error(`Unexpected response shape: ${asMap.error.issues[0]?.message ?? 'unknown'}`);
}
