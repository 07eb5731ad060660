// ============================================================================
// FIELD EXTRACTOR
// ============================================================================
// Turns one product element into normalized fields. Every function here is
// total: a missing or unreadable field becomes "N/A" or null, never an
// exception, so one bad field cannot take down its element.

import { NOT_AVAILABLE, type StockInfo } from '../../../shared/types.js';

/**
 * Anything with readable text (Playwright ElementHandle, wrapped DOM node)
 */
export interface TextNode {
  innerText(): Promise<string>;
}

/**
 * Product container element as seen by the extractor
 */
export interface ElementSource {
  /** First descendant matching the selector, or null */
  query(selector: string): Promise<TextNode | null>;
}

/** Extracted trimmed text, or the "N/A" sentinel */
export type RawField = string;

const NUMBER_TOKEN = /\d+\.?\d*/;

const RATING_WORDS: ReadonlyArray<readonly [string, number]> = [
  ['one', 1],
  ['two', 2],
  ['three', 3],
  ['four', 4],
  ['five', 5],
];

const MAX_RATING = 5.0;

const IN_STOCK_PHRASES = ['in stock', 'available', 'ready to ship'];

const SCARCITY_PATTERN = /only \d+ left/;

/**
 * First descendant match's trimmed text, or "N/A" on no match, empty text
 * or a failing query
 */
export async function extractText(element: ElementSource, selector: string): Promise<RawField> {
  try {
    const target = await element.query(selector);
    if (!target) return NOT_AVAILABLE;
    const text = (await target.innerText()).trim();
    return text || NOT_AVAILABLE;
  } catch {
    return NOT_AVAILABLE;
  }
}

function isMissing(text: string | null | undefined): text is null | undefined | '' {
  return !text || text === NOT_AVAILABLE;
}

/**
 * Numeric price from text such as "$1,234.56" or "£45.00"
 *
 * Thousands separators are dropped before matching, so the first number
 * token is the whole amount.
 */
export function extractPrice(text: string | null | undefined): number | null {
  if (isMissing(text)) return null;

  const match = text.replace(/,/g, '').match(NUMBER_TOKEN);
  if (!match) return null;

  const value = parseFloat(match[0]);
  return Number.isNaN(value) ? null : value;
}

/**
 * Rating from "4.5 out of 5 stars" or a word rating like "Three"
 */
export function extractRating(text: string | null | undefined): number | null {
  if (isMissing(text)) return null;

  const match = text.match(NUMBER_TOKEN);
  if (match) {
    const value = parseFloat(match[0]);
    if (!Number.isNaN(value)) {
      return Math.min(value, MAX_RATING);
    }
  }

  const lower = text.toLowerCase();
  for (const [word, value] of RATING_WORDS) {
    if (lower.includes(word)) {
      return value;
    }
  }

  return null;
}

/**
 * Availability flags plus any "only N left" scarcity phrase
 */
export function extractStockInfo(text: string | null | undefined): StockInfo {
  const rawText = text ?? '';
  if (isMissing(text)) {
    return { in_stock: null, scarcity_signal: null, raw_text: rawText };
  }

  const lower = text.toLowerCase();
  const inStock = IN_STOCK_PHRASES.some((phrase) => lower.includes(phrase));
  const scarcity = lower.match(SCARCITY_PATTERN);

  return {
    in_stock: inStock,
    scarcity_signal: scarcity ? scarcity[0] : null,
    raw_text: rawText,
  };
}
