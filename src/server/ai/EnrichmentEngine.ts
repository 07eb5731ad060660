// ============================================================================
// ENRICHMENT ENGINE - Batched pricing-tier categorization
// ============================================================================
// Priced products go to the LLM provider in batches keyed by product id.
// Anything the provider cannot answer is categorized by a fixed price rule,
// so every priced product always ends up with exactly one category.

import type {
  EnrichedOutput,
  EnrichedProduct,
  EnrichmentFields,
  PriceCategory,
  PriceStatistics,
  Product,
} from '../../shared/types.js';
import { EnrichmentProviderError, errorMessage } from '../scraper/types/errors.js';
import { systemClock, type Clock } from '../utils/timing.js';
import { buildCategorizationPrompt } from './prompts.js';
import type { LLMProvider } from './providers/LLMProvider.js';
import { parseCategorizations, type CategorizationMap, type ProductSummary } from './types.js';

export const RULE_BASED_MISSING_REASONING = 'Rule-based categorization (missing from AI response)';
export const RULE_BASED_UNAVAILABLE_REASONING = 'Rule-based categorization (AI unavailable)';

/** Budget below 0.7×avg, MidRange below 1.3×avg, HighEnd otherwise */
const BUDGET_RATIO = 0.7;
const HIGH_END_RATIO = 1.3;

export type PricedProduct = Product & { price: number };

export type BatchState = 'pending' | 'provider_attempted' | 'parsed' | 'failed' | 'finalized';

export interface BatchReport {
  index: number;
  size: number;
  outcome: 'parsed' | 'failed';
  /** States the batch passed through, in order */
  states: BatchState[];
  aiCount: number;
  fallbackCount: number;
  error?: string;
}

export interface EnrichmentResult {
  /** Enriched priced products (input order) followed by unpriced ones */
  products: EnrichedProduct[];
  stats: PriceStatistics | null;
  batches: BatchReport[];
  aiCount: number;
  fallbackCount: number;
}

export interface EnrichmentOptions {
  temperature: number;
  maxTokens: number;
  batchSize: number;
  /** Per provider call; 0 disables the bound */
  timeoutMs: number;
}

export function isPriced(product: Product): product is PricedProduct {
  return product.price !== null;
}

export function computePriceStatistics(products: PricedProduct[]): PriceStatistics | null {
  if (products.length === 0) return null;

  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const { price } of products) {
    min = Math.min(min, price);
    max = Math.max(max, price);
    sum += price;
  }
  return { min, max, avg: sum / products.length };
}

export function fallbackCategory(price: number, stats: PriceStatistics): PriceCategory {
  if (price < stats.avg * BUDGET_RATIO) return 'Budget';
  if (price < stats.avg * HIGH_END_RATIO) return 'MidRange';
  return 'HighEnd';
}

export function splitIntoBatches<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw new RangeError(`Batch size must be at least 1, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function toSummary(product: PricedProduct): ProductSummary {
  return { id: product.id, name: product.name, price: product.price, rating: product.rating };
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, provider: string): Promise<T> {
  if (timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new EnrichmentProviderError(provider, `Request timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class EnrichmentEngine {
  private provider: LLMProvider;
  private options: EnrichmentOptions;
  private clock: Clock;

  constructor(provider: LLMProvider, options: EnrichmentOptions, deps: { clock?: Clock } = {}) {
    this.provider = provider;
    this.options = options;
    this.clock = deps.clock ?? systemClock;
  }

  async categorizeProducts(products: Product[]): Promise<EnrichmentResult> {
    console.log('[EnrichmentEngine] Starting AI enrichment process...');

    const priced = products.filter(isPriced);
    const unpriced = products.filter((product) => !isPriced(product));
    const stats = computePriceStatistics(priced);

    if (!stats) {
      console.warn('[EnrichmentEngine] No valid products with prices to enrich');
      return { products: [...products], stats: null, batches: [], aiCount: 0, fallbackCount: 0 };
    }

    console.log(
      `[EnrichmentEngine] Price range: $${stats.min.toFixed(2)} - $${stats.max.toFixed(2)} (avg: $${stats.avg.toFixed(2)})`
    );

    const batches = splitIntoBatches(priced, this.options.batchSize);
    const enriched: EnrichedProduct[] = [];
    const reports: BatchReport[] = [];

    for (let i = 0; i < batches.length; i++) {
      console.log(`[EnrichmentEngine] Processing batch ${i + 1} (${batches[i].length} products)...`);
      const { products: batchProducts, report } = await this.enrichBatch(batches[i], stats, i);
      enriched.push(...batchProducts);
      reports.push(report);
    }

    const aiCount = reports.reduce((sum, r) => sum + r.aiCount, 0);
    const fallbackCount = reports.reduce((sum, r) => sum + r.fallbackCount, 0);
    console.log(
      `[EnrichmentEngine] Enriched ${enriched.length} products (${aiCount} by AI, ${fallbackCount} by rule)`
    );

    return {
      products: [...enriched, ...unpriced],
      stats,
      batches: reports,
      aiCount,
      fallbackCount,
    };
  }

  /**
   * Pending → ProviderAttempted → Parsed | Failed → Finalized
   */
  private async enrichBatch(
    batch: PricedProduct[],
    stats: PriceStatistics,
    index: number
  ): Promise<{ products: EnrichedProduct[]; report: BatchReport }> {
    const states: BatchState[] = ['pending'];
    const prompt = buildCategorizationPrompt(batch.map(toSummary), stats);

    let categorizations: CategorizationMap | null = null;
    let failure: string | undefined;

    states.push('provider_attempted');
    try {
      const response = await withTimeout(
        this.provider.complete(prompt, this.options.temperature, this.options.maxTokens),
        this.options.timeoutMs,
        this.provider.name
      );
      categorizations = parseCategorizations(response);
      states.push('parsed');
    } catch (error) {
      const wrapped =
        error instanceof EnrichmentProviderError
          ? error
          : new EnrichmentProviderError(this.provider.name, errorMessage(error), error);
      failure = wrapped.message;
      states.push('failed');
      console.warn(`[EnrichmentEngine] AI enrichment error: ${failure}`);
      console.warn('[EnrichmentEngine] Falling back to rule-based categorization...');
    }

    let aiCount = 0;
    const products = batch.map((product): EnrichedProduct => {
      const answer = categorizations?.get(product.id);
      let fields: Omit<EnrichmentFields, 'enriched_at'>;
      if (answer) {
        aiCount++;
        fields = { ai_category: answer.category, ai_reasoning: answer.reasoning };
      } else {
        fields = {
          ai_category: fallbackCategory(product.price, stats),
          ai_reasoning: categorizations ? RULE_BASED_MISSING_REASONING : RULE_BASED_UNAVAILABLE_REASONING,
        };
      }
      return { ...product, ...fields, enriched_at: new Date(this.clock.now()).toISOString() };
    });

    states.push('finalized');

    return {
      products,
      report: {
        index,
        size: batch.length,
        outcome: categorizations ? 'parsed' : 'failed',
        states,
        aiCount,
        fallbackCount: batch.length - aiCount,
        ...(failure === undefined ? {} : { error: failure }),
      },
    };
  }
}

/**
 * Count products per category; unenriched products count as "Unknown"
 */
export function categoryDistribution(products: EnrichedProduct[]): Record<string, number> {
  const distribution: Record<string, number> = {};
  for (const product of products) {
    const category = 'ai_category' in product ? product.ai_category : 'Unknown';
    distribution[category] = (distribution[category] ?? 0) + 1;
  }
  return distribution;
}

export function toEnrichedOutput(
  products: EnrichedProduct[],
  providerName: string,
  enrichedAt: Date
): EnrichedOutput {
  return {
    metadata: {
      total_products: products.length,
      enriched_at: enrichedAt.toISOString(),
      ai_provider: providerName,
      category_distribution: categoryDistribution(products),
    },
    products,
  };
}
