// ============================================================================
// SCRAPING ENGINE - Session → behavior → extraction
// ============================================================================

import type { Product, RawOutput, TargetDescriptor } from '../../shared/types.js';
import type { AppConfig } from '../config/AppConfig.js';
import { withBrowserSession } from '../browser/BrowserManager.js';
import type { ScrapeSession } from '../browser/PageDriver.js';
import { HumanBehaviorSimulator } from '../behavior/HumanBehaviorSimulator.js';
import { systemClock, systemRandom, type Clock, type Random } from '../utils/timing.js';
import { wrapError, type ItemExtractionError } from './types/errors.js';
import {
  extractPrice,
  extractRating,
  extractStockInfo,
  extractText,
  type ElementSource,
} from './utils/FieldExtractor.js';

export const DEFAULT_MAX_PRODUCTS = 50;

/** Warm-up browsing rounds before extraction */
const WARMUP_ROUNDS = 2;

/** Pause between lazy-load scroll steps */
const LAZY_LOAD_PAUSE_MS = 2000;

export interface ScrapeRunMetadata {
  target: string;
  count: number;
  timestamp: string;
}

export interface ScrapeRunResult {
  products: Product[];
  metadata: ScrapeRunMetadata;
  itemErrors: ItemExtractionError[];
}

/**
 * Outcome of extracting one element
 */
export type ElementExtraction =
  | { ok: true; product: Product }
  | { ok: false; error: string };

/** Runs `fn` inside a session and closes it afterwards */
export type SessionRunner = <T>(fn: (session: ScrapeSession) => Promise<T>) => Promise<T>;

export type ProductExtractor = (
  element: ElementSource,
  target: TargetDescriptor,
  ordinal: number,
  now: () => Date
) => Promise<ElementExtraction>;

export interface ScrapingEngineDeps {
  rng?: Random;
  clock?: Clock;
  /** Session lifecycle (default: withBrowserSession on the browser config) */
  runSession?: SessionRunner;
  /** Per-element extraction (default: extractProduct) */
  extractElement?: ProductExtractor;
}

/**
 * Extract one Product from one container element.
 * Field failures degrade to defaults; anything else is reported as a value.
 */
export async function extractProduct(
  element: ElementSource,
  target: TargetDescriptor,
  ordinal: number,
  now: () => Date = () => new Date()
): Promise<ElementExtraction> {
  try {
    const { selectors } = target;
    const name = await extractText(element, selectors.name);
    const priceText = await extractText(element, selectors.price);
    const ratingText = await extractText(element, selectors.rating);
    const availabilityText = await extractText(element, selectors.availability);

    return {
      ok: true,
      product: {
        id: `${target.name}_${ordinal}`,
        name,
        price: extractPrice(priceText),
        price_raw: priceText,
        rating: extractRating(ratingText),
        rating_raw: ratingText,
        stock_info: extractStockInfo(availabilityText),
        source: target.name,
        source_url: target.url,
        scraped_at: now().toISOString(),
      },
    };
  } catch (error) {
    return { ok: false, error: wrapError(error).message };
  }
}

export class ScrapingEngine {
  private config: AppConfig;
  private target: TargetDescriptor;
  private rng: Random;
  private clock: Clock;
  private runSession: SessionRunner;
  private extractElement: ProductExtractor;

  constructor(config: AppConfig, target: TargetDescriptor, deps: ScrapingEngineDeps = {}) {
    this.config = config;
    this.target = target;
    this.rng = deps.rng ?? systemRandom;
    this.clock = deps.clock ?? systemClock;
    this.runSession =
      deps.runSession ??
      (<T>(fn: (session: ScrapeSession) => Promise<T>) =>
        withBrowserSession(config.browser, fn, { rng: this.rng, clock: this.clock }));
    this.extractElement = deps.extractElement ?? extractProduct;
  }

  /**
   * Run one scrape. The session is released on every exit path; a
   * navigation failure propagates and aborts the run.
   */
  async scrape(maxProducts: number = DEFAULT_MAX_PRODUCTS): Promise<ScrapeRunResult> {
    console.log(`[ScrapingEngine] Starting scrape for target: ${this.target.name}`);
    console.log(`[ScrapingEngine] URL: ${this.target.url}`);

    return this.runSession((session) => this.scrapeInSession(session, maxProducts));
  }

  private async scrapeInSession(session: ScrapeSession, maxProducts: number): Promise<ScrapeRunResult> {
    const behavior = new HumanBehaviorSimulator(session.driver, this.config.behavior, {
      rng: this.rng,
      clock: this.clock,
    });

    console.log('[ScrapingEngine] Navigating to target URL...');
    await session.navigate(this.target.url);

    console.log('[ScrapingEngine] Simulating human browsing behavior...');
    await behavior.simulateBrowsing(WARMUP_ROUNDS);

    if (this.target.kind === 'dynamic') {
      console.log('[ScrapingEngine] Triggering lazy-loaded content...');
      const scrolled = await behavior.scrollToBottom(LAZY_LOAD_PAUSE_MS);
      console.log(
        `[ScrapingEngine] Scrolled ${scrolled.iterations}x (${scrolled.reason}), height ${scrolled.finalHeight}px`
      );
      await session.waitForLazyLoad(this.target.selectors.container);
    }

    console.log('[ScrapingEngine] Extracting product data...');
    const { products, itemErrors } = await this.extractProducts(session, maxProducts);
    console.log(`[ScrapingEngine] Successfully extracted ${products.length} products`);

    return {
      products,
      metadata: {
        target: this.target.name,
        count: products.length,
        timestamp: new Date(this.clock.now()).toISOString(),
      },
      itemErrors,
    };
  }

  private async extractProducts(
    session: ScrapeSession,
    maxProducts: number
  ): Promise<{ products: Product[]; itemErrors: ItemExtractionError[] }> {
    const containerSelector = this.target.selectors.container;
    const elements = await session.queryAll(containerSelector);
    console.log(`[ScrapingEngine] Found ${elements.length} product elements`);

    const products: Product[] = [];
    const itemErrors: ItemExtractionError[] = [];
    const now = () => new Date(this.clock.now());

    // The cap bounds the elements examined, so skipped elements count toward it
    const candidates = elements.slice(0, Math.max(0, maxProducts));

    for (let idx = 0; idx < candidates.length; idx++) {
      const ordinal = idx + 1;
      const result = await this.safeExtract(candidates[idx], ordinal, now);

      if (result.ok) {
        products.push(result.product);
      } else {
        console.warn(`[ScrapingEngine] Error extracting product ${ordinal}: ${result.error}`);
        itemErrors.push({ itemIndex: ordinal, containerSelector, error: result.error });
      }

      if (ordinal % 10 === 0) {
        console.log(`[ScrapingEngine] Processed ${ordinal} products...`);
      }
    }

    return { products, itemErrors };
  }

  private async safeExtract(
    element: ElementSource,
    ordinal: number,
    now: () => Date
  ): Promise<ElementExtraction> {
    try {
      return await this.extractElement(element, this.target, ordinal, now);
    } catch (error) {
      return { ok: false, error: wrapError(error).message };
    }
  }
}

/**
 * Raw-output document for a finished run
 */
export function toRawOutput(result: ScrapeRunResult): RawOutput {
  return {
    metadata: {
      target: result.metadata.target,
      total_products: result.products.length,
      scraped_at: result.metadata.timestamp,
    },
    products: result.products,
  };
}
