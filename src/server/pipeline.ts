// ============================================================================
// MARKET INTELLIGENCE PIPELINE - Scrape → persist → enrich → report
// ============================================================================

import type { EnrichedOutput, RawOutput, TargetDescriptor } from '../shared/types.js';
import { getTarget, type AIConfig, type AppConfig } from './config/AppConfig.js';
import { OutputStore } from './data/OutputStore.js';
import { EnrichmentEngine, toEnrichedOutput, type EnrichmentResult } from './ai/EnrichmentEngine.js';
import { createProvider, type LLMProvider } from './ai/providers/index.js';
import { buildSummaryReport } from './report/summary.js';
import { ScrapingEngine, toRawOutput, type ScrapeRunResult } from './scraper/ScrapingEngine.js';
import { EmptyScrapeError, type ItemExtractionError } from './scraper/types/errors.js';
import { systemClock, type Clock } from './utils/timing.js';

export interface ProductScraper {
  scrape(maxProducts: number): Promise<ScrapeRunResult>;
}

export interface PipelineDeps {
  createScraper?: (config: AppConfig, target: TargetDescriptor) => ProductScraper;
  createProvider?: (config: AIConfig) => LLMProvider;
  store?: OutputStore;
  clock?: Clock;
}

export interface PipelineRunOptions {
  target: string;
  maxProducts?: number;
  /** Enrich the raw file left by an earlier run */
  skipScraping?: boolean;
  skipEnrichment?: boolean;
}

export interface PipelineRunResult {
  raw: RawOutput | null;
  enriched: EnrichedOutput | null;
  enrichment: EnrichmentResult | null;
  itemErrors: ItemExtractionError[];
  report: string[];
}

export class MarketIntelligencePipeline {
  private config: AppConfig;
  private store: OutputStore;
  private clock: Clock;
  private createScraper: (config: AppConfig, target: TargetDescriptor) => ProductScraper;
  private createProvider: (config: AIConfig) => LLMProvider;

  constructor(config: AppConfig, deps: PipelineDeps = {}) {
    this.config = config;
    this.store = deps.store ?? new OutputStore(config.output);
    this.clock = deps.clock ?? systemClock;
    this.createScraper =
      deps.createScraper ?? ((cfg, target) => new ScrapingEngine(cfg, target, { clock: this.clock }));
    this.createProvider = deps.createProvider ?? createProvider;
  }

  get outputStore(): OutputStore {
    return this.store;
  }

  async run(options: PipelineRunOptions): Promise<PipelineRunResult> {
    const { skipScraping = false, skipEnrichment = false } = options;
    const maxProducts = options.maxProducts ?? this.config.defaultMaxProducts;

    // Fail on configuration before any browser work
    const target = skipScraping ? null : getTarget(this.config, options.target);
    const provider = skipEnrichment ? null : this.createProvider(this.config.ai);

    let raw: RawOutput | null = null;
    let itemErrors: ItemExtractionError[] = [];

    if (target) {
      console.log('[Pipeline] Phase 1: data collection');
      const scraped = await this.createScraper(this.config, target).scrape(maxProducts);
      if (scraped.products.length === 0) {
        throw new EmptyScrapeError(
          `No products collected from ${target.name}. Please check the target configuration.`
        );
      }
      itemErrors = scraped.itemErrors;
      raw = toRawOutput(scraped);
      await this.store.saveRaw(raw);
    } else {
      console.log('[Pipeline] Skipping scraping (using existing data)');
    }

    if (!provider) {
      console.log('[Pipeline] Skipping AI enrichment');
      return { raw, enriched: null, enrichment: null, itemErrors, report: [] };
    }

    console.log('[Pipeline] Phase 2: AI enrichment and categorization');
    const input = await this.store.loadRaw();
    console.log(`[Pipeline] Loaded ${input.products.length} products from ${this.store.rawDataPath}`);

    const engine = new EnrichmentEngine(
      provider,
      {
        temperature: this.config.ai.temperature,
        maxTokens: this.config.ai.maxTokens,
        batchSize: this.config.ai.batchSize,
        timeoutMs: this.config.ai.timeoutMs,
      },
      { clock: this.clock }
    );
    const enrichment = await engine.categorizeProducts(input.products);
    const enriched = toEnrichedOutput(enrichment.products, provider.name, new Date(this.clock.now()));
    await this.store.saveEnriched(enriched);

    console.log('[Pipeline] Phase 3: summary report');
    return { raw, enriched, enrichment, itemErrors, report: buildSummaryReport(enriched) };
  }
}
