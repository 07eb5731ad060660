// ============================================================================
// SHARED TYPES - Market Intelligence Scraper
// ============================================================================

// Target Types
export type PageKind = 'static' | 'dynamic';

export interface TargetSelectors {
  container: string;
  name: string;
  price: string;
  rating: string;
  availability: string;
}

export interface TargetDescriptor {
  readonly name: string;
  readonly url: string;
  readonly kind: PageKind;
  readonly selectors: Readonly<TargetSelectors>;
}

// Product Types

/** Sentinel stored in raw fields when nothing could be read */
export const NOT_AVAILABLE = 'N/A';

export interface StockInfo {
  in_stock: boolean | null;
  scarcity_signal: string | null;
  raw_text: string;
}

export interface Product {
  /** `{target}_{ordinal}`, ordinal 1-based per extracted element */
  id: string;
  name: string;
  price: number | null;
  price_raw: string;
  /** Clamped to 5.0 */
  rating: number | null;
  rating_raw: string;
  stock_info: StockInfo;
  source: string;
  source_url: string;
  scraped_at: string;
}

export type PriceCategory = 'Budget' | 'MidRange' | 'HighEnd';

export interface EnrichmentFields {
  ai_category: PriceCategory;
  ai_reasoning: string;
  enriched_at: string;
}

/** Priced products carry the enrichment fields, unpriced ones pass through */
export type EnrichedProduct = Product | (Product & EnrichmentFields);

export interface PriceStatistics {
  min: number;
  max: number;
  avg: number;
}

// Persisted Output Types
export interface RawOutput {
  metadata: {
    target: string;
    total_products: number;
    scraped_at: string;
  };
  products: Product[];
}

export interface EnrichedOutput {
  metadata: {
    total_products: number;
    enriched_at: string;
    ai_provider: string;
    category_distribution: Record<string, number>;
  };
  products: EnrichedProduct[];
}

export function isEnriched(product: EnrichedProduct): product is Product & EnrichmentFields {
  return 'ai_category' in product;
}
