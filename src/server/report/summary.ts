// ============================================================================
// SUMMARY REPORT
// ============================================================================

import type { EnrichedOutput } from '../../shared/types.js';

export interface PriceSummary {
  lowest: number;
  highest: number;
  average: number;
}

export function summarizePrices(output: EnrichedOutput): PriceSummary | null {
  const prices = output.products.flatMap((product) => (product.price === null ? [] : [product.price]));
  if (prices.length === 0) return null;

  return {
    lowest: Math.min(...prices),
    highest: Math.max(...prices),
    average: prices.reduce((sum, price) => sum + price, 0) / prices.length,
  };
}

/**
 * Human-readable lines describing an enriched run
 */
export function buildSummaryReport(output: EnrichedOutput): string[] {
  const { metadata } = output;
  const lines = [
    `Total Products Analyzed: ${metadata.total_products}`,
    `AI Provider: ${metadata.ai_provider.toUpperCase()}`,
  ];

  const distribution = Object.entries(metadata.category_distribution);
  if (distribution.length > 0) {
    lines.push('', 'Category Distribution:');
    for (const [category, count] of distribution) {
      lines.push(`  - ${category}: ${count} products`);
    }
  }

  const prices = summarizePrices(output);
  if (prices) {
    lines.push(
      '',
      'Price Analysis:',
      `  - Lowest: $${prices.lowest.toFixed(2)}`,
      `  - Highest: $${prices.highest.toFixed(2)}`,
      `  - Average: $${prices.average.toFixed(2)}`
    );
  }

  return lines;
}
