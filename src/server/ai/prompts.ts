// ============================================================================
// ENRICHMENT PROMPTS
// ============================================================================

import type { PriceStatistics } from '../../shared/types.js';
import type { ProductSummary } from './types.js';

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Prompt for one batch: products, global price context, category
 * definitions, and the exact JSON shape to return
 */
export function buildCategorizationPrompt(products: ProductSummary[], stats: PriceStatistics): string {
  return `Analyze these e-commerce products and categorize each into a pricing tier.

PRICE STATISTICS (all products in this run):
- Min: ${money(stats.min)}
- Max: ${money(stats.max)}
- Average: ${money(stats.avg)}

PRODUCTS:
${JSON.stringify(products, null, 2)}

TASK:
For each product, determine its category based on:
1. Price relative to the range and average
2. Rating (if available)
3. Product name/features

CATEGORIES:
- "Budget" - Lower-priced options (typically well below average)
- "MidRange" - Moderately priced (around average)
- "HighEnd" - Premium/expensive (well above average)

Respond ONLY with a valid JSON object mapping every product id to its result, in this exact format:
{
  "<product id>": {
    "category": "Budget" | "MidRange" | "HighEnd",
    "reasoning": "brief explanation"
  }
}`;
}
