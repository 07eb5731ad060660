// ============================================================================
// LLM PROVIDER - Vendor-neutral completion capability
// ============================================================================

import type { ProviderName } from '../../config/AppConfig.js';

/**
 * The only operation the enrichment engine needs from a model vendor
 */
export interface LLMProvider {
  readonly name: ProviderName | string;
  complete(prompt: string, temperature: number, maxTokens: number): Promise<string>;
}

/** System instruction shared by every vendor */
export const ANALYST_SYSTEM_PROMPT = 'You are an expert e-commerce data analyst.';

/** Placeholder keys copied from .env.example count as missing */
const PLACEHOLDER_KEY = /^your_[a-z]+_api_key_here$/;

export function isUsableApiKey(key: string | undefined): key is string {
  return key !== undefined && key.trim() !== '' && !PLACEHOLDER_KEY.test(key.trim());
}
