// ============================================================================
// PROVIDER FACTORY - Vendor selected once, at construction
// ============================================================================

import type { AIConfig, ProviderName } from '../../config/AppConfig.js';
import { ConfigurationError } from '../../scraper/types/errors.js';
import { AnthropicProvider } from './AnthropicProvider.js';
import { GeminiProvider } from './GeminiProvider.js';
import { isUsableApiKey, type LLMProvider } from './LLMProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';

export type { LLMProvider } from './LLMProvider.js';

const API_KEY_ENV: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

/**
 * Build the configured provider. Missing credentials are a ConfigurationError.
 */
export function createProvider(config: AIConfig): LLMProvider {
  const { provider, timeoutMs } = config;
  const apiKey = config.apiKeys[provider];

  if (!isUsableApiKey(apiKey)) {
    throw new ConfigurationError(
      `${provider} API key not configured. Please set ${API_KEY_ENV[provider]} in .env`
    );
  }

  const model = config.models[provider];
  switch (provider) {
    case 'openai':
      return new OpenAIProvider(apiKey, model, timeoutMs);
    case 'anthropic':
      return new AnthropicProvider(apiKey, model, timeoutMs);
    case 'gemini':
      return new GeminiProvider(apiKey, model, timeoutMs);
  }
}
