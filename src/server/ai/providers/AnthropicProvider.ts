// ============================================================================
// ANTHROPIC PROVIDER
// ============================================================================

import Anthropic from '@anthropic-ai/sdk';
import { ANALYST_SYSTEM_PROMPT, type LLMProvider } from './LLMProvider.js';

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string, timeoutMs: number) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
    this.model = model;
    console.log(`[AnthropicProvider] Initialized with ${model}`);
  }

  async complete(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      temperature,
      system: ANALYST_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
    });

    const text = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text) {
      throw new Error('Anthropic returned no text content');
    }
    return text;
  }
}
