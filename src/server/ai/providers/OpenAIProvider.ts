// ============================================================================
// OPENAI PROVIDER
// ============================================================================

import OpenAI from 'openai';
import { ANALYST_SYSTEM_PROMPT, type LLMProvider } from './LLMProvider.js';

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;

  constructor(apiKey: string, model: string, timeoutMs: number) {
    this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
    this.model = model;
    console.log(`[OpenAIProvider] Initialized with ${model}`);
  }

  async complete(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: ANALYST_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      temperature,
      max_tokens: maxTokens,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned an empty completion');
    }
    return content;
  }
}
