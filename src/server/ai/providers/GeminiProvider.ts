// ============================================================================
// GEMINI PROVIDER
// ============================================================================

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { ANALYST_SYSTEM_PROMPT, type LLMProvider } from './LLMProvider.js';

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini';
  private model: GenerativeModel;
  private timeoutMs: number;

  constructor(apiKey: string, model: string, timeoutMs: number) {
    const client = new GoogleGenerativeAI(apiKey);
    this.model = client.getGenerativeModel({
      model,
      systemInstruction: ANALYST_SYSTEM_PROMPT,
      generationConfig: {
        responseMimeType: 'application/json',
      },
    });
    this.timeoutMs = timeoutMs;
    console.log(`[GeminiProvider] Initialized with ${model} (JSON mode)`);
  }

  async complete(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    const result = await this.model.generateContent(
      {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: { temperature, maxOutputTokens: maxTokens },
      },
      { timeout: this.timeoutMs }
    );
    return result.response.text();
  }
}
