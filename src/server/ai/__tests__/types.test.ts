import { describe, test, expect } from 'vitest';
import { normalizeCategory, parseCategorizations, parseJsonObject } from '../types.js';
import { buildCategorizationPrompt } from '../prompts.js';

describe('normalizeCategory', () => {
  test('accepts spacing and case variants', () => {
    expect(normalizeCategory('Budget')).toBe('Budget');
    expect(normalizeCategory('mid-range')).toBe('MidRange');
    expect(normalizeCategory('Mid Range')).toBe('MidRange');
    expect(normalizeCategory('HIGH_END')).toBe('HighEnd');
  });

  test('rejects unknown labels', () => {
    expect(normalizeCategory('Luxury')).toBeNull();
    expect(normalizeCategory('')).toBeNull();
  });
});

describe('parseJsonObject', () => {
  test('strips Markdown code fences', () => {
    expect(parseJsonObject('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    expect(parseJsonObject('```\n{"a": 2}\n```')).toEqual({ a: 2 });
  });

  test('finds the object inside surrounding prose', () => {
    expect(parseJsonObject('Here you go: {"a": {"b": 3}} Hope this helps.')).toEqual({ a: { b: 3 } });
  });

  test('throws when there is no JSON object', () => {
    expect(() => parseJsonObject('no json here')).toThrow('No valid JSON found in response');
  });
});

describe('parseCategorizations', () => {
  test('reads the id-keyed map', () => {
    const parsed = parseCategorizations(
      '{"shop_1": {"category": "Budget", "reasoning": "Lowest price"}, "shop_2": {"category": "HighEnd"}}'
    );

    expect([...parsed.entries()]).toEqual([
      ['shop_1', { category: 'Budget', reasoning: 'Lowest price' }],
      ['shop_2', { category: 'HighEnd', reasoning: 'No reasoning provided' }],
    ]);
  });

  test('reads the categorizations list', () => {
    const parsed = parseCategorizations(
      '{"categorizations": [{"id": 7, "category": "midrange", "reasoning": "Near average"}]}'
    );

    expect(parsed.get('7')).toEqual({ category: 'MidRange', reasoning: 'Near average' });
  });

  test('drops entries with unknown categories', () => {
    const parsed = parseCategorizations(
      '{"a": {"category": "Luxury", "reasoning": "x"}, "b": {"category": "Budget", "reasoning": "y"}}'
    );

    expect([...parsed.keys()]).toEqual(['b']);
  });

  test('skips malformed entries and keeps the valid ones', () => {
    const parsed = parseCategorizations(
      '{"a": {"category": "HighEnd", "reasoning": "r"}, "b": {"category": null}, "c": "Budget", "note": "done"}'
    );

    expect([...parsed.entries()]).toEqual([['a', { category: 'HighEnd', reasoning: 'r' }]]);
  });

  test('skips malformed list items', () => {
    const parsed = parseCategorizations(
      '{"categorizations": [{"id": 1, "category": "Budget"}, {"category": "HighEnd"}, null]}'
    );

    expect([...parsed.entries()]).toEqual([['1', { category: 'Budget', reasoning: 'No reasoning provided' }]]);
  });

  test('throws when the response is not an object', () => {
    expect(() => parseCategorizations('[1, 2]')).toThrow(/^Unexpected response shape/);
  });
});

describe('buildCategorizationPrompt', () => {
  test('includes statistics, products and the response format', () => {
    const prompt = buildCategorizationPrompt(
      [{ id: 'shop_1', name: 'Desk Lamp', price: 24.5, rating: null }],
      { min: 9.99, max: 120, avg: 45.125 }
    );

    expect(prompt).toContain('- Min: $9.99');
    expect(prompt).toContain('- Max: $120.00');
    expect(prompt).toContain('- Average: $45.13');
    expect(prompt).toContain('"name": "Desk Lamp"');
    expect(prompt).toContain('"rating": null');
    expect(prompt).toContain('"category": "Budget" | "MidRange" | "HighEnd"');
  });
});
