import { describe, test, expect } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import {
  DEFAULT_MODELS,
  getTarget,
  listTargets,
  loadConfig,
  loadTargetsFile,
  parseProviderName,
  parseTargets,
  withProvider,
} from '../AppConfig.js';
import { ConfigurationError } from '../../scraper/types/errors.js';

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../..');

const targetFile = {
  demo_shop: {
    url: 'https://shop.example.com/catalog',
    kind: 'static',
    selectors: {
      container: 'article.product',
      name: 'h3',
      price: '.price',
      rating: '.rating',
      availability: '.stock',
    },
  },
  legacy_shop: {
    url: 'https://legacy.example.com/list',
    type: 'dynamic',
    selectors: {
      product_container: 'li.item',
      name: '.title',
      price: '.cost',
      rating: '.stars',
      availability: '.availability',
    },
  },
};

describe('AppConfig', () => {
  describe('parseTargets', () => {
    test('accepts both key spellings', () => {
      const targets = parseTargets(targetFile);

      expect(targets.get('demo_shop')).toEqual({
        name: 'demo_shop',
        url: 'https://shop.example.com/catalog',
        kind: 'static',
        selectors: {
          container: 'article.product',
          name: 'h3',
          price: '.price',
          rating: '.rating',
          availability: '.stock',
        },
      });
      expect(targets.get('legacy_shop')?.kind).toBe('dynamic');
      expect(targets.get('legacy_shop')?.selectors.container).toBe('li.item');
    });

    test('returns frozen descriptors', () => {
      const target = parseTargets(targetFile).get('demo_shop');
      expect(Object.isFrozen(target)).toBe(true);
      expect(Object.isFrozen(target?.selectors)).toBe(true);
    });

    test('reports the first invalid field', () => {
      const broken = { demo_shop: { ...targetFile.demo_shop, url: 'not a url' } };
      expect(() => parseTargets(broken)).toThrow(ConfigurationError);
      expect(() => parseTargets(broken)).toThrow(/^Invalid target configuration at demo_shop\.url/);
    });

    test('requires a container selector', () => {
      const { container: _container, ...selectors } = targetFile.demo_shop.selectors;
      const broken = { demo_shop: { ...targetFile.demo_shop, selectors } };
      expect(() => parseTargets(broken)).toThrow(/a container selector is required/);
    });
  });

  test('the bundled target file is valid', () => {
    const targets = loadTargetsFile(path.join(PROJECT_ROOT, 'config/targets.json'));
    expect([...targets.keys()]).toEqual(['books_toscrape', 'amazon_headphones', 'ebay_laptops']);
    expect(targets.get('books_toscrape')?.kind).toBe('static');
  });

  test('a missing target file is a configuration error', () => {
    expect(() => loadTargetsFile(path.join(PROJECT_ROOT, 'config/missing.json'))).toThrow(
      ConfigurationError
    );
  });

  describe('loadConfig', () => {
    const targets = parseTargets(targetFile);

    test('applies defaults', () => {
      const config = loadConfig({}, { targets, cwd: '/srv/app' });

      expect(config.browser.headless).toBe(false);
      expect(config.behavior.actionDelayMs).toEqual({ min: 2000, max: 5000 });
      expect(config.behavior.scrollToBottomMaxIterations).toBe(50);
      expect(config.ai.provider).toBe('openai');
      expect(config.ai.models).toEqual(DEFAULT_MODELS);
      expect(config.ai.timeoutMs).toBe(30000);
      expect(config.output).toEqual({
        rawData: path.join('/srv/app/output', 'products_raw.json'),
        enrichedData: path.join('/srv/app/output', 'products_enriched.json'),
      });
      expect(config.defaultMaxProducts).toBe(50);
    });

    test('reads environment overrides', () => {
      const config = loadConfig(
        {
          HEADLESS_MODE: 'TRUE',
          REQUEST_DELAY_MIN: '1',
          REQUEST_DELAY_MAX: '1.5',
          AI_PROVIDER: 'Gemini',
          GEMINI_MODEL: 'gemini-test',
          OUTPUT_DIR: 'data',
        },
        { targets, cwd: '/srv/app' }
      );

      expect(config.browser.headless).toBe(true);
      expect(config.behavior.actionDelayMs).toEqual({ min: 1000, max: 1500 });
      expect(config.ai.provider).toBe('gemini');
      expect(config.ai.models.gemini).toBe('gemini-test');
      expect(config.output.rawData).toBe(path.join('/srv/app/data', 'products_raw.json'));
    });

    test('rejects invalid numbers and inverted delay ranges', () => {
      expect(() => loadConfig({ REQUEST_DELAY_MIN: 'soon' }, { targets })).toThrow(
        'REQUEST_DELAY_MIN must be a non-negative number, got "soon"'
      );
      expect(() => loadConfig({ REQUEST_DELAY_MIN: '6' }, { targets })).toThrow(
        'REQUEST_DELAY_MIN must not exceed REQUEST_DELAY_MAX'
      );
    });

    test('rejects unknown providers', () => {
      expect(() => loadConfig({ AI_PROVIDER: 'mystery' }, { targets })).toThrow(
        'Unsupported AI provider: mystery (expected one of openai, anthropic, gemini)'
      );
    });
  });

  describe('lookups', () => {
    const config = loadConfig({}, { targets: parseTargets(targetFile) });

    test('getTarget names the available targets on a miss', () => {
      expect(getTarget(config, 'demo_shop').url).toBe('https://shop.example.com/catalog');
      expect(() => getTarget(config, 'nowhere')).toThrow(
        'Unknown target: nowhere. Available targets: demo_shop, legacy_shop'
      );
    });

    test('listTargets keeps file order', () => {
      expect(listTargets(config).map((t) => t.name)).toEqual(['demo_shop', 'legacy_shop']);
    });

    test('withProvider leaves the original untouched', () => {
      const switched = withProvider(config, parseProviderName('anthropic'));
      expect(switched.ai.provider).toBe('anthropic');
      expect(config.ai.provider).toBe('openai');
      expect(switched.targets).toBe(config.targets);
    });
  });
});
