// ============================================================================
// APP CONFIG - One immutable configuration value per process
// ============================================================================
// Built once at startup from environment variables and the target file, then
// passed explicitly into every component.

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { TargetDescriptor } from '../../shared/types.js';
import type { Range } from '../utils/timing.js';
import { ConfigurationError, errorMessage } from '../scraper/types/errors.js';

export type ProviderName = 'openai' | 'anthropic' | 'gemini';

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic', 'gemini'];

/** Playwright `waitUntil` values accepted for navigation */
export type WaitCondition = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface BrowserConfig {
  headless: boolean;
  viewport: { width: number; height: number };
  locale: string;
  timezoneId: string;
  deviceScaleFactor: number;
  isMobile: boolean;
  hasTouch: boolean;
  userAgentRotation: boolean;
  navigationTimeoutMs: number;
  waitUntil: WaitCondition;
  /** Hesitation before `goto` */
  preNavigationDelayMs: Range;
  /** Settle time after the load condition is met */
  postNavigationDelayMs: Range;
}

export interface BehaviorConfig {
  scrollDelayMs: Range;
  scrollAmountPx: Range;
  /** Default range for `delay()` when no bounds are given */
  actionDelayMs: Range;
  mouseMovementEnabled: boolean;
  randomMouseMoves: boolean;
  /** Upper bounds on the lazy-load scroll loop */
  scrollToBottomMaxIterations: number;
  scrollToBottomMaxDurationMs: number;
}

export interface AIConfig {
  provider: ProviderName;
  apiKeys: Record<ProviderName, string | undefined>;
  models: Record<ProviderName, string>;
  temperature: number;
  maxTokens: number;
  batchSize: number;
  timeoutMs: number;
}

export interface OutputPaths {
  rawData: string;
  enrichedData: string;
}

export interface AppConfig {
  readonly targets: ReadonlyMap<string, TargetDescriptor>;
  readonly browser: Readonly<BrowserConfig>;
  readonly behavior: Readonly<BehaviorConfig>;
  readonly ai: Readonly<AIConfig>;
  readonly output: Readonly<OutputPaths>;
  readonly defaultMaxProducts: number;
}

export const DEFAULT_BROWSER_CONFIG: BrowserConfig = {
  headless: false,
  viewport: { width: 1920, height: 1080 },
  locale: 'en-US',
  timezoneId: 'America/New_York',
  deviceScaleFactor: 1,
  isMobile: false,
  hasTouch: false,
  userAgentRotation: true,
  navigationTimeoutMs: 60000,
  waitUntil: 'networkidle',
  preNavigationDelayMs: { min: 1000, max: 2500 },
  postNavigationDelayMs: { min: 1500, max: 3000 },
};

export const DEFAULT_BEHAVIOR_CONFIG: BehaviorConfig = {
  scrollDelayMs: { min: 800, max: 2500 },
  scrollAmountPx: { min: 200, max: 600 },
  actionDelayMs: { min: 2000, max: 5000 },
  mouseMovementEnabled: true,
  randomMouseMoves: true,
  scrollToBottomMaxIterations: 50,
  scrollToBottomMaxDurationMs: 120000,
};

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4-turbo-preview',
  anthropic: 'claude-3-sonnet-20240229',
  gemini: 'gemini-2.0-flash',
};

const DEFAULT_TARGETS_FILE = 'config/targets.json';

// ============================================================================
// TARGET FILE
// ============================================================================

const selectorsSchema = z
  .object({
    container: z.string().min(1).optional(),
    product_container: z.string().min(1).optional(),
    name: z.string().min(1),
    price: z.string().min(1),
    rating: z.string().min(1),
    availability: z.string().min(1),
  })
  .refine((s) => s.container !== undefined || s.product_container !== undefined, {
    message: 'a container selector is required',
  });

const targetSchema = z
  .object({
    url: z.string().url(),
    kind: z.enum(['static', 'dynamic']).optional(),
    type: z.enum(['static', 'dynamic']).optional(),
    selectors: selectorsSchema,
  })
  .refine((t) => t.kind !== undefined || t.type !== undefined, {
    message: 'kind (or type) is required',
  });

const targetFileSchema = z.record(z.string().min(1), targetSchema);

/**
 * Validate a parsed target file into descriptors, preserving file order
 */
export function parseTargets(raw: unknown): Map<string, TargetDescriptor> {
  const parsed = targetFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid target configuration at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }

  const targets = new Map<string, TargetDescriptor>();
  for (const [name, target] of Object.entries(parsed.data)) {
    const { selectors } = target;
    targets.set(
      name,
      Object.freeze({
        name,
        url: target.url,
        kind: target.kind ?? target.type ?? 'static',
        selectors: Object.freeze({
          container: selectors.container ?? selectors.product_container ?? '',
          name: selectors.name,
          price: selectors.price,
          rating: selectors.rating,
          availability: selectors.availability,
        }),
      })
    );
  }
  return targets;
}

export function loadTargetsFile(filePath: string): Map<string, TargetDescriptor> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read target file ${filePath}: ${errorMessage(error)}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Target file ${filePath} is not valid JSON`, error);
  }
  return parseTargets(raw);
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${key} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

export function parseProviderName(value: string): ProviderName {
  const normalized = value.trim().toLowerCase();
  const match = PROVIDER_NAMES.find((name) => name === normalized);
  if (!match) {
    throw new ConfigurationError(
      `Unsupported AI provider: ${value} (expected one of ${PROVIDER_NAMES.join(', ')})`
    );
  }
  return match;
}

export interface LoadConfigOptions {
  /** Already-parsed targets; skips reading TARGETS_FILE */
  targets?: ReadonlyMap<string, TargetDescriptor>;
  /** Base directory for relative paths (default: cwd) */
  cwd?: string;
}

export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const targets =
    options.targets ?? loadTargetsFile(path.resolve(cwd, env.TARGETS_FILE || DEFAULT_TARGETS_FILE));

  const delayMin = readNumber(env, 'REQUEST_DELAY_MIN', 2);
  const delayMax = readNumber(env, 'REQUEST_DELAY_MAX', 5);
  if (delayMin > delayMax) {
    throw new ConfigurationError('REQUEST_DELAY_MIN must not exceed REQUEST_DELAY_MAX');
  }

  const outputDir = path.resolve(cwd, env.OUTPUT_DIR || 'output');

  return Object.freeze({
    targets,
    browser: Object.freeze({
      ...DEFAULT_BROWSER_CONFIG,
      headless: (env.HEADLESS_MODE || 'false').toLowerCase() === 'true',
    }),
    behavior: Object.freeze({
      ...DEFAULT_BEHAVIOR_CONFIG,
      actionDelayMs: { min: delayMin * 1000, max: delayMax * 1000 },
    }),
    ai: Object.freeze({
      provider: parseProviderName(env.AI_PROVIDER || 'openai'),
      apiKeys: {
        openai: env.OPENAI_API_KEY,
        anthropic: env.ANTHROPIC_API_KEY,
        gemini: env.GEMINI_API_KEY,
      },
      models: {
        openai: env.OPENAI_MODEL || DEFAULT_MODELS.openai,
        anthropic: env.ANTHROPIC_MODEL || DEFAULT_MODELS.anthropic,
        gemini: env.GEMINI_MODEL || DEFAULT_MODELS.gemini,
      },
      temperature: 0.3,
      maxTokens: 2000,
      batchSize: 20,
      timeoutMs: readNumber(env, 'AI_TIMEOUT_MS', 30000),
    }),
    output: Object.freeze({
      rawData: path.join(outputDir, 'products_raw.json'),
      enrichedData: path.join(outputDir, 'products_enriched.json'),
    }),
    defaultMaxProducts: 50,
  });
}

// ============================================================================
// LOOKUPS
// ============================================================================

export function getTarget(config: AppConfig, name: string): TargetDescriptor {
  const target = config.targets.get(name);
  if (!target) {
    const available = [...config.targets.keys()].join(', ');
    throw new ConfigurationError(`Unknown target: ${name}. Available targets: ${available}`);
  }
  return target;
}

export function listTargets(config: AppConfig): TargetDescriptor[] {
  return [...config.targets.values()];
}

/**
 * Return a copy of the config with another provider selected
 */
export function withProvider(config: AppConfig, provider: ProviderName): AppConfig {
  return Object.freeze({ ...config, ai: Object.freeze({ ...config.ai, provider }) });
}
