// ============================================================================
// BROWSER MANAGER - Stealth Playwright session
// ============================================================================
// Owns one browser process, one fingerprinted context and one page. The
// page never leaves this class: callers get a PageDriver and ElementSources.

import { chromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, Page } from 'playwright';
import { v4 as uuidv4 } from 'uuid';
import { IGNORED_DEFAULT_ARGS, STEALTH_CHROME_FLAGS } from '../config/chrome-flags.js';
import type { BrowserConfig } from '../config/AppConfig.js';
import { NavigationError, errorMessage } from '../scraper/types/errors.js';
import type { ElementSource } from '../scraper/utils/FieldExtractor.js';
import {
  systemClock,
  systemRandom,
  uniform,
  type Clock,
  type Random,
} from '../utils/timing.js';
import { buildFingerprint, getStealthInitScript, type Fingerprint } from './fingerprint.js';
import {
  PlaywrightPageDriver,
  fromElementHandle,
  type PageDriver,
  type ScrapeSession,
} from './PageDriver.js';

// Apply stealth plugin globally, on top of our own init script
chromium.use(StealthPlugin());

export interface BrowserManagerDeps {
  rng?: Random;
  clock?: Clock;
}

export class BrowserManager implements ScrapeSession {
  readonly id: string;
  private config: BrowserConfig;
  private rng: Random;
  private clock: Clock;

  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private pageDriver: PageDriver | null = null;
  private fingerprint: Fingerprint | null = null;

  constructor(config: BrowserConfig, deps: BrowserManagerDeps = {}) {
    this.id = uuidv4();
    this.config = config;
    this.rng = deps.rng ?? systemRandom;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Launch the browser and open a fingerprinted context and page
   */
  async initialize(): Promise<this> {
    if (this.page) return this;

    console.log(`[BrowserManager] Creating session ${this.id} (headless: ${this.config.headless})`);

    const browser = await chromium.launch({
      headless: this.config.headless,
      args: STEALTH_CHROME_FLAGS,
      ignoreDefaultArgs: IGNORED_DEFAULT_ARGS,
    });
    this.browser = browser;

    try {
      const fingerprint = buildFingerprint(this.config, this.rng);
      this.fingerprint = fingerprint;

      const context = await browser.newContext({
        viewport: fingerprint.viewport,
        userAgent: fingerprint.userAgent,
        locale: fingerprint.locale,
        timezoneId: fingerprint.timezoneId,
        deviceScaleFactor: fingerprint.deviceScaleFactor,
        isMobile: fingerprint.isMobile,
        hasTouch: fingerprint.hasTouch,
        extraHTTPHeaders: fingerprint.extraHTTPHeaders,
      });
      this.context = context;

      // Must be registered before any page script runs
      await context.addInitScript(getStealthInitScript([fingerprint.locale, fingerprint.locale.split('-')[0]]));

      const page = await context.newPage();
      this.page = page;
      this.pageDriver = new PlaywrightPageDriver(page, fingerprint.viewport);
      this.setupPageListeners(page);
    } catch (error) {
      console.error(`[BrowserManager] Session ${this.id} failed to initialize:`, errorMessage(error));
      await this.close();
      throw error;
    }

    console.log(`[BrowserManager] Session ${this.id} created (UA: ${this.fingerprint?.userAgent})`);
    return this;
  }

  private setupPageListeners(page: Page): void {
    // Dialogs would block a headed run; dismiss them
    page.on('dialog', (dialog) => {
      console.log(`[BrowserManager] Dismissing ${dialog.type()} dialog: ${dialog.message()}`);
      dialog.dismiss().catch((error: unknown) => {
        console.warn('[BrowserManager] Dialog dismiss failed:', errorMessage(error));
      });
    });
  }

  get driver(): PageDriver {
    if (!this.pageDriver) {
      throw new Error(`Session ${this.id} is not initialized`);
    }
    return this.pageDriver;
  }

  getFingerprint(): Fingerprint | null {
    return this.fingerprint;
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error(`Session ${this.id} is not initialized`);
    }
    return this.page;
  }

  // =========================================================================
  // NAVIGATION
  // =========================================================================

  /**
   * Navigate with a human-like hesitation before and settle time after.
   * Failures surface as NavigationError; there is no retry here.
   */
  async navigate(url: string): Promise<void> {
    const page = this.requirePage();
    const { preNavigationDelayMs: pre, postNavigationDelayMs: post } = this.config;

    await this.clock.sleep(uniform(this.rng, pre.min, pre.max));

    try {
      await page.goto(url, {
        waitUntil: this.config.waitUntil,
        timeout: this.config.navigationTimeoutMs,
      });
    } catch (error) {
      console.error(`[BrowserManager] Navigation error: ${errorMessage(error)}`);
      throw new NavigationError(url, error);
    }

    await this.clock.sleep(uniform(this.rng, post.min, post.max));
  }

  /**
   * Wait for lazy-loaded elements, or for network idle when no selector is given
   */
  async waitForLazyLoad(selector?: string, timeoutMs = 5000): Promise<boolean> {
    const page = this.requirePage();
    try {
      if (selector) {
        await page.waitForSelector(selector, { timeout: timeoutMs });
      } else {
        await page.waitForLoadState('networkidle', { timeout: timeoutMs });
      }
      return true;
    } catch (error) {
      console.log(`[BrowserManager] Lazy load wait ended without match: ${errorMessage(error)}`);
      return false;
    }
  }

  async queryAll(selector: string): Promise<ElementSource[]> {
    const handles = await this.requirePage().$$(selector);
    return handles.map(fromElementHandle);
  }

  // =========================================================================
  // TEARDOWN
  // =========================================================================

  /**
   * Release page, context and browser in that order. Safe to call twice;
   * a failing step is logged and the remaining steps still run.
   */
  async close(): Promise<void> {
    const { page, context, browser } = this;
    this.page = null;
    this.pageDriver = null;
    this.context = null;
    this.browser = null;

    if (!page && !context && !browser) return;

    console.log(`[BrowserManager] Destroying session ${this.id}`);

    if (page) {
      try {
        if (!page.isClosed()) {
          await page.close();
        }
      } catch (error) {
        console.error('[BrowserManager] Error closing page:', errorMessage(error));
      }
    }

    if (context) {
      await context.close().catch((error: unknown) => {
        console.error('[BrowserManager] Error closing context:', errorMessage(error));
      });
    }

    if (browser) {
      await browser.close().catch((error: unknown) => {
        console.error('[BrowserManager] Error closing browser:', errorMessage(error));
      });
    }
  }
}

/**
 * Run `fn` with the session `open` resolves to, closing it on every exit path
 */
export async function runInSession<S extends ScrapeSession, T>(
  open: () => Promise<S>,
  fn: (session: S) => Promise<T>
): Promise<T> {
  const session = await open();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

/**
 * Run `fn` with a fresh browser session. `initialize` releases whatever it
 * launched when it fails, so only an open session needs closing here.
 */
export function withBrowserSession<T>(
  config: BrowserConfig,
  fn: (session: BrowserManager) => Promise<T>,
  deps: BrowserManagerDeps = {}
): Promise<T> {
  return runInSession(() => new BrowserManager(config, deps).initialize(), fn);
}
