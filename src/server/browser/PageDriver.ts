// ============================================================================
// PAGE DRIVER - Narrow views of the live page
// ============================================================================
// The Playwright Page stays inside BrowserManager. The behavior simulator
// and the scraper only see these interfaces.

import type { ElementHandle, Page } from 'playwright';
import type { ElementSource } from '../scraper/utils/FieldExtractor.js';

export interface Viewport {
  width: number;
  height: number;
}

/**
 * Input and layout operations used by the behavior simulator
 */
export interface PageDriver {
  scrollBy(deltaY: number): Promise<void>;
  documentHeight(): Promise<number>;
  moveMouse(x: number, y: number): Promise<void>;
  viewport(): Viewport;
}

/**
 * One exclusively-owned browser session as seen by the scraper
 */
export interface ScrapeSession {
  readonly id: string;
  readonly driver: PageDriver;
  navigate(url: string): Promise<void>;
  queryAll(selector: string): Promise<ElementSource[]>;
  waitForLazyLoad(selector?: string, timeoutMs?: number): Promise<boolean>;
  close(): Promise<void>;
}

export class PlaywrightPageDriver implements PageDriver {
  constructor(
    private page: Page,
    private fallbackViewport: Viewport
  ) {}

  async scrollBy(deltaY: number): Promise<void> {
    await this.page.evaluate(`window.scrollBy(0, ${Math.round(deltaY)})`);
  }

  async documentHeight(): Promise<number> {
    return this.page.evaluate<number>('document.body.scrollHeight');
  }

  async moveMouse(x: number, y: number): Promise<void> {
    await this.page.mouse.move(x, y);
  }

  viewport(): Viewport {
    return this.page.viewportSize() ?? this.fallbackViewport;
  }
}

/**
 * Adapt a Playwright element handle to the extractor's element view
 */
export function fromElementHandle(handle: ElementHandle<SVGElement | HTMLElement>): ElementSource {
  return {
    query: (selector) => handle.$(selector),
  };
}
