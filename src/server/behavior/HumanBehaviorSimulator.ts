// ============================================================================
// HUMAN BEHAVIOR SIMULATOR
// ============================================================================
// Randomized scrolling, pointer movement and pauses against the active page.
// Every operation is awaited in sequence: overlapping input events are
// themselves an automation signal.

import type { BehaviorConfig } from '../config/AppConfig.js';
import type { PageDriver } from '../browser/PageDriver.js';
import {
  randomInt,
  systemClock,
  systemRandom,
  uniform,
  type Clock,
  type Random,
} from '../utils/timing.js';

/** Pointer targets stay this far from every viewport edge */
const VIEWPORT_INSET_PX = 100;

/**
 * Why scrollToBottom stopped
 */
export type ScrollStopReason = 'stable' | 'max_iterations' | 'timeout';

export interface ScrollToBottomResult {
  reason: ScrollStopReason;
  iterations: number;
  finalHeight: number;
}

export interface BehaviorDeps {
  rng?: Random;
  clock?: Clock;
}

export class HumanBehaviorSimulator {
  private driver: PageDriver;
  private config: BehaviorConfig;
  private rng: Random;
  private clock: Clock;

  constructor(driver: PageDriver, config: BehaviorConfig, deps: BehaviorDeps = {}) {
    this.driver = driver;
    this.config = config;
    this.rng = deps.rng ?? systemRandom;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Sleep a duration drawn uniformly from [minMs, maxMs]
   */
  async delay(minMs?: number, maxMs?: number): Promise<void> {
    const min = minMs ?? this.config.actionDelayMs.min;
    const max = maxMs ?? this.config.actionDelayMs.max;
    await this.clock.sleep(uniform(this.rng, min, max));
  }

  async scroll(times = 3): Promise<void> {
    const { scrollAmountPx, scrollDelayMs } = this.config;
    for (let i = 0; i < times; i++) {
      await this.driver.scrollBy(randomInt(this.rng, scrollAmountPx.min, scrollAmountPx.max));
      await this.clock.sleep(uniform(this.rng, scrollDelayMs.min, scrollDelayMs.max));
    }
  }

  /**
   * Scroll in 300-800px steps until the document height stops growing.
   * Bounded by an iteration cap and a wall-clock cap so pages that grow
   * forever still terminate.
   */
  async scrollToBottom(pauseMs = 2000): Promise<ScrollToBottomResult> {
    const { scrollToBottomMaxIterations: maxIterations, scrollToBottomMaxDurationMs: maxDuration } =
      this.config;
    const startedAt = this.clock.now();
    let lastHeight = await this.driver.documentHeight();
    let iterations = 0;

    while (true) {
      if (iterations >= maxIterations) {
        console.warn(`[HumanBehavior] scrollToBottom stopped after ${iterations} iterations`);
        return { reason: 'max_iterations', iterations, finalHeight: lastHeight };
      }
      if (this.clock.now() - startedAt >= maxDuration) {
        console.warn(`[HumanBehavior] scrollToBottom timed out after ${maxDuration}ms`);
        return { reason: 'timeout', iterations, finalHeight: lastHeight };
      }

      await this.driver.scrollBy(randomInt(this.rng, 300, 800));
      await this.clock.sleep(uniform(this.rng, pauseMs * 0.7, pauseMs * 1.3));
      iterations++;

      const newHeight = await this.driver.documentHeight();
      if (newHeight === lastHeight) {
        return { reason: 'stable', iterations, finalHeight: newHeight };
      }
      lastHeight = newHeight;
    }
  }

  async moveMouse(): Promise<void> {
    if (!this.config.mouseMovementEnabled) return;

    const { width, height } = this.driver.viewport();
    const x = randomInt(this.rng, VIEWPORT_INSET_PX, Math.max(VIEWPORT_INSET_PX, width - VIEWPORT_INSET_PX));
    const y = randomInt(this.rng, VIEWPORT_INSET_PX, Math.max(VIEWPORT_INSET_PX, height - VIEWPORT_INSET_PX));

    await this.driver.moveMouse(x, y);
    await this.clock.sleep(uniform(this.rng, 100, 300));
  }

  /**
   * Idle on the page with small pointer moves and scroll jitter
   */
  async simulateReading(durationMs?: number): Promise<void> {
    const readTime = durationMs ?? uniform(this.rng, 2000, 5000);
    const startedAt = this.clock.now();

    while (this.clock.now() - startedAt < readTime) {
      if (this.config.randomMouseMoves) {
        await this.moveMouse();
      }

      if (this.rng.next() > 0.7) {
        await this.driver.scrollBy(randomInt(this.rng, -50, 150));
      }

      await this.clock.sleep(uniform(this.rng, 500, 1500));
    }
  }

  /**
   * Browse like a shopper: scroll, read, maybe move, pause
   */
  async simulateBrowsing(rounds = 3): Promise<void> {
    for (let i = 0; i < rounds; i++) {
      await this.scroll(randomInt(this.rng, 1, 2));
      await this.simulateReading(uniform(this.rng, 1000, 3000));

      if (this.rng.next() > 0.5) {
        await this.moveMouse();
      }

      await this.delay(500, 2000);
    }
  }
}
