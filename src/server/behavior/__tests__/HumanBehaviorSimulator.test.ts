import { describe, test, expect } from 'vitest';
import { HumanBehaviorSimulator } from '../HumanBehaviorSimulator.js';
import { DEFAULT_BEHAVIOR_CONFIG, type BehaviorConfig } from '../../config/AppConfig.js';
import type { PageDriver, Viewport } from '../../browser/PageDriver.js';
import type { Clock, Random } from '../../utils/timing.js';

class FakeDriver implements PageDriver {
  scrolls: number[] = [];
  moves: Array<[number, number]> = [];
  private heights: number[];

  constructor(heights: number[] = [1000], private size: Viewport = { width: 1920, height: 1080 }) {
    this.heights = [...heights];
  }

  async scrollBy(deltaY: number): Promise<void> {
    this.scrolls.push(deltaY);
  }

  /** Returns heights in order, repeating the last one */
  async documentHeight(): Promise<number> {
    return this.heights.length > 1 ? (this.heights.shift() ?? 0) : this.heights[0];
  }

  async moveMouse(x: number, y: number): Promise<void> {
    this.moves.push([x, y]);
  }

  viewport(): Viewport {
    return this.size;
  }
}

class FakeClock implements Clock {
  time = 0;
  sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

function constantRandom(value: number): Random {
  return { next: () => value };
}

function config(overrides: Partial<BehaviorConfig> = {}): BehaviorConfig {
  return { ...DEFAULT_BEHAVIOR_CONFIG, ...overrides };
}

describe('HumanBehaviorSimulator', () => {
  describe('delay', () => {
    test('draws from the configured action delay by default', async () => {
      const clock = new FakeClock();
      const sim = new HumanBehaviorSimulator(new FakeDriver(), config(), {
        rng: constantRandom(0.5),
        clock,
      });

      await sim.delay();
      await sim.delay(100, 300);

      expect(clock.sleeps).toEqual([3500, 200]);
    });
  });

  describe('scroll', () => {
    test('scrolls the requested number of times within the configured ranges', async () => {
      const driver = new FakeDriver();
      const clock = new FakeClock();
      const sim = new HumanBehaviorSimulator(driver, config(), { rng: constantRandom(0), clock });

      await sim.scroll(3);

      expect(driver.scrolls).toEqual([200, 200, 200]);
      expect(clock.sleeps).toEqual([800, 800, 800]);
    });
  });

  describe('scrollToBottom', () => {
    test('stops once the document height stops growing', async () => {
      const driver = new FakeDriver([1000, 2000, 3000, 3000]);
      const clock = new FakeClock();
      const sim = new HumanBehaviorSimulator(driver, config(), { rng: constantRandom(0), clock });

      const result = await sim.scrollToBottom(1000);

      expect(result).toEqual({ reason: 'stable', iterations: 3, finalHeight: 3000 });
      expect(driver.scrolls).toEqual([300, 300, 300]);
      expect(clock.sleeps).toEqual([700, 700, 700]);
    });

    test('stops at the iteration cap on a page that keeps growing', async () => {
      let height = 0;
      const driver = new FakeDriver();
      driver.documentHeight = async () => (height += 500);
      const sim = new HumanBehaviorSimulator(
        driver,
        config({ scrollToBottomMaxIterations: 4 }),
        { rng: constantRandom(0), clock: new FakeClock() }
      );

      const result = await sim.scrollToBottom(1000);

      expect(result).toEqual({ reason: 'max_iterations', iterations: 4, finalHeight: 2500 });
      expect(driver.scrolls).toHaveLength(4);
    });

    test('stops at the wall-clock cap', async () => {
      let height = 0;
      const driver = new FakeDriver();
      driver.documentHeight = async () => (height += 500);
      const sim = new HumanBehaviorSimulator(
        driver,
        config({ scrollToBottomMaxDurationMs: 2000 }),
        { rng: constantRandom(0.5), clock: new FakeClock() }
      );

      // Each iteration pauses exactly 1000ms with next() = 0.5
      const result = await sim.scrollToBottom(1000);

      expect(result).toEqual({ reason: 'timeout', iterations: 2, finalHeight: 1500 });
    });
  });

  describe('moveMouse', () => {
    test('keeps the pointer inside the viewport inset', async () => {
      const low = new FakeDriver();
      await new HumanBehaviorSimulator(low, config(), {
        rng: constantRandom(0),
        clock: new FakeClock(),
      }).moveMouse();

      const high = new FakeDriver();
      await new HumanBehaviorSimulator(high, config(), {
        rng: constantRandom(0.999999),
        clock: new FakeClock(),
      }).moveMouse();

      expect(low.moves).toEqual([[100, 100]]);
      expect(high.moves).toEqual([[1820, 980]]);
    });

    test('does nothing when mouse movement is disabled', async () => {
      const driver = new FakeDriver();
      const clock = new FakeClock();
      const sim = new HumanBehaviorSimulator(driver, config({ mouseMovementEnabled: false }), {
        rng: constantRandom(0.5),
        clock,
      });

      await sim.moveMouse();

      expect(driver.moves).toEqual([]);
      expect(clock.sleeps).toEqual([]);
    });
  });

  describe('simulateReading', () => {
    test('runs for the requested duration', async () => {
      const driver = new FakeDriver();
      const clock = new FakeClock();
      const sim = new HumanBehaviorSimulator(driver, config({ randomMouseMoves: false }), {
        rng: constantRandom(0),
        clock,
      });

      await sim.simulateReading(1200);

      // Two 500ms pauses leave the clock at 1000, the third crosses 1200
      expect(clock.sleeps).toEqual([500, 500, 500]);
      expect(driver.scrolls).toEqual([]);
      expect(driver.moves).toEqual([]);
    });

    test('adds scroll jitter and pointer moves when enabled', async () => {
      const driver = new FakeDriver();
      const clock = new FakeClock();
      const sim = new HumanBehaviorSimulator(driver, config(), {
        rng: constantRandom(0.8),
        clock,
      });

      await sim.simulateReading(1000);

      expect(driver.moves).toHaveLength(1);
      expect(driver.scrolls).toHaveLength(1);
      expect(driver.scrolls[0]).toBeGreaterThanOrEqual(-50);
      expect(driver.scrolls[0]).toBeLessThanOrEqual(150);
    });
  });

  test('simulateBrowsing completes every round', async () => {
    const driver = new FakeDriver();
    const clock = new FakeClock();
    const sim = new HumanBehaviorSimulator(driver, config({ randomMouseMoves: false }), {
      rng: constantRandom(0),
      clock,
    });

    await sim.simulateBrowsing(2);

    // next() = 0 scrolls once per round and never takes the optional move
    expect(driver.scrolls).toEqual([200, 200]);
    expect(driver.moves).toEqual([]);
  });
});
