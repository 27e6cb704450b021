/**
 * Periodic counter increment.
 *
 * @module counter/ticker
 */

import type { CounterState } from "./state.js";

/** Default tick interval in milliseconds */
export const DEFAULT_TICK_INTERVAL_MS = 100;

/** Longest delay a Node.js timer honours; larger ones fire after 1 ms */
export const MAX_TICK_INTERVAL_MS = 2_147_483_647;

export interface TickerOptions {
  /** Interval between ticks; 0 disables ticking (default: 100) */
  intervalMs?: number;
  /** Receives the counter value after each increment */
  onTick: (value: number) => void;
}

/**
 * Increments a counter on a fixed interval and reports each new value.
 *
 * @example
 * ```ts
 * const ticker = new Ticker(counter, {
 *   intervalMs: 100,
 *   onTick: (value) => logger.info(String(value)),
 * });
 * ticker.start();
 * // ...
 * ticker.stop();
 * ```
 */
export class Ticker {
  private readonly counter: CounterState;
  private readonly intervalMs: number;
  private readonly onTick: (value: number) => void;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(counter: CounterState, options: TickerOptions) {
    this.counter = counter;
    this.intervalMs = options.intervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.onTick = options.onTick;
  }

  /**
   * Starts ticking. Does nothing when already running or when the
   * interval is 0.
   */
  start(): void {
    if (this.timer || this.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.onTick(this.counter.increment());
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }
}
