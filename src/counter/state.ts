/**
 * The shared counter.
 *
 * Held as a signed 32-bit integer; arithmetic wraps on overflow.
 *
 * @module counter/state
 */

export class CounterState {
  private value: number;

  constructor(initial = 0) {
    this.value = initial | 0;
  }

  get(): number {
    return this.value;
  }

  /**
   * Overwrites the counter.
   *
   * @returns The value before the write
   */
  set(value: number): number {
    const previous = this.value;
    this.value = value | 0;
    return previous;
  }

  /**
   * Adds one to the counter.
   *
   * @returns The new value
   */
  increment(): number {
    this.value = (this.value + 1) | 0;
    return this.value;
  }
}
