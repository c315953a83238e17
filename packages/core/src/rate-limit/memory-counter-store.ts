/**
 * In-memory counter store.
 *
 * Single-process only. Increments run synchronously inside one call, so
 * concurrent async callers cannot interleave a read and a write. Counters
 * for past windows are swept on increments at most once per sweep interval.
 */

import { EXPIRED_SWEEP_INTERVAL_MS } from '../constants.js';
import { systemClock, type Clock } from '../types.js';
import type { CounterStore } from './types.js';

interface Counter {
  value: number;
  expiresAt: number;
}

export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, Counter>();
  private nextSweepAt = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  async get(key: string): Promise<number> {
    return this.live(key)?.value ?? 0;
  }

  async increment(key: string, by: number, ttlSeconds: number): Promise<number> {
    this.sweepExpired();
    const counter = this.live(key);
    if (counter) {
      counter.value += by;
      return counter.value;
    }

    this.counters.set(key, { value: by, expiresAt: this.clock.now() + ttlSeconds * 1000 });
    return by;
  }

  async delete(key: string): Promise<void> {
    this.counters.delete(key);
  }

  /**
   * Number of stored counters, expired ones included until swept.
   */
  get size(): number {
    return this.counters.size;
  }

  private sweepExpired(): void {
    const now = this.clock.now();
    if (now < this.nextSweepAt) {
      return;
    }
    this.nextSweepAt = now + EXPIRED_SWEEP_INTERVAL_MS;
    for (const [key, counter] of this.counters) {
      if (counter.expiresAt <= now) {
        this.counters.delete(key);
      }
    }
  }

  private live(key: string): Counter | undefined {
    const counter = this.counters.get(key);
    if (counter && counter.expiresAt <= this.clock.now()) {
      this.counters.delete(key);
      return undefined;
    }
    return counter;
  }
}
