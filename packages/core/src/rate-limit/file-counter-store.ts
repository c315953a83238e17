/**
 * File Counter Store
 *
 * Counters persisted to a JSON file and guarded with proper-lockfile, so
 * several processes on one host share the same windows. Calls from this
 * process are queued first and only one holds the file lock at a time.
 * Writes go to a temp file that is renamed over the state file, so readers
 * never see a partial write.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import lockfile from 'proper-lockfile';
import { z } from 'zod';

import { systemClock, type Clock } from '../types.js';
import type { CounterStore } from './types.js';

const stateSchema = z.object({
  counters: z.record(z.object({
    value: z.number(),
    expiresAt: z.number(),
  })),
});

type CounterState = z.infer<typeof stateSchema>;

export interface FileCounterStoreOptions {
  /** Path of the JSON state file */
  path: string;
  clock?: Clock;
  /** Consider a lock stale after this many milliseconds (default: 10000) */
  staleMs?: number;
  /** Lock acquisition retries (default: 5) */
  lockRetries?: number;
}

function emptyState(): CounterState {
  return { counters: {} };
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export class FileCounterStore implements CounterStore {
  private readonly path: string;
  private readonly clock: Clock;
  private readonly staleMs: number;
  private readonly lockRetries: number;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: FileCounterStoreOptions) {
    this.path = options.path;
    this.clock = options.clock ?? systemClock;
    this.staleMs = options.staleMs ?? 10000;
    this.lockRetries = options.lockRetries ?? 5;
  }

  async get(key: string): Promise<number> {
    const counter = this.readState().counters[key];
    if (!counter || counter.expiresAt <= this.clock.now()) {
      return 0;
    }
    return counter.value;
  }

  increment(key: string, by: number, ttlSeconds: number): Promise<number> {
    return this.withLock(() => {
      const state = this.readState();
      const now = this.clock.now();
      this.prune(state, now);

      const counter = state.counters[key];
      const value = counter ? counter.value + by : by;
      state.counters[key] = {
        value,
        expiresAt: counter ? counter.expiresAt : now + ttlSeconds * 1000,
      };

      this.writeState(state);
      return value;
    });
  }

  delete(key: string): Promise<void> {
    return this.withLock(() => {
      const state = this.readState();
      delete state.counters[key];
      this.writeState(state);
    });
  }

  /**
   * Run `fn` holding the file lock, after earlier calls from this process.
   */
  private withLock<T>(fn: () => T): Promise<T> {
    const run = async (): Promise<T> => {
      this.ensureFile();

      let release: () => Promise<void>;
      try {
        release = await lockfile.lock(this.path, {
          stale: this.staleMs,
          retries: {
            retries: this.lockRetries,
            factor: 2,
            minTimeout: 50,
            maxTimeout: 1000,
          },
        });
      } catch (error) {
        throw new Error(
          `Failed to acquire lock on counter store ${this.path}: ${error instanceof Error ? error.message : String(error)}`
        );
      }

      try {
        return fn();
      } finally {
        await release();
      }
    };

    const result = this.queue.then(run, run);
    // Keep the queue going; failures reach the caller through `result`
    this.queue = result.catch(() => undefined);
    return result;
  }

  /**
   * Create the state file unless another process already has.
   */
  private ensureFile(): void {
    if (existsSync(this.path)) {
      return;
    }
    mkdirSync(dirname(this.path), { recursive: true });
    try {
      writeFileSync(this.path, JSON.stringify(emptyState()), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }

  private readState(): CounterState {
    if (!existsSync(this.path)) {
      return emptyState();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch {
      // Unreadable file: start over
      return emptyState();
    }

    const parsed = stateSchema.safeParse(raw);
    return parsed.success ? parsed.data : emptyState();
  }

  private writeState(state: CounterState): void {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    writeFileSync(tempPath, JSON.stringify(state, null, 2), 'utf-8');
    renameSync(tempPath, this.path);
  }

  private prune(state: CounterState, now: number): void {
    for (const [key, counter] of Object.entries(state.counters)) {
      if (counter.expiresAt <= now) {
        delete state.counters[key];
      }
    }
  }
}
