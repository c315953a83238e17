/**
 * File Counter Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FileCounterStore } from '../../rate-limit/file-counter-store.js';
import { FakeClock } from '../support/fakes.js';

describe('FileCounterStore', () => {
  let dir: string;
  let path: string;
  let clock: FakeClock;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'promptgate-counters-'));
    path = join(dir, 'state', 'counters.json');
    clock = new FakeClock();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return 0 for unknown counters', async () => {
    const store = new FileCounterStore({ path, clock });

    expect(await store.get('missing')).toBe(0);
  });

  it('should increment and persist counters to disk', async () => {
    const store = new FileCounterStore({ path, clock });

    expect(await store.increment('requests', 1, 60)).toBe(1);
    expect(await store.increment('requests', 2, 60)).toBe(3);

    const saved = JSON.parse(readFileSync(path, 'utf-8'));
    expect(saved.counters.requests.value).toBe(3);
  });

  it('should keep the first expiry when incrementing', async () => {
    const store = new FileCounterStore({ path, clock });
    await store.increment('requests', 1, 60);

    clock.advance(30_000);
    await store.increment('requests', 1, 60);
    clock.advance(30_000);

    expect(await store.get('requests')).toBe(0);
  });

  it('should apply concurrent increments without losing any', async () => {
    const store = new FileCounterStore({ path, clock });

    const values = await Promise.all(
      Array.from({ length: 10 }, () => store.increment('requests', 1, 60))
    );

    expect([...values].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(await store.get('requests')).toBe(10);
  });

  it('should share counters between instances on the same file', async () => {
    const first = new FileCounterStore({ path, clock, lockRetries: 10 });
    const second = new FileCounterStore({ path, clock, lockRetries: 10 });

    await Promise.all([
      first.increment('requests', 1, 60),
      second.increment('requests', 1, 60),
      first.increment('requests', 1, 60),
    ]);

    expect(await second.get('requests')).toBe(3);
  });

  it('should keep counters from a state file another process created', async () => {
    mkdirSync(join(dir, 'state'), { recursive: true });
    const expiresAt = clock.now() + 60_000;
    writeFileSync(path, JSON.stringify({ counters: { requests: { value: 4, expiresAt } } }), 'utf-8');
    const store = new FileCounterStore({ path, clock });

    expect(await store.increment('requests', 1, 60)).toBe(5);
    expect(await store.get('requests')).toBe(5);
  });

  it('should replace the state file on each write instead of rewriting it in place', async () => {
    const store = new FileCounterStore({ path, clock });
    await store.increment('requests', 1, 60);
    const before = statSync(path).ino;

    await store.increment('requests', 1, 60);

    expect(statSync(path).ino).not.toBe(before);
    expect(readdirSync(join(dir, 'state')).filter((name) => name.endsWith('.tmp'))).toEqual([]);
  });

  it('should delete counters', async () => {
    const store = new FileCounterStore({ path, clock });
    await store.increment('requests', 5, 60);

    await store.delete('requests');

    expect(await store.get('requests')).toBe(0);
  });

  it('should start over when the file is corrupt', async () => {
    const store = new FileCounterStore({ path, clock });
    await store.increment('requests', 1, 60);
    writeFileSync(path, '{not json', 'utf-8');

    expect(await store.get('requests')).toBe(0);
    expect(await store.increment('requests', 1, 60)).toBe(1);
  });
});
