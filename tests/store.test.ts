import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { HealingCache } from '../src/cache';
import { JsonFileStore, MemoryStore } from '../src/store';
import type { HealingRequest } from '../src/types';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'healer-store-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

// ---------- MemoryStore ----------

describe('MemoryStore', () => {
  it('supports the full key-value contract', async () => {
    const store = new MemoryStore<string>({ a: '1' });
    await store.set('b', '2');
    expect(await store.get('a')).toBe('1');
    expect(await store.has('b')).toBe(true);
    expect(await store.keys()).toEqual(['a', 'b']);
    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
    expect(await store.size()).toBe(1);
    await store.clear();
    expect(await store.size()).toBe(0);
  });
});

// ---------- JsonFileStore ----------

describe('JsonFileStore', () => {
  it('persists every mutation and reloads it in a new instance', async () => {
    const file = path.join(dir, 'cache.json');
    const first = new JsonFileStore(file, z.string());
    await first.set('k1', 'v1');
    await first.set('k2', 'v2');
    await first.delete('k1');

    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual({ k2: 'v2' });

    const second = new JsonFileStore(file, z.string());
    expect(await second.get('k2')).toBe('v2');
    expect(await second.has('k1')).toBe(false);
  });

  it('starts empty without a file and does not create one on read', async () => {
    const file = path.join(dir, 'absent.json');
    const store = new JsonFileStore(file, z.string());
    expect(await store.size()).toBe(0);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('replaces a corrupt file with an empty store and warns', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const file = path.join(dir, 'corrupt.json');
    await fs.writeFile(file, '{"k": 42}', 'utf8');

    const store = new JsonFileStore(file, z.string());
    expect(await store.keys()).toEqual([]);
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain(`read failed for ${file}`);

    await store.set('k', 'fixed');
    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual({ k: 'fixed' });
  });

  it('serialises concurrent writes', async () => {
    const file = path.join(dir, 'concurrent.json');
    const store = new JsonFileStore(file, z.string());
    await Promise.all(['a', 'b', 'c', 'd'].map((k) => store.set(k, k.toUpperCase())));
    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual({ a: 'A', b: 'B', c: 'C', d: 'D' });
  });
});

// ---------- HealingCache ----------

describe('HealingCache', () => {
  const request: HealingRequest = { framework: 'playwright', failedLocator: '#old', contextHint: 'Submit' };

  it('builds the key from framework, locator and hint', () => {
    expect(HealingCache.keyFor(request)).toBe('playwright:#old:Submit');
    expect(HealingCache.keyFor({ ...request, framework: 'selenium' })).toBe('selenium:#old:Submit');
  });

  it('remembers healed locators', async () => {
    const cache = new HealingCache(new MemoryStore());
    await cache.remember(request, '#new');
    expect(await cache.lookup(request)).toBe('#new');
    expect(await cache.lookup({ ...request, contextHint: 'submit' })).toBeUndefined();
  });

  it('ignores identity repairs', async () => {
    const cache = new HealingCache(new MemoryStore());
    await cache.remember(request, '#old');
    expect(await cache.lookup(request)).toBeUndefined();
  });

  it('reports size and the first ten keys', async () => {
    const store = new MemoryStore<string>();
    const cache = new HealingCache(store);
    for (let i = 0; i < 12; i++) {
      await cache.remember({ ...request, failedLocator: `#l${i}` }, `#n${i}`);
    }
    const stats = await cache.stats();
    expect(stats.size).toBe(12);
    expect(stats.keys).toHaveLength(10);
    expect(stats.keys[0]).toBe('playwright:#l0:Submit');
  });

  it('clears every entry', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const cache = new HealingCache(new MemoryStore({ 'playwright:#old:Submit': '#new' }));
    await cache.clear();
    expect((await cache.stats()).size).toBe(0);
  });
});
