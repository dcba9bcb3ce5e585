/**
 * Key-value persistence used by the healing and vision caches.
 *
 * JsonFileStore keeps the whole map in memory, loads it lazily on first use and
 * rewrites the file atomically after every mutation. Writes from one process are
 * queued so they never overlap. There is no cross-process locking: parallel test
 * workers sharing a file can lose each other's updates.
 */

import { z, type ZodType, type ZodTypeDef } from "zod";
import { healLog, errorMessage } from "./logger";
import { readJson, writeAtomic } from "./utils";

export interface KeyValueStore<T> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T): Promise<void>;
  has(key: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  keys(): Promise<string[]>;
  size(): Promise<number>;
  /** Persist pending state; resolves once every queued write has settled */
  flush(): Promise<void>;
}

export class MemoryStore<T> implements KeyValueStore<T> {
  private readonly data = new Map<string, T>();

  constructor(initial?: Record<string, T>) {
    for (const [k, v] of Object.entries(initial ?? {})) this.data.set(k, v);
  }

  async get(key: string) { return this.data.get(key); }
  async set(key: string, value: T) { this.data.set(key, value); }
  async has(key: string) { return this.data.has(key); }
  async delete(key: string) { return this.data.delete(key); }
  async clear() { this.data.clear(); }
  async keys() { return [...this.data.keys()]; }
  async size() { return this.data.size; }
  async flush() {}
}

export class JsonFileStore<T> implements KeyValueStore<T> {
  private data = new Map<string, T>();
  private loading: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();
  private readonly schema: ZodType<Record<string, T>, ZodTypeDef, unknown>;

  constructor(
    readonly file: string,
    valueSchema: ZodType<T, ZodTypeDef, unknown>,
  ) {
    this.schema = z.record(z.string(), valueSchema);
  }

  private ensureLoaded(): Promise<void> {
    this.loading ??= this.load();
    return this.loading;
  }

  private async load(): Promise<void> {
    const result = await readJson(this.file, this.schema);
    switch (result.status) {
      case "ok":
        this.data = new Map(Object.entries(result.value));
        return;
      case "missing":
        return;
      case "invalid":
        // a corrupt cache costs memoization for this run, nothing more
        healLog.storeFailed(this.file, "read", `${result.error}; starting empty`);
        return;
    }
  }

  private persist(): Promise<void> {
    const snapshot = Object.fromEntries(this.data);
    this.writes = this.writes.then(() =>
      writeAtomic(this.file, snapshot).catch((err: unknown) => {
        healLog.storeFailed(this.file, "write", errorMessage(err));
      }),
    );
    return this.writes;
  }

  async get(key: string): Promise<T | undefined> {
    await this.ensureLoaded();
    return this.data.get(key);
  }

  async set(key: string, value: T): Promise<void> {
    await this.ensureLoaded();
    this.data.set(key, value);
    await this.persist();
  }

  async has(key: string): Promise<boolean> {
    await this.ensureLoaded();
    return this.data.has(key);
  }

  async delete(key: string): Promise<boolean> {
    await this.ensureLoaded();
    const existed = this.data.delete(key);
    if (existed) await this.persist();
    return existed;
  }

  async clear(): Promise<void> {
    await this.ensureLoaded();
    this.data.clear();
    await this.persist();
  }

  async keys(): Promise<string[]> {
    await this.ensureLoaded();
    return [...this.data.keys()];
  }

  async size(): Promise<number> {
    await this.ensureLoaded();
    return this.data.size;
  }

  async flush(): Promise<void> {
    await this.ensureLoaded();
    await this.persist();
  }
}
