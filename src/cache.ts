/**
 * Permanent memo of healed locators, keyed by framework, failed locator and context hint.
 * Entries are never evicted automatically; `clear()` is the only way out.
 */

import { healLog } from "./logger";
import type { KeyValueStore } from "./store";
import type { HealingRequest } from "./types";

export interface CacheStats {
  size: number;
  keys: string[];
}

export class HealingCache {
  constructor(private readonly store: KeyValueStore<string>) {}

  /**
   * Exact, case-sensitive concatenation; stable across restarts.
   * @example keyFor({ framework: "playwright", failedLocator: "#old", contextHint: "Submit" }) // "playwright:#old:Submit"
   */
  static keyFor(request: HealingRequest): string {
    return `${request.framework}:${request.failedLocator}:${request.contextHint}`;
  }

  lookup(request: HealingRequest): Promise<string | undefined> {
    return this.store.get(HealingCache.keyFor(request));
  }

  /** Identity repairs are not worth remembering and are ignored. */
  async remember(request: HealingRequest, locator: string): Promise<void> {
    if (locator === request.failedLocator) return;
    await this.store.set(HealingCache.keyFor(request), locator);
  }

  async clear(): Promise<void> {
    await this.store.clear();
    healLog.cacheCleared("healing cache");
  }

  async stats(): Promise<CacheStats> {
    const keys = await this.store.keys();
    return { size: keys.length, keys: keys.slice(0, 10) };
  }
}
