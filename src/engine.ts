/**
 * LocatorHealingEngine — turns a failed locator into a working one.
 *
 * Strategies run strictly in order and the first one that changes the locator wins:
 *
 *   cache → ai (with retry) → fallback (keyword heuristics) → vision (screenshot diff)
 *
 * When none of them produce a different locator the failed one comes back with
 * source `none`. Errors inside a strategy are logged and count as "no repair";
 * `heal()` itself never rejects. Every call appends exactly one HealingRecord.
 */

import { HealingCache, type CacheStats } from "./cache";
import { suggestFallbackLocator } from "./heuristics";
import type { HealingLog, HealingStats } from "./history";
import { healLog, errorMessage } from "./logger";
import { buildRepairPrompt, type AIRepairClient } from "./repair";
import type { HealingRecord, HealingRequest, HealingResult, HealingSource } from "./types";
import { elapsedMs } from "./utils";
import type { VisualDiffEngine } from "./vision";

export type PageSource = string | (() => Promise<string>);

export type RepairClient = Pick<AIRepairClient, "repair">;
export type VisualFallback = Pick<VisualDiffEngine, "detectAnomalies" | "suggestLocator">;

export interface VisionFallbackOptions {
  engine: VisualFallback;
  baselineScreenshot?: string;
  currentScreenshot?: string;
  threshold?: number;
}

export interface LocatorHealingEngineOptions {
  cache: HealingCache;
  log: HealingLog;
  /** Without a repair client the AI step yields no repair */
  repairClient?: RepairClient;
  vision?: VisionFallbackOptions;
}

interface Outcome {
  locator: string;
  source: HealingSource;
}

export class LocatorHealingEngine {
  private readonly cache: HealingCache;
  private readonly log: HealingLog;
  private readonly repairClient?: RepairClient;
  private readonly vision?: VisionFallbackOptions;
  // per cache key, the tail of the queue of heal() calls for that key
  private readonly inflight = new Map<string, Promise<void>>();

  constructor(opts: LocatorHealingEngineOptions) {
    this.cache = opts.cache;
    this.log = opts.log;
    this.repairClient = opts.repairClient;
    this.vision = opts.vision;
  }

  /**
   * Heal `request.failedLocator`. `pageSource` is only read on a cache miss.
   * Concurrent calls for the same request run one after another so the second
   * one is served from the cache.
   */
  async heal(request: HealingRequest, pageSource: PageSource = ""): Promise<HealingResult> {
    const key = HealingCache.keyFor(request);
    const previous = this.inflight.get(key) ?? Promise.resolve();
    const run = previous.then(() => this.healOnce(request, pageSource));
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.inflight.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.inflight.get(key) === tail) this.inflight.delete(key);
    }
  }

  private async healOnce(request: HealingRequest, pageSource: PageSource): Promise<HealingResult> {
    const timestamp = new Date().toISOString();
    const start = performance.now();
    healLog.healStarted(request.failedLocator, request.contextHint);

    const outcome = await this.runStrategies(request, pageSource);
    const latencyMs = elapsedMs(start);
    const healed = outcome.locator !== request.failedLocator;

    if (healed && outcome.source !== "cache") {
      await this.remember(request, outcome.locator);
    }

    const record: HealingRecord = {
      timestamp,
      framework: request.framework,
      oldLocator: request.failedLocator,
      newLocator: outcome.locator,
      healingSource: outcome.source,
      latencyMs,
      contextHint: request.contextHint,
      success: healed,
    };
    await this.log.append(record);

    if (healed) {
      healLog.healed(outcome.locator, outcome.source, latencyMs);
    } else {
      healLog.healFailed(request.failedLocator);
    }
    return { locator: outcome.locator, source: outcome.source, latencyMs, healed };
  }

  private async runStrategies(request: HealingRequest, pageSource: PageSource): Promise<Outcome> {
    const cached = await this.lookup(request);
    if (cached !== undefined) {
      healLog.cacheHit(cached);
      return { locator: cached, source: "cache" };
    }

    const fromAi = await this.tryAi(request, pageSource);
    if (fromAi) return { locator: fromAi, source: "ai" };

    const fromHeuristics = suggestFallbackLocator(request.contextHint, request.framework);
    if (fromHeuristics && fromHeuristics !== request.failedLocator) {
      return { locator: fromHeuristics, source: "fallback" };
    }

    const fromVision = await this.tryVision(request);
    if (fromVision) return { locator: fromVision, source: "vision" };

    return { locator: request.failedLocator, source: "none" };
  }

  private async lookup(request: HealingRequest): Promise<string | undefined> {
    try {
      return await this.cache.lookup(request);
    } catch (err) {
      healLog.strategyError("cache", errorMessage(err));
      return undefined;
    }
  }

  private async remember(request: HealingRequest, locator: string): Promise<void> {
    try {
      await this.cache.remember(request, locator);
    } catch (err) {
      healLog.strategyError("cache", errorMessage(err));
    }
  }

  private async tryAi(request: HealingRequest, pageSource: PageSource): Promise<string | null> {
    if (!this.repairClient) return null;
    try {
      const html = typeof pageSource === "function" ? await pageSource() : pageSource;
      const prompt = buildRepairPrompt(request.framework, request.failedLocator, request.contextHint, html);
      const locator = await this.repairClient.repair(prompt, request.failedLocator);
      return locator !== request.failedLocator ? locator : null;
    } catch (err) {
      healLog.strategyError("ai", errorMessage(err));
      return null;
    }
  }

  private async tryVision(request: HealingRequest): Promise<string | null> {
    const vision = this.vision;
    if (!vision?.baselineScreenshot || !vision.currentScreenshot) return null;
    try {
      const anomalies = await vision.engine.detectAnomalies(
        vision.baselineScreenshot,
        vision.currentScreenshot,
        vision.threshold ?? 0.85
      );
      const locator = await vision.engine.suggestLocator(anomalies, request.contextHint, request.framework);
      return locator && locator !== request.failedLocator ? locator : null;
    } catch (err) {
      healLog.strategyError("vision", errorMessage(err));
      return null;
    }
  }

  healingStats(): Promise<HealingStats> {
    return this.log.stats();
  }

  cacheStats(): Promise<CacheStats> {
    return this.cache.stats();
  }

  clearCache(): Promise<void> {
    return this.cache.clear();
  }
}
