/**
 * locator-healer - self-healing locators for Playwright pages
 */

import path from "node:path";
import type { Locator, Page } from "playwright-core";
import { z } from "zod";

import { PlaywrightAdapter } from "./adapters/playwright";
import { HealingCache } from "./cache";
import { loadDotenv, resolveConfig, type HealConfig, type HealOptions } from "./config";
import { LocatorHealingEngine } from "./engine";
import { HealingLog } from "./history";
import { AdaptiveInteractor } from "./interactor";
import { healLog } from "./logger";
import { createAIProvider, type AIProvider } from "./providers";
import { AIRepairClient } from "./repair";
import { SmartLocator } from "./smartLocator";
import { JsonFileStore } from "./store";
import { VisionAnalysis, type HealingResult } from "./types";
import { VisualDiffEngine } from "./vision";

export interface HealingDependencies {
  /** Replaces the provider built from the configuration */
  provider?: AIProvider;
}

// One store and one log per file, so every engine in the process sees the same entries
const cacheStores = new Map<string, JsonFileStore<string>>();
const visionStores = new Map<string, JsonFileStore<VisionAnalysis>>();
const healingLogs = new Map<string, HealingLog>();

function sharedCacheStore(file: string): JsonFileStore<string> {
  const key = path.resolve(file);
  let store = cacheStores.get(key);
  if (!store) {
    store = new JsonFileStore(key, z.string());
    cacheStores.set(key, store);
  }
  return store;
}

function sharedVisionStore(cacheDir: string): JsonFileStore<VisionAnalysis> {
  const key = path.resolve(cacheDir, "vision_cache.json");
  let store = visionStores.get(key);
  if (!store) {
    store = new JsonFileStore(key, VisionAnalysis);
    visionStores.set(key, store);
  }
  return store;
}

function sharedHealingLog(file: string): HealingLog {
  const key = path.resolve(file);
  let log = healingLogs.get(key);
  if (!log) {
    log = new HealingLog(key);
    healingLogs.set(key, log);
  }
  return log;
}

/**
 * Build a healing engine from a resolved configuration. The AI step and the
 * vision step only exist when healing (respectively vision) is enabled.
 */
export function createHealingEngine(config: HealConfig, deps: HealingDependencies = {}): LocatorHealingEngine {
  let provider = deps.provider;
  if (!provider && config.enabled) {
    // resolveConfig guarantees a key for every provider that needs one
    provider = createAIProvider(config.provider, { apiKey: config.apiKey ?? "", model: config.model, baseURL: config.host });
  }

  const repairClient = config.enabled && provider
    ? new AIRepairClient({ provider, maxAttempts: config.maxAiAttempts, baseDelayMs: config.retryBaseDelayMs })
    : undefined;

  const vision = config.enabled && config.vision.enabled
    ? {
        engine: new VisualDiffEngine({
          cacheDir: config.visionCacheDir,
          vision: provider,
          store: sharedVisionStore(config.visionCacheDir),
        }),
        baselineScreenshot: config.vision.baselineScreenshot,
        currentScreenshot: config.vision.currentScreenshot,
        threshold: config.vision.threshold,
      }
    : undefined;

  return new LocatorHealingEngine({
    cache: new HealingCache(sharedCacheStore(config.cacheFile)),
    log: sharedHealingLog(config.logFile),
    repairClient,
    vision,
  });
}

export interface HealMethods {
  /** Click `selector`, healing it first when it is not visible. Resolves false when every click method failed. */
  click(selector: string, contextHint: string): Promise<boolean>;
  fill(selector: string, contextHint: string, value: string): Promise<boolean>;
  /** Heal only; the result's `locator` is the selector itself when nothing changed */
  resolve(selector: string, contextHint: string): Promise<HealingResult>;
  locator(selector: string, contextHint: string, maxRetries?: number): SmartLocator<Locator>;
  navigate(url: string): Promise<boolean>;
  setTestName(name: string): void;
  readonly interactor: AdaptiveInteractor;
  readonly engine: LocatorHealingEngine;
  readonly config: HealConfig;
}

export type HealPage = Page & { heal: HealMethods };

const enhanced = new WeakMap<Page, HealPage>();

/**
 * Enhance a Playwright Page with self-healing capabilities.
 *
 * @example
 * ```typescript
 * import { withSelfHealing } from 'locator-healer';
 *
 * const healPage = withSelfHealing(page, { provider: 'anthropic' });
 * await healPage.heal.click('#old-button', 'Submit button');
 * await healPage.heal.fill('#email', 'Email input', 'user@example.com');
 * ```
 */
export function withSelfHealing(page: Page, opts: HealOptions = {}, deps: HealingDependencies = {}): HealPage {
  const existing = enhanced.get(page);
  if (existing) return existing;

  const config = resolveConfig(opts);
  const engine = createHealingEngine(config, deps);
  const adapter = new PlaywrightAdapter(page, config.timeout);
  const interactor = new AdaptiveInteractor(adapter, { timeout: config.timeout });

  let currentTestName: string | undefined;
  let bannerShownForTest: string | undefined;
  let aiDisabledWarningShown = false;

  function showBannerOnce() {
    if (bannerShownForTest !== currentTestName) {
      healLog.banner();
      bannerShownForTest = currentTestName;
    }
  }

  async function resolve(selector: string, contextHint: string): Promise<HealingResult> {
    if (!config.enabled) {
      if (!aiDisabledWarningShown) {
        healLog.aiDisabled();
        aiDisabledWarningShown = true;
      }
      return { locator: selector, source: "none", latencyMs: 0, healed: false };
    }
    showBannerOnce();
    return engine.heal(
      { framework: adapter.frameworkName, failedLocator: selector, contextHint },
      () => adapter.getPageSource()
    );
  }

  async function target(selector: string, contextHint: string): Promise<string> {
    if (await adapter.isVisible(selector)) return selector;
    return (await resolve(selector, contextHint)).locator;
  }

  const heal: HealMethods = {
    click: async (selector, contextHint) =>
      interactor.safeClick(await target(selector, contextHint), contextHint),

    fill: async (selector, contextHint, value) =>
      interactor.safeFill(await target(selector, contextHint), value, contextHint),

    resolve,

    locator: (selector, contextHint, maxRetries) =>
      new SmartLocator(selector, adapter, { heal: (req) => resolve(req.failedLocator, req.contextHint) }, {
        contextHint,
        maxRetries,
      }),

    navigate: (url) => interactor.safeNavigate(url),

    setTestName: (name) => { currentTestName = name; },

    interactor,
    engine,
    config,
  };

  const healPage = Object.assign(page, { heal });
  enhanced.set(page, healPage);
  return healPage;
}

/**
 * Create a Playwright test fixture with healing capabilities.
 *
 * @example
 * ```typescript
 * import { test as base } from '@playwright/test';
 * import { createHealingFixture, HealPage } from 'locator-healer';
 *
 * export const test = base.extend<{ page: HealPage }>(createHealingFixture());
 * ```
 */
export function createHealingFixture(opts?: HealOptions, envFile?: string) {
  loadDotenv(envFile);
  return {
    page: async (
      { page }: { page: Page },
      use: (page: HealPage) => Promise<void>,
      testInfo: { title: string }
    ) => {
      const healPage = withSelfHealing(page, opts);
      healPage.heal.setTestName(testInfo.title);
      await use(healPage);
    },
  };
}

export default withSelfHealing;
