/**
 * locator-healer - self-healing locators for Playwright and Selenium style suites
 *
 * Repair order: cache → AI → keyword heuristics → screenshot diff.
 * Supports multiple AI providers:
 * - OpenAI (default), Groq and OpenRouter
 * - Anthropic Claude
 * - Google Gemini
 * - Local models through Ollama
 */

export { withSelfHealing, createHealingFixture, createHealingEngine } from './selfHealing';
export type { HealPage, HealMethods, HealingDependencies } from './selfHealing';
export { resolveConfig, loadDotenv } from './config';
export type { HealOptions, HealConfig, VisionConfig } from './config';
export { LocatorHealingEngine } from './engine';
export type { LocatorHealingEngineOptions, PageSource, RepairClient, VisualFallback, VisionFallbackOptions } from './engine';
export { AdaptiveInteractor } from './interactor';
export type { AdaptiveInteractorOptions } from './interactor';
export { SmartLocator } from './smartLocator';
export type { SmartLocatorOptions } from './smartLocator';
export { PlaywrightAdapter } from './adapters/playwright';
export { AIRepairClient, buildRepairPrompt } from './repair';
export { VisualDiffEngine, regionsOf, severityFor } from './vision';
export { HealingCache } from './cache';
export type { CacheStats } from './cache';
export { HealingLog } from './history';
export type { HealingStats } from './history';
export { MemoryStore, JsonFileStore } from './store';
export type { KeyValueStore } from './store';
export { cleanAIResponse } from './sanitize';
export { suggestFallbackLocator } from './heuristics';
export { HealError, ConfigError } from './types';
export type {
  Framework,
  FrameworkAdapter,
  HealingRecord,
  HealingRequest,
  HealingResult,
  HealingSource,
  InteractionLogEntry,
  InteractionMethod,
  InteractionSurface,
  Anomaly,
  Region,
  VisionAnalysis,
  VisualDiffResult,
} from './types';
export { createAIProvider, DEFAULT_MODELS } from './providers';
export type { ProviderName, AIProvider, AIProviderConfig } from './providers';
