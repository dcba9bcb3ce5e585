/**
 * Configuration: explicit options merged over environment variables, validated with zod.
 * The environment is only read here; everything downstream receives plain values.
 */

import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { healLog } from "./logger";
import { normalizeProviderName, requiresApiKey, resolveProviderName, type ProviderName } from "./providers";
import { ConfigError } from "./types";

const VisionOptions = z
  .object({
    enabled: z.boolean(),
    baselineScreenshot: z.string().min(1),
    currentScreenshot: z.string().min(1),
    threshold: z.number().min(0).max(1),
  })
  .partial()
  .strict();

export const HealOptions = z
  .object({
    enabled: z.boolean(),
    provider: z.string(),
    apiKey: z.string(),
    model: z.string(),
    /** Ollama host, or the base URL of an OpenAI-compatible endpoint */
    host: z.string().url(),
    cacheFile: z.string().min(1),
    logFile: z.string().min(1),
    visionCacheDir: z.string().min(1),
    maxAiAttempts: z.number().int().min(1).max(10),
    retryBaseDelayMs: z.number().int().nonnegative(),
    timeout: z.number().int().positive(),
    vision: VisionOptions,
  })
  .partial()
  .strict();
export type HealOptions = z.input<typeof HealOptions>;

export interface VisionConfig {
  enabled: boolean;
  baselineScreenshot?: string;
  currentScreenshot?: string;
  threshold: number;
}

export interface HealConfig {
  enabled: boolean;
  provider: ProviderName;
  apiKey?: string;
  model?: string;
  host?: string;
  cacheFile: string;
  logFile: string;
  visionCacheDir: string;
  maxAiAttempts: number;
  retryBaseDelayMs: number;
  timeout: number;
  vision: VisionConfig;
}

export type Env = Record<string, string | undefined>;

function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`).join("; ");
}

function numberFromEnv(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) throw new ConfigError(`${name} must be a number, got "${raw}"`);
  return value;
}

/**
 * Resolve the effective configuration. Throws ConfigError for invalid options,
 * an unknown provider, or a remote provider enabled without an API key.
 *
 * @example
 * ```typescript
 * resolveConfig({ provider: "claude", apiKey: "test-secret", enabled: true });
 * ```
 */
export function resolveConfig(options: HealOptions = {}, env: Env = process.env, cwd = process.cwd()): HealConfig {
  const parsed = HealOptions.safeParse(options);
  if (!parsed.success) throw new ConfigError(`Invalid heal options: ${issuesOf(parsed.error)}`);
  const opts = parsed.data;

  const selfHealDir = path.join(cwd, ".self-heal");
  const enabled = opts.enabled ?? (env.SELF_HEAL === "1" || env.AI_SELF_HEAL === "true");
  const provider = resolveProviderName(opts.provider ?? env.AI_PROVIDER ?? "openai");
  const apiKey = opts.apiKey ?? (env.AI_API_KEY || undefined);

  if (enabled && requiresApiKey(provider) && !apiKey) {
    throw new ConfigError(`AI_API_KEY (or the apiKey option) is required for provider "${provider}"`);
  }

  const threshold = opts.vision?.threshold ?? numberFromEnv("SELF_HEAL_VISION_THRESHOLD", env.SELF_HEAL_VISION_THRESHOLD) ?? 0.85;
  const vision = VisionOptions.required({ threshold: true }).safeParse({
    enabled: opts.vision?.enabled ?? env.SELF_HEAL_VISION === "1",
    baselineScreenshot: opts.vision?.baselineScreenshot ?? (env.SELF_HEAL_BASELINE || undefined),
    currentScreenshot: opts.vision?.currentScreenshot ?? (env.SELF_HEAL_CURRENT || undefined),
    threshold,
  });
  if (!vision.success) throw new ConfigError(`Invalid vision options: ${issuesOf(vision.error)}`);

  // OLLAMA_HOST only applies to the local provider; other endpoints need the explicit host option
  const envHost = normalizeProviderName(provider) === "local" ? env.OLLAMA_HOST || undefined : undefined;
  const host = opts.host ?? envHost;
  if (host !== undefined && !z.string().url().safeParse(host).success) {
    throw new ConfigError(`OLLAMA_HOST must be a URL, got "${host}"`);
  }

  return {
    enabled,
    provider,
    apiKey,
    model: opts.model ?? (env.AI_MODEL || undefined),
    host,
    cacheFile: opts.cacheFile ?? path.join(selfHealDir, "healing_cache.json"),
    logFile: opts.logFile ?? path.join(selfHealDir, "healing_log.json"),
    visionCacheDir: opts.visionCacheDir ?? path.join(selfHealDir, "vision"),
    maxAiAttempts: opts.maxAiAttempts ?? 3,
    retryBaseDelayMs: opts.retryBaseDelayMs ?? 1000,
    timeout: opts.timeout ?? 5000,
    vision: { ...vision.data, enabled: vision.data.enabled ?? false },
  };
}

/** Load a `.env` file into `process.env`. A missing file is not an error. */
export function loadDotenv(file = ".env"): void {
  const result = dotenv.config({ path: file });
  if (result.error && !("code" in result.error && result.error.code === "ENOENT")) {
    healLog.warn(`could not load ${file}: ${result.error.message}`);
  }
}
