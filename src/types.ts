/**
 * Type definitions and Zod schemas for locator-healer
 */

import { z } from "zod";

// Closed set of supported automation frameworks. Keep every switch over it exhaustive.
export const Framework = z.enum(["playwright", "selenium"]);
export type Framework = z.infer<typeof Framework>;

export const FRAMEWORK_DISPLAY_NAMES: Record<Framework, string> = {
  playwright: "Playwright",
  selenium: "Selenium",
};

export const HealingSource = z.enum(["cache", "ai", "fallback", "vision", "none"]);
export type HealingSource = z.infer<typeof HealingSource>;

export const Severity = z.enum(["low", "medium", "high", "critical"]);
export type Severity = z.infer<typeof Severity>;

export type InteractionMethod = "direct" | "js_inject" | "human_typing" | "degraded";

export interface HealingRequest {
  readonly framework: Framework;
  readonly failedLocator: string;
  readonly contextHint: string;
}

export interface HealingResult {
  locator: string;
  source: HealingSource;
  latencyMs: number;
  /** false when every strategy was exhausted and `locator` is the failed one */
  healed: boolean;
}

// Persisted documents
export const HealingRecord = z.object({
  timestamp: z.string(),
  framework: Framework,
  oldLocator: z.string(),
  newLocator: z.string(),
  healingSource: HealingSource,
  latencyMs: z.number().nonnegative(),
  contextHint: z.string(),
  success: z.boolean(),
});
export type HealingRecord = z.infer<typeof HealingRecord>;

export const VisionAnalysis = z.object({
  description: z.string(),
  elementsAffected: z.array(z.string()),
  suggestedAction: z.enum(["update_locator", "no_action_needed", "manual_review"]),
  confidence: z.number(),
  timestamp: z.string(),
  prompt: z.string(),
  imagePath: z.string(),
  error: z.string().optional(),
});
export type VisionAnalysis = z.infer<typeof VisionAnalysis>;

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
  severity: Severity;
}

export interface VisualDiffResult {
  similarity: number;
  diffPixelCount: number;
  diffPercentage: number;
  changedRegions: Region[];
  diffMapPath?: string;
  baselineSize: { width: number; height: number };
  currentSize: { width: number; height: number };
  timestamp: string;
}

export interface Anomaly {
  region: Region;
  severity: Severity;
  description: string;
  confidence: number;
  diffMapPath?: string;
  timestamp: string;
}

export interface InteractionLogEntry {
  method: InteractionMethod;
  latencyMs: number;
  selector: string;
  context: string;
  timestamp: string;
  failed: boolean;
}

/**
 * Minimal capability a browser-automation library must expose for healing.
 * `E` is the library's element handle type.
 */
export interface FrameworkAdapter<E = unknown> {
  readonly frameworkName: Framework;
  findElement(locator: string): Promise<E>;
  click(locator: string): Promise<void>;
  fill(locator: string, text: string): Promise<void>;
  getText(locator: string): Promise<string>;
  isVisible(locator: string): Promise<boolean>;
  getPageSource(): Promise<string>;
}

/** Arguments handed to scripts injected into the page */
export interface ScriptArgs {
  selector: string;
  value: string;
}

export type InjectedScript = (args: ScriptArgs) => boolean;

/** Low-level primitives the adaptive interactor drives, each bounded by a timeout */
export interface InteractionSurface {
  fill(selector: string, value: string, timeout: number): Promise<void>;
  click(selector: string, timeout: number): Promise<void>;
  evaluate(script: InjectedScript, args: ScriptArgs): Promise<boolean>;
  focus(selector: string, timeout: number): Promise<void>;
  press(key: string): Promise<void>;
  type(selector: string, text: string, delay: number): Promise<void>;
  goto(url: string, timeout: number): Promise<void>;
}

// Errors
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface HealErrorContext {
  action: string;
  locator: string;
  contextHint: string;
  healingSource: HealingSource;
  healAttempts: number;
  cause?: string;
}

export class HealError extends Error {
  public readonly context: HealErrorContext;

  constructor(message: string, context: HealErrorContext) {
    super(HealError.formatMessage(message, context));
    this.name = "HealError";
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HealError);
    }
  }

  static formatMessage(message: string, ctx: HealErrorContext): string {
    const lines = [
      ``,
      `  ✕ ${message}`,
      ``,
      `     • Action: ${ctx.action.toUpperCase()}`,
      `     • Locator: ${ctx.locator}`,
      `     • Looking for: "${ctx.contextHint}"`,
      `     • Healing source: ${ctx.healingSource}`,
      `     • Heal attempts: ${ctx.healAttempts}`,
    ];
    if (ctx.cause) {
      lines.push(`     • Last error: ${ctx.cause}`);
    }
    return lines.join("\n");
  }
}
