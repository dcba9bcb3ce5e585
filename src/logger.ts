/**
 * Console styling and logging for locator-healer
 */

import type { HealingSource, InteractionMethod } from "./types";

// ANSI color codes
export const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  gray: "\x1b[90m",
  red: "\x1b[91m",
  green: "\x1b[92m",
  yellow: "\x1b[93m",
  blue: "\x1b[94m",
  purple: "\x1b[95m",
  cyan: "\x1b[96m",
  white: "\x1b[97m",
  bgPurple: "\x1b[48;5;99m",
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const SOURCE_LABELS: Record<HealingSource, string> = {
  cache: `${c.cyan}◆ cache${c.reset}`,
  ai: `${c.purple}⬡ ai${c.reset}`,
  fallback: `${c.yellow}◇ fallback${c.reset}`,
  vision: `${c.blue}◉ vision${c.reset}`,
  none: `${c.red}✕ none${c.reset}`,
};

export function formatSource(source: HealingSource): string {
  return SOURCE_LABELS[source];
}

export const healLog = {
  banner: () => {
    console.log();
    console.log(`${c.bgPurple}${c.bold}${c.white}  ✦ locator-healer  ${c.reset}`);
  },

  healStarted: (failedLocator: string, contextHint: string) => {
    console.log(`${c.gray}  ┌${"─".repeat(50)}${c.reset}`);
    console.log(`${c.gray}  ├─${c.reset} ${c.yellow}⚡${c.reset} ${c.dim}HEAL${c.reset} ${c.white}${failedLocator}${c.reset} ${c.dim}${contextHint}${c.reset}`);
  },

  cacheHit: (locator: string) => {
    console.log(`${c.gray}  │  ${c.cyan}◆${c.reset} ${c.dim}cached → ${locator}${c.reset}`);
  },

  aiAttemptFailed: (attempt: number, maxAttempts: number, error: string) => {
    console.log(`${c.gray}  │  ${c.red}↳ attempt ${attempt}/${maxAttempts} failed: ${error}${c.reset}`);
  },

  retrying: (delayMs: number) => {
    console.log(`${c.gray}  │  ${c.dim}↳ retrying in ${delayMs}ms${c.reset}`);
  },

  aiExhausted: (maxAttempts: number) => {
    console.log(`${c.gray}  │  ${c.red}↳ no AI repair after ${maxAttempts} attempts${c.reset}`);
  },

  aiResponse: (length: number) => {
    console.log(`${c.gray}  │  ${c.dim}↳ received ${length} chars${c.reset}`);
  },

  strategyError: (strategy: string, error: string) => {
    console.log(`${c.gray}  │  ${c.red}↳ [${strategy}] error: ${error}${c.reset}`);
  },

  healed: (newLocator: string, source: HealingSource, latencyMs: number) => {
    console.log(`${c.gray}  │${c.reset}`);
    console.log(`${c.gray}  └─${c.reset} ${c.green}✓${c.reset} ${c.bold}${c.white}${newLocator}${c.reset} ${formatSource(source)} ${c.dim}${latencyMs}ms${c.reset}`);
    console.log();
  },

  healFailed: (failedLocator: string) => {
    console.log(`${c.gray}  │${c.reset}`);
    console.log(`${c.gray}  └─${c.reset} ${c.red}✕${c.reset} ${c.red}${failedLocator}${c.reset} ${c.dim}no strategy changed the locator${c.reset}`);
    console.log();
  },

  storeFailed: (file: string, operation: "read" | "write", error: string) => {
    console.log(`${c.yellow}⚠ ${operation} failed for ${file}: ${error}${c.reset}`);
  },

  cacheCleared: (what: string) => {
    console.log(`${c.dim}  ↳ ${what} cleared${c.reset}`);
  },

  tierFailed: (action: string, method: InteractionMethod, error: string) => {
    console.log(`${c.gray}  │  ${c.dim}↳ ${action} via ${method} failed: ${error}${c.reset}`);
  },

  tierSucceeded: (action: string, method: InteractionMethod, selector: string, latencyMs: number) => {
    console.log(`${c.gray}  │  ${c.green}↳ ${action} via ${method}${c.reset} ${c.dim}${selector} (${latencyMs}ms)${c.reset}`);
  },

  degraded: (action: string, selector: string) => {
    console.log(`${c.gray}  │  ${c.red}✕ all ${action} methods failed for ${selector}${c.reset}`);
  },

  warn: (message: string) => {
    console.log(`${c.yellow}⚠ ${message}${c.reset}`);
  },

  aiDisabled: () => {
    console.log(`${c.yellow}⚠ Set SELF_HEAL=1 or AI_SELF_HEAL=true with AI_API_KEY to enable AI repair${c.reset}`);
  },
};
