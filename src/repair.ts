/**
 * AI locator repair: prompt construction plus a retrying call to a text model.
 */

import { healLog, errorMessage } from "./logger";
import type { TextCapability } from "./providers";
import { cleanAIResponse } from "./sanitize";
import { FRAMEWORK_DISPLAY_NAMES, type Framework } from "./types";
import { sleep as defaultSleep, withRetry, type Sleep } from "./utils";

export const PAGE_SOURCE_LIMIT = 4000;

export function buildRepairPrompt(
  framework: Framework,
  failedLocator: string,
  contextHint: string,
  pageSource: string
): string {
  return [
    "You are an automation test assistant.",
    `The following ${FRAMEWORK_DISPLAY_NAMES[framework]} locator failed: "${failedLocator}".`,
    "The page HTML is below.",
    "",
    contextHint,
    "",
    "HTML START:",
    pageSource.slice(0, PAGE_SOURCE_LIMIT),
    "HTML END",
    "",
    "Suggest ONE working alternative locator (CSS or XPath) that likely matches",
    "the same element. Respond with ONLY the locator string, without any markdown",
    "formatting, backticks, quotes, or explanations.",
  ].join("\n");
}

export interface AIRepairClientOptions {
  provider: TextCapability;
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: Sleep;
}

export class AIRepairClient {
  private readonly provider: TextCapability;
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: Sleep;

  constructor(opts: AIRepairClientOptions) {
    this.provider = opts.provider;
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.baseDelayMs = opts.baseDelayMs ?? 1000;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Ask the model for a replacement locator, retrying with exponential backoff.
   * Resolves to `failedLocator` itself when every attempt failed or came back empty.
   */
  async repair(prompt: string, failedLocator: string, maxAttempts = this.maxAttempts): Promise<string> {
    try {
      return await withRetry(
        async () => {
          const raw = await this.provider.ask(prompt);
          const locator = cleanAIResponse(raw);
          if (!locator) throw new Error("response contained no locator");
          return locator;
        },
        {
          maxAttempts,
          baseDelayMs: this.baseDelayMs,
          sleep: this.sleep,
          onFailure: (err, attempt, delayMs) => {
            healLog.aiAttemptFailed(attempt + 1, maxAttempts, errorMessage(err));
            if (delayMs !== null) healLog.retrying(delayMs);
          },
        }
      );
    } catch {
      healLog.aiExhausted(maxAttempts);
      return failedLocator;
    }
  }
}
