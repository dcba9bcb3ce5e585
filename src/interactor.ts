/**
 * AdaptiveInteractor — performs a fill or click even when the page resists
 * automation, by falling through progressively less direct methods:
 *
 *   direct → js_inject → human_typing → degraded
 *
 * Click has one more step before giving up: a synthetic MouseEvent dispatch
 * (logged as js_inject). Nothing here throws; the boolean result and the
 * interaction log tell the caller what happened.
 */

import { healLog, errorMessage } from "./logger";
import { dispatchClick, injectClick, injectValue } from "./scripts";
import type { InteractionLogEntry, InteractionMethod, InteractionSurface } from "./types";
import { elapsedMs } from "./utils";

export interface AdaptiveInteractorOptions {
  /** Per-method timeout in ms */
  timeout?: number;
  /** Source of randomness for the typing cadence */
  random?: () => number;
}

type Attempt = () => Promise<boolean>;

const SELECT_ALL = "ControlOrMeta+A";

export class AdaptiveInteractor {
  readonly timeout: number;
  private readonly random: () => number;
  private entries: InteractionLogEntry[] = [];

  constructor(
    private readonly surface: InteractionSurface,
    opts: AdaptiveInteractorOptions = {}
  ) {
    this.timeout = opts.timeout ?? 5000;
    this.random = opts.random ?? Math.random;
  }

  /** Randomised per-character delay between 45 and 80 ms */
  typingDelay(): number {
    return 45 + Math.floor(this.random() * 36);
  }

  async safeFill(selector: string, value: string, context = ""): Promise<boolean> {
    return this.runTiers("fill", selector, context, [
      ["direct", async () => {
        await this.surface.fill(selector, value, this.timeout);
        return true;
      }],
      ["js_inject", () => this.surface.evaluate(injectValue, { selector, value })],
      ["human_typing", async () => {
        await this.surface.focus(selector, this.timeout);
        await this.clearField();
        for (const ch of value) {
          await this.surface.type(selector, ch, this.typingDelay());
        }
        return true;
      }],
    ]);
  }

  async safeClick(selector: string, context = ""): Promise<boolean> {
    return this.runTiers("click", selector, context, [
      ["direct", async () => {
        await this.surface.click(selector, this.timeout);
        return true;
      }],
      ["js_inject", () => this.surface.evaluate(injectClick, { selector, value: "" })],
      ["human_typing", async () => {
        await this.surface.focus(selector, this.timeout);
        await this.surface.press("Enter");
        return true;
      }],
      ["js_inject", () => this.surface.evaluate(dispatchClick, { selector, value: "" })],
    ]);
  }

  async safeNavigate(url: string): Promise<boolean> {
    return this.runTiers("navigate", url, "navigation", [
      ["direct", async () => {
        await this.surface.goto(url, this.timeout);
        return true;
      }],
    ]);
  }

  private async clearField(): Promise<void> {
    try {
      await this.surface.press(SELECT_ALL);
      await this.surface.press("Backspace");
    } catch (err) {
      // typing still overwrites a selection left behind
      healLog.tierFailed("clear", "human_typing", errorMessage(err));
    }
  }

  private async runTiers(
    action: string,
    selector: string,
    context: string,
    tiers: Array<[InteractionMethod, Attempt]>
  ): Promise<boolean> {
    const start = performance.now();
    for (const [method, attempt] of tiers) {
      try {
        if (await attempt()) {
          const latencyMs = this.record(method, start, selector, context, false);
          healLog.tierSucceeded(action, method, selector, latencyMs);
          return true;
        }
        healLog.tierFailed(action, method, "element not found");
      } catch (err) {
        healLog.tierFailed(action, method, errorMessage(err));
      }
    }
    healLog.degraded(action, selector);
    this.record("degraded", start, selector, context, true);
    return false;
  }

  private record(method: InteractionMethod, start: number, selector: string, context: string, failed: boolean): number {
    const latencyMs = elapsedMs(start);
    this.entries.push({ method, latencyMs, selector, context, timestamp: new Date().toISOString(), failed });
    return latencyMs;
  }

  stats(): Record<InteractionMethod, number> {
    const counts: Record<InteractionMethod, number> = { direct: 0, js_inject: 0, human_typing: 0, degraded: 0 };
    for (const entry of this.entries) counts[entry.method]++;
    return counts;
  }

  log(): InteractionLogEntry[] {
    return [...this.entries];
  }

  clearLog(): void {
    this.entries = [];
  }
}
