/**
 * A locator string that repairs itself. Each action runs with the current
 * locator; when it fails the healing engine is asked for a replacement, which
 * becomes current before the action is retried.
 *
 * @example
 * ```typescript
 * const submit = new SmartLocator("#old-button", adapter, engine, { contextHint: "Submit button" });
 * await submit.click();
 * submit.wasHealed; // true when the original locator had to be replaced
 * ```
 */

import type { LocatorHealingEngine } from "./engine";
import { healLog, errorMessage } from "./logger";
import { HealError, type FrameworkAdapter, type HealingSource } from "./types";

export interface SmartLocatorOptions {
  contextHint: string;
  /** How many heals to attempt per action */
  maxRetries?: number;
}

export class SmartLocator<E = unknown> {
  readonly originalLocator: string;
  readonly contextHint: string;
  readonly maxRetries: number;
  private current: string;
  private healed = false;
  private lastSource: HealingSource = "none";

  constructor(
    locator: string,
    private readonly adapter: FrameworkAdapter<E>,
    private readonly engine: Pick<LocatorHealingEngine, "heal">,
    opts: SmartLocatorOptions
  ) {
    this.originalLocator = locator;
    this.current = locator;
    this.contextHint = opts.contextHint;
    this.maxRetries = opts.maxRetries ?? 1;
  }

  get currentLocator(): string {
    return this.current;
  }

  get wasHealed(): boolean {
    return this.healed;
  }

  click(): Promise<void> {
    return this.run("click", (loc) => this.adapter.click(loc));
  }

  fill(text: string): Promise<void> {
    return this.run("fill", (loc) => this.adapter.fill(loc, text));
  }

  text(): Promise<string> {
    return this.run("text", (loc) => this.adapter.getText(loc));
  }

  isVisible(): Promise<boolean> {
    return this.run("isVisible", (loc) => this.adapter.isVisible(loc));
  }

  element(): Promise<E> {
    return this.run("element", (loc) => this.adapter.findElement(loc));
  }

  reset(): void {
    this.current = this.originalLocator;
    this.healed = false;
    this.lastSource = "none";
  }

  private async run<T>(action: string, perform: (locator: string) => Promise<T>): Promise<T> {
    let heals = 0;
    for (;;) {
      try {
        return await perform(this.current);
      } catch (err) {
        const fail = (message: string) =>
          new HealError(message, {
            action,
            locator: this.current,
            contextHint: this.contextHint,
            healingSource: this.lastSource,
            healAttempts: heals,
            cause: errorMessage(err),
          });

        if (heals >= this.maxRetries) {
          throw fail(`${action} still failing after ${heals} heal attempt(s)`);
        }
        heals++;

        const result = await this.engine.heal(
          { framework: this.adapter.frameworkName, failedLocator: this.current, contextHint: this.contextHint },
          () => this.adapter.getPageSource()
        );
        this.lastSource = result.source;
        if (!result.healed) {
          throw fail(`could not heal locator for ${action}`);
        }
        healLog.warn(`${this.current} → ${result.locator} (${result.source})`);
        this.current = result.locator;
        this.healed = true;
      }
    }
  }
}
