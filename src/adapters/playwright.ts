/**
 * Playwright binding for the healing core. One object serves both as the
 * FrameworkAdapter (used by SmartLocator and the healing engine) and as the
 * InteractionSurface driven by the AdaptiveInteractor.
 */

import type { Locator, Page } from "playwright-core";
import type { FrameworkAdapter, InjectedScript, InteractionSurface, ScriptArgs } from "../types";

export class PlaywrightAdapter implements FrameworkAdapter<Locator>, InteractionSurface {
  readonly frameworkName = "playwright" as const;

  constructor(
    readonly page: Page,
    private readonly timeout = 5000
  ) {}

  private first(locator: string): Locator {
    return this.page.locator(locator).first();
  }

  async findElement(locator: string): Promise<Locator> {
    const loc = this.first(locator);
    await loc.waitFor({ state: "attached", timeout: this.timeout });
    return loc;
  }

  async click(locator: string, timeout = this.timeout): Promise<void> {
    await this.first(locator).click({ timeout });
  }

  async fill(locator: string, text: string, timeout = this.timeout): Promise<void> {
    await this.first(locator).fill(text, { timeout });
  }

  async getText(locator: string): Promise<string> {
    return this.first(locator).innerText({ timeout: this.timeout });
  }

  async isVisible(locator: string): Promise<boolean> {
    // an unparsable selector matches nothing
    return this.first(locator).isVisible().catch(() => false);
  }

  getPageSource(): Promise<string> {
    return this.page.content();
  }

  evaluate(script: InjectedScript, args: ScriptArgs): Promise<boolean> {
    return this.page.evaluate(script, args);
  }

  async focus(selector: string, timeout: number): Promise<void> {
    await this.first(selector).focus({ timeout });
  }

  async press(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async type(selector: string, text: string, delay: number): Promise<void> {
    await this.first(selector).pressSequentially(text, { delay });
  }

  async goto(url: string, timeout: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "networkidle", timeout });
  }
}
