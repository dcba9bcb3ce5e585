import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { PageSource } from '../src/engine';
import { SmartLocator } from '../src/smartLocator';
import { HealError, type FrameworkAdapter, type HealingRequest, type HealingResult } from '../src/types';

class FakeAdapter implements FrameworkAdapter<string> {
  readonly frameworkName = 'playwright' as const;
  readonly clicks: string[] = [];
  readonly fills: Array<[string, string]> = [];

  constructor(private readonly working: Set<string>) {}

  private check(locator: string) {
    if (!this.working.has(locator)) throw new Error(`no element for ${locator}`);
  }

  async findElement(locator: string) {
    this.check(locator);
    return `element:${locator}`;
  }
  async click(locator: string) {
    this.check(locator);
    this.clicks.push(locator);
  }
  async fill(locator: string, text: string) {
    this.check(locator);
    this.fills.push([locator, text]);
  }
  async getText(locator: string) {
    this.check(locator);
    return 'Submit';
  }
  async isVisible(locator: string) {
    return this.working.has(locator);
  }
  async getPageSource() {
    return '<button id="new">Submit</button>';
  }
}

function engineReturning(locator: string | null) {
  return {
    heal: vi.fn(async (request: HealingRequest, _pageSource?: PageSource): Promise<HealingResult> => ({
      locator: locator ?? request.failedLocator,
      source: locator ? 'ai' : 'none',
      latencyMs: 1,
      healed: locator !== null,
    })),
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('SmartLocator', () => {
  it('acts directly while the locator works', async () => {
    const adapter = new FakeAdapter(new Set(['#ok']));
    const engine = engineReturning('#other');
    const loc = new SmartLocator('#ok', adapter, engine, { contextHint: 'Submit button' });

    await loc.click();
    expect(adapter.clicks).toEqual(['#ok']);
    expect(engine.heal).not.toHaveBeenCalled();
    expect(loc.wasHealed).toBe(false);
  });

  it('heals a failing locator and retries', async () => {
    const adapter = new FakeAdapter(new Set(['#new']));
    const engine = engineReturning('#new');
    const loc = new SmartLocator('#old', adapter, engine, { contextHint: 'Submit button' });

    await loc.fill('hello');

    expect(adapter.fills).toEqual([['#new', 'hello']]);
    expect(engine.heal).toHaveBeenCalledWith(
      { framework: 'playwright', failedLocator: '#old', contextHint: 'Submit button' },
      expect.any(Function)
    );
    expect(loc.currentLocator).toBe('#new');
    expect(loc.wasHealed).toBe(true);

    expect(await loc.text()).toBe('Submit');
    expect(await loc.element()).toBe('element:#new');
    expect(engine.heal).toHaveBeenCalledTimes(1);
  });

  it('passes the page source lazily', async () => {
    const adapter = new FakeAdapter(new Set(['#new']));
    const engine = engineReturning('#new');
    await new SmartLocator('#old', adapter, engine, { contextHint: 'Submit' }).click();

    const [, pageSource] = engine.heal.mock.calls[0];
    expect(typeof pageSource === 'function' ? await pageSource() : pageSource).toBe('<button id="new">Submit</button>');
  });

  it('throws a HealError when healing changes nothing', async () => {
    const adapter = new FakeAdapter(new Set());
    const loc = new SmartLocator('#old', adapter, engineReturning(null), { contextHint: 'Submit' });

    const error = await loc.click().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(HealError);
    if (error instanceof HealError) {
      expect(error.context).toEqual({
        action: 'click',
        locator: '#old',
        contextHint: 'Submit',
        healingSource: 'none',
        healAttempts: 1,
        cause: 'no element for #old',
      });
      expect(error.message).toContain('✕ could not heal locator for click');
    }
  });

  it('gives up after maxRetries heals', async () => {
    const adapter = new FakeAdapter(new Set());
    const engine = engineReturning('#still-broken');
    const loc = new SmartLocator('#old', adapter, engine, { contextHint: 'Submit', maxRetries: 1 });

    await expect(loc.click()).rejects.toThrow('click still failing after 1 heal attempt(s)');
    expect(engine.heal).toHaveBeenCalledTimes(1);
    expect(loc.currentLocator).toBe('#still-broken');
  });

  it('resets to the original locator', async () => {
    const adapter = new FakeAdapter(new Set(['#new']));
    const loc = new SmartLocator('#old', adapter, engineReturning('#new'), { contextHint: 'Submit' });
    await loc.click();

    loc.reset();
    expect(loc.currentLocator).toBe('#old');
    expect(loc.wasHealed).toBe(false);
  });

  it('reports visibility without healing', async () => {
    const adapter = new FakeAdapter(new Set());
    const engine = engineReturning('#new');
    const loc = new SmartLocator('#old', adapter, engine, { contextHint: 'Submit' });

    expect(await loc.isVisible()).toBe(false);
    expect(engine.heal).not.toHaveBeenCalled();
  });
});
