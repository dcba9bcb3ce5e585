import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { AIRepairClient, buildRepairPrompt } from '../src/repair';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------- buildRepairPrompt ----------

describe('buildRepairPrompt', () => {
  it('names the framework, the failed locator and the hint', () => {
    const prompt = buildRepairPrompt('selenium', "//div[@id='gone']", 'Login button', '<html></html>');
    expect(prompt).toContain(`The following Selenium locator failed: "//div[@id='gone']".`);
    expect(prompt).toContain('\nLogin button\n');
    expect(prompt).toContain('HTML START:\n<html></html>\nHTML END');
    expect(prompt).toContain('Respond with ONLY the locator string');
  });

  it('keeps only the first 4000 characters of the page', () => {
    const prompt = buildRepairPrompt('playwright', '#x', 'hint', 'a'.repeat(5000));
    expect(prompt).toContain(`HTML START:\n${'a'.repeat(4000)}\nHTML END`);
    expect(prompt).not.toContain('a'.repeat(4001));
  });
});

// ---------- AIRepairClient ----------

describe('AIRepairClient', () => {
  it('returns the sanitised answer', async () => {
    const ask = vi.fn().mockResolvedValue('```css\n#new\n```');
    const client = new AIRepairClient({ provider: { ask }, sleep: vi.fn() });
    expect(await client.repair('prompt', '#old')).toBe('#new');
    expect(ask).toHaveBeenCalledWith('prompt');
  });

  it('retries with exponential backoff', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const ask = vi.fn()
      .mockRejectedValueOnce(new Error('rate limited'))
      .mockRejectedValueOnce(new Error('rate limited'))
      .mockResolvedValue('#third');
    const client = new AIRepairClient({ provider: { ask }, sleep });

    expect(await client.repair('prompt', '#old')).toBe('#third');
    expect(ask).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('returns the failed locator once every attempt failed', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const ask = vi.fn().mockRejectedValue(new Error('down'));
    const client = new AIRepairClient({ provider: { ask }, sleep });

    expect(await client.repair('prompt', '#old')).toBe('#old');
    expect(ask).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('treats an answer with no locator as a failed attempt', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const ask = vi.fn().mockResolvedValueOnce('""').mockResolvedValue('#ok');
    const client = new AIRepairClient({ provider: { ask }, sleep });

    expect(await client.repair('prompt', '#old')).toBe('#ok');
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('honours a per-call attempt limit', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const ask = vi.fn().mockRejectedValue(new Error('down'));
    const client = new AIRepairClient({ provider: { ask }, sleep, baseDelayMs: 10 });

    expect(await client.repair('prompt', '#old', 1)).toBe('#old');
    expect(ask).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
