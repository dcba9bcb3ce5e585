import { describe, it, expect } from 'vitest';
import { suggestFallbackLocator, textLocator } from '../src/heuristics';

describe('suggestFallbackLocator', () => {
  it('maps submit hints per framework', () => {
    expect(suggestFallbackLocator('Submit button', 'playwright')).toBe("button[type='submit']");
    expect(suggestFallbackLocator('Submit button', 'selenium')).toBe("//button[@type='submit']");
  });

  it('is case-insensitive', () => {
    expect(suggestFallbackLocator('SAVE', 'playwright')).toBe("button[type='submit']");
  });

  it('uses table order when several categories match', () => {
    expect(suggestFallbackLocator('Cancel submit', 'playwright')).toBe("button[type='submit']");
  });

  it.each([
    ['Close dialog', "button:has-text('Cancel')", "//button[contains(text(), 'Cancel')]"],
    ['Sign in now', "button:has-text('Login')", "//button[contains(text(), 'Login')]"],
    ['Primary btn', "button:has-text('btn')", "//button[contains(text(), 'btn')]"],
    ['Email field', "input[type='text']", "//input[@type='text']"],
    ['Help link', "a:has-text('link')", "//a[contains(text(), 'link')]"],
    ['Remember me checkbox', "input[type='checkbox']", "//input[@type='checkbox']"],
    ['Gender radio', "input[type='radio']", "//input[@type='radio']"],
  ])('maps %j', (hint, playwright, selenium) => {
    expect(suggestFallbackLocator(hint, 'playwright')).toBe(playwright);
    expect(suggestFallbackLocator(hint, 'selenium')).toBe(selenium);
  });

  it('falls back to the first word of the hint', () => {
    expect(suggestFallbackLocator('Profile avatar', 'playwright')).toBe('text=Profile');
    expect(suggestFallbackLocator('Profile avatar', 'selenium')).toBe("//*[contains(text(), 'Profile')]");
  });

  it('returns null for an empty or blank hint', () => {
    expect(suggestFallbackLocator('', 'playwright')).toBeNull();
    expect(suggestFallbackLocator('   ', 'selenium')).toBeNull();
  });
});

describe('textLocator', () => {
  it('builds the dialect text locator', () => {
    expect(textLocator('playwright', 'Go')).toBe('text=Go');
    expect(textLocator('selenium', 'Go')).toBe("//*[contains(text(), 'Go')]");
  });
});
