/**
 * Keyword based locator guesses, used when AI repair produced nothing.
 * Deterministic and side-effect free.
 */

import type { Framework } from "./types";

type Category = "submit" | "cancel" | "login" | "button" | "input" | "link" | "checkbox" | "radio";

// Order is significant: the first category with any matching keyword wins.
const KEYWORDS: ReadonlyArray<readonly [Category, readonly string[]]> = [
  ["submit", ["submit", "send", "save"]],
  ["cancel", ["cancel", "close", "dismiss"]],
  ["login", ["login", "sign in", "log in"]],
  ["button", ["button", "btn"]],
  ["input", ["input", "field", "textbox"]],
  ["link", ["link", "anchor"]],
  ["checkbox", ["checkbox", "check"]],
  ["radio", ["radio"]],
];

function playwrightTemplate(category: Category, keyword: string): string {
  switch (category) {
    case "submit": return "button[type='submit']";
    case "cancel": return "button:has-text('Cancel')";
    case "login": return "button:has-text('Login')";
    case "button": return `button:has-text('${keyword}')`;
    case "input": return "input[type='text']";
    case "link": return `a:has-text('${keyword}')`;
    case "checkbox": return "input[type='checkbox']";
    case "radio": return "input[type='radio']";
  }
}

function seleniumTemplate(category: Category, keyword: string): string {
  switch (category) {
    case "submit": return "//button[@type='submit']";
    case "cancel": return "//button[contains(text(), 'Cancel')]";
    case "login": return "//button[contains(text(), 'Login')]";
    case "button": return `//button[contains(text(), '${keyword}')]`;
    case "input": return "//input[@type='text']";
    case "link": return `//a[contains(text(), '${keyword}')]`;
    case "checkbox": return "//input[@type='checkbox']";
    case "radio": return "//input[@type='radio']";
  }
}

function templateFor(framework: Framework, category: Category, keyword: string): string {
  switch (framework) {
    case "playwright": return playwrightTemplate(category, keyword);
    case "selenium": return seleniumTemplate(category, keyword);
  }
}

/** Text locator in the framework's dialect */
export function textLocator(framework: Framework, text: string): string {
  switch (framework) {
    case "playwright": return `text=${text}`;
    case "selenium": return `//*[contains(text(), '${text}')]`;
  }
}

export function suggestFallbackLocator(contextHint: string, framework: Framework): string | null {
  if (!contextHint) return null;

  const hint = contextHint.toLowerCase();
  for (const [category, keywords] of KEYWORDS) {
    const keyword = keywords.find((k) => hint.includes(k));
    if (keyword) return templateFor(framework, category, keyword);
  }

  const firstWord = contextHint.split(/\s+/).find((w) => w.length > 0);
  return firstWord ? textLocator(framework, firstWord) : null;
}
