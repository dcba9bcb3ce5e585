/**
 * Functions serialised into the page by `evaluate`. They run in the browser, so
 * they must not close over anything from this module.
 */

import type { InjectedScript } from "./types";

/** Set the value directly and fire the events a framework listens for */
export const injectValue: InjectedScript = ({ selector, value }) => {
  const el = document.querySelector<HTMLInputElement>(selector);
  if (!el) return false;
  el.focus();
  el.value = value;
  el.dispatchEvent(new Event("input", { bubbles: true }));
  el.dispatchEvent(new Event("change", { bubbles: true }));
  el.dispatchEvent(new Event("blur", { bubbles: true }));
  return true;
};

export const injectClick: InjectedScript = ({ selector }) => {
  const el = document.querySelector<HTMLElement>(selector);
  if (!el) return false;
  el.click();
  return true;
};

export const dispatchClick: InjectedScript = ({ selector }) => {
  const el = document.querySelector(selector);
  if (!el) return false;
  el.dispatchEvent(new MouseEvent("click", { view: window, bubbles: true, cancelable: true }));
  return true;
};
