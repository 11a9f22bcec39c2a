/**
 * Functions evaluated inside the page via `page.evaluate(fn, arg)`.
 *
 * They must stay self-contained: Playwright serializes the function source,
 * so nothing outside the function body is reachable at run time.
 */

/**
 * Set an input's value directly and dispatch the events reactive frameworks
 * listen for. Returns false when the selector matches nothing.
 */
export function injectValue(arg: { selector: string; value: string }): boolean {
  const el = document.querySelector(arg.selector);
  if (!el) return false;

  if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
    // React tracks the last value it saw through the prototype setter
    const proto = el instanceof HTMLInputElement ? HTMLInputElement.prototype : HTMLTextAreaElement.prototype;
    const setter = Object.getOwnPropertyDescriptor(proto, 'value')?.set;
    if (setter) {
      setter.call(el, arg.value);
    } else {
      el.value = arg.value;
    }
  } else if (el instanceof HTMLElement && el.isContentEditable) {
    el.textContent = arg.value;
  } else {
    return false;
  }

  el.dispatchEvent(new Event('input', { bubbles: true }));
  el.dispatchEvent(new Event('change', { bubbles: true }));
  return true;
}

/**
 * Call `click()` on the first element matching the selector.
 */
export function clickElement(arg: { selector: string }): boolean {
  const el = document.querySelector(arg.selector);
  if (!(el instanceof HTMLElement)) return false;
  el.click();
  return true;
}

/**
 * Move focus to the document body so a paste lands on document-level handlers.
 */
export function focusBody(): void {
  if (document.activeElement instanceof HTMLElement) {
    document.activeElement.blur();
  }
  document.body.focus();
}

/**
 * Put text on the clipboard. Requires clipboard permissions on the context.
 */
export async function writeClipboard(text: string): Promise<void> {
  await navigator.clipboard.writeText(text);
}

/**
 * OTP success probe: true when one input holds the full code, or when a
 * contiguous run of single-character inputs (split-digit widgets) spells it.
 */
export function inputsHoldCode(arg: { code: string }): boolean {
  const values = Array.from(document.querySelectorAll('input')).map((el) => el.value);
  if (values.some((value) => value === arg.code)) return true;

  const length = arg.code.length;
  if (length < 2) return false;

  for (let start = 0; start + length <= values.length; start++) {
    const run = values.slice(start, start + length);
    if (run.every((value) => value.length === 1) && run.join('') === arg.code) {
      return true;
    }
  }
  return false;
}

/**
 * Script click on an element handed over by `locator.evaluate`.
 */
export function clickSelf(el: Element): void {
  if (el instanceof HTMLElement) {
    el.click();
  }
}
