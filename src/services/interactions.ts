import { describeError, LocatorMiss } from '../errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/pacing.js';
import type { BrowserDriver, PageElement } from './browser.js';

/**
 * Small page helpers shared by the session gate, scanner, submitter and
 * verifier. Every browser call made through `step` is bounded by the step
 * timeout.
 */

export function step<T>(work: Promise<T>, timeoutMs: number, name: string): Promise<T> {
  return withTimeout(work, timeoutMs, name);
}

export async function findFirst(driver: BrowserDriver, locator: string): Promise<PageElement | undefined> {
  const [first] = await driver.findElements(locator);
  return first;
}

export async function requireFirst(
  driver: BrowserDriver,
  locator: string,
  stepName: string
): Promise<PageElement> {
  const element = await findFirst(driver, locator);
  if (!element) throw new LocatorMiss(locator, stepName);
  return element;
}

/** Click away cookie banners and modals. Misses are expected and ignored. */
export async function dismissOverlays(
  driver: BrowserDriver,
  locators: readonly string[],
  timeoutMs: number
): Promise<number> {
  let dismissed = 0;
  for (const locator of locators) {
    try {
      const overlay = await step(findFirst(driver, locator), timeoutMs, 'dismiss-overlay');
      if (!overlay) continue;
      await step(driver.click(overlay), timeoutMs, 'dismiss-overlay');
      dismissed += 1;
      logger.debug(`Dismissed overlay: ${locator}`);
    } catch (error) {
      logger.debug(`Overlay ${locator} not dismissed: ${describeError(error)}`);
    }
  }
  return dismissed;
}

/** Type `text` into the first match of `locator` unless it already holds a value. */
export async function fillIfEmpty(
  driver: BrowserDriver,
  locator: string,
  text: string,
  timeoutMs: number,
  stepName: string
): Promise<boolean> {
  if (!text) return false;
  const field = await step(findFirst(driver, locator), timeoutMs, stepName);
  if (!field) return false;
  const current = await step(field.value(), timeoutMs, stepName);
  if (current.trim()) return false;
  await step(driver.type(field, text), timeoutMs, stepName);
  return true;
}

export async function readText(element: PageElement | undefined, timeoutMs: number, stepName: string): Promise<string> {
  if (!element) return '';
  return (await step(element.text(), timeoutMs, stepName)).trim();
}
