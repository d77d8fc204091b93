import { describeError, VerificationFault } from '../errors.js';
import type { DeepReadonly, SiteProfile } from '../types/index.js';
import { firstMatch, hit, miss, type Strategy } from '../utils/strategies.js';
import { logger } from '../utils/logger.js';
import type { BrowserDriver } from './browser.js';
import { readText, step } from './interactions.js';

export interface VerificationTarget {
  jobTitle: string;
  reference: string;
  /** Result page to fall back to when the history page is unavailable. */
  listingUrl: string;
}

export interface VerifierOptions {
  site: DeepReadonly<SiteProfile>;
  stepTimeoutMs: number;
  now?: () => Date;
}

/**
 * Spellings of a title to look for on pages that render it differently:
 * the lowercase title, the same without whitespace, and the part before
 * " - " or " (" (which sites often drop). Never empty; first occurrence wins.
 */
export function titleVariants(title: string): string[] {
  const lower = title.toLowerCase();
  const beforeDash = lower.split(' - ')[0] ?? lower;
  const beforeParen = lower.split(' (')[0] ?? lower;
  const candidates = [lower, lower.replace(/\s+/g, ''), beforeDash, beforeParen];
  return [...new Set(candidates)];
}

export function findVariant(text: string, variants: readonly string[]): string | undefined {
  return variants.find((variant) => variant.length > 0 && text.includes(variant));
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function dateStamps(date: Date): [string, string] {
  const day = pad(date.getDate());
  const month = pad(date.getMonth() + 1);
  const year = String(date.getFullYear());
  return [`${day}/${month}/${year}`, `${year}-${month}-${day}`];
}

function historyStrategy(
  driver: BrowserDriver,
  variants: readonly string[],
  options: VerifierOptions
): Strategy<string> {
  return {
    name: 'history',
    attempt: async () => {
      await step(driver.navigate(options.site.historyUrl), options.stepTimeoutMs, 'verify');
      const text = (await step(driver.pageText(), options.stepTimeoutMs, 'verify')).toLowerCase();
      if (text.includes(options.site.markers.accessRestricted.toLowerCase())) {
        return miss('restricted');
      }
      const found = findVariant(text, variants);
      return found ? hit(found) : miss('title not in application history');
    },
  };
}

// A row counts only if it shows the title, the applied marker and either the
// job reference or today's date.
function listingStrategy(
  driver: BrowserDriver,
  target: VerificationTarget,
  variants: readonly string[],
  options: VerifierOptions
): Strategy<string> {
  return {
    name: 'listing',
    attempt: async () => {
      const timeoutMs = options.stepTimeoutMs;
      await step(driver.navigate(target.listingUrl), timeoutMs, 'verify');
      const rows = await step(driver.findElements(options.site.locators.resultRow), timeoutMs, 'verify');

      const applied = options.site.markers.applied.toLowerCase();
      const reference = target.reference.trim().toLowerCase();
      const stamps = dateStamps(options.now?.() ?? new Date());

      for (const row of rows) {
        const text = (await readText(row, timeoutMs, 'verify')).toLowerCase();
        const found = findVariant(text, variants);
        if (!found || !text.includes(applied)) continue;
        const corroborated =
          (reference.length > 0 && text.includes(reference)) || stamps.some((stamp) => text.includes(stamp));
        if (corroborated) return hit(found);
      }
      return miss('no applied row for title');
    },
  };
}

/**
 * Look for evidence that an application went through. Tries the application
 * history first, then the listing page. Resolves `false` on any failure.
 */
export async function verifyApplication(
  driver: BrowserDriver,
  target: VerificationTarget,
  options: VerifierOptions
): Promise<boolean> {
  try {
    const variants = titleVariants(target.jobTitle);
    const result = await firstMatch(
      [historyStrategy(driver, variants, options), listingStrategy(driver, target, variants, options)],
      {
        onMiss: (strategy, reason, error) => {
          if (error !== undefined) {
            const fault = new VerificationFault(`${strategy} check failed: ${reason}`, { cause: error });
            logger.warn(`[${fault.step}] ${target.jobTitle}: ${fault.message}`);
          } else {
            logger.debug(`Verification via ${strategy} missed: ${reason}`);
          }
        },
      }
    );

    if (result.ok) {
      logger.success(`Application verified via ${result.strategy}: ${target.jobTitle}`);
      return true;
    }
    logger.warn(`Application not found in history: ${target.jobTitle}`);
    return false;
  } catch (error) {
    logger.warn(`[verify] ${target.jobTitle}: ${describeError(error)}`);
    return false;
  }
}
