import { filterCandidatesByKeywords } from '../config.js';
import { describeError } from '../errors.js';
import type { Candidate, FrozenRunConfig } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { BrowserDriver, PageElement } from './browser.js';
import { dismissOverlays, findFirst, readText, step } from './interactions.js';

export interface ScanResult {
  /** URL of the result page, revisited by the submitter and the verifier. */
  listingUrl: string;
  totalRows: number;
  candidates: Candidate[];
}

export function slugify(title: string): string {
  return title
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function candidateId(title: string, url?: string): string {
  if (url) {
    try {
      const parsed = new URL(url);
      for (const [key, value] of parsed.searchParams) {
        if (key.toLowerCase() === 'jobid' && value) return value;
      }
    } catch {
      // not an absolute URL, fall back to the title
    }
  }
  return `job-${slugify(title)}`;
}

function resolveUrl(href: string | null, base: string): string | undefined {
  if (!href || href.startsWith('javascript:') || href === '#') return undefined;
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

/**
 * Fill one search field. The form differs between page variants, so a field
 * that cannot be found or set is skipped.
 */
async function fillSearchField(
  driver: BrowserDriver,
  locator: string,
  value: string,
  kind: 'text' | 'select',
  timeoutMs: number
): Promise<void> {
  if (!value) return;
  try {
    const field = await step(findFirst(driver, locator), timeoutMs, 'search');
    if (!field) {
      logger.debug(`Search field not found: ${locator}`);
      return;
    }
    if (kind === 'select') {
      await step(driver.selectOption(field, value), timeoutMs, 'search');
    } else {
      await step(driver.type(field, value), timeoutMs, 'search');
    }
  } catch (error) {
    logger.debug(`Could not set search field ${locator}: ${describeError(error)}`);
  }
}

async function extractCandidate(
  row: PageElement,
  config: FrozenRunConfig,
  baseUrl: string
): Promise<Candidate | undefined> {
  const { locators } = config.site;
  const timeoutMs = config.runtime.stepTimeoutMs;

  const [titleElement] = await step(row.findAll(locators.rowTitle), timeoutMs, 'scan');
  const title = await readText(titleElement, timeoutMs, 'scan');
  if (!title) return undefined;

  // Rows without an apply affordance have usually been applied to already
  const [apply] = await step(row.findAll(locators.rowApply), timeoutMs, 'scan');
  if (!apply) {
    logger.debug(`Skipping "${title}": no apply link`);
    return undefined;
  }

  const href = titleElement ? await step(titleElement.getAttribute('href'), timeoutMs, 'scan') : null;
  const url = resolveUrl(href, baseUrl);
  const [companyElement] = await step(row.findAll(locators.rowCompany), timeoutMs, 'scan');
  const [referenceElement] = await step(row.findAll(locators.rowReference), timeoutMs, 'scan');
  const company = await readText(companyElement, timeoutMs, 'scan');
  const reference = await readText(referenceElement, timeoutMs, 'scan');

  const candidate: Candidate = { id: candidateId(title, url), title };
  if (url) candidate.url = url;
  if (company) candidate.company = company;
  if (reference) candidate.reference = reference;
  return candidate;
}

/**
 * Extract candidates from the rows currently on the page, skipping ids
 * already in `seenIds`.
 */
export async function extractCandidates(
  driver: BrowserDriver,
  config: FrozenRunConfig,
  seenIds: Set<string> = new Set()
): Promise<{ rows: number; candidates: Candidate[] }> {
  const timeoutMs = config.runtime.stepTimeoutMs;
  const baseUrl = driver.currentUrl();
  const rows = await step(driver.findElements(config.site.locators.resultRow), timeoutMs, 'scan');
  const candidates: Candidate[] = [];

  for (const row of rows) {
    try {
      const candidate = await extractCandidate(row, config, baseUrl);
      if (!candidate || seenIds.has(candidate.id)) continue;
      seenIds.add(candidate.id);
      candidates.push(candidate);
    } catch (error) {
      logger.debug(`Error extracting result row: ${describeError(error)}`);
    }
  }

  return { rows: rows.length, candidates };
}

/**
 * Open the search page, run the configured search and return the filtered
 * candidates in the order they should be tried.
 */
export async function scanListings(driver: BrowserDriver, config: FrozenRunConfig): Promise<ScanResult> {
  const { site, search } = config;
  const { locators } = site;
  const timeoutMs = config.runtime.stepTimeoutMs;

  logger.action('Opening job search...');
  await step(driver.navigate(site.searchUrl), timeoutMs, 'search');
  await dismissOverlays(driver, locators.overlayDismiss, timeoutMs);

  logger.action(`Searching for "${search.keywords}" in ${search.location}`);
  await fillSearchField(driver, locators.keywordsInput, search.keywords, 'text', timeoutMs);
  await fillSearchField(driver, locators.locationInput, search.location, 'text', timeoutMs);
  await fillSearchField(driver, locators.jobTypeSelect, search.jobType, 'select', timeoutMs);
  await fillSearchField(driver, locators.distanceSelect, search.distance, 'select', timeoutMs);

  const submit = await step(findFirst(driver, locators.searchSubmit), timeoutMs, 'search');
  if (submit) {
    await step(driver.click(submit), timeoutMs, 'search');
  } else {
    logger.warn('Search button not found, using the results already on the page');
  }

  // Results render lazily below the fold
  try {
    await step(driver.executeScript('window.scrollTo(0, document.body.scrollHeight)'), timeoutMs, 'scan');
  } catch (error) {
    logger.debug(`Could not scroll results: ${describeError(error)}`);
  }

  const listingUrl = driver.currentUrl();
  const { rows, candidates } = await extractCandidates(driver, config);
  const filtered = filterCandidatesByKeywords(candidates, search);

  logger.success(`Found ${rows} listings, ${candidates.length} applicable, ${filtered.length} match your keywords`);
  for (const candidate of filtered) {
    logger.job(candidate.company ? `${candidate.title} @ ${candidate.company}` : candidate.title);
  }

  return { listingUrl, totalRows: rows, candidates: filtered };
}
