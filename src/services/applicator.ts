import { describeError, StepTimeout, SubmissionFault } from '../errors.js';
import type { Candidate, FrozenRunConfig } from '../types/index.js';
import { firstMatch, hit, miss, type Strategy } from '../utils/strategies.js';
import { logger } from '../utils/logger.js';
import type { BrowserDriver, PageElement } from './browser.js';
import { dismissOverlays, fillIfEmpty, findFirst, readText, step } from './interactions.js';

export type SubmissionOutcome =
  | { submitted: true; company: string; reference: string }
  | { submitted: false; reason: string };

export interface SubmitContext {
  config: FrozenRunConfig;
  /** Result page the candidate was found on. */
  listingUrl: string;
}

/**
 * Find the candidate's row on the listing page by exact title and return its
 * apply affordance. Used when the candidate has no detail URL.
 */
async function findRowApply(
  driver: BrowserDriver,
  candidate: Candidate,
  config: FrozenRunConfig
): Promise<PageElement | undefined> {
  const { locators } = config.site;
  const timeoutMs = config.runtime.stepTimeoutMs;
  const rows = await step(driver.findElements(locators.resultRow), timeoutMs, 'open-job');

  for (const row of rows) {
    const [titleElement] = await step(row.findAll(locators.rowTitle), timeoutMs, 'open-job');
    const title = await readText(titleElement, timeoutMs, 'open-job');
    if (title !== candidate.title) continue;
    const [apply] = await step(row.findAll(locators.rowApply), timeoutMs, 'open-job');
    return apply;
  }
  return undefined;
}

/**
 * Get the application form on screen: through the detail page's apply button
 * when the candidate has a URL, otherwise through the row on the listing.
 */
async function openApplication(
  driver: BrowserDriver,
  candidate: Candidate,
  { config, listingUrl }: SubmitContext
): Promise<string | null> {
  const { locators } = config.site;
  const timeoutMs = config.runtime.stepTimeoutMs;

  if (candidate.url) {
    logger.debug(`Navigating to job URL: ${candidate.url}`);
    await step(driver.navigate(candidate.url), timeoutMs, 'open-job');
    await dismissOverlays(driver, locators.overlayDismiss, timeoutMs);

    const apply = await step(findFirst(driver, locators.detailApply), timeoutMs, 'open-job');
    if (!apply) return 'Could not find Apply button';
    await step(driver.click(apply), timeoutMs, 'open-job');
    return null;
  }

  logger.debug('No job URL, applying from the listing row...');
  if (driver.currentUrl() !== listingUrl) {
    await step(driver.navigate(listingUrl), timeoutMs, 'open-job');
  }
  await dismissOverlays(driver, locators.overlayDismiss, timeoutMs);

  const apply = await findRowApply(driver, candidate, config);
  if (!apply) return 'Could not find job row on listing page';
  await step(driver.click(apply), timeoutMs, 'open-job');
  return null;
}

function formIndicators(driver: BrowserDriver, config: FrozenRunConfig): Array<Strategy<string>> {
  const timeoutMs = config.runtime.stepTimeoutMs;
  return config.site.locators.applicationForm.map((locator) => ({
    name: locator,
    attempt: async () => {
      const found = await step(findFirst(driver, locator), timeoutMs, 'application-form');
      return found ? hit(locator) : miss('not on page');
    },
  }));
}

async function selectWorkingStatus(driver: BrowserDriver, config: FrozenRunConfig): Promise<void> {
  const timeoutMs = config.runtime.stepTimeoutMs;
  const select = await step(findFirst(driver, config.site.locators.formWorkingStatus), timeoutMs, 'fill-form');
  if (!select) return;
  if ((await step(select.value(), timeoutMs, 'fill-form')).trim()) return;

  const options = await step(select.findAll('option'), timeoutMs, 'fill-form');
  for (const option of options) {
    const label = await readText(option, timeoutMs, 'fill-form');
    const lower = label.toLowerCase();
    if (config.applicant.workingStatusKeywords.some((keyword) => lower.includes(keyword))) {
      await step(driver.selectOption(select, label), timeoutMs, 'fill-form');
      logger.debug(`Selected working status: ${label}`);
      return;
    }
  }
}

// Pick the first stored CV; the first option is the "no file" placeholder.
async function selectStoredCv(driver: BrowserDriver, config: FrozenRunConfig): Promise<void> {
  const timeoutMs = config.runtime.stepTimeoutMs;
  const select = await step(findFirst(driver, config.site.locators.formCv), timeoutMs, 'fill-form');
  if (!select) {
    logger.debug('No CV selector on form, assuming a CV is attached');
    return;
  }

  const options = await step(select.findAll('option'), timeoutMs, 'fill-form');
  for (const option of options.slice(1)) {
    const label = await readText(option, timeoutMs, 'fill-form');
    if (label && !label.toLowerCase().includes('no file')) {
      await step(driver.selectOption(select, label), timeoutMs, 'fill-form');
      logger.debug(`Selected CV: ${label}`);
      return;
    }
  }
  logger.warn('No stored CV to select, continuing');
}

async function fillApplicationForm(driver: BrowserDriver, config: FrozenRunConfig): Promise<void> {
  const { locators } = config.site;
  const timeoutMs = config.runtime.stepTimeoutMs;

  await fillIfEmpty(driver, locators.formEmail, config.credentials.email, timeoutMs, 'fill-form');
  await selectWorkingStatus(driver, config);
  await selectStoredCv(driver, config);
  await fillIfEmpty(driver, locators.formFirstName, config.applicant.firstName, timeoutMs, 'fill-form');
  await fillIfEmpty(driver, locators.formLastName, config.applicant.lastName, timeoutMs, 'fill-form');
}

export async function checkApplicationSuccess(driver: BrowserDriver, config: FrozenRunConfig): Promise<boolean> {
  const timeoutMs = config.runtime.stepTimeoutMs;
  const pageText = (await step(driver.pageText(), timeoutMs, 'confirm')).toLowerCase();
  if (config.site.markers.successPhrases.some((phrase) => pageText.includes(phrase))) {
    return true;
  }
  const confirmation = await step(findFirst(driver, config.site.locators.successElement), timeoutMs, 'confirm');
  return confirmation !== undefined;
}

async function extractDetail(driver: BrowserDriver, locator: string, timeoutMs: number): Promise<string> {
  try {
    return await readText(await step(findFirst(driver, locator), timeoutMs, 'extract'), timeoutMs, 'extract');
  } catch (error) {
    logger.debug(`Could not read ${locator}: ${describeError(error)}`);
    return '';
  }
}

/**
 * Apply to one candidate: open the form, fill whatever is still empty, submit
 * and look for a confirmation.
 *
 * Ordinary refusals come back as `{ submitted: false }`. Step timeouts,
 * locator misses and a submit click that cannot be performed are thrown.
 */
export async function submitApplication(
  driver: BrowserDriver,
  candidate: Candidate,
  context: SubmitContext
): Promise<SubmissionOutcome> {
  const { config } = context;
  const { locators } = config.site;
  const timeoutMs = config.runtime.stepTimeoutMs;

  const openFailure = await openApplication(driver, candidate, context);
  if (openFailure) return { submitted: false, reason: openFailure };

  await dismissOverlays(driver, locators.overlayDismiss, timeoutMs);
  const form = await firstMatch(formIndicators(driver, config));
  if (!form.ok) return { submitted: false, reason: 'Application form did not open' };
  logger.debug(`Application form detected via ${form.value}`);

  await fillApplicationForm(driver, config);

  const submit = await step(findFirst(driver, locators.formSubmit), timeoutMs, 'submit');
  if (!submit) return { submitted: false, reason: 'No submit button found' };

  logger.action('Submitting application...');
  try {
    await step(driver.click(submit), timeoutMs, 'submit');
  } catch (error) {
    if (error instanceof StepTimeout) throw error;
    throw new SubmissionFault(`Submit click failed: ${describeError(error)}`, 'submit', { cause: error });
  }

  if (!(await checkApplicationSuccess(driver, config))) {
    return { submitted: false, reason: 'Application submission may have failed' };
  }

  const company = (await extractDetail(driver, locators.company, timeoutMs)) || candidate.company || '';
  const reference = (await extractDetail(driver, locators.reference, timeoutMs)) || candidate.reference || '';
  return { submitted: true, company, reference };
}
