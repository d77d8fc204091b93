import { describeError, LocatorMiss, SessionFault } from '../errors.js';
import type { FrozenRunConfig } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { BrowserDriver } from './browser.js';
import { dismissOverlays, findFirst, requireFirst, step } from './interactions.js';

export type SessionState = 'existing' | 'logged-in';

/**
 * Make sure the browser holds an authenticated session. A visible sign-out
 * link means we are already logged in; otherwise log in with the configured
 * credentials. Anything short of a confirmed session throws `SessionFault`.
 */
export async function ensureSession(driver: BrowserDriver, config: FrozenRunConfig): Promise<SessionState> {
  const { site, credentials } = config;
  const timeoutMs = config.runtime.stepTimeoutMs;
  const { locators } = site;

  logger.action('Checking if login is required...');
  try {
    await step(driver.navigate(site.homeUrl), timeoutMs, 'session');
  } catch (error) {
    throw new SessionFault(`Could not open ${site.homeUrl}: ${describeError(error)}`, { cause: error });
  }
  await dismissOverlays(driver, locators.overlayDismiss, timeoutMs);

  const signOut = await step(findFirst(driver, locators.signOut), timeoutMs, 'session').catch(() => undefined);
  if (signOut) {
    logger.success('User is already logged in');
    return 'existing';
  }

  if (!credentials.email || !credentials.password) {
    logger.info('Set JOBSITE_EMAIL and JOBSITE_PASSWORD in your .env file');
    throw new SessionFault('Login required but credentials were not provided');
  }

  logger.action('Login required, attempting to authenticate...');
  try {
    const signIn = await step(requireFirst(driver, locators.signIn, 'session'), timeoutMs, 'session');
    await step(driver.click(signIn), timeoutMs, 'session');

    const email = await driver.waitUntilPresent(locators.emailInput, timeoutMs);
    await step(driver.type(email, credentials.email), timeoutMs, 'session');
    logger.debug('Filled email field');

    const password = await step(requireFirst(driver, locators.passwordInput, 'session'), timeoutMs, 'session');
    await step(driver.type(password, credentials.password), timeoutMs, 'session');
    logger.debug('Filled password field');

    const submit = await step(requireFirst(driver, locators.loginSubmit, 'session'), timeoutMs, 'session');
    await step(driver.click(submit), timeoutMs, 'session');
  } catch (error) {
    throw new SessionFault(`Login error: ${describeError(error)}`, { cause: error });
  }

  try {
    await driver.waitUntilPresent(locators.signOut, timeoutMs);
  } catch (error) {
    if (error instanceof LocatorMiss) {
      throw new SessionFault('Login failed - check your credentials', { cause: error });
    }
    throw new SessionFault(`Login error: ${describeError(error)}`, { cause: error });
  }

  logger.success('Successfully logged in');
  return 'logged-in';
}
