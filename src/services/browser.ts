import { chromium, errors, Browser, BrowserContext, ElementHandle, Page } from 'playwright';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { LocatorMiss, StepTimeout } from '../errors.js';
import { logger } from '../utils/logger.js';
import { sleep, withTimeout } from '../utils/pacing.js';

/**
 * An element found on the current page. Handles are only valid until the next
 * navigation.
 */
export interface PageElement {
  text(): Promise<string>;
  value(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  findAll(locator: string): Promise<PageElement[]>;
}

/**
 * The browser capability the rest of the code depends on. Locators are
 * Playwright selector strings (CSS, `:has-text()`, `xpath=`).
 */
export interface BrowserDriver {
  navigate(url: string): Promise<void>;
  currentUrl(): string;
  findElements(locator: string): Promise<PageElement[]>;
  click(element: PageElement): Promise<void>;
  type(element: PageElement, text: string): Promise<void>;
  selectOption(element: PageElement, label: string): Promise<void>;
  executeScript(script: string): Promise<unknown>;
  waitUntilPresent(locator: string, timeoutMs: number): Promise<PageElement>;
  pageText(): Promise<string>;
  pageHtml(): Promise<string>;
  screenshot(filePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  stepTimeoutMs: number;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

type Handle = ElementHandle<HTMLElement | SVGElement>;

/**
 * Playwright enforces its own timeout alongside the `step()` race; whichever
 * fires first has to surface as the same `StepTimeout`.
 */
export function asStepFault(error: unknown, stepName: string, timeoutMs: number): unknown {
  return error instanceof errors.TimeoutError ? new StepTimeout(stepName, timeoutMs) : error;
}

class PlaywrightElement implements PageElement {
  constructor(readonly handle: Handle) {}

  text(): Promise<string> {
    return this.handle.innerText();
  }

  async value(): Promise<string> {
    const tag = await this.handle.evaluate((node) => node.nodeName.toLowerCase());
    if (tag === 'input' || tag === 'textarea' || tag === 'select') {
      return this.handle.inputValue();
    }
    return (await this.handle.getAttribute('value')) ?? '';
  }

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async findAll(locator: string): Promise<PageElement[]> {
    const handles = await this.handle.$$(locator);
    return handles.map((handle) => new PlaywrightElement(handle));
  }
}

export class PlaywrightDriver implements BrowserDriver {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly stepTimeoutMs: number
  ) {}

  static async launch(options: LaunchOptions): Promise<PlaywrightDriver> {
    logger.action('Launching browser...');

    const browser = await chromium.launch({
      headless: options.headless,
      args: ['--no-sandbox', '--disable-dev-shm-usage', '--window-size=1920,1080'],
    });

    const context = await browser.newContext({
      viewport: { width: 1920, height: 1080 },
      userAgent: DEFAULT_USER_AGENT,
      locale: 'en-GB',
    });
    const page = await context.newPage();
    page.setDefaultTimeout(options.stepTimeoutMs);

    logger.success(`Browser launched (headless=${options.headless})`);
    return new PlaywrightDriver(browser, context, page, options.stepTimeoutMs);
  }

  private async bounded<T>(work: Promise<T>, stepName: string): Promise<T> {
    try {
      return await work;
    } catch (error) {
      throw asStepFault(error, stepName, this.stepTimeoutMs);
    }
  }

  private unwrap(element: PageElement): Handle {
    if (!(element instanceof PlaywrightElement)) {
      throw new TypeError('Element was not produced by this driver');
    }
    return element.handle;
  }

  async navigate(url: string, retries = 1): Promise<void> {
    logger.action(`Navigating to ${url}`);

    for (let attempt = 1; attempt <= retries + 1; attempt++) {
      try {
        await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.stepTimeoutMs });
        logger.debug('Page loaded');
        return;
      } catch (error) {
        if (attempt <= retries) {
          logger.warn(`Navigation attempt ${attempt} failed, retrying...`);
          await sleep(2000);
        } else {
          throw error;
        }
      }
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async findElements(locator: string): Promise<PageElement[]> {
    const handles = await this.page.$$(locator);
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  async click(element: PageElement): Promise<void> {
    const handle = this.unwrap(element);
    await handle.scrollIntoViewIfNeeded().catch(() => undefined);
    await this.bounded(handle.click({ timeout: this.stepTimeoutMs }), 'click');
  }

  async type(element: PageElement, text: string): Promise<void> {
    await this.bounded(this.unwrap(element).fill(text, { timeout: this.stepTimeoutMs }), 'type');
  }

  async selectOption(element: PageElement, label: string): Promise<void> {
    await this.bounded(this.unwrap(element).selectOption({ label }, { timeout: this.stepTimeoutMs }), 'select');
  }

  executeScript(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  async waitUntilPresent(locator: string, timeoutMs: number): Promise<PageElement> {
    try {
      const handle = await this.page.waitForSelector(locator, { state: 'attached', timeout: timeoutMs });
      if (!handle) throw new LocatorMiss(locator, 'wait');
      return new PlaywrightElement(handle);
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new LocatorMiss(locator, 'wait');
      }
      throw error;
    }
  }

  pageText(): Promise<string> {
    return this.bounded(this.page.locator('body').innerText({ timeout: this.stepTimeoutMs }), 'page-text');
  }

  pageHtml(): Promise<string> {
    return this.page.content();
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  async close(): Promise<void> {
    logger.action('Closing browser...');
    await this.page.close();
    await this.context.close();
    await this.browser.close();
    logger.success('Browser closed');
  }
}

/**
 * Save a screenshot and the page HTML under `artifactsDir/<label>-<stamp>`.
 * Each capture is bounded by `timeoutMs`; problems are logged and never thrown.
 */
export async function captureFailureArtifacts(
  driver: BrowserDriver,
  artifactsDir: string,
  label: string,
  timeoutMs: number
): Promise<{ screenshotPath?: string; htmlPath?: string }> {
  const stamp = new Date().toISOString().replace(/[:.]/g, '-');
  const safeLabel = label.replace(/[^a-zA-Z0-9_.-]+/g, '-').slice(0, 60);
  const screenshotPath = path.join(artifactsDir, `${safeLabel}-${stamp}.png`);
  const htmlPath = path.join(artifactsDir, `${safeLabel}-${stamp}.html`);
  const saved: { screenshotPath?: string; htmlPath?: string } = {};

  try {
    await fs.mkdir(artifactsDir, { recursive: true });
  } catch (error) {
    logger.warn(`Failed to create artifacts dir: ${error instanceof Error ? error.message : String(error)}`);
    return saved;
  }

  try {
    await withTimeout(driver.screenshot(screenshotPath), timeoutMs, 'artifacts');
    saved.screenshotPath = screenshotPath;
    logger.debug(`Saved screenshot: ${screenshotPath}`);
  } catch (captureError) {
    logger.warn(
      `Failed to capture screenshot: ${captureError instanceof Error ? captureError.message : String(captureError)}`
    );
  }

  try {
    const html = await withTimeout(driver.pageHtml(), timeoutMs, 'artifacts');
    await fs.writeFile(htmlPath, html, 'utf8');
    saved.htmlPath = htmlPath;
    logger.debug(`Saved HTML: ${htmlPath}`);
  } catch (captureError) {
    logger.warn(
      `Failed to capture HTML: ${captureError instanceof Error ? captureError.message : String(captureError)}`
    );
  }

  return saved;
}
