import { LocatorMiss } from '../../src/errors.js';
import type { BrowserDriver, PageElement } from '../../src/services/browser.js';

export interface FakeElementSpec {
  /** Name recorded in `clicks` / `typed` / `selected`. */
  id?: string;
  text?: string;
  value?: string;
  attributes?: Record<string, string>;
  children?: Record<string, FakeElementSpec[]>;
  onClick?: (driver: FakeDriver) => void | Promise<void>;
}

export interface FakePageSpec {
  text?: string;
  html?: string;
  elements?: Record<string, FakeElementSpec[]>;
}

export class FakeElement implements PageElement {
  current: string;

  constructor(
    readonly spec: FakeElementSpec,
    private readonly driver: FakeDriver
  ) {
    this.current = spec.value ?? '';
  }

  get name(): string {
    return this.spec.id ?? this.spec.text ?? '';
  }

  async text(): Promise<string> {
    return this.spec.text ?? '';
  }

  async value(): Promise<string> {
    return this.current;
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.spec.attributes?.[name] ?? null;
  }

  async findAll(locator: string): Promise<PageElement[]> {
    return (this.spec.children?.[locator] ?? []).map((child) => this.driver.elementFor(child));
  }
}

/**
 * In-memory browser: a map of URL to page description. Clicking an element
 * runs its `onClick`, which usually calls `show()` to swap the page.
 */
export class FakeDriver implements BrowserDriver {
  url = 'about:blank';
  readonly navigations: string[] = [];
  readonly clicks: string[] = [];
  readonly typed: Array<{ name: string; text: string }> = [];
  readonly selected: Array<{ name: string; label: string }> = [];
  readonly screenshots: string[] = [];
  readonly scripts: string[] = [];
  readonly unreachable = new Set<string>();
  closed = false;

  private readonly elements = new WeakMap<FakeElementSpec, FakeElement>();
  private page: FakePageSpec = {};

  constructor(readonly pages: Record<string, FakePageSpec> = {}) {}

  elementFor(spec: FakeElementSpec): FakeElement {
    let element = this.elements.get(spec);
    if (!element) {
      element = new FakeElement(spec, this);
      this.elements.set(spec, element);
    }
    return element;
  }

  /** Switch the current page without recording a navigation. */
  show(url: string, page?: FakePageSpec): void {
    if (page) this.pages[url] = page;
    this.url = url;
    this.page = this.pages[url] ?? {};
  }

  private own(element: PageElement): FakeElement {
    if (!(element instanceof FakeElement)) {
      throw new TypeError('Element was not produced by this driver');
    }
    return element;
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    if (this.unreachable.has(url)) {
      throw new Error(`net::ERR_CONNECTION_REFUSED at ${url}`);
    }
    this.show(url);
  }

  currentUrl(): string {
    return this.url;
  }

  async findElements(locator: string): Promise<PageElement[]> {
    return (this.page.elements?.[locator] ?? []).map((spec) => this.elementFor(spec));
  }

  async click(element: PageElement): Promise<void> {
    const target = this.own(element);
    this.clicks.push(target.name);
    await target.spec.onClick?.(this);
  }

  async type(element: PageElement, text: string): Promise<void> {
    const target = this.own(element);
    target.current = text;
    this.typed.push({ name: target.name, text });
  }

  async selectOption(element: PageElement, label: string): Promise<void> {
    const target = this.own(element);
    const options = (target.spec.children?.option ?? []).map((option) => option.text ?? '');
    if (!options.includes(label)) {
      throw new Error(`No option "${label}"`);
    }
    target.current = label;
    this.selected.push({ name: target.name, label });
  }

  async executeScript(script: string): Promise<unknown> {
    this.scripts.push(script);
    return undefined;
  }

  async waitUntilPresent(locator: string): Promise<PageElement> {
    const [first] = await this.findElements(locator);
    if (!first) throw new LocatorMiss(locator, 'wait');
    return first;
  }

  async pageText(): Promise<string> {
    return this.page.text ?? '';
  }

  async pageHtml(): Promise<string> {
    return this.page.html ?? `<html><body>${this.page.text ?? ''}</body></html>`;
  }

  async screenshot(filePath: string): Promise<void> {
    this.screenshots.push(filePath);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** A promise that never settles, for steps that hang. */
export function never(): Promise<void> {
  return new Promise<void>(() => undefined);
}
