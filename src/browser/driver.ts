/**
 * Browser driver
 * Waiting and clicking helpers over a playwright-core page, handed to
 * console sessions as `driver`.
 */

import { chromium, firefox, webkit, type Browser, type BrowserType, type Page } from "playwright-core";
import type { BrowserName, PerchConfig } from "../config/schema.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("browser");

export const DEFAULT_TIMEOUT_MS = 10_000;

/** What attribute reads need from a DOM element. */
export interface AttributeSource {
  attributes: ArrayLike<{ name: string; value: string }>;
}

/** The slice of a playwright Locator the helpers rely on. */
export interface ElementLocator {
  first(): ElementLocator;
  waitFor(options: { state: "attached" | "visible"; timeout: number }): Promise<void>;
  click(options: { timeout: number }): Promise<void>;
  dispatchEvent(type: string): Promise<void>;
  getAttribute(name: string, options: { timeout: number }): Promise<string | null>;
  evaluate<R>(pageFunction: (element: AttributeSource) => R): Promise<R>;
}

export interface DriverPage {
  locator(selector: string): ElementLocator;
}

export interface WaitOptions {
  timeoutMs?: number;
}

export class BrowserDriver {
  readonly page: DriverPage;
  private defaultTimeoutMs: number;

  constructor(page: DriverPage, defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.page = page;
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  private timeout(opts: WaitOptions): number {
    return opts.timeoutMs ?? this.defaultTimeoutMs;
  }

  private async waitFor(selector: string, state: "attached" | "visible", opts: WaitOptions): Promise<ElementLocator> {
    const element = this.page.locator(selector).first();
    await element.waitFor({ state, timeout: this.timeout(opts) });
    return element;
  }

  /** Waits until the element is visible and returns it. */
  async getElement(selector: string, opts: WaitOptions = {}): Promise<ElementLocator> {
    return this.waitFor(selector, "visible", opts);
  }

  async click(selector: string, opts: WaitOptions = {}): Promise<ElementLocator> {
    const element = await this.getElement(selector, opts);
    await element.click({ timeout: this.timeout(opts) });
    log.debug("Clicked %s", selector);
    return element;
  }

  /**
   * Dispatches a DOM click on the element, skipping the actionability checks
   * a regular click performs (overlays, animations).
   */
  async forceClick(selector: string, opts: WaitOptions = {}): Promise<ElementLocator> {
    const element = await this.getElement(selector, opts);
    await element.dispatchEvent("click");
    log.debug("Dispatched click on %s", selector);
    return element;
  }

  async waitForPresence(selector: string, opts: WaitOptions = {}): Promise<ElementLocator> {
    return this.waitFor(selector, "attached", opts);
  }

  async waitForVisibility(selector: string, opts: WaitOptions = {}): Promise<ElementLocator> {
    return this.waitFor(selector, "visible", opts);
  }

  async attribute(selector: string, name: string, opts: WaitOptions = {}): Promise<string | null> {
    const element = await this.waitForVisibility(selector, opts);
    return element.getAttribute(name, { timeout: this.timeout(opts) });
  }

  /** Every attribute of the visible element, by name. */
  async attributes(selector: string, opts: WaitOptions = {}): Promise<Record<string, string>> {
    const element = await this.waitForVisibility(selector, opts);
    // Runs in the page: must not close over anything.
    return element.evaluate((el) => Object.fromEntries(Array.from(el.attributes, (attr) => [attr.name, attr.value] as const)));
  }
}

const BROWSER_TYPES: Record<BrowserName, BrowserType> = { chromium, firefox, webkit };

export interface DriverHandle {
  browser: Browser;
  page: Page;
  driver: BrowserDriver;
  close(): Promise<void>;
}

/**
 * Launches a local browser. playwright-core ships no browser binaries; they
 * must already be installed on the machine.
 */
export async function launchDriver(opts: PerchConfig["browser"]): Promise<DriverHandle> {
  log.info("Launching %s (headless: %s)", opts.name, opts.headless);
  const browser = await BROWSER_TYPES[opts.name].launch({ headless: opts.headless });
  const context = await browser.newContext({ viewport: { width: 1920, height: 1080 } });
  const page = await context.newPage();

  if (opts.startUrl) {
    await page.goto(opts.startUrl);
  }

  return {
    browser,
    page,
    driver: new BrowserDriver(page, opts.timeoutMs),
    close: () => browser.close(),
  };
}
