/**
 * Browser driver tests
 * Uses an in-memory page instead of a real browser.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { BrowserDriver, type AttributeSource, type DriverPage, type ElementLocator } from "./driver.js";

class FakeLocator implements ElementLocator {
  readonly calls: string[];
  private attributes: Record<string, string>;

  constructor(calls: string[], attributes: Record<string, string> = {}) {
    this.calls = calls;
    this.attributes = attributes;
  }

  first(): ElementLocator {
    this.calls.push("first");
    return this;
  }

  async waitFor(options: { state: "attached" | "visible"; timeout: number }): Promise<void> {
    this.calls.push(`waitFor:${options.state}:${options.timeout}`);
  }

  async click(options: { timeout: number }): Promise<void> {
    this.calls.push(`click:${options.timeout}`);
  }

  async dispatchEvent(type: string): Promise<void> {
    this.calls.push(`dispatch:${type}`);
  }

  async getAttribute(name: string): Promise<string | null> {
    this.calls.push(`attr:${name}`);
    return this.attributes[name] ?? null;
  }

  async evaluate<R>(pageFunction: (element: AttributeSource) => R): Promise<R> {
    this.calls.push("evaluate");
    const attributes = Object.entries(this.attributes).map(([name, value]) => ({ name, value }));
    return pageFunction({ attributes });
  }
}

class FakePage implements DriverPage {
  readonly calls: string[] = [];
  readonly selectors: string[] = [];

  locator(selector: string): ElementLocator {
    this.selectors.push(selector);
    return new FakeLocator(this.calls, { href: "/login" });
  }
}

describe("BrowserDriver", () => {
  let page: FakePage;
  let driver: BrowserDriver;

  beforeEach(() => {
    page = new FakePage();
    driver = new BrowserDriver(page, 5000);
  });

  it("should wait for visibility before clicking", async () => {
    await driver.click("#submit");
    expect(page.selectors).toEqual(["#submit"]);
    expect(page.calls).toEqual(["first", "waitFor:visible:5000", "click:5000"]);
  });

  it("should dispatch a DOM click for force clicks", async () => {
    await driver.forceClick(".cookie-banner button", { timeoutMs: 250 });
    expect(page.calls).toEqual(["first", "waitFor:visible:250", "dispatch:click"]);
  });

  it("should wait for presence without requiring visibility", async () => {
    await driver.waitForPresence("main");
    expect(page.calls).toEqual(["first", "waitFor:attached:5000"]);
  });

  it("should read attributes of visible elements", async () => {
    expect(await driver.attribute("a.login", "href")).toBe("/login");
    expect(await driver.attribute("a.login", "target")).toBeNull();
    expect(page.calls.slice(0, 3)).toEqual(["first", "waitFor:visible:5000", "attr:href"]);
  });

  it("should read every attribute of visible elements", async () => {
    expect(await driver.attributes("a.login", { timeoutMs: 100 })).toEqual({ href: "/login" });
    expect(page.calls).toEqual(["first", "waitFor:visible:100", "evaluate"]);
  });

  it("should default to a ten second wait", async () => {
    const defaults = new BrowserDriver(page);
    await defaults.getElement("h1");
    expect(page.calls).toEqual(["first", "waitFor:visible:10000"]);
  });
});
