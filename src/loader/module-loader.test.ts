/**
 * Module loader tests
 * Walks the fixture tree under test/fixtures and imports the helper modules.
 */

import { describe, it, expect } from "vitest";
import { join } from "path";
import { fileURLToPath } from "url";
import { getActionRegistry } from "../actions/registry.js";
import {
  discover,
  setup,
  moduleIdFor,
  isEligibleSource,
  sourceSuffix,
  ImportResolutionError,
} from "./module-loader.js";

const FIXTURES = fileURLToPath(new URL("../../test/fixtures", import.meta.url));
const PKG = join(FIXTURES, "pkg");
const ORIGIN = join(PKG, "a.ts");

describe("discover", () => {
  it("should skip ignored directories, reserved files and the origin", () => {
    const plan = discover(PKG, ORIGIN);
    expect(plan.map((entry) => entry.moduleId)).toEqual(["b", "sub.c"]);
    expect(plan.map((entry) => entry.file)).toEqual([join(PKG, "b.ts"), join(PKG, "sub", "c.ts")]);
  });

  it("should compare the origin by filesystem identity", () => {
    const roundabout = join(PKG, "sub", "..", "a.ts");
    expect(discover(PKG, roundabout).map((entry) => entry.moduleId)).toEqual(["b", "sub.c"]);
  });

  it("should honour a custom ignore set", () => {
    const plan = discover(PKG, ORIGIN, { ignoreDirectories: ["venv", "env", "sub"] });
    expect(plan.map((entry) => entry.moduleId)).toEqual(["b"]);
  });

  it("should fall back to ids relative to the scanned root outside the package", () => {
    const plan = discover(join(FIXTURES, "extras"), ORIGIN);
    expect(plan.map((entry) => entry.moduleId)).toEqual(["tools", "nested.more"]);
  });

  it("should reject files outside the package in strict mode", () => {
    expect(() => discover(join(FIXTURES, "extras"), ORIGIN, { strict: true })).toThrow(ImportResolutionError);
  });
});

describe("loader helpers", () => {
  it("should derive dotted ids from the nearest package directory", () => {
    expect(moduleIdFor("flows", "/work/flows/app/flows/login/form.ts", ".ts")).toBe("login.form");
    expect(moduleIdFor("flows", "/work/other/form.ts", ".ts")).toBeUndefined();
  });

  it("should pick the suffix from the origin file", () => {
    expect(sourceSuffix("/work/app/main.ts")).toBe(".ts");
    expect(sourceSuffix("/work/dist/main.js")).toBe(".js");
    expect(sourceSuffix("/work/bin/run")).toBe(".js");
  });

  it("should exclude declarations and reserved names", () => {
    expect(isEligibleSource("login.ts", ".ts")).toBe(true);
    expect(isEligibleSource("types.d.ts", ".ts")).toBe(false);
    expect(isEligibleSource("__init__.ts", ".ts")).toBe(false);
    expect(isEligibleSource("login.js", ".ts")).toBe(false);
  });
});

describe("setup", () => {
  it("should import sibling modules once and register their actions", async () => {
    const plan = await setup({ file: ORIGIN, line: 1 });

    expect(plan.map((entry) => entry.moduleId)).toEqual(["b", "sub.c"]);
    const registry = getActionRegistry();
    expect(registry.has("visitB")).toBe(true);
    expect(registry.has("visitC")).toBe(true);
    expect(registry.has("fromOrigin")).toBe(false);

    expect(await setup({ file: ORIGIN })).toEqual([]);
  });

  it("should resolve a relative directory against the host module", async () => {
    const plan = await setup({ file: ORIGIN }, "../extras");
    expect(plan.map((entry) => entry.moduleId)).toEqual(["tools", "nested.more"]);
  });
});
