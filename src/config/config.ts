import { resolve } from "path";
import { existsSync } from "fs";
import { config as loadDotenv } from "dotenv";
import { readYAML, writeYAML } from "../utils/file.js";
import { validateConfig, BROWSER_NAMES, type BrowserName, type PerchConfig } from "./schema.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("config");

export const DEFAULT_CONFIG: PerchConfig = {
  console: {
    prompt: ">>> ",
    quitTokens: [":q", "quit", "exit"],
  },
  loader: {
    ignoreDirectories: ["venv", "env", "node_modules"],
    strict: false,
  },
  browser: {
    name: "chromium",
    headless: false,
    timeoutMs: 10_000,
  },
};

export function loadEnv(rootDir: string) {
  loadDotenv({ path: resolve(rootDir, ".env") });
  loadDotenv({ path: resolve(rootDir, ".env.local"), override: true });
}

export function getConfigPath(runtimeDir: string): string {
  return resolve(runtimeDir, "config.yaml");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: keyof PerchConfig): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

/** Partial files are completed from the defaults before validation. */
function withDefaults(raw: Record<string, unknown>): unknown {
  return {
    console: { ...DEFAULT_CONFIG.console, ...section(raw, "console") },
    loader: { ...DEFAULT_CONFIG.loader, ...section(raw, "loader") },
    browser: { ...DEFAULT_CONFIG.browser, ...section(raw, "browser") },
  };
}

function isBrowserName(name: string): name is BrowserName {
  return BROWSER_NAMES.some((known) => known === name);
}

function applyEnvOverrides(config: PerchConfig): PerchConfig {
  const browser = { ...config.browser };

  const name = process.env.PERCH_BROWSER;
  if (name) {
    if (isBrowserName(name)) browser.name = name;
    else log.warn("Ignoring unknown PERCH_BROWSER=%s", name);
  }

  const headless = process.env.PERCH_HEADLESS;
  if (headless) browser.headless = headless === "1" || headless.toLowerCase() === "true";

  return { ...config, browser };
}

export function loadConfig(runtimeDir: string): PerchConfig {
  const configPath = getConfigPath(runtimeDir);

  if (!existsSync(configPath)) {
    log.info("Creating default config at %s", configPath);
    writeYAML(configPath, DEFAULT_CONFIG);
    return applyEnvOverrides(DEFAULT_CONFIG);
  }

  const raw = readYAML(configPath);
  if (!isRecord(raw)) {
    log.warn("Empty config, using defaults");
    return applyEnvOverrides(DEFAULT_CONFIG);
  }

  const merged = withDefaults(raw);
  if (!validateConfig(merged)) {
    log.error({ errors: validateConfig.errors }, "Invalid config, using defaults");
    return applyEnvOverrides(DEFAULT_CONFIG);
  }

  return applyEnvOverrides(merged);
}

export function saveConfig(runtimeDir: string, config: PerchConfig) {
  writeYAML(getConfigPath(runtimeDir), config);
}
