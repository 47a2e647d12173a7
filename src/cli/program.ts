#!/usr/bin/env node

import { Command } from "commander";
import { extname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { createLogger, setLogLevel } from "../infra/logger.js";
import { theme } from "./ui/theme.js";
import { BROWSER_NAMES, type BrowserName, type PerchConfig } from "../config/schema.js";

// Silence logs for the console (clean output)
setLogLevel("silent");

const log = createLogger("cli");

export const PERCH_VERSION = "0.1.0";

const ROOT_DIR = process.cwd();
const RUNTIME_DIR = resolve(ROOT_DIR, ".perch");
const PROGRAM_FILE = fileURLToPath(import.meta.url);

interface ConsoleCommandOptions {
  browser?: string | false;
  headless?: boolean;
  dir?: string;
  url?: string;
  verbose?: boolean;
}

function resolveBrowserName(requested: string, fallback: BrowserName): BrowserName {
  const known = BROWSER_NAMES.find((name) => name === requested);
  if (known) return known;
  console.log(theme.warn(`Could not find the browser ${requested}, running ${fallback}.`));
  return fallback;
}

function browserOptions(config: PerchConfig, opts: ConsoleCommandOptions): PerchConfig["browser"] {
  return {
    ...config.browser,
    name: typeof opts.browser === "string" ? resolveBrowserName(opts.browser, config.browser.name) : config.browser.name,
    headless: opts.headless ?? config.browser.headless,
    startUrl: opts.url ?? config.browser.startUrl,
  };
}

const program = new Command();

program
  .name("perch")
  .description("Interactive console for browser automation scripts")
  .version(PERCH_VERSION);

program
  .command("console", { isDefault: true })
  .description("Launch a browser and open a console bound to it")
  .option("-b, --browser <name>", `browser to launch [${BROWSER_NAMES.join("|")}]`)
  .option("--no-browser", "open the console without launching a browser")
  .option("--headless", "run the browser headless")
  .option("-d, --dir <path>", "directory of helper modules whose actions to load")
  .option("-u, --url <url>", "page to open before the console starts")
  .option("-v, --verbose", "show logs on stderr")
  .action(async (opts: ConsoleCommandOptions) => {
    const { loadConfig, loadEnv } = await import("../config/config.js");
    loadEnv(ROOT_DIR);
    if (opts.verbose) setLogLevel(process.env.LOG_LEVEL || "debug");

    const config = loadConfig(RUNTIME_DIR);
    const { activate } = await import("../console/session.js");

    const namespace: Record<string, unknown> = { config };
    let close: (() => Promise<void>) | undefined;

    if (opts.browser !== false) {
      const { launchDriver } = await import("../browser/driver.js");
      const handle = await launchDriver(browserOptions(config, opts));
      Object.assign(namespace, { browser: handle.browser, page: handle.page, driver: handle.driver });
      close = handle.close;
    }

    // Discovery is anchored on a reserved (never imported) name inside --dir,
    // making the directory the package root for module ids.
    const directory = opts.dir ? resolve(ROOT_DIR, opts.dir) : undefined;
    const origin = directory ? { file: join(directory, `__perch__${extname(PROGRAM_FILE)}`) } : undefined;

    try {
      await activate({
        namespace,
        callSite: { file: PROGRAM_FILE },
        origin,
        directory,
        loadModules: directory !== undefined,
        loader: config.loader,
        prompt: config.console.prompt,
        quitTokens: config.console.quitTokens,
      });
    } finally {
      if (close) {
        log.debug("Closing browser");
        await close();
      }
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(theme.err(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
