/**
 * Module loader — pulls helper modules into the process before a console
 * session starts, so the actions they register are available by name.
 *
 * The walk is sorted and files come before subdirectories at each level, so
 * the import order is the same on every platform.
 */

import { readdirSync, realpathSync, statSync, type Dirent } from "fs";
import { basename, dirname, extname, isAbsolute, join, normalize, relative, resolve, sep } from "path";
import { pathToFileURL } from "url";
import { callSiteFile, type CallSite } from "../console/call-site.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("loader");

export const DEFAULT_IGNORE_DIRECTORIES: readonly string[] = ["venv", "env", "node_modules"];

const SOURCE_SUFFIXES = [".ts", ".mts", ".js", ".mjs"];
const RESERVED_PREFIX = "__";

export interface LoaderOptions {
  ignoreDirectories?: readonly string[];
  /** Throw instead of warning when a file lies outside the host package. */
  strict?: boolean;
}

export interface ImportPlanEntry {
  /** Dotted path relative to the package root, e.g. `flows.login`. */
  moduleId: string;
  file: string;
}

export class ImportResolutionError extends Error {
  public readonly file: string;
  public readonly packageName: string;

  constructor(file: string, packageName: string) {
    super(`Cannot resolve ${file}: no "${packageName}" directory in its path`);
    this.name = "ImportResolutionError";
    this.file = file;
    this.packageName = packageName;
  }
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function realpathOrResolve(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return resolve(path);
  }
}

function isFileEntry(dir: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  return entry.isSymbolicLink() && statSync(join(dir, entry.name), { throwIfNoEntry: false })?.isFile() === true;
}

function walk(dir: string, ignore: ReadonlySet<string>, visit: (file: string) => void): void {
  const entries = readdirSync(dir, { withFileTypes: true }).sort(byName);

  for (const entry of entries) {
    if (isFileEntry(dir, entry)) visit(join(dir, entry.name));
  }
  for (const entry of entries) {
    if (entry.isDirectory() && !ignore.has(entry.name)) walk(join(dir, entry.name), ignore, visit);
  }
}

/** Hosts running from compiled output discover compiled siblings. */
export function sourceSuffix(originFile: string): string {
  const ext = extname(originFile);
  return SOURCE_SUFFIXES.includes(ext) ? ext : ".js";
}

export function isEligibleSource(name: string, suffix: string): boolean {
  return name.endsWith(suffix) && !name.endsWith(".d.ts") && !name.startsWith(RESERVED_PREFIX);
}

/**
 * Dotted module id of `file` relative to the nearest ancestor directory named
 * `packageName`. Returns undefined when no such ancestor exists.
 */
export function moduleIdFor(packageName: string, file: string, suffix: string): string | undefined {
  const segments = normalize(file).split(sep);
  const fileName = segments.pop();
  if (!fileName) return undefined;

  const rootIndex = segments.lastIndexOf(packageName);
  if (rootIndex === -1) return undefined;

  return [...segments.slice(rootIndex + 1), fileName.slice(0, -suffix.length)].join(".");
}

export function discover(rootDirectory: string, originFile: string, options: LoaderOptions = {}): ImportPlanEntry[] {
  const ignore = new Set(options.ignoreDirectories ?? DEFAULT_IGNORE_DIRECTORIES);
  const suffix = sourceSuffix(originFile);
  const origin = realpathOrResolve(originFile);
  const packageName = basename(dirname(resolve(originFile)));
  const root = resolve(rootDirectory);
  const plan: ImportPlanEntry[] = [];

  walk(root, ignore, (file) => {
    if (!isEligibleSource(basename(file), suffix)) return;
    if (realpathOrResolve(file) === origin) return;

    let moduleId = moduleIdFor(packageName, file, suffix);
    if (moduleId === undefined) {
      if (options.strict) throw new ImportResolutionError(file, packageName);
      moduleId = relative(root, file).slice(0, -suffix.length).split(sep).join(".");
      log.warn("%s is outside package %s, importing as %s", file, packageName, moduleId);
    }
    plan.push({ moduleId, file });
  });

  return plan;
}

/**
 * Imports every discovered module in plan order. Errors thrown by a module's
 * top-level code propagate to the caller.
 */
export async function load(rootDirectory: string, originFile: string, options: LoaderOptions = {}): Promise<ImportPlanEntry[]> {
  const plan = discover(rootDirectory, originFile, options);

  for (const entry of plan) {
    log.debug("Importing %s (%s)", entry.moduleId, entry.file);
    await import(pathToFileURL(entry.file).href);
  }

  log.info("Loaded %d helper module(s) from %s", plan.length, rootDirectory);
  return plan;
}

const loadedRoots = new Set<string>();

/**
 * Loads helper modules for a session opened at `site`. `directory` defaults
 * to the host module's own directory; relative paths resolve against it.
 * Each directory is loaded at most once per process.
 */
export async function setup(site: CallSite, directory?: string, options: LoaderOptions = {}): Promise<ImportPlanEntry[]> {
  const originFile = resolve(callSiteFile(site));
  const originDir = dirname(originFile);

  let root = originDir;
  if (directory) {
    root = isAbsolute(directory) ? directory : join(originDir, directory);
  }
  root = normalize(root);

  if (loadedRoots.has(root)) {
    log.debug("Modules in %s already loaded", root);
    return [];
  }

  const plan = await load(root, originFile, options);
  loadedRoots.add(root);
  return plan;
}
