import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { parse, stringify } from "yaml";

export function ensureDir(dir: string) {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

export function readYAML(path: string): unknown {
  if (!existsSync(path)) return null;
  return parse(readFileSync(path, "utf-8"));
}

export function writeYAML(path: string, data: unknown) {
  ensureDir(dirname(path));
  writeFileSync(path, stringify(data), "utf-8");
}
