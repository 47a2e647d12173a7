import { fileURLToPath } from "url";

/** Where a console session was opened from. */
export interface CallSite {
  /** Absolute path or `file:` URL of the host module. */
  file: string;
  line?: number;
}

export function callSiteFile(site: CallSite): string {
  return site.file.startsWith("file:") ? fileURLToPath(site.file) : site.file;
}

// "    at fn (/abs/file.ts:12:5)" or "    at /abs/file.ts:12:5"
const FRAME_RE = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

/**
 * Convenience for hosts that don't want to spell out their location:
 * returns the frame `depth` levels above the caller of `here()`.
 * Hosts can always pass `{ file: import.meta.url }` instead.
 */
export function here(depth = 0): CallSite | undefined {
  const frames = (new Error().stack ?? "").split("\n").slice(1);
  const frame = frames[1 + depth];
  if (!frame) return undefined;

  const match = FRAME_RE.exec(frame);
  if (!match) return undefined;
  return { file: callSiteFile({ file: match[1] }), line: Number(match[2]) };
}
