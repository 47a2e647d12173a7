import { theme } from "./theme.js";
import { callSiteFile, type CallSite } from "../../console/call-site.js";

/**
 * Startup banner for a console session: where it was opened and how to leave.
 */
export function renderBanner(site: CallSite, quitTokens: readonly string[]): string {
  const line = site.line ?? "?";
  return [
    theme.primaryBold("Debug session on:"),
    `\t${callSiteFile(site)} ${theme.dim("line:")} ${line}`,
    `Write either ${quitTokens.map((t) => theme.bold(t)).join(", ")} to exit debug mode.`,
  ].join("\n");
}
