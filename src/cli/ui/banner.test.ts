import { describe, it, expect } from "vitest";
import stripAnsi from "strip-ansi";
import { renderBanner } from "./banner.js";

describe("renderBanner", () => {
  it("should report the file, line and quit tokens", () => {
    const banner = stripAnsi(renderBanner({ file: "/work/scrape.ts", line: 42 }, [":q", "quit", "exit"]));
    expect(banner).toBe(
      "Debug session on:\n\t/work/scrape.ts line: 42\nWrite either :q, quit, exit to exit debug mode."
    );
  });

  it("should resolve file URLs and unknown lines", () => {
    const banner = stripAnsi(renderBanner({ file: "file:///work/scrape.ts" }, ["exit"]));
    expect(banner.split("\n")[1]).toBe("\t/work/scrape.ts line: ?");
  });
});
