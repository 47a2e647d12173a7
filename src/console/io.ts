import * as readline from "readline";
import type { Readable, Writable } from "stream";

/** Line-oriented operator channel used by a console session. */
export interface ConsoleIO {
  /** Resolves with the next line, or `undefined` once input has ended. */
  readLine(prompt: string): Promise<string | undefined>;
  write(text: string): void;
  close(): void;
}

/**
 * readline-backed IO. Lines are queued as they arrive so piped input
 * isn't dropped while a previous line is still being handled.
 */
export class TerminalIO implements ConsoleIO {
  private rl: readline.Interface;
  private output: Writable;
  private queue: string[] = [];
  private waiting: ((line: string | undefined) => void) | null = null;
  private ended = false;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.output = output;
    this.rl = readline.createInterface({
      input,
      output,
      terminal: "isTTY" in output && output.isTTY === true,
    });

    this.rl.on("line", (line) => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(line);
      } else {
        this.queue.push(line);
      }
    });

    this.rl.on("close", () => {
      this.ended = true;
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(undefined);
      }
    });
  }

  readLine(prompt: string): Promise<string | undefined> {
    const next = this.queue.shift();
    if (next !== undefined) {
      this.output.write(prompt);
      return Promise.resolve(next);
    }
    if (this.ended) return Promise.resolve(undefined);

    this.rl.setPrompt(prompt);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  write(text: string): void {
    this.output.write(text.endsWith("\n") ? text : text + "\n");
  }

  close(): void {
    this.rl.close();
  }
}
