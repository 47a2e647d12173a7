/**
 * Session transcript: every line submitted to the console, in order,
 * tagged with whether it ran cleanly.
 */

export type CommandValidity = "unknown" | "succeeded" | "failed";

export class UnsupportedOperationError extends Error {
  public readonly operation: string;

  constructor(operation: string, reason: string) {
    super(`${operation} is not supported: ${reason}`);
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}

export class Command {
  readonly text: string;
  private _validity: CommandValidity = "unknown";

  constructor(text: string) {
    this.text = text;
  }

  get validity(): CommandValidity {
    return this._validity;
  }

  /** Settles the outcome of the first execution attempt. */
  settle(succeeded: boolean): void {
    if (this._validity !== "unknown") {
      throw new Error(`Command already settled as ${this._validity}: ${this.text}`);
    }
    this._validity = succeeded ? "succeeded" : "failed";
  }

  toString(): string {
    return this.text;
  }
}

export class CommandCache {
  private entries: Command[] = [];

  append(command: Command): void {
    this.entries.push(command);
  }

  commands(): readonly Command[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  render(prefix = "\t"): string {
    return `Currently stored commands:\n${prefix}` + this.entries.map(String).join(`\n${prefix}`);
  }

  clear(): never {
    throw new UnsupportedOperationError("clear", "the command cache is append-only for a session");
  }

  persist(path: string): never {
    throw new UnsupportedOperationError(`persist(${path})`, "command history is not saved to disk");
  }
}
