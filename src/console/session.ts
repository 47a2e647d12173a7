/**
 * Console session — the read-evaluate-print loop a host drops into.
 *
 * Each line is one of: a quit token, a built-in listing (`cache`,
 * `registry`), the exact name of a registered action, or a command that is
 * evaluated against the session namespace and recorded in the cache.
 */

import { ActionRegistry, getActionRegistry } from "../actions/registry.js";
import { setup as setupModules, type LoaderOptions } from "../loader/module-loader.js";
import { renderBanner } from "../cli/ui/banner.js";
import { theme } from "../cli/ui/theme.js";
import { createLogger } from "../infra/logger.js";
import { Command, CommandCache } from "./command-cache.js";
import { VmEvaluator, runCommand, type Evaluator, type Namespace } from "./evaluator.js";
import { TerminalIO, type ConsoleIO } from "./io.js";
import type { CallSite } from "./call-site.js";

const log = createLogger("console");

export const QUIT_TOKENS: readonly string[] = [":q", "quit", "exit"];
export const DEFAULT_PROMPT = ">>> ";

export type SessionState = "running" | "terminated";

export type LineOutcome =
  | { kind: "quit" }
  | { kind: "cache" }
  | { kind: "registry" }
  | { kind: "action"; name: string }
  | { kind: "command"; command: Command };

export interface SessionOptions {
  /** Host bindings. Copied; the host's object is never modified. */
  namespace?: Namespace;
  callSite: CallSite;
  io: ConsoleIO;
  registry?: ActionRegistry;
  /** Builds the evaluator over the session's namespace copy. */
  evaluator?: (namespace: Namespace) => Evaluator;
  prompt?: string;
  quitTokens?: readonly string[];
}

export class ConsoleSession {
  readonly cache = new CommandCache();
  readonly namespace: Namespace;
  private _state: SessionState = "running";
  private started = false;
  private io: ConsoleIO;
  private registry: ActionRegistry;
  private evaluator: Evaluator;
  private callSite: CallSite;
  private prompt: string;
  private quitTokens: readonly string[];

  constructor(opts: SessionOptions) {
    this.namespace = { ...opts.namespace };
    this.io = opts.io;
    this.callSite = opts.callSite;
    this.registry = opts.registry ?? getActionRegistry();
    this.evaluator = (opts.evaluator ?? ((ns) => new VmEvaluator(ns)))(this.namespace);
    this.prompt = opts.prompt ?? DEFAULT_PROMPT;
    this.quitTokens = opts.quitTokens ?? QUIT_TOKENS;
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Runs until a quit token or end of input. Rejects with the original error
   * when a registered action throws.
   */
  async run(): Promise<void> {
    if (this.started) throw new Error("Console session has already been run");
    this.started = true;

    this.io.write(renderBanner(this.callSite, this.quitTokens));
    log.debug("Session started with %d binding(s)", Object.keys(this.namespace).length);

    while (this._state === "running") {
      const line = await this.io.readLine(this.prompt);
      if (line === undefined) {
        this._state = "terminated";
        break;
      }
      await this.handleLine(line);
    }

    log.debug("Session ended after %d command(s)", this.cache.size);
  }

  /** Processes one submitted line. */
  async handleLine(line: string): Promise<LineOutcome> {
    if (this._state === "terminated") throw new Error("Console session has terminated");

    if (this.quitTokens.includes(line)) {
      this._state = "terminated";
      return { kind: "quit" };
    }

    if (line === "cache") {
      this.io.write(this.cache.render());
      return { kind: "cache" };
    }

    if (line === "registry") {
      this.io.write(this.registry.render());
      return { kind: "registry" };
    }

    const action = this.registry.lookup(line);
    if (action) {
      log.debug("Running action %s", line);
      await action();
      return { kind: "action", name: line };
    }

    const command = new Command(line);
    const outcome = await runCommand(command, this.evaluator);
    if (outcome.output !== undefined) this.io.write(outcome.output);
    if (outcome.error !== undefined) this.io.write(theme.err(outcome.error));
    this.cache.append(command);
    return { kind: "command", command };
  }
}

export interface ActivateOptions {
  namespace?: Namespace;
  callSite: CallSite;
  /** Anchors helper discovery; defaults to `callSite`. */
  origin?: CallSite;
  /** Helper module directory; defaults to the origin module's directory. */
  directory?: string;
  /** Set to false to open the console without loading helper modules. */
  loadModules?: boolean;
  io?: ConsoleIO;
  registry?: ActionRegistry;
  loader?: LoaderOptions;
  prompt?: string;
  quitTokens?: readonly string[];
}

/**
 * Opens a console at the host's current point of execution. Helper modules
 * are loaded first, then the session runs on stdin/stdout (or `io`).
 */
export async function activate(opts: ActivateOptions): Promise<ConsoleSession> {
  if (opts.loadModules !== false) {
    await setupModules(opts.origin ?? opts.callSite, opts.directory, opts.loader);
  }

  const io = opts.io ?? new TerminalIO();
  const session = new ConsoleSession({
    namespace: opts.namespace,
    callSite: opts.callSite,
    io,
    registry: opts.registry,
    prompt: opts.prompt,
    quitTokens: opts.quitTokens,
  });

  try {
    await session.run();
  } finally {
    io.close();
  }
  return session;
}
