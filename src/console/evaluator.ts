/**
 * Evaluate-or-execute against a namespace.
 *
 * The console only talks to the `Evaluator` interface; `VmEvaluator` backs it
 * with `node:vm`, using the namespace object itself as the context global so
 * that assignments made by one line are visible to the next.
 */

import * as vm from "vm";
import { inspect, types } from "util";
import { Command } from "./command-cache.js";
import { hoistTopLevelBindings } from "./hoist.js";

export type Namespace = Record<string, unknown>;

export interface Evaluator {
  readonly namespace: Namespace;
  /** Run `source` as an expression and return its value. */
  evaluate(source: string): unknown;
  /** Run `source` as one or more statements. */
  execute(source: string): unknown;
}

export interface CommandOutcome {
  command: Command;
  output?: string;
  error?: string;
}

// Exposed inside the context without being copied into the host's snapshot.
const HOST_GLOBALS: Namespace = {
  console,
  process,
  Buffer,
  URL,
  URLSearchParams,
  TextEncoder,
  TextDecoder,
  structuredClone,
  setTimeout,
  clearTimeout,
  setInterval,
  clearInterval,
  setImmediate,
  clearImmediate,
};

const AWAIT_RE = /\bawait\b/;
const FILENAME = "perch-console";

export class VmEvaluator implements Evaluator {
  readonly namespace: Namespace;
  private context: vm.Context;

  constructor(namespace: Namespace) {
    this.namespace = namespace;
    for (const [name, value] of Object.entries(HOST_GLOBALS)) {
      if (name in namespace) continue;
      Object.defineProperty(namespace, name, { value, writable: true, configurable: true, enumerable: false });
    }
    this.context = vm.createContext(namespace);
  }

  evaluate(source: string): unknown {
    // Trailing newline keeps a line comment from swallowing the paren.
    const code = AWAIT_RE.test(source) ? `(async () => (${source}\n))()` : `(${source}\n)`;
    return new vm.Script(code, { filename: FILENAME }).runInContext(this.context);
  }

  /**
   * Lines using `await` run inside an async function; their top-level
   * declarations are copied onto the context global as they complete.
   */
  execute(source: string): unknown {
    const code = AWAIT_RE.test(source) ? `(async () => {\n${hoistTopLevelBindings(source).code}\n})()` : source;
    return new vm.Script(code, { filename: FILENAME }).runInContext(this.context);
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

async function settle(value: unknown): Promise<unknown> {
  return isThenable(value) ? await value : value;
}

/** Nothing, empty strings and empty collections print nothing. */
export function isEmptyResult(value: unknown): boolean {
  if (value === undefined || value === null || value === "") return true;
  if (Array.isArray(value)) return value.length === 0;
  // Values may come from the context's realm: no instanceof.
  if (types.isMap(value) || types.isSet(value)) return value.size === 0;
  return isPlainObject(value) && Reflect.ownKeys(value).length === 0;
}

function isPlainObject(value: unknown): value is object {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || (typeof proto === "object" && Object.getPrototypeOf(proto) === null);
}

export function formatResult(value: unknown): string {
  return typeof value === "string" ? value : inspect(value, { depth: 2, colors: false });
}

export function formatError(err: unknown): string {
  // Errors thrown inside the context come from its own realm, so no instanceof.
  if (types.isNativeError(err)) return `${err.name}: ${err.message}`;
  return `Uncaught ${formatResult(err)}`;
}

/**
 * Runs a command: expression first, statement on failure. Settles the
 * command's validity and reports what should be shown to the operator.
 */
export async function runCommand(command: Command, evaluator: Evaluator): Promise<CommandOutcome> {
  let pending: unknown;
  let evaluated = true;

  try {
    pending = evaluator.evaluate(command.text);
  } catch {
    evaluated = false;
  }

  try {
    if (evaluated) {
      const value = await settle(pending);
      command.settle(true);
      return isEmptyResult(value) ? { command } : { command, output: formatResult(value) };
    }
    await settle(evaluator.execute(command.text));
    command.settle(true);
    return { command };
  } catch (err) {
    command.settle(false);
    return { command, error: formatError(err) };
  }
}
