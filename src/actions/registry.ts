/**
 * Action registry — process-wide table of zero-argument callables.
 *
 * Helper modules register actions at load time (see loader/module-loader.ts);
 * any console session created afterwards can invoke them by typing the name.
 * Follows the Map-based registry pattern used elsewhere in the codebase.
 */

import { createLogger } from "../infra/logger.js";

const log = createLogger("actions");

export type Action = () => unknown;

export class ActionRegistry {
  private actions = new Map<string, Action>();

  /**
   * Store `fn` under `name` and hand it back unchanged.
   * A later registration under the same name replaces the earlier one.
   */
  register<T extends Action>(name: string, fn: T): T {
    if (this.actions.has(name)) {
      log.warn("Action %s registered twice, replacing previous definition", name);
    }
    this.actions.set(name, fn);
    log.debug("Registered action: %s", name);
    return fn;
  }

  lookup(name: string): Action | undefined {
    return this.actions.get(name);
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  names(): string[] {
    return [...this.actions.keys()];
  }

  get size(): number {
    return this.actions.size;
  }

  render(prefix = "\t"): string {
    return ["Registered actions:", ...this.names().map((name) => prefix + name)].join("\n");
  }

  /** Teardown only. Sessions never remove actions. */
  clear(): void {
    this.actions.clear();
  }
}

let registry: ActionRegistry | null = null;

export function getActionRegistry(): ActionRegistry {
  if (!registry) registry = new ActionRegistry();
  return registry;
}

export function resetActionRegistry(): void {
  registry?.clear();
}

/**
 * Registration wrapper. Records `fn` in the process-wide registry under its
 * own name (or `name`) and returns it, so it can wrap a definition in place:
 *
 *   export const openLogin = action(async function openLogin() { ... });
 */
export function action<T extends Action>(fn: T, name: string = fn.name): T {
  if (!name) {
    throw new TypeError("Cannot register an anonymous action without an explicit name");
  }
  return getActionRegistry().register(name, fn);
}
