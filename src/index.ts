// Public API exports
export { activate, ConsoleSession, QUIT_TOKENS, DEFAULT_PROMPT, type ActivateOptions, type SessionOptions, type SessionState, type LineOutcome } from "./console/session.js";
export { Command, CommandCache, UnsupportedOperationError, type CommandValidity } from "./console/command-cache.js";
export { VmEvaluator, runCommand, type Evaluator, type Namespace, type CommandOutcome } from "./console/evaluator.js";
export { TerminalIO, type ConsoleIO } from "./console/io.js";
export { here, type CallSite } from "./console/call-site.js";
export { ActionRegistry, action, getActionRegistry, resetActionRegistry, type Action } from "./actions/registry.js";
export { discover, load, setup, ImportResolutionError, DEFAULT_IGNORE_DIRECTORIES, type ImportPlanEntry, type LoaderOptions } from "./loader/module-loader.js";
export { BrowserDriver, launchDriver, type DriverHandle, type DriverPage, type ElementLocator } from "./browser/driver.js";
export { loadConfig, saveConfig } from "./config/config.js";
export type { PerchConfig, BrowserName } from "./config/schema.js";
