/**
 * Terminal output helpers: error reporting, exit codes and run progress.
 * Progress goes to stderr so stdout carries only the run's final text.
 */

import pc from "picocolors";
import { ConfigError, ScriptloomError } from "../types/errors.js";
import type { IToolLoadDiagnostic } from "../types/tool.js";
import type { EventBus } from "../core/event-bus.js";

export const EXIT_RUN_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_RUN_FAILURE;
}

export function formatError(error: unknown): string {
  if (error instanceof ScriptloomError) {
    const lines = [`Error: ${error.userMessage}`];
    if (error.suggestedRecovery !== undefined) {
      lines.push(`Hint: ${error.suggestedRecovery}`);
    }
    return lines.join("\n");
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

export function printError(error: unknown): void {
  process.stderr.write(pc.red(`${formatError(error)}\n`));
  process.exitCode = exitCodeFor(error);
}

export function printDiagnostics(diagnostics: readonly IToolLoadDiagnostic[]): void {
  for (const diagnostic of diagnostics) {
    const name = diagnostic.toolName !== undefined ? ` (${diagnostic.toolName})` : "";
    process.stderr.write(pc.yellow(`Skipped tool ${diagnostic.path}${name}: ${diagnostic.reason}\n`));
  }
}

/**
 * Echo tool activity while a run is in progress. Returns an unsubscribe.
 */
export function attachProgress(events: EventBus): () => void {
  const unsubscribers = [
    events.on("tool:call", ({ name }) => {
      process.stderr.write(pc.dim(`⚙ ${name}\n`));
    }),
    events.on("tool:result", ({ name, success, denied, durationMs }) => {
      const status = denied
        ? pc.yellow("denied")
        : success
          ? pc.green("ok")
          : pc.red("failed");
      process.stderr.write(pc.dim(`  → ${name} ${status} ${pc.dim(`(${durationMs}ms)`)}\n`));
    }),
  ];
  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
