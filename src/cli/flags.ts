/**
 * CLI flag shapes and option parsers shared by the commands.
 */

import { resolve } from "node:path";
import { InvalidArgumentError } from "commander";
import { findProjectRoot } from "../utils/pathResolver.js";

/** Options declared on the root program (a type alias so it fits commander's OptionValues). */
export type GlobalFlags = {
  readonly verbose?: boolean | undefined;
  readonly projectRoot?: string | undefined;
};

export interface IRunFlags {
  readonly provider?: string | undefined;
  readonly model?: string | undefined;
  readonly agent?: string | undefined;
  readonly rules?: string[] | undefined;
  readonly context: string[];
  readonly permissionMode?: string | undefined;
  readonly allow?: string[] | undefined;
  readonly maxTurns?: number | undefined;
  readonly json?: boolean | undefined;
}

export interface ICapabilitiesFlags {
  readonly detailed?: boolean | undefined;
  readonly agent?: string | undefined;
}

export interface IToolsSchemaFlags {
  readonly provider: string;
}

/** Accumulate a repeatable option into an array. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function resolveProjectRoot(globals: GlobalFlags): string {
  return globals.projectRoot !== undefined
    ? resolve(globals.projectRoot)
    : findProjectRoot(process.cwd());
}
