#!/usr/bin/env node

/**
 * scriptloom — CLI entry point: Commander.js setup with subcommand routing.
 */

import { Command } from "commander";
import pc from "picocolors";
import { createRunCommand } from "./commands/run.js";
import { createCapabilitiesCommand } from "./commands/capabilities.js";
import { createToolsCommand } from "./commands/tools.js";
import type { GlobalFlags } from "./flags.js";
import { logger, setLogLevel } from "../utils/index.js";

const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command()
    .name("scriptloom")
    .description("Run natural-language scripts against OpenAI, Anthropic or Google models with permission-gated tools")
    .version(VERSION, "-v, --version")
    .option("--verbose", "Enable debug logging")
    .option("--project-root <path>", "Override project root detection");

  program.hook("preAction", (thisCommand) => {
    if (thisCommand.opts<GlobalFlags>().verbose === true) {
      setLogLevel("debug");
    }
  });

  program.addCommand(createRunCommand());
  program.addCommand(createCapabilitiesCommand());
  program.addCommand(createToolsCommand());

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof Error) {
      logger.error({ error: error.message }, "CLI error");
      process.stderr.write(pc.red(`Error: ${error.message}\n`));
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  process.stderr.write(
    pc.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`),
  );
  process.exit(1);
});
