/**
 * `tools` — inspect the tool registry.
 */

import { Command } from "commander";
import { loadScriptloomConfig } from "../../config/index.js";
import { createRuntimeRegistry } from "../../tools/index.js";
import type { ToolRegistry } from "../../tools/index.js";
import { ConfigError } from "../../types/errors.js";
import { resolveProviderKind } from "../../types/model.js";
import { resolveProjectRoot } from "../flags.js";
import type { GlobalFlags, IToolsSchemaFlags } from "../flags.js";
import { printDiagnostics, printError } from "../output.js";

async function loadRegistry(command: Command): Promise<ToolRegistry> {
  const projectRoot = resolveProjectRoot(command.optsWithGlobals<GlobalFlags>());
  const { config } = loadScriptloomConfig({ projectRoot });
  const { registry, diagnostics } = await createRuntimeRegistry({
    projectRoot,
    blockedCommands: config.blockedCommands,
  });
  printDiagnostics(diagnostics);
  return registry;
}

export function createToolsCommand(): Command {
  const tools = new Command("tools").description("Inspect registered tools");

  tools
    .command("schema")
    .description("Print the tool descriptors sent to a provider")
    .requiredOption("-p, --provider <kind>", "openai, anthropic or google")
    .action(async (flags: IToolsSchemaFlags, command: Command) => {
      try {
        const kind = resolveProviderKind(flags.provider);
        if (kind === undefined) {
          throw new ConfigError("provider", `unknown provider "${flags.provider}"`);
        }
        const registry = await loadRegistry(command);
        process.stdout.write(`${JSON.stringify(registry.toProviderSchema(kind), null, 2)}\n`);
      } catch (error: unknown) {
        printError(error);
      }
    });

  tools
    .command("list")
    .description("List tool names")
    .action(async (_flags: unknown, command: Command) => {
      try {
        const registry = await loadRegistry(command);
        process.stdout.write(`${registry.names().join("\n")}\n`);
      } catch (error: unknown) {
        printError(error);
      }
    });

  return tools;
}
