/**
 * `capabilities` — list the tools a run would have and the active policy.
 */

import { Command } from "commander";
import pc from "picocolors";
import { loadConfig, toPermissionPolicy } from "../../config/index.js";
import { describePolicy } from "../../core/index.js";
import { createRuntimeRegistry } from "../../tools/index.js";
import { resolveProjectRoot } from "../flags.js";
import type { GlobalFlags, ICapabilitiesFlags } from "../flags.js";
import { printDiagnostics, printError } from "../output.js";

export function createCapabilitiesCommand(): Command {
  return new Command("capabilities")
    .description("Show available tools and the permission policy")
    .option("-d, --detailed", "List each tool's parameters and source")
    .option("-a, --agent <name>", "Agent whose settings to show")
    .action(async (flags: ICapabilitiesFlags, command: Command) => {
      try {
        const globals = command.optsWithGlobals<GlobalFlags>();
        const projectRoot = resolveProjectRoot(globals);
        const settings = loadConfig({ projectRoot, agent: flags.agent });
        const { registry, diagnostics } = await createRuntimeRegistry({
          projectRoot,
          blockedCommands: settings.blockedCommands,
        });
        printDiagnostics(diagnostics);

        process.stdout.write(`${pc.bold("Agent:")} ${settings.name} (${settings.provider}/${settings.model})\n`);
        process.stdout.write(`${pc.bold("Permissions:")} ${describePolicy(toPermissionPolicy(settings.permissions))}\n`);
        process.stdout.write(`${pc.bold("Config:")} ${settings.origin}\n\n`);
        process.stdout.write(`${registry.describeCapabilities(flags.detailed === true)}\n`);
      } catch (error: unknown) {
        printError(error);
      }
    });
}
