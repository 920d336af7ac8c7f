/**
 * `run <script>` — execute a script file against the configured agent.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { resolve } from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import { applyAgentOverrides, loadConfig, resolveProviderConfig, toPermissionPolicy } from "../../config/index.js";
import { Interpreter, describePolicy, denyAllConfirmer, loadRules } from "../../core/index.js";
import { createRuntimeRegistry } from "../../tools/index.js";
import { ConfigError } from "../../types/errors.js";
import type { IConfirmer } from "../../types/tool.js";
import { logger } from "../../utils/index.js";
import { collect, parsePositiveInt, resolveProjectRoot } from "../flags.js";
import type { GlobalFlags, IRunFlags } from "../flags.js";
import { attachProgress, printDiagnostics, printError } from "../output.js";

function readScript(path: string): string {
  const fullPath = resolve(path);
  if (!existsSync(fullPath) || !statSync(fullPath).isFile()) {
    throw new ConfigError("script", `script file not found: ${path}`);
  }
  return readFileSync(fullPath, "utf-8");
}

async function selectConfirmer(mode: string): Promise<IConfirmer> {
  if (process.stdin.isTTY === true) {
    const { createInkConfirmer } = await import("../../ui/confirmer.js");
    return createInkConfirmer();
  }
  if (mode === "ask") {
    process.stderr.write(
      pc.yellow("stdin is not a terminal: tool calls that need approval will be denied.\n"),
    );
  }
  return denyAllConfirmer;
}

export async function runScript(scriptPath: string, flags: IRunFlags, globals: GlobalFlags): Promise<void> {
  const projectRoot = resolveProjectRoot(globals);

  const settings = applyAgentOverrides(
    loadConfig({ projectRoot, agent: flags.agent }),
    {
      provider: flags.provider,
      model: flags.model,
      permissionMode: flags.permissionMode,
      allowed: flags.allow,
      maxTurns: flags.maxTurns,
      rules: flags.rules?.map((path) => resolve(path)),
    },
  );
  const provider = resolveProviderConfig(settings);
  const script = readScript(scriptPath);
  const rules = loadRules(settings.rules, projectRoot);

  const confirmer = await selectConfirmer(settings.permissions.mode);
  const { registry, diagnostics } = await createRuntimeRegistry({
    projectRoot,
    blockedCommands: settings.blockedCommands,
    confirmer,
  });
  printDiagnostics(diagnostics);

  const policy = toPermissionPolicy(settings.permissions);
  logger.debug(
    { agent: settings.name, provider: provider.kind, model: provider.model, policy: describePolicy(policy), origin: settings.origin },
    "Run configuration resolved",
  );

  const interpreter = new Interpreter({
    provider,
    registry,
    policy,
    confirmer,
    rules,
    workingDirectory: projectRoot,
    limits: {
      maxTurns: settings.maxTurns,
      maxRetries: settings.maxRetries,
      toolTimeoutMs: settings.toolTimeoutMs,
      maxToolOutputChars: settings.maxToolOutputChars,
    },
  });

  const controller = new AbortController();
  const onSigint = (): void => {
    process.stderr.write(pc.yellow("\nCancelling run...\n"));
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  const detach = attachProgress(interpreter.events);

  try {
    const result = await interpreter.run(script, { context: flags.context, signal: controller.signal });
    if (flags.json === true) {
      process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } else {
      process.stdout.write(`${result.finalText}\n`);
    }
    if (result.truncated) {
      process.stderr.write(pc.yellow("Warning: the model's last answer was cut off at the output token limit.\n"));
    }
  } finally {
    detach();
    process.removeListener("SIGINT", onSigint);
  }
}

export function createRunCommand(): Command {
  return new Command("run")
    .description("Run a script file")
    .argument("<script>", "Path to the script file")
    .option("-p, --provider <kind>", "Provider: openai, anthropic or google")
    .option("-m, --model <model>", "Model name")
    .option("-a, --agent <name>", "Agent from the configuration file")
    .option("--rules <files...>", "Extra rule files appended to the configured ones")
    .option("-c, --context <entry>", "Additional context (key=value or free text, repeatable)", collect, [])
    .option("--permission-mode <mode>", "allow-all, deny-unlisted or ask")
    .option("--allow <tools...>", "Tools allowed under deny-unlisted")
    .option("--max-turns <n>", "Maximum model turns", parsePositiveInt)
    .option("--json", "Print the run result (final text and transcript) as JSON")
    .action(async (script: string, flags: IRunFlags, command: Command) => {
      try {
        await runScript(script, flags, command.optsWithGlobals<GlobalFlags>());
      } catch (error: unknown) {
        printError(error);
      }
    });
}
