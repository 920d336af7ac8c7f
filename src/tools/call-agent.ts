/**
 * call_agent — delegate a subtask to another configured agent.
 *
 * The subtask runs in its own Interpreter with a fresh registry of the
 * built-in tools (without call_agent) under the chosen agent's provider,
 * rules and permission settings. The nested run's final answer becomes the
 * tool output.
 */

import { applyAgentOverrides, loadConfig, toPermissionPolicy } from "../config/config-loader.js";
import { resolveProviderConfig } from "../config/provider-config.js";
import { Interpreter } from "../core/interpreter.js";
import { loadRules } from "../core/context-assembler.js";
import type { ProviderAdapterFactory } from "../providers/types.js";
import { ScriptloomError } from "../types/errors.js";
import type { IToolResult } from "../types/message.js";
import { PROVIDER_KINDS } from "../types/model.js";
import type { IBuiltinToolOptions, IToolSpec } from "../types/tool.js";
import { logger } from "../utils/logger.js";
import { ToolRegistry } from "./registry.js";

const CALL_AGENT_TIMEOUT_MS = 300_000;

export interface ICallAgentOptions extends IBuiltinToolOptions {
  /** Tools registered for each nested run. */
  readonly createTools: () => readonly IToolSpec[];
  readonly createAdapter?: ProviderAdapterFactory | undefined;
  /** Source of API keys; defaults to the process environment. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

function failure(error: string): IToolResult {
  return { success: false, output: "", error };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

export function createCallAgentTool(options: ICallAgentOptions): IToolSpec {
  return {
    name: "call_agent",
    description:
      "Delegate a subtask to a configured agent. The agent works on the instructions with its own tools and returns its final answer.",
    parameters: [
      {
        name: "instructions",
        type: "string",
        description: "The task to give to the agent",
        required: true,
      },
      {
        name: "agent",
        type: "string",
        description: "Name of a configured agent (default agent when omitted)",
        required: false,
      },
      {
        name: "provider",
        type: "string",
        description: "Override the agent's provider",
        required: false,
        enum: [...PROVIDER_KINDS],
      },
      {
        name: "model",
        type: "string",
        description: "Override the agent's model",
        required: false,
      },
      {
        name: "rules",
        type: "array",
        description: "Extra rule files for this call, relative to the project root",
        required: false,
      },
    ],
    requiresPermission: true,
    timeoutMs: CALL_AGENT_TIMEOUT_MS,
    handler: async (args, context) => {
      const instructions = optionalString(args["instructions"]);
      if (instructions === undefined) {
        return failure("instructions must be a non-empty string");
      }
      const agentName = optionalString(args["agent"]);
      const label = agentName ?? "default agent";

      try {
        const settings = applyAgentOverrides(
          loadConfig({ projectRoot: options.projectRoot, agent: agentName }),
          {
            provider: optionalString(args["provider"]),
            model: optionalString(args["model"]),
            rules: stringList(args["rules"]),
          },
        );
        const provider = resolveProviderConfig(settings, options.env);

        const registry = new ToolRegistry();
        for (const tool of options.createTools()) {
          registry.register(tool);
        }

        const interpreter = new Interpreter({
          provider,
          registry,
          policy: toPermissionPolicy(settings.permissions),
          confirmer: options.confirmer,
          rules: loadRules(settings.rules, options.projectRoot),
          workingDirectory: context.workingDirectory,
          limits: {
            maxTurns: settings.maxTurns,
            maxRetries: settings.maxRetries,
            toolTimeoutMs: settings.toolTimeoutMs,
            maxToolOutputChars: settings.maxToolOutputChars,
          },
          createAdapter: options.createAdapter,
        });

        logger.info({ agent: settings.name, provider: provider.kind, model: provider.model }, "Delegating to agent");
        const result = await interpreter.run(instructions, { signal: context.signal });

        return { success: true, output: result.finalText };
      } catch (error: unknown) {
        if (error instanceof ScriptloomError) {
          logger.debug({ agent: label, code: error.code }, "Agent call failed");
          return failure(`Agent call to ${label} failed: ${error.userMessage}`);
        }
        throw error;
      }
    },
  };
}
