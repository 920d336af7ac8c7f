/**
 * shell — command execution with timeout, blocklist and a scrubbed environment.
 */

import { execa } from "execa";
import type { IBuiltinToolOptions, IToolSpec } from "../types/tool.js";
import type { IToolResult } from "../types/message.js";
import { isCommandBlocked, redactSecrets, truncateText } from "../utils/sanitizer.js";
import { logger } from "../utils/logger.js";

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_TIMEOUT_MS = 600_000;
const MAX_OUTPUT_LENGTH = 30_000;

const DANGEROUS_PATTERNS: readonly string[] = [
  "rm -rf /",
  "rm -rf ~",
  "mkfs",
  "dd if=",
  "> /dev/sd",
  "chmod -R 777 /",
  ":(){ :|:& };:",
  "shutdown",
  "reboot",
];

const SENSITIVE_ENV_PATTERNS: readonly string[] = [
  "API_KEY",
  "SECRET",
  "TOKEN",
  "PASSWORD",
  "CREDENTIAL",
  "PRIVATE_KEY",
];

export function filterSensitiveEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const filtered: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    const upperKey = key.toUpperCase();
    if (!SENSITIVE_ENV_PATTERNS.some((pattern) => upperKey.includes(pattern))) {
      filtered[key] = value;
    }
  }
  return filtered;
}

function failure(error: string, output = ""): IToolResult {
  return { success: false, output, error };
}

export function createShellTool(options: IBuiltinToolOptions): IToolSpec {
  const blockedCommands = options.blockedCommands ?? [];

  return {
    name: "shell",
    description:
      "Execute a shell command in the project directory and return its output.",
    parameters: [
      {
        name: "command",
        type: "string",
        description: "The shell command to execute",
        required: true,
      },
      {
        name: "timeout",
        type: "integer",
        description: `Timeout in milliseconds (max ${MAX_TIMEOUT_MS})`,
        required: false,
        default: DEFAULT_TIMEOUT_MS,
      },
    ],
    requiresPermission: true,
    handler: async (args, context) => {
      const command = args["command"];
      if (typeof command !== "string" || command.trim().length === 0) {
        return failure("command must be a non-empty string");
      }

      const lowerCommand = command.toLowerCase().trim();
      const dangerous = DANGEROUS_PATTERNS.find((pattern) => lowerCommand.includes(pattern));
      if (dangerous !== undefined) {
        return failure(`Blocked: command matches dangerous pattern "${dangerous}"`);
      }
      if (isCommandBlocked(command, blockedCommands)) {
        return failure("Command is on the blocked list and cannot be executed");
      }

      const timeoutMs = typeof args["timeout"] === "number"
        ? Math.max(1000, Math.min(args["timeout"], MAX_TIMEOUT_MS))
        : DEFAULT_TIMEOUT_MS;

      logger.debug(
        { command: redactSecrets(command), timeout: timeoutMs, cwd: context.workingDirectory },
        "Executing shell command",
      );

      const result = await execa(command, {
        shell: true,
        cwd: context.workingDirectory,
        timeout: timeoutMs,
        cancelSignal: context.signal,
        reject: false,
        stripFinalNewline: true,
        extendEnv: false,
        env: { ...filterSensitiveEnv(process.env), TERM: "dumb", NO_COLOR: "1" },
      });

      const stdout = truncateText(result.stdout, MAX_OUTPUT_LENGTH);
      const stderr = truncateText(result.stderr, MAX_OUTPUT_LENGTH);

      let output = stdout;
      if (stderr.length > 0) {
        output += (output.length > 0 ? "\n\nSTDERR:\n" : "STDERR:\n") + stderr;
      }

      if (result.timedOut) {
        return failure(`Command timed out after ${timeoutMs}ms`, output);
      }
      if (result.isCanceled) {
        return failure("Command was cancelled", output);
      }

      const exitCode = result.exitCode ?? -1;
      if (exitCode !== 0) {
        logger.debug({ command: redactSecrets(command), exitCode }, "Shell command failed");
        return failure(`Command exited with code ${exitCode}`, output);
      }

      return {
        success: true,
        output: output.length > 0 ? output : "Command completed with exit code 0.",
      };
    },
  };
}
