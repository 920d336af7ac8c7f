/**
 * Input/output sanitization.
 * Treat all model-generated content as untrusted.
 */

import { resolve, normalize, sep } from "node:path";

/**
 * Quote a value for safe inclusion in a POSIX shell command line.
 */
export function sanitizeShellArg(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Validate a file path is within the allowed project root.
 * Prevents directory traversal.
 */
export function validatePath(filePath: string, projectRoot: string): string {
  const normalizedRoot = normalize(resolve(projectRoot));
  const normalizedPath = normalize(resolve(normalizedRoot, filePath));

  const inside =
    normalizedPath === normalizedRoot ||
    normalizedPath.startsWith(normalizedRoot.endsWith(sep) ? normalizedRoot : normalizedRoot + sep);

  if (!inside) {
    throw new Error(
      `Path traversal detected: "${filePath}" resolves outside project root "${projectRoot}"`,
    );
  }

  return normalizedPath;
}

/**
 * Check if a shell command is on the blocked list.
 */
export function isCommandBlocked(
  command: string,
  blockedCommands: readonly string[],
): boolean {
  const normalizedCommand = command.trim().toLowerCase();
  return blockedCommands.some((blocked) =>
    normalizedCommand.includes(blocked.toLowerCase()),
  );
}

/**
 * Redact potential secrets from text for logging.
 */
export function redactSecrets(text: string): string {
  return text
    .replace(/sk-ant-api\S+/g, "sk-ant-api[REDACTED]")
    .replace(/sk-[a-zA-Z0-9]{20,}/g, "sk-[REDACTED]")
    .replace(/AIza[a-zA-Z0-9_-]{35}/g, "AIza[REDACTED]")
    .replace(/ghp_[a-zA-Z0-9]{36}/g, "ghp_[REDACTED]")
    .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]");
}

/**
 * Shorten and redact tool arguments before they reach the log.
 */
export function redactToolArgs(args: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value === "string") {
      const shortened = value.length > 200 ? value.slice(0, 200) + "..." : value;
      redacted[key] = redactSecrets(shortened);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

/**
 * Sanitize user input for safe inclusion in prompts.
 */
export function sanitizePromptInput(input: string): string {
  // Strip null bytes
  return input.replace(/\0/g, "");
}

/**
 * Cut text to `maxLength` characters, noting how much was dropped.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}\n...(truncated ${text.length - maxLength} characters)`;
}
