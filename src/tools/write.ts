/**
 * write_file — write or append to files, create parent dirs, restrict
 * permissions on credential-looking files.
 */

import { appendFile, mkdir, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname } from "node:path";
import type { IBuiltinToolOptions, IToolSpec } from "../types/tool.js";
import type { IToolResult } from "../types/message.js";
import { validatePath } from "../utils/sanitizer.js";
import { logger } from "../utils/logger.js";

const CONFIG_EXTENSIONS = new Set([
  ".env", ".pem", ".key", ".crt", ".p12", ".pfx", ".jks",
]);

const SENSITIVE_FILENAMES = new Set([
  ".env", ".env.local", ".env.production", ".env.development",
  "credentials.json", "secrets.json", "id_rsa", "id_ed25519",
]);

function isConfigFile(filePath: string): boolean {
  return CONFIG_EXTENSIONS.has(extname(filePath).toLowerCase()) ||
    SENSITIVE_FILENAMES.has(basename(filePath));
}

function failure(error: string): IToolResult {
  return { success: false, output: "", error };
}

async function isExistingFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export function createWriteFileTool(options: IBuiltinToolOptions): IToolSpec {
  const { projectRoot } = options;

  return {
    name: "write_file",
    description:
      "Write content to a file in the project. Creates parent directories if needed. Overwrites unless append is true.",
    parameters: [
      {
        name: "path",
        type: "string",
        description: "Path to the file, relative to the project root",
        required: true,
      },
      {
        name: "content",
        type: "string",
        description: "The content to write",
        required: true,
      },
      {
        name: "append",
        type: "boolean",
        description: "Append to the file instead of replacing it",
        required: false,
        default: false,
      },
    ],
    requiresPermission: true,
    handler: async (args) => {
      const filePath = args["path"];
      const content = args["content"];

      if (typeof filePath !== "string" || filePath.length === 0) {
        return failure("path must be a non-empty string");
      }
      if (typeof content !== "string") {
        return failure("content must be a string");
      }

      let resolvedPath: string;
      try {
        resolvedPath = validatePath(filePath, projectRoot);
      } catch (err: unknown) {
        return failure(err instanceof Error ? err.message : "Path validation failed");
      }

      try {
        await mkdir(dirname(resolvedPath), { recursive: true });
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : "Failed to create directory";
        return failure(`Failed to create parent directory: ${msg}`);
      }

      const fileMode = isConfigFile(resolvedPath) ? 0o600 : 0o644;
      const existed = await isExistingFile(resolvedPath);
      const append = args["append"] === true;

      try {
        if (append) {
          await appendFile(resolvedPath, content, { encoding: "utf-8", mode: fileMode });
        } else {
          await writeFile(resolvedPath, content, { encoding: "utf-8", mode: fileMode });
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : "Write failed";
        return failure(`Failed to write file: ${msg}`);
      }

      const lineCount = content.split("\n").length;
      const action = append ? (existed ? "Appended to" : "Created") : existed ? "Updated" : "Created";

      logger.debug({ file: resolvedPath, lines: lineCount, mode: fileMode.toString(8) }, "File written");
      return { success: true, output: `${action} ${filePath} (${lineCount} lines)` };
    },
  };
}
