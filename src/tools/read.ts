/**
 * read_file — file reading with line numbers, offset/limit, binary detection.
 */

import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import type { IBuiltinToolOptions, IToolSpec } from "../types/tool.js";
import type { IToolResult } from "../types/message.js";
import { validatePath } from "../utils/sanitizer.js";
import { logger } from "../utils/logger.js";

const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10 MB
const DEFAULT_LINE_LIMIT = 2000;
const MAX_LINE_LENGTH = 2000;

const BINARY_EXTENSIONS = new Set([
  ".png", ".jpg", ".jpeg", ".gif", ".bmp", ".ico", ".webp",
  ".mp3", ".mp4", ".avi", ".mov", ".wav", ".flac",
  ".zip", ".gz", ".tar", ".bz2", ".7z", ".rar",
  ".exe", ".dll", ".so", ".dylib", ".o", ".a",
  ".pdf", ".woff", ".woff2", ".ttf", ".sqlite", ".db",
]);

export function isBinaryContent(filePath: string, buffer: Buffer): boolean {
  if (BINARY_EXTENSIONS.has(extname(filePath).toLowerCase())) {
    return true;
  }
  // Null byte in the first 8KB
  return buffer.subarray(0, 8192).includes(0);
}

export function formatWithLineNumbers(content: string, offset: number, limit: number): string {
  const allLines = content.split("\n");
  const startLine = Math.max(0, offset);
  const endLine = Math.min(allLines.length, startLine + limit);
  const padWidth = String(endLine).length;

  return allLines
    .slice(startLine, endLine)
    .map((line, idx) => {
      const lineNum = String(startLine + idx + 1).padStart(padWidth, " ");
      const shown = line.length > MAX_LINE_LENGTH ? line.substring(0, MAX_LINE_LENGTH) + "..." : line;
      return `${lineNum}\t${shown}`;
    })
    .join("\n");
}

function failure(error: string): IToolResult {
  return { success: false, output: "", error };
}

export function createReadFileTool(options: IBuiltinToolOptions): IToolSpec {
  const { projectRoot } = options;

  return {
    name: "read_file",
    description:
      "Read a text file from the project with line numbers. Supports offset and limit for large files.",
    parameters: [
      {
        name: "path",
        type: "string",
        description: "Path to the file, relative to the project root",
        required: true,
      },
      {
        name: "offset",
        type: "integer",
        description: "Line number to start reading from (0-indexed)",
        required: false,
        default: 0,
      },
      {
        name: "limit",
        type: "integer",
        description: "Maximum number of lines to read",
        required: false,
        default: DEFAULT_LINE_LIMIT,
      },
    ],
    requiresPermission: false,
    handler: async (args) => {
      const filePath = args["path"];
      if (typeof filePath !== "string" || filePath.length === 0) {
        return failure("path must be a non-empty string");
      }

      let resolvedPath: string;
      try {
        resolvedPath = validatePath(filePath, projectRoot);
      } catch (err: unknown) {
        return failure(err instanceof Error ? err.message : "Path validation failed");
      }

      let fileStat;
      try {
        fileStat = await stat(resolvedPath);
      } catch {
        return failure(`File not found: ${filePath}`);
      }

      if (!fileStat.isFile()) {
        return failure(`"${filePath}" is not a regular file. Use list_files for directories.`);
      }

      if (fileStat.size > MAX_FILE_SIZE) {
        return failure(
          `File is too large (${(fileStat.size / 1024 / 1024).toFixed(1)} MB). Maximum is ${MAX_FILE_SIZE / 1024 / 1024} MB.`,
        );
      }

      const rawBuffer = await readFile(resolvedPath);
      if (isBinaryContent(resolvedPath, rawBuffer)) {
        return {
          success: true,
          output: `Binary file: ${filePath} (${fileStat.size} bytes). Cannot display binary content.`,
        };
      }

      const content = rawBuffer.toString("utf-8");
      if (content.length === 0) {
        return { success: true, output: `File "${filePath}" exists but is empty.` };
      }

      const offset = typeof args["offset"] === "number" ? args["offset"] : 0;
      const limit = typeof args["limit"] === "number" ? args["limit"] : DEFAULT_LINE_LIMIT;

      logger.debug({ file: resolvedPath, offset, limit }, "File read");
      return { success: true, output: formatWithLineNumbers(content, offset, limit) };
    },
  };
}
