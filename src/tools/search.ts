/**
 * search — regex search over file contents.
 * Files are enumerated with fast-glob and scanned line by line, so no external
 * search binary is needed.
 */

import fg from "fast-glob";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { IBuiltinToolOptions, IToolSpec } from "../types/tool.js";
import type { IToolResult } from "../types/message.js";
import { logger } from "../utils/logger.js";
import { truncateText, validatePath } from "../utils/sanitizer.js";
import { IGNORED_DIRECTORIES } from "./list-files.js";

const MAX_OUTPUT_LENGTH = 30_000;
const DEFAULT_MAX_RESULTS = 200;
const MAX_SEARCHED_FILE_SIZE = 2 * 1024 * 1024;

type OutputMode = "content" | "files_with_matches" | "count";

function failure(error: string): IToolResult {
  return { success: false, output: "", error };
}

function toOutputMode(value: unknown): OutputMode {
  return value === "files_with_matches" || value === "count" ? value : "content";
}

export function createSearchTool(options: IBuiltinToolOptions): IToolSpec {
  const { projectRoot } = options;

  return {
    name: "search",
    description:
      "Search file contents with a regular expression. Reports matching lines as path:line: text.",
    parameters: [
      {
        name: "pattern",
        type: "string",
        description: "Regular expression to search for",
        required: true,
      },
      {
        name: "path",
        type: "string",
        description: "Directory to search, relative to the project root. Defaults to the root.",
        required: false,
      },
      {
        name: "glob",
        type: "string",
        description: 'Glob filter for files (e.g. "**/*.md")',
        required: false,
        default: "**/*",
      },
      {
        name: "output_mode",
        type: "string",
        description: "Output mode: content, files_with_matches, or count",
        required: false,
        default: "content",
        enum: ["content", "files_with_matches", "count"],
      },
      {
        name: "case_insensitive",
        type: "boolean",
        description: "Case insensitive search",
        required: false,
        default: false,
      },
      {
        name: "max_results",
        type: "integer",
        description: "Stop after this many matching lines",
        required: false,
        default: DEFAULT_MAX_RESULTS,
      },
    ],
    requiresPermission: false,
    handler: async (args, context) => {
      const pattern = args["pattern"];
      if (typeof pattern !== "string" || pattern.length === 0) {
        return failure("pattern must be a non-empty string");
      }

      let regex: RegExp;
      try {
        regex = new RegExp(pattern, args["case_insensitive"] === true ? "i" : "");
      } catch (err: unknown) {
        return failure(`Invalid regular expression: ${err instanceof Error ? err.message : pattern}`);
      }

      let searchPath = projectRoot;
      if (typeof args["path"] === "string" && args["path"].length > 0) {
        try {
          searchPath = validatePath(args["path"], projectRoot);
        } catch (err: unknown) {
          return failure(err instanceof Error ? err.message : "Path validation failed");
        }
      }

      const glob = typeof args["glob"] === "string" && args["glob"].length > 0 ? args["glob"] : "**/*";
      const outputMode = toOutputMode(args["output_mode"]);
      const maxResults = typeof args["max_results"] === "number" && args["max_results"] > 0
        ? args["max_results"]
        : DEFAULT_MAX_RESULTS;

      const files = await fg(glob, {
        cwd: searchPath,
        onlyFiles: true,
        ignore: [...IGNORED_DIRECTORIES],
      });
      files.sort();

      const lines: string[] = [];
      let matchCount = 0;

      for (const file of files) {
        if (context.signal.aborted || matchCount >= maxResults) {
          break;
        }

        const buffer = await readFile(join(searchPath, file));
        if (buffer.length > MAX_SEARCHED_FILE_SIZE || buffer.includes(0)) {
          continue;
        }

        let fileMatches = 0;
        const fileLines = buffer.toString("utf-8").split("\n");
        for (let i = 0; i < fileLines.length && matchCount < maxResults; i++) {
          const line = fileLines[i] ?? "";
          if (!regex.test(line)) {
            continue;
          }
          fileMatches++;
          matchCount++;
          if (outputMode === "content") {
            lines.push(`${file}:${i + 1}: ${line}`);
          }
        }

        if (fileMatches > 0 && outputMode === "files_with_matches") {
          lines.push(file);
        } else if (fileMatches > 0 && outputMode === "count") {
          lines.push(`${file}:${fileMatches}`);
        }
      }

      logger.debug({ pattern, searchPath, files: files.length, matches: matchCount }, "Search complete");

      if (lines.length === 0) {
        return { success: true, output: "No matches found." };
      }
      return { success: true, output: truncateText(lines.join("\n"), MAX_OUTPUT_LENGTH) };
    },
  };
}
