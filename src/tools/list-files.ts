/**
 * list_files — glob-based file listing under the project root.
 */

import fg from "fast-glob";
import type { IBuiltinToolOptions, IToolSpec } from "../types/tool.js";
import type { IToolResult } from "../types/message.js";
import { logger } from "../utils/logger.js";
import { validatePath } from "../utils/sanitizer.js";

const MAX_RESULTS = 1000;

export const IGNORED_DIRECTORIES: readonly string[] = [
  "**/node_modules/**",
  "**/.git/**",
  "**/dist/**",
  "**/build/**",
  "**/coverage/**",
];

function failure(error: string): IToolResult {
  return { success: false, output: "", error };
}

export function createListFilesTool(options: IBuiltinToolOptions): IToolSpec {
  const { projectRoot } = options;

  return {
    name: "list_files",
    description:
      "List files matching a glob pattern. Paths are relative to the searched directory and sorted alphabetically.",
    parameters: [
      {
        name: "pattern",
        type: "string",
        description: 'Glob pattern to match (e.g. "**/*.ts"). Defaults to "*".',
        required: false,
        default: "*",
      },
      {
        name: "path",
        type: "string",
        description: "Directory to list, relative to the project root. Defaults to the root.",
        required: false,
      },
      {
        name: "include_hidden",
        type: "boolean",
        description: "Include dot-files",
        required: false,
        default: false,
      },
    ],
    requiresPermission: false,
    handler: async (args) => {
      const pattern = typeof args["pattern"] === "string" && args["pattern"].length > 0
        ? args["pattern"]
        : "*";

      let searchPath = projectRoot;
      if (typeof args["path"] === "string" && args["path"].length > 0) {
        try {
          searchPath = validatePath(args["path"], projectRoot);
        } catch (err: unknown) {
          return failure(err instanceof Error ? err.message : "Path validation failed");
        }
      }

      let matched: string[];
      try {
        matched = await fg(pattern, {
          cwd: searchPath,
          dot: args["include_hidden"] === true,
          onlyFiles: true,
          ignore: [...IGNORED_DIRECTORIES],
        });
      } catch (err: unknown) {
        return failure(err instanceof Error ? err.message : "File listing failed");
      }

      if (matched.length === 0) {
        return { success: true, output: "No files found" };
      }

      matched.sort();
      const truncated = matched.length > MAX_RESULTS;
      const shown = truncated ? matched.slice(0, MAX_RESULTS) : matched;

      logger.debug({ pattern, searchPath, total: matched.length }, "File listing complete");

      const suffix = truncated ? `\n\n(Showing ${MAX_RESULTS} of ${matched.length} files)` : "";
      return { success: true, output: shown.join("\n") + suffix };
    },
  };
}
