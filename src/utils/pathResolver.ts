/**
 * Safe path handling. No hardcoded paths: everything derives from
 * os.homedir() or the detected project root.
 */

import { homedir } from "node:os";
import { join, dirname } from "node:path";
import { existsSync } from "node:fs";

const CONFIG_DIR_NAME = ".scriptloom";
const CONFIG_FILE_NAME = "config.json";

// ── User-level paths ─────────────────────────────────────────────────────

export function getScriptloomHome(): string {
  return process.env["SCRIPTLOOM_HOME"] ?? join(homedir(), CONFIG_DIR_NAME);
}

export function getUserConfigPath(): string {
  return join(getScriptloomHome(), CONFIG_FILE_NAME);
}

export function getUserToolsDir(): string {
  return join(getScriptloomHome(), "tools");
}

// ── Project-level paths ──────────────────────────────────────────────────

export function getProjectConfigDir(projectRoot: string): string {
  return join(projectRoot, CONFIG_DIR_NAME);
}

export function getProjectConfigPath(projectRoot: string): string {
  return join(getProjectConfigDir(projectRoot), CONFIG_FILE_NAME);
}

export function getProjectToolsDir(projectRoot: string): string {
  return join(getProjectConfigDir(projectRoot), "tools");
}

// ── Project Root Detection ───────────────────────────────────────────────

export function findProjectRoot(startDir?: string): string {
  let currentDir = startDir ?? process.cwd();

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, CONFIG_DIR_NAME))) {
      return currentDir;
    }
    if (existsSync(join(currentDir, ".git"))) {
      return currentDir;
    }
    if (existsSync(join(currentDir, "package.json"))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  // Fallback to the start directory
  return startDir ?? process.cwd();
}
