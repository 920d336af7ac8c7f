import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  findProjectRoot,
  getProjectConfigPath,
  getProjectToolsDir,
  getUserConfigPath,
  getUserToolsDir,
} from "../../src/utils/pathResolver.js";

describe("pathResolver", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "scriptloom-paths-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(root, { recursive: true, force: true });
  });

  it("places user files under SCRIPTLOOM_HOME", () => {
    vi.stubEnv("SCRIPTLOOM_HOME", join(root, "home"));
    expect(getUserConfigPath()).toBe(join(root, "home", "config.json"));
    expect(getUserToolsDir()).toBe(join(root, "home", "tools"));
  });

  it("places project files under .scriptloom", () => {
    expect(getProjectConfigPath("/work")).toBe(join("/work", ".scriptloom", "config.json"));
    expect(getProjectToolsDir("/work")).toBe(join("/work", ".scriptloom", "tools"));
  });

  it("walks up to the directory holding .scriptloom", () => {
    mkdirSync(join(root, ".scriptloom"));
    mkdirSync(join(root, "a", "b"), { recursive: true });
    expect(findProjectRoot(join(root, "a", "b"))).toBe(root);
  });
});
