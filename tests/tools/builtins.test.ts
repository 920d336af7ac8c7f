import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createBuiltinTools, createDefaultRegistry, createRuntimeRegistry } from "../../src/tools/index.js";
import { createReadFileTool } from "../../src/tools/read.js";
import { createWriteFileTool } from "../../src/tools/write.js";
import { createListFilesTool } from "../../src/tools/list-files.js";
import { createSearchTool } from "../../src/tools/search.js";
import { createShellTool } from "../../src/tools/shell.js";
import { checkUrl, createWebTool, stripHtmlTags } from "../../src/tools/web.js";
import type { IToolExecutionContext } from "../../src/types/tool.js";

let root: string;
let context: IToolExecutionContext;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "scriptloom-builtins-"));
  context = { workingDirectory: root, signal: new AbortController().signal };
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("createBuiltinTools", () => {
  it("creates the built-ins with their permission requirements", () => {
    const tools = createBuiltinTools({ projectRoot: "/tmp" });
    expect(tools.map((tool) => [tool.name, tool.requiresPermission])).toEqual([
      ["read_file", false],
      ["write_file", true],
      ["list_files", false],
      ["search", false],
      ["shell", true],
      ["web", false],
      ["call_agent", true],
    ]);
    expect(createDefaultRegistry({ projectRoot: "/tmp" }).size).toBe(7);
  });
});

describe("createRuntimeRegistry", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("layers project and then user tools over the built-ins", async () => {
    const home = join(root, "home");
    mkdirSync(join(home, "tools"), { recursive: true });
    mkdirSync(join(root, ".scriptloom", "tools"), { recursive: true });
    vi.stubEnv("SCRIPTLOOM_HOME", home);

    writeFileSync(
      join(home, "tools", "greet.json"),
      JSON.stringify({ name: "greet", description: "User greeting", command: "echo user" }),
    );
    writeFileSync(
      join(root, ".scriptloom", "tools", "greet.json"),
      JSON.stringify({ name: "greet", description: "Project greeting", command: "echo project" }),
    );
    writeFileSync(
      join(root, ".scriptloom", "tools", "web.json"),
      JSON.stringify({ name: "web", description: "Offline stand-in", requires_permission: false, command: "echo offline" }),
    );
    writeFileSync(join(root, ".scriptloom", "tools", "broken.json"), "{");

    const { registry, diagnostics } = await createRuntimeRegistry({ projectRoot: root });

    expect(registry.names()).toEqual([
      "read_file",
      "write_file",
      "list_files",
      "search",
      "shell",
      "web",
      "call_agent",
      "greet",
    ]);
    expect(registry.get("greet")?.description).toBe("User greeting");
    expect(registry.get("web")?.description).toBe("Offline stand-in");
    expect(diagnostics.map((d) => d.path)).toEqual([join(root, ".scriptloom", "tools", "broken.json")]);
  });
});

describe("read_file", () => {
  it("numbers lines and honours offset and limit", async () => {
    writeFileSync(join(root, "a.txt"), "one\ntwo\nthree");
    const tool = createReadFileTool({ projectRoot: root });

    expect(await tool.handler({ path: "a.txt" }, context)).toEqual({
      success: true,
      output: "1\tone\n2\ttwo\n3\tthree",
    });
    expect(await tool.handler({ path: "a.txt", offset: 1, limit: 1 }, context)).toEqual({
      success: true,
      output: "2\ttwo",
    });
  });

  it("reports missing files, directories and empty files", async () => {
    mkdirSync(join(root, "dir"));
    writeFileSync(join(root, "empty.txt"), "");
    const tool = createReadFileTool({ projectRoot: root });

    expect(await tool.handler({ path: "nope.txt" }, context)).toEqual({
      success: false,
      output: "",
      error: "File not found: nope.txt",
    });
    expect((await tool.handler({ path: "dir" }, context)).error).toBe(
      '"dir" is not a regular file. Use list_files for directories.',
    );
    expect((await tool.handler({ path: "empty.txt" }, context)).output).toBe(
      'File "empty.txt" exists but is empty.',
    );
  });

  it("refuses paths outside the project root", async () => {
    const tool = createReadFileTool({ projectRoot: root });
    const result = await tool.handler({ path: "../outside.txt" }, context);

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Path traversal detected/);
  });
});

describe("write_file", () => {
  it("creates, updates and appends", async () => {
    const tool = createWriteFileTool({ projectRoot: root });

    expect((await tool.handler({ path: "sub/new.txt", content: "a\nb" }, context)).output).toBe(
      "Created sub/new.txt (2 lines)",
    );
    expect((await tool.handler({ path: "sub/new.txt", content: "a\nb" }, context)).output).toBe(
      "Updated sub/new.txt (2 lines)",
    );
    expect(
      (await tool.handler({ path: "sub/new.txt", content: "c", append: true }, context)).output,
    ).toBe("Appended to sub/new.txt (1 lines)");
    expect(readFileSync(join(root, "sub", "new.txt"), "utf-8")).toBe("a\nbc");
  });
});

describe("list_files", () => {
  beforeEach(() => {
    mkdirSync(join(root, "sub"));
    mkdirSync(join(root, "node_modules"));
    writeFileSync(join(root, "a.ts"), "");
    writeFileSync(join(root, "b.md"), "");
    writeFileSync(join(root, ".hidden.ts"), "");
    writeFileSync(join(root, "sub", "c.ts"), "");
    writeFileSync(join(root, "node_modules", "x.ts"), "");
  });

  it("matches the pattern, skipping ignored directories", async () => {
    const tool = createListFilesTool({ projectRoot: root });
    expect((await tool.handler({ pattern: "**/*.ts" }, context)).output).toBe("a.ts\nsub/c.ts");
  });

  it("includes dot-files on request", async () => {
    const tool = createListFilesTool({ projectRoot: root });
    expect((await tool.handler({ pattern: "**/*.ts", include_hidden: true }, context)).output).toBe(
      ".hidden.ts\na.ts\nsub/c.ts",
    );
  });

  it("says so when nothing matches", async () => {
    const tool = createListFilesTool({ projectRoot: root });
    expect(await tool.handler({ pattern: "*.none" }, context)).toEqual({
      success: true,
      output: "No files found",
    });
  });
});

describe("search", () => {
  beforeEach(() => {
    mkdirSync(join(root, "sub"));
    writeFileSync(join(root, "a.ts"), "const x = 1;\nTODO fix\n");
    writeFileSync(join(root, "b.md"), "nothing here\n");
    writeFileSync(join(root, "sub", "c.ts"), "todo later\n");
  });

  it("reports matching lines as path:line: text", async () => {
    const tool = createSearchTool({ projectRoot: root });
    expect((await tool.handler({ pattern: "TODO" }, context)).output).toBe("a.ts:2: TODO fix");
    expect((await tool.handler({ pattern: "todo", case_insensitive: true }, context)).output).toBe(
      "a.ts:2: TODO fix\nsub/c.ts:1: todo later",
    );
  });

  it("supports count and files_with_matches modes", async () => {
    const tool = createSearchTool({ projectRoot: root });
    expect(
      (await tool.handler({ pattern: "todo", case_insensitive: true, output_mode: "count" }, context)).output,
    ).toBe("a.ts:1\nsub/c.ts:1");
    expect(
      (await tool.handler({ pattern: "o", glob: "**/*.md", output_mode: "files_with_matches" }, context)).output,
    ).toBe("b.md");
  });

  it("rejects an invalid expression and reports no matches", async () => {
    const tool = createSearchTool({ projectRoot: root });
    expect((await tool.handler({ pattern: "(" }, context)).error).toMatch(/^Invalid regular expression:/);
    expect((await tool.handler({ pattern: "zzz" }, context)).output).toBe("No matches found.");
  });
});

describe("shell", () => {
  it("returns stdout", async () => {
    const tool = createShellTool({ projectRoot: root });
    expect(await tool.handler({ command: "echo hi" }, context)).toEqual({ success: true, output: "hi" });
    expect((await tool.handler({ command: "true" }, context)).output).toBe("Command completed with exit code 0.");
  });

  it("fails on a non-zero exit and includes stderr", async () => {
    const tool = createShellTool({ projectRoot: root });
    expect(await tool.handler({ command: "echo oops 1>&2; exit 2" }, context)).toEqual({
      success: false,
      output: "STDERR:\noops",
      error: "Command exited with code 2",
    });
  });

  it("refuses dangerous and blocked commands without running them", async () => {
    const tool = createShellTool({ projectRoot: root, blockedCommands: ["git push --force"] });
    expect((await tool.handler({ command: "sudo reboot" }, context)).error).toBe(
      'Blocked: command matches dangerous pattern "reboot"',
    );
    expect((await tool.handler({ command: "git push --force origin main" }, context)).error).toBe(
      "Command is on the blocked list and cannot be executed",
    );
  });

  it("does not pass credentials through the environment", async () => {
    vi.stubEnv("SCRIPTLOOM_TEST_API_KEY", "test-secret");
    try {
      const tool = createShellTool({ projectRoot: root });
      const result = await tool.handler({ command: 'echo "[$SCRIPTLOOM_TEST_API_KEY]"' }, context);
      expect(result.output).toBe("[]");
    } finally {
      vi.unstubAllEnvs();
    }
  });
});

describe("web", () => {
  it("converts HTML to text and prefixes the response line", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      new Response("<p>Hello</p><p>World</p>", { status: 200, headers: { "content-type": "text/html" } }),
    );
    const tool = createWebTool({ projectRoot: root, fetch: fetchMock });

    expect(await tool.handler({ url: "https://example.com/page" }, context)).toEqual({
      success: true,
      output: "HTTP 200\nURL: https://example.com/page\nContent-Type: text/html\n\nHello\nWorld",
    });
  });

  it("marks error statuses as failures", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      new Response("missing", { status: 404, headers: { "content-type": "text/plain" } }),
    );
    const tool = createWebTool({ projectRoot: root, fetch: fetchMock });

    expect(await tool.handler({ url: "https://example.com/x" }, context)).toEqual({
      success: false,
      output: "HTTP 404\nURL: https://example.com/x\nContent-Type: text/plain\n\nmissing",
      error: "HTTP 404",
    });
  });

  it("sends a JSON body with a JSON content type", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("{}", { status: 201 }));
    const tool = createWebTool({ projectRoot: root, fetch: fetchMock });

    await tool.handler({ url: "https://api.example.com/items", method: "POST", data: '{"a":1}' }, context);

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"a":1}');
    expect(init?.headers).toEqual({
      "User-Agent": "scriptloom-web/1.0",
      "Content-Type": "application/json",
    });
  });

  it("refuses local addresses without fetching", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    const tool = createWebTool({ projectRoot: root, fetch: fetchMock });

    expect((await tool.handler({ url: "http://localhost:8080/x" }, context)).error).toBe(
      "Access denied: localhost is a local or private address",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it.each([
    ["ftp://example.com/file", 'Unsupported protocol "ftp:". Only http and https are allowed.'],
    ["http://192.168.1.4/", "Access denied: 192.168.1.4 is a local or private address"],
    ["not a url", "Invalid URL: not a url"],
    ["https://example.com/", undefined],
  ])("checkUrl(%j)", (url, expected) => {
    expect(checkUrl(url)).toBe(expected);
  });

  it("strips scripts and decodes entities", () => {
    expect(stripHtmlTags("<script>x()</script><b>a &amp; b</b>")).toBe("a & b");
  });
});
