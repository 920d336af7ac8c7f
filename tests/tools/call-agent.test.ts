import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Interpreter } from "../../src/core/interpreter.js";
import { createCallAgentTool } from "../../src/tools/call-agent.js";
import { ToolRegistry } from "../../src/tools/registry.js";
import type { IMessage, IProviderTurn } from "../../src/types/message.js";
import type { IToolExecutionContext, IToolSpec } from "../../src/types/tool.js";
import type { IProviderAdapter, ProviderAdapterFactory } from "../../src/providers/types.js";

let root: string;
let context: IToolExecutionContext;

function scriptedAdapter(steps: readonly IProviderTurn[]): IProviderAdapter & { requests: Array<readonly IMessage[]> } {
  const requests: Array<readonly IMessage[]> = [];
  return {
    kind: "openai",
    model: "gpt-4o-mini",
    requests,
    send: async (conversation) => {
      requests.push(conversation);
      const step = steps[requests.length - 1];
      if (step === undefined) {
        throw new Error(`no scripted step for request ${requests.length}`);
      }
      return step;
    },
  };
}

const noteHandler = vi.fn<IToolSpec["handler"]>(async () => ({ success: true, output: "noted" }));

function noteTool(): IToolSpec {
  return {
    name: "note",
    description: "Take a note",
    parameters: [],
    requiresPermission: false,
    handler: noteHandler,
  };
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "scriptloom-call-agent-"));
  context = { workingDirectory: root, signal: new AbortController().signal };
  vi.stubEnv("SCRIPTLOOM_HOME", join(root, "home"));
  mkdirSync(join(root, ".scriptloom"), { recursive: true });
  writeFileSync(
    join(root, ".scriptloom", "config.json"),
    JSON.stringify({
      agents: [
        { name: "reviewer", provider: "openai", model: "gpt-4o-mini", permissions: { mode: "allow-all" } },
      ],
    }),
  );
  noteHandler.mockClear();
});

afterEach(() => {
  vi.unstubAllEnvs();
  rmSync(root, { recursive: true, force: true });
});

describe("call_agent", () => {
  it("requires permission", () => {
    const tool = createCallAgentTool({ projectRoot: root, createTools: () => [] });
    expect(tool.requiresPermission).toBe(true);
    expect(tool.parameters.filter((p) => p.required).map((p) => p.name)).toEqual(["instructions"]);
  });

  it("runs the named agent with its own tools and returns its final answer", async () => {
    const adapter = scriptedAdapter([
      { toolCalls: [{ id: "n1", toolName: "note", arguments: {} }], stopReason: "tool_calls_pending" },
      { assistantText: "Review complete", toolCalls: [], stopReason: "natural_stop" },
    ]);
    const createAdapter = vi.fn<ProviderAdapterFactory>(() => adapter);
    const tool = createCallAgentTool({
      projectRoot: root,
      createTools: () => [noteTool()],
      createAdapter,
      env: { OPENAI_API_KEY: "test-secret" },
    });

    const result = await tool.handler({ instructions: "Summarise the diff", agent: "reviewer" }, context);

    expect(result).toEqual({ success: true, output: "Review complete" });
    expect(createAdapter).toHaveBeenCalledWith(
      expect.objectContaining({ kind: "openai", model: "gpt-4o-mini", apiKey: "test-secret" }),
      undefined,
    );
    expect(adapter.requests[0]?.[1]).toEqual({ role: "user", content: "Summarise the diff" });
    expect(noteHandler).toHaveBeenCalledTimes(1);
  });

  it("reports an unknown agent", async () => {
    const tool = createCallAgentTool({
      projectRoot: root,
      createTools: () => [],
      env: { OPENAI_API_KEY: "test-secret" },
    });

    expect(await tool.handler({ instructions: "Go", agent: "ghost" }, context)).toEqual({
      success: false,
      output: "",
      error: 'Agent call to ghost failed: Invalid configuration "agent": no agent named "ghost" (known: reviewer)',
    });
  });

  it("reports a missing API key without contacting a provider", async () => {
    const createAdapter = vi.fn<ProviderAdapterFactory>();
    const tool = createCallAgentTool({ projectRoot: root, createTools: () => [], createAdapter, env: {} });

    expect((await tool.handler({ instructions: "Go", agent: "reviewer" }, context)).error).toBe(
      'Agent call to reviewer failed: Invalid configuration "apiKey": set OPENAI_API_KEY for provider openai',
    );
    expect(createAdapter).not.toHaveBeenCalled();
  });

  it("hands the nested answer back to the calling run", async () => {
    const nested = scriptedAdapter([{ assistantText: "Subtask done", toolCalls: [], stopReason: "natural_stop" }]);
    const registry = new ToolRegistry();
    registry.register(
      createCallAgentTool({
        projectRoot: root,
        createTools: () => [noteTool()],
        createAdapter: () => nested,
        env: { OPENAI_API_KEY: "test-secret" },
      }),
    );
    const outer = scriptedAdapter([
      {
        toolCalls: [{ id: "c1", toolName: "call_agent", arguments: { instructions: "Do the subtask", agent: "reviewer" } }],
        stopReason: "tool_calls_pending",
      },
      { assistantText: "All done", toolCalls: [], stopReason: "natural_stop" },
    ]);
    const interpreter = new Interpreter({
      provider: { kind: "openai", model: "gpt-4o", apiKey: "test-secret", maxTokens: 1024, timeoutMs: 1000 },
      registry,
      policy: { kind: "allow_all" },
      workingDirectory: root,
      createAdapter: () => outer,
    });

    const result = await interpreter.run("Delegate it");

    expect(result.finalText).toBe("All done");
    expect(result.transcript.filter((m) => m.role === "tool")).toEqual([
      { role: "tool", toolCallId: "c1", toolName: "call_agent", result: { success: true, output: "Subtask done" } },
    ]);
  });
});
