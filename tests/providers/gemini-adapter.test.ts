import { GeminiAdapter, convertConversation } from "../../src/providers/gemini-adapter.js";
import { capturedRequest, jsonFetch, providerConfig, readFileTool, roundTrip } from "./fake-fetch.js";

const config = providerConfig("google", "gemini-2.5-flash");

describe("convertConversation", () => {
  it("uses systemInstruction and function parts", () => {
    expect(convertConversation(roundTrip)).toEqual({
      systemInstruction: "sys",
      contents: [
        { role: "user", parts: [{ text: "Read a.txt" }] },
        { role: "model", parts: [{ functionCall: { name: "read_file", args: { path: "a.txt" } } }] },
        {
          role: "user",
          parts: [{ functionResponse: { name: "read_file", response: { error: "File not found: a.txt" } } }],
        },
      ],
    });
  });

  it("wraps successful output in the function response", () => {
    const { contents } = convertConversation([
      { role: "tool", toolCallId: "c1", toolName: "search", result: { success: true, output: { hits: 2 } } },
    ]);
    expect(contents).toEqual([
      { role: "user", parts: [{ functionResponse: { name: "search", response: { output: { hits: 2 } } } }] },
    ]);
  });
});

describe("GeminiAdapter", () => {
  it("posts to generateContent with the API key header", async () => {
    const fetchMock = jsonFetch({ candidates: [{ content: { parts: [{ text: "Hi" }] }, finishReason: "STOP" }] });
    await new GeminiAdapter(config, { fetch: fetchMock }).send(roundTrip, [readFileTool]);

    const request = capturedRequest(fetchMock);
    expect(request.url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent",
    );
    expect(request.headers).toEqual({ "Content-Type": "application/json", "x-goog-api-key": "test-secret" });
    expect(request.body).toMatchObject({
      systemInstruction: { parts: [{ text: "sys" }] },
      tools: [{ functionDeclarations: [{ name: "read_file", description: "Read a file" }] }],
      generationConfig: { maxOutputTokens: 512 },
    });
  });

  it("assigns generated ids to function calls", async () => {
    const ids = ["gen-1", "gen-2"];
    const fetchMock = jsonFetch({
      candidates: [
        {
          content: {
            parts: [
              { functionCall: { name: "read_file", args: { path: "a.txt" } } },
              { functionCall: { name: "read_file", args: { path: "b.txt" } } },
            ],
          },
          finishReason: "STOP",
        },
      ],
    });
    const adapter = new GeminiAdapter(config, { fetch: fetchMock, generateId: () => ids.shift() ?? "none" });

    expect(await adapter.send(roundTrip, [readFileTool])).toEqual({
      toolCalls: [
        { id: "gen-1", toolName: "read_file", arguments: { path: "a.txt" } },
        { id: "gen-2", toolName: "read_file", arguments: { path: "b.txt" } },
      ],
      stopReason: "tool_calls_pending",
    });
  });

  it("generates call_ prefixed ids by default", async () => {
    const fetchMock = jsonFetch({
      candidates: [{ content: { parts: [{ functionCall: { name: "read_file" } }] } }],
    });
    const turn = await new GeminiAdapter(config, { fetch: fetchMock }).send(roundTrip, []);

    expect(turn.toolCalls[0]?.id).toMatch(/^call_[0-9a-f-]{36}$/);
    expect(turn.toolCalls[0]?.arguments).toEqual({});
  });

  it("maps MAX_TOKENS and tolerates a candidate without content", async () => {
    const truncated = jsonFetch({ candidates: [{ content: { parts: [{ text: "Par" }] }, finishReason: "MAX_TOKENS" }] });
    expect(await new GeminiAdapter(config, { fetch: truncated }).send(roundTrip, [])).toEqual({
      assistantText: "Par",
      toolCalls: [],
      stopReason: "length_limit",
    });

    const empty = jsonFetch({ candidates: [{ finishReason: "SAFETY" }] });
    expect(await new GeminiAdapter(config, { fetch: empty }).send(roundTrip, [])).toEqual({
      toolCalls: [],
      stopReason: "natural_stop",
    });
  });
});
