import { decodeToolArguments, parseRetryAfter, postJson, toArgumentRecord } from "../../src/providers/http.js";
import {
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderRequestError,
  ProviderResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  RunCancelledError,
} from "../../src/types/errors.js";
import { capturedRequest, jsonFetch, textFetch } from "./fake-fetch.js";
import type { FetchMock } from "./fake-fetch.js";

function post(fetchMock: FetchMock, signal?: AbortSignal): Promise<unknown> {
  return postJson({
    provider: "openai",
    url: "https://llm.example.com/v1/chat",
    headers: { Authorization: "Bearer test-secret" },
    body: { hello: "world" },
    timeoutMs: 5000,
    fetch: fetchMock,
    signal,
  });
}

describe("parseRetryAfter", () => {
  const now = Date.parse("2026-10-21T07:28:00Z");

  it.each([
    ["3", 3000],
    ["0.5", 500],
    ["Wed, 21 Oct 2026 07:28:05 GMT", 5000],
    ["Wed, 21 Oct 2026 07:27:00 GMT", 0],
  ])("%j → %d ms", (header, expected) => {
    expect(parseRetryAfter(header, now)).toBe(expected);
  });

  it.each([[null], [""], ["soon"]])("ignores %j", (header) => {
    expect(parseRetryAfter(header, now)).toBeUndefined();
  });
});

describe("decodeToolArguments", () => {
  it("decodes a JSON object", () => {
    expect(decodeToolArguments('{"path":"a.txt","n":2}')).toEqual({ arguments: { path: "a.txt", n: 2 } });
  });

  it("treats a missing payload as no arguments", () => {
    expect(decodeToolArguments(undefined)).toEqual({ arguments: {} });
    expect(decodeToolArguments("  ")).toEqual({ arguments: {} });
  });

  it("reports payloads that are not usable", () => {
    expect(decodeToolArguments("{oops").error).toMatch(/^arguments are not valid JSON: /);
    expect(decodeToolArguments("[1,2]")).toEqual({ arguments: {}, error: "arguments must be a JSON object" });
    expect(toArgumentRecord("text")).toEqual({ arguments: {}, error: "arguments must be a JSON object" });
    expect(toArgumentRecord(null)).toEqual({ arguments: {} });
  });
});

describe("postJson", () => {
  it("posts JSON and returns the decoded body", async () => {
    const fetchMock = jsonFetch({ ok: true });

    expect(await post(fetchMock)).toEqual({ ok: true });
    expect(capturedRequest(fetchMock)).toEqual({
      url: "https://llm.example.com/v1/chat",
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: "Bearer test-secret" },
      body: { hello: "world" },
    });
  });

  it.each([
    [401, ProviderAuthError],
    [403, ProviderAuthError],
    [408, ProviderUnavailableError],
    [500, ProviderUnavailableError],
    [503, ProviderUnavailableError],
    [400, ProviderRequestError],
    [404, ProviderRequestError],
  ])("maps HTTP %d", async (status, errorClass) => {
    await expect(post(textFetch("nope", { status }))).rejects.toBeInstanceOf(errorClass);
  });

  it("carries the retry-after hint of a rate limit", async () => {
    const error = await post(textFetch("slow down", { status: 429, headers: { "retry-after": "7" } })).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(ProviderRateLimitError);
    expect(error instanceof ProviderRateLimitError ? error.retryAfterMs : undefined).toBe(7000);
  });

  it("keeps the status of a rejected request", async () => {
    const error = await post(textFetch("bad model", { status: 422 })).catch((caught: unknown) => caught);

    expect(error instanceof ProviderRequestError ? error.status : undefined).toBe(422);
    expect(error instanceof ProviderRequestError ? error.diagnosticMessage : undefined).toBe("bad model");
  });

  it("rejects a body that is not JSON", async () => {
    await expect(post(textFetch("<html>"))).rejects.toThrow(
      new ProviderResponseError("openai", "response body is not valid JSON"),
    );
  });

  it("maps transport failures", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    await expect(post(vi.fn<typeof fetch>().mockRejectedValue(timeout))).rejects.toBeInstanceOf(ProviderTimeoutError);
    await expect(post(vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed")))).rejects.toBeInstanceOf(
      ProviderUnavailableError,
    );
  });

  it("reports a cancelled caller as a cancellation", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      post(vi.fn<typeof fetch>().mockRejectedValue(new Error("This operation was aborted")), controller.signal),
    ).rejects.toBeInstanceOf(RunCancelledError);
  });
});
