/**
 * Shared HTTP plumbing for the vendor adapters: one JSON POST with a bounded
 * wait, vendor status codes mapped onto the provider error classes.
 */

import type { z } from "zod";
import { logger } from "../utils/logger.js";
import {
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderRequestError,
  ProviderResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  RunCancelledError,
} from "../types/errors.js";
import type { ProviderKind } from "../types/model.js";

const MAX_ERROR_BODY_LENGTH = 2000;

export interface IJsonPostRequest {
  readonly provider: ProviderKind;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly timeoutMs: number;
  readonly fetch: typeof fetch;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Parse a `retry-after` header given either in seconds or as an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim().length === 0) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error: unknown) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}

async function handleResponseError(provider: ProviderKind, response: Response): Promise<never> {
  const body = (await readErrorBody(response)).slice(0, MAX_ERROR_BODY_LENGTH);
  logger.debug({ provider, status: response.status }, "Provider returned an error status");

  if (response.status === 401 || response.status === 403) {
    throw new ProviderAuthError(provider, body);
  }
  if (response.status === 429) {
    throw new ProviderRateLimitError(provider, parseRetryAfter(response.headers.get("retry-after")));
  }
  if (response.status === 408) {
    throw new ProviderUnavailableError(provider, `HTTP 408: ${body}`);
  }
  if (response.status >= 500) {
    throw new ProviderUnavailableError(provider, `HTTP ${response.status}: ${body}`);
  }
  throw new ProviderRequestError(provider, response.status, body);
}

function toTransportError(
  provider: ProviderKind,
  error: unknown,
  timeoutMs: number,
  signal: AbortSignal | undefined,
): Error {
  if (signal?.aborted === true) {
    return new RunCancelledError("aborted while waiting for the model");
  }
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new ProviderTimeoutError(provider, timeoutMs);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderUnavailableError(provider, message);
}

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * @throws ProviderAuthError, ProviderRateLimitError, ProviderRequestError,
 *   ProviderUnavailableError, ProviderTimeoutError, ProviderResponseError,
 *   or RunCancelledError when the caller's signal aborts.
 */
export async function postJson(request: IJsonPostRequest): Promise<unknown> {
  const { provider, timeoutMs, signal } = request;
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const combined = signal !== undefined ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

  let response: Response;
  try {
    response = await request.fetch(request.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...request.headers },
      body: JSON.stringify(request.body),
      signal: combined,
    });
  } catch (error: unknown) {
    throw toTransportError(provider, error, timeoutMs, signal);
  }

  if (!response.ok) {
    await handleResponseError(provider, response);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error: unknown) {
    throw toTransportError(provider, error, timeoutMs, signal);
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderResponseError(provider, "response body is not valid JSON");
  }
}

/**
 * Validate a decoded response body against the vendor's wire schema.
 * @throws ProviderResponseError when the body does not match.
 */
export function parseWireResponse<T>(
  provider: ProviderKind,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ProviderResponseError(provider, `${where}${issue?.message ?? "unexpected shape"}`);
  }
  return result.data;
}

/**
 * Decode a JSON tool-argument payload into an object, reporting why when it
 * cannot be used.
 */
export function decodeToolArguments(
  raw: string | undefined,
): { readonly arguments: Record<string, unknown>; readonly error?: string | undefined } {
  if (raw === undefined || raw.trim().length === 0) {
    return { arguments: {} };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    return {
      arguments: {},
      error: `arguments are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return toArgumentRecord(parsed);
}

export function toArgumentRecord(
  value: unknown,
): { readonly arguments: Record<string, unknown>; readonly error?: string | undefined } {
  if (value === undefined || value === null) {
    return { arguments: {} };
  }
  if (typeof value !== "object" || Array.isArray(value)) {
    return { arguments: {}, error: "arguments must be a JSON object" };
  }
  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = entry;
  }
  return { arguments: record };
}
