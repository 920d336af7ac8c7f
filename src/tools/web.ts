/**
 * web — HTTP requests to public URLs, HTML converted to readable text.
 */

import type { IBuiltinToolOptions, IToolSpec } from "../types/tool.js";
import type { IToolResult } from "../types/message.js";
import { logger } from "../utils/logger.js";

const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_CONTENT_LENGTH = 1024 * 1024;
const MAX_CONTENT_LENGTH = 10 * 1024 * 1024;
const MAX_URL_LENGTH = 2048;
const METHODS = ["GET", "POST", "PUT", "DELETE"] as const;

type HttpMethod = (typeof METHODS)[number];

export function stripHtmlTags(html: string): string {
  let text = html.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "");
  text = text.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "");

  text = text.replace(/<\/(p|div|h[1-6]|li|tr|br|hr)[^>]*>/gi, "\n");
  text = text.replace(/<br\s*\/?>/gi, "\n");
  text = text.replace(/<[^>]+>/g, "");

  text = text.replace(/&amp;/g, "&");
  text = text.replace(/&lt;/g, "<");
  text = text.replace(/&gt;/g, ">");
  text = text.replace(/&quot;/g, '"');
  text = text.replace(/&#39;/g, "'");
  text = text.replace(/&nbsp;/g, " ");

  text = text.replace(/[ \t]+/g, " ");
  text = text.replace(/\n{3,}/g, "\n\n");

  return text.trim();
}

export function isPrivateHostname(hostname: string): boolean {
  const host = hostname.toLowerCase();
  if (host === "localhost" || host.endsWith(".localhost") || host === "[::1]" || host === "::1") {
    return true;
  }

  const ipMatch = /^(\d{1,3})\.(\d{1,3})\.\d{1,3}\.\d{1,3}$/.exec(host);
  if (ipMatch === null) {
    return false;
  }

  const first = Number(ipMatch[1]);
  const second = Number(ipMatch[2]);
  return (
    first === 0 ||
    first === 10 ||
    first === 127 ||
    (first === 169 && second === 254) ||
    (first === 172 && second >= 16 && second <= 31) ||
    (first === 192 && second === 168)
  );
}

/**
 * Returns the refusal reason, or undefined when the URL may be fetched.
 */
export function checkUrl(urlString: string): string | undefined {
  if (urlString.length > MAX_URL_LENGTH) {
    return `URL longer than ${MAX_URL_LENGTH} characters`;
  }
  let url: URL;
  try {
    url = new URL(urlString);
  } catch {
    return `Invalid URL: ${urlString}`;
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    return `Unsupported protocol "${url.protocol}". Only http and https are allowed.`;
  }
  if (isPrivateHostname(url.hostname)) {
    return `Access denied: ${url.hostname} is a local or private address`;
  }
  return undefined;
}

function toMethod(value: unknown): HttpMethod {
  return METHODS.find((method) => method === value) ?? "GET";
}

function toHeaders(value: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return headers;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      headers[key] = entry;
    }
  }
  return headers;
}

function looksLikeJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function failure(error: string): IToolResult {
  return { success: false, output: "", error };
}

export function createWebTool(options: IBuiltinToolOptions): IToolSpec {
  const fetchImpl = options.fetch ?? globalThis.fetch;

  return {
    name: "web",
    description: "Fetch content from web URLs, make HTTP requests, or call REST APIs.",
    parameters: [
      {
        name: "url",
        type: "string",
        description: "The http(s) URL to request",
        required: true,
      },
      {
        name: "method",
        type: "string",
        description: "HTTP method (default GET)",
        required: false,
        default: "GET",
        enum: [...METHODS],
      },
      {
        name: "headers",
        type: "object",
        description: "Optional HTTP headers as key-value pairs",
        required: false,
      },
      {
        name: "data",
        type: "string",
        description: "Request body for POST/PUT (JSON or form data)",
        required: false,
      },
      {
        name: "timeout",
        type: "integer",
        description: `Timeout in milliseconds (default ${DEFAULT_TIMEOUT_MS}, max ${MAX_TIMEOUT_MS})`,
        required: false,
        default: DEFAULT_TIMEOUT_MS,
      },
      {
        name: "max_content_length",
        type: "integer",
        description: "Maximum number of characters of body to return",
        required: false,
        default: DEFAULT_MAX_CONTENT_LENGTH,
      },
    ],
    requiresPermission: false,
    handler: async (args, context) => {
      const url = args["url"];
      if (typeof url !== "string" || url.length === 0) {
        return failure("url must be a non-empty string");
      }

      const refusal = checkUrl(url);
      if (refusal !== undefined) {
        return failure(refusal);
      }

      const method = toMethod(args["method"]);
      const headers = toHeaders(args["headers"]);
      const data = typeof args["data"] === "string" ? args["data"] : undefined;
      const timeoutMs = typeof args["timeout"] === "number"
        ? Math.max(1000, Math.min(args["timeout"], MAX_TIMEOUT_MS))
        : DEFAULT_TIMEOUT_MS;
      const maxLength = typeof args["max_content_length"] === "number"
        ? Math.max(1, Math.min(args["max_content_length"], MAX_CONTENT_LENGTH))
        : DEFAULT_MAX_CONTENT_LENGTH;

      const body = method === "POST" || method === "PUT" ? data : undefined;
      if (!Object.keys(headers).some((key) => key.toLowerCase() === "user-agent")) {
        headers["User-Agent"] = "scriptloom-web/1.0";
      }
      if (body !== undefined && !Object.keys(headers).some((key) => key.toLowerCase() === "content-type")) {
        headers["Content-Type"] = looksLikeJson(body)
          ? "application/json"
          : "application/x-www-form-urlencoded";
      }

      logger.debug({ url, method, timeout: timeoutMs }, "Web request");

      let response: Response;
      try {
        response = await fetchImpl(url, {
          method,
          headers,
          ...(body !== undefined ? { body } : {}),
          signal: AbortSignal.any([context.signal, AbortSignal.timeout(timeoutMs)]),
          redirect: "follow",
        });
      } catch (err: unknown) {
        if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
          return failure(`Request timed out after ${timeoutMs}ms: ${url}`);
        }
        const msg = err instanceof Error ? err.message : "Request failed";
        logger.debug({ url, error: msg }, "Web request failed");
        return failure(`Request failed for ${url}: ${msg}`);
      }

      const contentType = response.headers.get("content-type") ?? "unknown";
      const rawBody = await response.text();
      let text = contentType.includes("text/html") ? stripHtmlTags(rawBody) : rawBody;
      const truncated = text.length > maxLength;
      if (truncated) {
        text = text.slice(0, maxLength);
      }

      const header = [
        `HTTP ${response.status} ${response.statusText}`.trim(),
        `URL: ${url}`,
        `Content-Type: ${contentType}`,
        ...(truncated ? [`(Content truncated to ${maxLength} characters)`] : []),
      ].join("\n");
      const output = `${header}\n\n${text}`;

      if (!response.ok) {
        return { success: false, output, error: `HTTP ${response.status}` };
      }
      return { success: true, output };
    },
  };
}
