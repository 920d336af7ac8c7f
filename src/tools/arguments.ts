/**
 * Argument checks applied before a tool handler runs: declared required
 * parameters must be present and supplied values must match the declared type.
 * Anything deeper is the handler's business.
 */

import { ToolArgumentError } from "../types/errors.js";
import type { IToolSpec, ToolParameterType } from "../types/tool.js";

function matchesType(value: unknown, type: ToolParameterType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * @throws ToolArgumentError on the first missing or mistyped parameter.
 */
export function validateToolArguments(
  spec: IToolSpec,
  args: Readonly<Record<string, unknown>>,
): void {
  for (const param of spec.parameters) {
    const value = args[param.name];

    if (value === undefined || value === null) {
      if (param.required) {
        throw new ToolArgumentError(spec.name, `missing required parameter "${param.name}"`);
      }
      continue;
    }

    if (!matchesType(value, param.type)) {
      throw new ToolArgumentError(
        spec.name,
        `parameter "${param.name}" must be ${param.type}, got ${describeValue(value)}`,
      );
    }
  }
}
