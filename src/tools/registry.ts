/**
 * Tool Registry — name-indexed store of validated, frozen tool specs.
 * Built-ins are registered directly; custom tools come from
 * `loadFromDirectory`, which never fails as a whole.
 */

import type {
  IToolLoadDiagnostic,
  IToolLoadReport,
  IToolParameter,
  IToolSpec,
} from "../types/tool.js";
import type { ProviderKind } from "../types/model.js";
import { DuplicateToolError, InvalidToolSpecError, ScriptloomError } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { ToolDefinitionLoader } from "./loader.js";
import type { ToolCandidate } from "./loader.js";
import { toProviderSchema } from "./schema.js";
import type { IProviderToolSchemaMap } from "./schema.js";

/** Names every supported vendor accepts. */
const TOOL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_-]{0,63}$/;

export interface ILoadDirectoryOptions {
  /** Replace an already registered tool of the same name instead of skipping. */
  readonly override?: boolean | undefined;
}

export interface IToolRegistryOptions {
  readonly loader?: ToolDefinitionLoader | undefined;
}

/**
 * @throws InvalidToolSpecError when the candidate breaks a registration rule.
 */
export function assertValidToolSpec(candidate: ToolCandidate): asserts candidate is IToolSpec {
  const label = candidate.name.length > 0 ? candidate.name : "<unnamed>";

  if (candidate.name.trim().length === 0) {
    throw new InvalidToolSpecError(label, "name must not be empty");
  }
  if (!TOOL_NAME_PATTERN.test(candidate.name)) {
    throw new InvalidToolSpecError(
      label,
      "name must start with a letter or underscore and contain only letters, digits, '_' or '-' (max 64)",
    );
  }
  if (candidate.description.trim().length === 0) {
    throw new InvalidToolSpecError(label, "description must not be empty");
  }
  if (typeof candidate.handler !== "function") {
    throw new InvalidToolSpecError(label, "handler is missing");
  }

  const seen = new Set<string>();
  for (const param of candidate.parameters) {
    if (param.name.trim().length === 0) {
      throw new InvalidToolSpecError(label, "parameter name must not be empty");
    }
    if (seen.has(param.name)) {
      throw new InvalidToolSpecError(label, `duplicate parameter "${param.name}"`);
    }
    seen.add(param.name);
  }
}

function freezeSpec(spec: IToolSpec): IToolSpec {
  const parameters: readonly IToolParameter[] = Object.freeze(
    spec.parameters.map((param) =>
      Object.freeze({
        ...param,
        ...(param.enum !== undefined ? { enum: Object.freeze([...param.enum]) } : {}),
      }),
    ),
  );
  return Object.freeze({ ...spec, parameters });
}

export class ToolRegistry {
  private readonly tools: Map<string, IToolSpec> = new Map();
  private readonly loader: ToolDefinitionLoader;

  constructor(options?: IToolRegistryOptions) {
    this.loader = options?.loader ?? new ToolDefinitionLoader();
  }

  /**
   * @throws DuplicateToolError when the name is taken (the registry is unchanged).
   * @throws InvalidToolSpecError when the spec breaks a registration rule.
   */
  register(spec: ToolCandidate): void {
    assertValidToolSpec(spec);
    if (this.tools.has(spec.name)) {
      throw new DuplicateToolError(spec.name);
    }
    this.tools.set(spec.name, freezeSpec(spec));
    logger.debug({ toolName: spec.name, source: spec.source ?? "builtin" }, "Tool registered");
  }

  /**
   * Discover tool definitions under `dirPath` and register every one that
   * passes validation. Entries that fail are reported, not thrown.
   */
  async loadFromDirectory(
    dirPath: string,
    options?: ILoadDirectoryOptions,
  ): Promise<IToolLoadReport> {
    const discovery = await this.loader.discover(dirPath);
    const loaded: string[] = [];
    const diagnostics: IToolLoadDiagnostic[] = [...discovery.diagnostics];

    for (const { candidate, path } of discovery.entries) {
      try {
        if (options?.override === true && this.tools.has(candidate.name)) {
          assertValidToolSpec(candidate);
          this.tools.set(candidate.name, freezeSpec(candidate));
          logger.debug({ toolName: candidate.name, path }, "Tool overridden");
        } else {
          this.register(candidate);
        }
        loaded.push(candidate.name);
      } catch (error: unknown) {
        if (!(error instanceof ScriptloomError)) {
          throw error;
        }
        logger.warn({ path, toolName: candidate.name, error: error.message }, "Skipping tool definition");
        diagnostics.push({ path, toolName: candidate.name, reason: error.userMessage });
      }
    }

    logger.debug(
      { dirPath, loaded: loaded.length, skipped: diagnostics.length },
      "Tool directory loaded",
    );
    return { loaded, diagnostics };
  }

  get(name: string): IToolSpec | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): readonly IToolSpec[] {
    return [...this.tools.values()];
  }

  names(): readonly string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  toProviderSchema<K extends ProviderKind>(kind: K): Array<IProviderToolSchemaMap[K]> {
    return toProviderSchema(this.list(), kind);
  }

  /**
   * Human-readable summary of the registered tools, one per line. With
   * `detailed` each tool's parameters are listed beneath it.
   */
  describeCapabilities(detailed = false): string {
    if (this.tools.size === 0) {
      return "No tools registered.";
    }

    const lines: string[] = [`${this.tools.size} tools available:`];
    for (const spec of this.tools.values()) {
      const marker = spec.requiresPermission ? " [requires permission]" : "";
      lines.push(`- ${spec.name}: ${spec.description}${marker}`);
      if (!detailed) {
        continue;
      }
      for (const param of spec.parameters) {
        const required = param.required ? "required" : "optional";
        lines.push(`    ${param.name} (${param.type}, ${required}): ${param.description}`);
      }
      if (spec.source !== undefined) {
        lines.push(`    source: ${spec.source}`);
      }
    }
    return lines.join("\n");
  }
}
