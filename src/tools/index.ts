/**
 * Tools barrel export and default registry factory.
 */

export { ToolRegistry, assertValidToolSpec } from "./registry.js";
export type { ILoadDirectoryOptions, IToolRegistryOptions } from "./registry.js";
export { ToolDefinitionLoader, renderCommand, normalizeHandlerOutput } from "./loader.js";
export type { ToolCandidate, IToolDefinitionEntry, IDiscoveryResult } from "./loader.js";
export { toProviderSchema, toJsonSchema } from "./schema.js";
export type {
  IJsonSchemaProperty,
  IJsonSchemaObject,
  IOpenAIToolDescriptor,
  IAnthropicToolDescriptor,
  IGoogleFunctionDeclaration,
  IGoogleSchemaProperty,
  GoogleSchemaType,
  IProviderToolSchemaMap,
  ProviderToolDescriptor,
} from "./schema.js";
export { validateToolArguments } from "./arguments.js";

export { createReadFileTool } from "./read.js";
export { createWriteFileTool } from "./write.js";
export { createListFilesTool } from "./list-files.js";
export { createSearchTool } from "./search.js";
export { createShellTool } from "./shell.js";
export { createWebTool } from "./web.js";
export { createCallAgentTool } from "./call-agent.js";
export type { ICallAgentOptions } from "./call-agent.js";

import { ToolRegistry } from "./registry.js";
import { createReadFileTool } from "./read.js";
import { createWriteFileTool } from "./write.js";
import { createListFilesTool } from "./list-files.js";
import { createSearchTool } from "./search.js";
import { createShellTool } from "./shell.js";
import { createWebTool } from "./web.js";
import { createCallAgentTool } from "./call-agent.js";
import type { IBuiltinToolOptions, IToolLoadDiagnostic, IToolSpec } from "../types/tool.js";
import { getProjectToolsDir, getUserToolsDir } from "../utils/pathResolver.js";

function createWorkspaceTools(options: IBuiltinToolOptions): IToolSpec[] {
  return [
    createReadFileTool(options),
    createWriteFileTool(options),
    createListFilesTool(options),
    createSearchTool(options),
    createShellTool(options),
    createWebTool(options),
  ];
}

/** Nested agents get the workspace tools only, so delegation stays one level deep. */
export function createBuiltinTools(options: IBuiltinToolOptions): readonly IToolSpec[] {
  return [
    ...createWorkspaceTools(options),
    createCallAgentTool({ ...options, createTools: () => createWorkspaceTools(options) }),
  ];
}

export function createDefaultRegistry(options: IBuiltinToolOptions): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of createBuiltinTools(options)) {
    registry.register(tool);
  }
  return registry;
}

export interface IRuntimeRegistry {
  readonly registry: ToolRegistry;
  readonly diagnostics: readonly IToolLoadDiagnostic[];
}

/**
 * Built-ins, then `.scriptloom/tools` from the project, then from the user
 * home; later definitions replace earlier tools of the same name, so a
 * user's own tools win over a project's.
 */
export async function createRuntimeRegistry(options: IBuiltinToolOptions): Promise<IRuntimeRegistry> {
  const registry = createDefaultRegistry(options);
  const diagnostics: IToolLoadDiagnostic[] = [];

  for (const dir of [getProjectToolsDir(options.projectRoot), getUserToolsDir()]) {
    const report = await registry.loadFromDirectory(dir, { override: true });
    diagnostics.push(...report.diagnostics);
  }

  return { registry, diagnostics };
}
