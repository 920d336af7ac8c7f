/**
 * scriptloom — public API
 */

export * from "./types/index.js";
export {
  Interpreter,
  DEFAULT_RUN_LIMITS,
  PermissionGate,
  decide,
  describePolicy,
  denyAllConfirmer,
  EventBus,
  Conversation,
  buildSystemPrompt,
  enhanceContent,
  loadRules,
} from "./core/index.js";
export type { IInterpreterOptions, IRunLimits, IPermissionResult } from "./core/index.js";
export {
  ToolRegistry,
  ToolDefinitionLoader,
  createBuiltinTools,
  createDefaultRegistry,
  createRuntimeRegistry,
  toProviderSchema,
} from "./tools/index.js";
export {
  createProviderAdapter,
  OpenAIAdapter,
  AnthropicAdapter,
  GeminiAdapter,
} from "./providers/index.js";
export type { IProviderAdapter, IProviderOptions, ISendOptions } from "./providers/index.js";
export {
  loadConfig,
  applyAgentOverrides,
  resolveProviderConfig,
  validateProviderConfig,
  toPermissionPolicy,
} from "./config/index.js";
export { logger, setLogLevel } from "./utils/index.js";
