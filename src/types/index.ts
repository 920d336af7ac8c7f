/**
 * Scriptloom shared types — barrel export
 */

export type {
  ProviderKind,
  IProviderConfig,
} from "./model.js";

export {
  PROVIDER_KINDS,
  PROVIDER_ALIASES,
  PROVIDER_API_KEY_ENV,
  DEFAULT_MODELS,
  DEFAULT_BASE_URLS,
  resolveProviderKind,
} from "./model.js";

export type {
  JsonValue,
  IToolCallRequest,
  IToolResult,
  MessageRole,
  ISystemMessage,
  IUserMessage,
  IAssistantMessage,
  IToolMessage,
  IMessage,
  StopReason,
  IProviderTurn,
} from "./message.js";

export { formatToolResult } from "./message.js";

export type {
  ToolParameterType,
  IToolParameter,
  IToolExecutionContext,
  ToolHandler,
  IToolSpec,
  PermissionPolicy,
  PermissionDecision,
  IConfirmer,
  IToolLoadDiagnostic,
  IToolLoadReport,
  IBuiltinToolOptions,
} from "./tool.js";

export { TOOL_PARAMETER_TYPES } from "./tool.js";

export type {
  PermissionMode,
  IPermissionConfig,
  IAgentConfig,
  IScriptloomConfig,
  IResolvedAgentConfig,
} from "./config.js";

export { PERMISSION_MODES, DEFAULT_CONFIG } from "./config.js";

export {
  ScriptloomError,
  ConfigError,
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  ProviderRequestError,
  ProviderResponseError,
  ProviderRetryExhaustedError,
  DuplicateToolError,
  InvalidToolSpecError,
  ToolNotFoundError,
  ToolArgumentError,
  ToolTimeoutError,
  PermissionDeniedError,
  RunLimitExceededError,
  RunCancelledError,
  isRetryableError,
} from "./errors.js";

export type {
  ErrorComponent,
  IErrorContext,
  ProviderError,
  ToolError,
  RunError,
  AnyScriptloomError,
} from "./errors.js";

export type {
  RunState,
  IRunResult,
  IRunOptions,
  IRunEventMap,
  RunEventName,
} from "./run.js";
