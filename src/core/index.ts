/**
 * Core engine — barrel export
 */

export { Interpreter, DEFAULT_RUN_LIMITS } from "./interpreter.js";
export type { IInterpreterOptions, IRunLimits } from "./interpreter.js";
export { PermissionGate, decide, describePolicy, denyAllConfirmer } from "./permission-gate.js";
export type { IPermissionResult } from "./permission-gate.js";
export { EventBus } from "./event-bus.js";
export { Conversation } from "./conversation.js";
export {
  buildSystemPrompt,
  enhanceContent,
  formatContextEntry,
  loadRules,
} from "./context-assembler.js";
export type { ISystemPromptInput } from "./context-assembler.js";
