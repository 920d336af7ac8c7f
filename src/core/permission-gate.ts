/**
 * Permission gate: decides whether a requested tool call may run.
 *
 * `decide` is pure. `PermissionGate` pairs a fixed policy with the confirmer
 * consulted for `ask` decisions; a "no" denies that single call only.
 */

import type {
  IConfirmer,
  IToolSpec,
  PermissionDecision,
  PermissionPolicy,
} from "../types/tool.js";
import { logger } from "../utils/logger.js";
import { redactToolArgs } from "../utils/sanitizer.js";

export interface IPermissionResult {
  readonly allowed: boolean;
  readonly decision: PermissionDecision;
  readonly reason?: string | undefined;
}

export function decide(
  toolName: string,
  policy: PermissionPolicy,
  spec?: IToolSpec,
): PermissionDecision {
  switch (policy.kind) {
    case "allow_all":
      return "allow";
    case "deny_unlisted":
      return policy.allowed.has(toolName) ? "allow" : "deny";
    case "ask_interactive":
      return spec !== undefined && !spec.requiresPermission ? "allow" : "ask";
  }
}

export function describePolicy(policy: PermissionPolicy): string {
  switch (policy.kind) {
    case "allow_all":
      return "allow all tools";
    case "deny_unlisted": {
      const names = [...policy.allowed].sort();
      return names.length > 0
        ? `allow only: ${names.join(", ")}`
        : "deny all tools";
    }
    case "ask_interactive":
      return "ask before tools that require permission";
  }
}

/** Confirmer that answers "no" to everything, for non-interactive runs. */
export const denyAllConfirmer: IConfirmer = {
  confirm: () => Promise.resolve(false),
};

export class PermissionGate {
  private readonly policy: PermissionPolicy;
  private readonly confirmer: IConfirmer;

  constructor(policy: PermissionPolicy, confirmer?: IConfirmer) {
    this.policy = policy;
    this.confirmer = confirmer ?? denyAllConfirmer;
  }

  getPolicy(): PermissionPolicy {
    return this.policy;
  }

  /**
   * Resolve the policy decision for one call, asking the confirmer if needed.
   */
  async authorize(
    toolName: string,
    args: Readonly<Record<string, unknown>>,
    spec?: IToolSpec,
  ): Promise<IPermissionResult> {
    const decision = decide(toolName, this.policy, spec);

    if (decision === "allow") {
      return { allowed: true, decision };
    }

    if (decision === "deny") {
      return {
        allowed: false,
        decision,
        reason: `tool "${toolName}" is not in the allowed list`,
      };
    }

    const approved = await this.confirmer.confirm(toolName, args);
    logger.info(
      { toolName, args: redactToolArgs(args), approved },
      approved ? "Tool call approved by user" : "Tool call declined by user",
    );
    return approved
      ? { allowed: true, decision }
      : { allowed: false, decision, reason: "declined by user" };
  }
}
