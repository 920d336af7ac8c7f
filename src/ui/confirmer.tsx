/**
 * Terminal confirmer: renders the permission prompt for each `ask` decision.
 */

import { render } from "ink";
import type { IConfirmer } from "../types/tool.js";
import { redactToolArgs } from "../utils/sanitizer.js";
import { PermissionPrompt } from "./components/PermissionPrompt.js";

export function createInkConfirmer(): IConfirmer {
  return {
    async confirm(toolName: string, args: Readonly<Record<string, unknown>>): Promise<boolean> {
      let approved = false;
      const instance = render(
        <PermissionPrompt
          toolName={toolName}
          args={redactToolArgs(args)}
          onDecide={(value) => {
            approved = value;
            instance.unmount();
          }}
        />,
      );
      await instance.waitUntilExit();
      return approved;
    },
  };
}
