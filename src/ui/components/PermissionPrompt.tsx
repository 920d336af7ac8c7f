/**
 * Yes/no prompt shown before a tool call that needs the user's approval.
 */

import React, { useState } from "react";
import { Box, Text, useInput } from "ink";

interface IPermissionPromptProps {
  readonly toolName: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly onDecide: (approved: boolean) => void;
}

interface IChoice {
  readonly label: string;
  readonly approved: boolean;
}

const CHOICES: readonly IChoice[] = [
  { label: "Allow this call", approved: true },
  { label: "Deny", approved: false },
];

const MAX_ARG_LENGTH = 200;

export function formatArgument(value: unknown): string {
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  return text.length > MAX_ARG_LENGTH ? `${text.slice(0, MAX_ARG_LENGTH)}...` : text;
}

export function PermissionPrompt({ toolName, args, onDecide }: IPermissionPromptProps): React.ReactElement {
  const [cursor, setCursor] = useState(0);

  useInput((input, key) => {
    if (input === "y" || input === "Y") {
      onDecide(true);
    } else if (input === "n" || input === "N" || key.escape) {
      onDecide(false);
    } else if (key.upArrow || key.downArrow) {
      setCursor((prev) => (prev === 0 ? 1 : 0));
    } else if (key.return) {
      const selected = CHOICES[cursor];
      onDecide(selected?.approved ?? false);
    }
  });

  const entries = Object.entries(args);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1}>
      <Text bold color="yellow">
        Allow tool <Text color="cyan">{toolName}</Text>?
      </Text>
      {entries.length === 0 ? (
        <Text color="gray">  (no arguments)</Text>
      ) : (
        entries.map(([name, value]) => (
          <Text key={name}>
            <Text color="gray">  {name}: </Text>
            {formatArgument(value)}
          </Text>
        ))
      )}
      <Box flexDirection="column" marginTop={1}>
        {CHOICES.map((choice, idx) => {
          const isHighlighted = cursor === idx;
          return (
            <Text key={choice.label} {...(isHighlighted ? { color: "green" } : {})} bold={isHighlighted}>
              {isHighlighted ? "> " : "  "}{choice.label}
            </Text>
          );
        })}
      </Box>
      <Text color="gray">  (y/n, or up/down and Enter)</Text>
    </Box>
  );
}
