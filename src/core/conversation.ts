/**
 * Append-only message list owned by a single run.
 */

import type { IMessage } from "../types/message.js";

export class Conversation {
  private readonly messages: IMessage[] = [];

  constructor(initial: readonly IMessage[] = []) {
    this.messages.push(...initial);
  }

  append(message: IMessage): void {
    this.messages.push(message);
  }

  get length(): number {
    return this.messages.length;
  }

  last(): IMessage | undefined {
    return this.messages[this.messages.length - 1];
  }

  /** Snapshot of the messages so far; later appends do not affect it. */
  snapshot(): readonly IMessage[] {
    return [...this.messages];
  }

  toJSON(): readonly IMessage[] {
    return this.snapshot();
  }
}
