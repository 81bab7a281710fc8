/**
 * Shared command class contracts.
 */

import type { Logger } from "../lib.js";
import type { CommandFrame } from "../protocol/index.js";
import type { Value, ValueStore } from "../values.js";

/** When a node may be (re)queried for its state */
export const RequestFlags = {
  Static: 0x01,
  Session: 0x02,
  Dynamic: 0x04,
} as const;

/**
 * Accepts outgoing commands. Delivery, retries and waiting for replies
 * belong to whoever drains the sink.
 */
export interface MessageSink {
  sendMessage(frame: CommandFrame): void;
}

/** Collaborators a command class is constructed with */
export interface CommandClassContext {
  nodeId: number;
  values: ValueStore;
  sink: MessageSink;
  logger?: Logger;
}

export interface CommandClassHandler {
  readonly commandClassId: number;
  readonly name: string;

  /** Queue whatever requests the given flags call for. True if any were sent. */
  requestState(requestFlags: number): boolean;

  /**
   * Handle an incoming command addressed to this class.
   * @param data - command bytes after the command class id
   * @returns false when the command is not one this class understands
   */
  handleMessage(data: readonly number[], instance?: number): boolean;

  /** Push a caller-requested value to the device */
  setValue(value: Value): boolean;

  /** Register the values this class exposes for one instance */
  createVars(instance: number): void;
}

/** How a node builds a command class it supports */
export interface CommandClassDefinition<T extends CommandClassHandler = CommandClassHandler> {
  commandClassId: number;
  create(context: CommandClassContext): T;
}
