/**
 * Command class lookup by numeric id, resolved when a node is set up.
 */

import type { CommandClassHandler } from "./types.js";

export class CommandClassRegistry {
  private handlers = new Map<number, CommandClassHandler>();

  register(handler: CommandClassHandler): void {
    if (this.handlers.has(handler.commandClassId)) {
      throw new Error(`Command class 0x${formatId(handler.commandClassId)} is already registered`);
    }
    this.handlers.set(handler.commandClassId, handler);
  }

  get(commandClassId: number): CommandClassHandler | undefined {
    return this.handlers.get(commandClassId);
  }

  has(commandClassId: number): boolean {
    return this.handlers.has(commandClassId);
  }

  ids(): number[] {
    return [...this.handlers.keys()].sort((a, b) => a - b);
  }

  /**
   * Route an incoming command. False when no handler is registered
   * for the class or the handler does not understand the command.
   */
  handleMessage(commandClassId: number, data: readonly number[], instance = 1): boolean {
    return this.handlers.get(commandClassId)?.handleMessage(data, instance) ?? false;
  }

  requestState(requestFlags: number): boolean {
    let requested = false;
    for (const handler of this.handlers.values()) {
      if (handler.requestState(requestFlags)) {
        requested = true;
      }
    }
    return requested;
  }

  createVars(instance: number): void {
    for (const handler of this.handlers.values()) {
      handler.createVars(instance);
    }
  }
}

function formatId(id: number): string {
  return id.toString(16).padStart(2, "0");
}
