/**
 * A device on the network: its values, its command classes, and the
 * commands they have queued for transmission.
 */

import {
  CommandClassRegistry,
  type CommandClassDefinition,
  type CommandClassHandler,
  type MessageSink,
} from "./command-classes/index.js";
import { createLogger, type Logger } from "./lib.js";
import type { ApplicationCommand, CommandFrame } from "./protocol/index.js";
import { NodeValues, type Value } from "./values.js";

/**
 * Outbox handed to command classes. Frames wait here until the
 * connection takes them.
 */
export class MessageQueue implements MessageSink {
  private frames: CommandFrame[] = [];

  sendMessage(frame: CommandFrame): void {
    this.frames.push(frame);
  }

  take(): CommandFrame[] {
    const frames = this.frames;
    this.frames = [];
    return frames;
  }

  get size(): number {
    return this.frames.length;
  }
}

export interface ZWaveNodeOptions {
  logger?: Logger;
}

export class ZWaveNode {
  readonly values: NodeValues;
  readonly commandClasses = new CommandClassRegistry();
  private readonly outbox = new MessageQueue();
  private readonly logger: Logger;

  constructor(readonly nodeId: number, options: ZWaveNodeOptions = {}) {
    this.values = new NodeValues(nodeId);
    this.logger = options.logger ?? createLogger();
  }

  addCommandClass<T extends CommandClassHandler>(definition: CommandClassDefinition<T>): T {
    const handler = definition.create({
      nodeId: this.nodeId,
      values: this.values.forCommandClass(definition.commandClassId),
      sink: this.outbox,
      logger: this.logger,
    });
    this.commandClasses.register(handler);
    return handler;
  }

  createVars(instance = 1): void {
    this.commandClasses.createVars(instance);
  }

  requestState(requestFlags: number): boolean {
    return this.commandClasses.requestState(requestFlags);
  }

  /**
   * Dispatch a command received from this node. False when no command
   * class claimed it.
   */
  applicationCommand(command: ApplicationCommand, instance = 1): boolean {
    const handled = this.commandClasses.handleMessage(command.commandClassId, command.data, instance);
    if (!handled) {
      this.logger.debug(
        `Unhandled command 0x${command.commandClassId.toString(16)} from node ${this.nodeId}: [${command.data.join(", ")}]`
      );
    }
    return handled;
  }

  setValue(value: Value): boolean {
    const handler = this.commandClasses.get(value.id.commandClassId);
    return handler?.setValue(value) ?? false;
  }

  takeMessages(): CommandFrame[] {
    return this.outbox.take();
  }
}
