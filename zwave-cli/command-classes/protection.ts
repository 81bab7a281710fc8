/**
 * COMMAND_CLASS_PROTECTION: how a device guards itself against
 * local or remote operation.
 */

import { createLogger, type Logger } from "../lib.js";
import { DEFAULT_TRANSMIT_OPTIONS, type CommandFrame } from "../protocol/index.js";
import type { ListValueDefinition, Value, ValueListItem, ValueStore } from "../values.js";
import {
  RequestFlags,
  type CommandClassContext,
  type CommandClassDefinition,
  type CommandClassHandler,
  type MessageSink,
} from "./types.js";

// =============================================================================
// Constants
// =============================================================================

export const COMMAND_CLASS_PROTECTION = 0x75;

export const ProtectionCommand = {
  Set: 0x01,
  Get: 0x02,
  Report: 0x03,
} as const;

export const ProtectionState = {
  Unprotected: 0,
  ProtectionBySequence: 1,
  NoOperationPossible: 2,
} as const;

export type ProtectionState = (typeof ProtectionState)[keyof typeof ProtectionState];

/** Index of the protection state value within each instance */
export const PROTECTION_VALUE_INDEX = 0;

export const PROTECTION_STATES: readonly ValueListItem[] = Object.freeze([
  Object.freeze({ value: ProtectionState.Unprotected, label: "Unprotected" }),
  Object.freeze({ value: ProtectionState.ProtectionBySequence, label: "Protection by Sequence" }),
  Object.freeze({ value: ProtectionState.NoOperationPossible, label: "No Operation Possible" }),
]);

// =============================================================================
// State Lookup
// =============================================================================

/**
 * Bounds-checked lookup of a state code, e.g. one read off the wire.
 */
export function lookupProtectionState(code: number): ValueListItem | undefined {
  if (!Number.isInteger(code) || code < 0 || code >= PROTECTION_STATES.length) {
    return undefined;
  }
  return PROTECTION_STATES[code];
}

/**
 * Parse a state given as a code ("1") or a label ("protection by sequence").
 */
export function parseProtectionState(input: string): ValueListItem {
  const trimmed = input.trim();
  const byCode = /^\d+$/.test(trimmed) ? lookupProtectionState(parseInt(trimmed, 10)) : undefined;
  const byLabel = PROTECTION_STATES.find((s) => s.label.toLowerCase() === trimmed.toLowerCase());
  const state = byCode ?? byLabel;

  if (!state) {
    const valid = PROTECTION_STATES.map((s) => `${s.value} (${s.label})`).join(", ");
    throw new Error(`Invalid protection state: ${input}. Expected one of: ${valid}`);
  }
  return state;
}

// =============================================================================
// Frame Building
// =============================================================================

export function buildGetRequest(nodeId: number): CommandFrame {
  return {
    label: "ProtectionCmd_Get",
    nodeId,
    command: [COMMAND_CLASS_PROTECTION, ProtectionCommand.Get],
    transmitOptions: DEFAULT_TRANSMIT_OPTIONS,
    expectedReply: { commandClassId: COMMAND_CLASS_PROTECTION, command: ProtectionCommand.Report },
  };
}

/**
 * Build a Set for the option selected in `value`.
 * Returns null for anything but a list value carrying a known state.
 */
export function buildSetRequest(nodeId: number, value: Value): CommandFrame | null {
  const option = extractRequestedOption(value);
  if (!option || !lookupProtectionState(option.value)) return null;

  return {
    label: "ProtectionCmd_Set",
    nodeId,
    command: [COMMAND_CLASS_PROTECTION, ProtectionCommand.Set, option.value],
    transmitOptions: DEFAULT_TRANSMIT_OPTIONS,
  };
}

export function extractRequestedOption(value: Value): ValueListItem | undefined {
  return value.type === "list" ? value.selected : undefined;
}

// =============================================================================
// Handler
// =============================================================================

export class ProtectionCommandClass implements CommandClassHandler {
  readonly commandClassId = COMMAND_CLASS_PROTECTION;
  readonly name = "COMMAND_CLASS_PROTECTION";

  private readonly nodeId: number;
  private readonly values: ValueStore;
  private readonly sink: MessageSink;
  private readonly logger: Logger;

  constructor(context: CommandClassContext) {
    this.nodeId = context.nodeId;
    this.values = context.values;
    this.sink = context.sink;
    this.logger = context.logger ?? createLogger();
  }

  requestState(requestFlags: number): boolean {
    if (requestFlags & RequestFlags.Session) {
      this.requestValue();
      return true;
    }
    return false;
  }

  requestValue(): void {
    this.sink.sendMessage(buildGetRequest(this.nodeId));
  }

  handleMessage(data: readonly number[], instance = 1): boolean {
    if (data[0] !== ProtectionCommand.Report) return false;

    const code = data[1];
    const state = code === undefined ? undefined : lookupProtectionState(code);
    if (!state) {
      this.logger.warn(`Ignoring Protection report from node ${this.nodeId}: invalid state ${code ?? "(missing)"}`);
      return true;
    }

    this.logger.info(`Received a Protection report from node ${this.nodeId}: ${state.label}`);
    this.pushObservedState(instance, state.value);
    return true;
  }

  setValue(value: Value): boolean {
    const frame = buildSetRequest(this.nodeId, value);
    const option = extractRequestedOption(value);
    if (!frame || !option) return false;

    this.logger.info(`Protection::Set - Setting protection state on node ${this.nodeId} to '${option.label}'`);
    this.sink.sendMessage(frame);
    return true;
  }

  createVars(instance: number): void {
    const definition: ListValueDefinition = {
      genre: "system",
      label: "Protection",
      units: "",
      readOnly: false,
      persisted: false,
      items: PROTECTION_STATES,
      defaultIndex: 0,
    };
    this.values.registerEnumeratedValue(instance, PROTECTION_VALUE_INDEX, definition);
  }

  /**
   * Write a validated state into the observable value. Does nothing
   * when the value has not been created for this instance.
   */
  pushObservedState(instance: number, code: number): void {
    if (!this.values.getValue(instance, PROTECTION_VALUE_INDEX)) {
      this.logger.debug(`No Protection value for node ${this.nodeId} instance ${instance}`);
      return;
    }
    this.values.setValue(instance, PROTECTION_VALUE_INDEX, code);
  }
}

export const protectionCommandClass: CommandClassDefinition<ProtectionCommandClass> = {
  commandClassId: COMMAND_CLASS_PROTECTION,
  create: (context) => new ProtectionCommandClass(context),
};
