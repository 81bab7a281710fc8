/**
 * Nodes as the CLI sets them up: protection command class added and
 * its values created for the root instance.
 */

import { COMMAND_CLASS_PROTECTION, PROTECTION_VALUE_INDEX, protectionCommandClass } from "./command-classes/index.js";
import { parseNodeId, type Logger } from "./lib.js";
import { ZWaveNode } from "./node.js";
import { parseApplicationCommand, type ApplicationCommand } from "./protocol/index.js";
import type { ListValue } from "./values.js";

export function createProtectionNode(nodeId: number, logger?: Logger): ZWaveNode {
  const node = new ZWaveNode(nodeId, { logger });
  node.addCommandClass(protectionCommandClass);
  node.createVars();
  return node;
}

export function protectionValue(node: ZWaveNode, instance = 1): ListValue {
  const value = node.values.get(COMMAND_CLASS_PROTECTION, instance, PROTECTION_VALUE_INDEX);
  if (!value || value.type !== "list") {
    throw new Error(`Node ${node.nodeId} has no Protection value`);
  }
  return value;
}

export function formatProtectionValue(node: ZWaveNode): string {
  const { selected } = protectionValue(node);
  return `Node ${node.nodeId}: ${selected.label} (${selected.value})`;
}

export interface DecodeOptions {
  /** Only take a command sent by this node */
  nodeId?: number;
  logger?: Logger;
}

export interface DecodeResult {
  handled: boolean;
  node: ZWaveNode;
  command: ApplicationCommand;
}

/**
 * Run the first application command in `bytes` (from `options.nodeId`, when
 * given) through a freshly set up node.
 */
export function decodeFrame(bytes: readonly number[], options: DecodeOptions = {}): DecodeResult {
  const command = parseApplicationCommand(Buffer.from(bytes), options.nodeId);
  if (!command) {
    throw new Error(
      options.nodeId === undefined
        ? "No application command found in input"
        : `No application command from node ${options.nodeId} in input`
    );
  }

  const node = createProtectionNode(parseNodeId(command.sourceNodeId), options.logger);
  return { handled: node.applicationCommand(command), node, command };
}
