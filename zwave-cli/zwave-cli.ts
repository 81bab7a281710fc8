#!/usr/bin/env npx tsx
import { program } from "commander";
import { RequestFlags, buildGetRequest, buildSetRequest, parseProtectionState } from "./command-classes/index.js";
import { ZWaveConnection } from "./connection.js";
import {
  createLogger,
  getErrorMessage,
  parseCallbackId,
  parseNodeId,
  parseTimeout,
  type Logger,
} from "./lib.js";
import type { ZWaveNode } from "./node.js";
import { buildSendDataPacket, parseHex, toHex, type CommandFrame } from "./protocol/index.js";
import { createProtectionNode, decodeFrame, formatProtectionValue, protectionValue } from "./session.js";
import { withSelection, type ListValue } from "./values.js";

// =============================================================================
// Helpers
// =============================================================================

interface DeviceOptions {
  port?: string;
  timeout?: number;
  verbose?: boolean;
}

async function withConnection(
  options: DeviceOptions,
  logger: Logger,
  fn: (connection: ZWaveConnection) => Promise<void>
): Promise<void> {
  logger.info("Connecting to Z-Wave controller...");
  const connection = await ZWaveConnection.connect(options.port, logger);
  logger.info("Connected.\n");

  try {
    await fn(connection);
  } finally {
    connection.close();
  }
}

function fail(err: unknown): never {
  console.error(getErrorMessage(err));
  process.exit(1);
}

// =============================================================================
// CLI Commands
// =============================================================================

program.name("zwave-cli").description("Z-Wave protection state CLI").version("1.0.0");

program
  .command("get")
  .description("Read a node's protection state")
  .argument("<node>", "Node id (1-232)")
  .option("-p, --port <path>", "Serial port path (auto-detect if not specified)")
  .option("-t, --timeout <ms>", "Reply timeout in milliseconds", parseTimeout)
  .option("-v, --verbose", "Show frames as they are sent and received")
  .action(async (nodeArg: string, options: DeviceOptions) => {
    const logger = createLogger({ verbose: options.verbose });
    let nodeId: number;
    try {
      nodeId = parseNodeId(nodeArg);
    } catch (err) {
      fail(err);
    }

    const node = createProtectionNode(nodeId, logger);
    node.requestState(RequestFlags.Session);

    try {
      await withConnection(options, logger, async (connection) => {
        await connection.flush(node, { timeout: options.timeout, debug: options.verbose });
      });
    } catch (err) {
      fail(err);
    }

    logger.info(formatProtectionValue(node));
  });

program
  .command("set")
  .description("Change a node's protection state")
  .argument("<node>", "Node id (1-232)")
  .argument("<state>", "State code (0-2) or label, e.g. \"Protection by Sequence\"")
  .option("-p, --port <path>", "Serial port path (auto-detect if not specified)")
  .option("-t, --timeout <ms>", "Reply timeout in milliseconds", parseTimeout)
  .option("-v, --verbose", "Show frames as they are sent and received")
  .action(async (nodeArg: string, stateArg: string, options: DeviceOptions) => {
    const logger = createLogger({ verbose: options.verbose });
    let node: ZWaveNode;
    let requested: ListValue | undefined;
    try {
      node = createProtectionNode(parseNodeId(nodeArg), logger);
      requested = withSelection(protectionValue(node), parseProtectionState(stateArg).value);
    } catch (err) {
      fail(err);
    }

    if (!requested || !node.setValue(requested)) {
      fail(`Cannot set protection state to ${stateArg}`);
    }
    node.requestState(RequestFlags.Session);

    try {
      await withConnection(options, logger, async (connection) => {
        await connection.flush(node, { timeout: options.timeout, debug: options.verbose });
      });
    } catch (err) {
      fail(err);
    }

    logger.info(formatProtectionValue(node));
  });

program
  .command("encode")
  .description("Print the serial packet for a command without sending it")
  .argument("<node>", "Node id (1-232)")
  .argument("<command>", "get or set")
  .argument("[state]", "State for set: code (0-2) or label")
  .option("--callback <id>", "Callback id to place in the packet", parseCallbackId, 1)
  .action((nodeArg: string, command: string, stateArg: string | undefined, options: { callback: number }) => {
    try {
      const logger = createLogger();
      const node = createProtectionNode(parseNodeId(nodeArg), logger);

      let frame: CommandFrame | null;
      switch (command.toLowerCase()) {
        case "get":
          frame = buildGetRequest(node.nodeId);
          break;
        case "set": {
          if (stateArg === undefined) throw new Error("Missing state for set");
          const requested = withSelection(protectionValue(node), parseProtectionState(stateArg).value);
          frame = requested ? buildSetRequest(node.nodeId, requested) : null;
          if (!frame) throw new Error(`Cannot encode protection state ${stateArg}`);
          break;
        }
        default:
          throw new Error(`Unknown command: ${command}. Expected get or set.`);
      }

      console.log(toHex(buildSendDataPacket(frame, options.callback).serial));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("decode")
  .description("Run an inbound serial frame through the protection handler")
  .argument("<hex>", "Frame bytes in hex, e.g. \"01 09 00 04 00 05 03 75 03 02 80\"")
  .option("--node <id>", "Only decode a command sent by this node", parseNodeId)
  .action((hex: string, options: { node?: number }) => {
    try {
      const logger = createLogger({ verbose: true });
      const result = decodeFrame(parseHex(hex), { nodeId: options.node, logger });
      if (!result.handled) {
        console.log(`Not handled: command class 0x${result.command.commandClassId.toString(16)}`);
        return;
      }

      console.log(formatProtectionValue(result.node));
    } catch (err) {
      fail(err);
    }
  });

program.parse();
