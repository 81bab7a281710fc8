/**
 * Z-Wave controller connection abstraction.
 */

import { SerialPort } from "serialport";
import { MAX_CALLBACK_ID, createLogger, matchesUsbFilter, type Logger } from "./lib.js";
import type { ZWaveNode } from "./node.js";
import {
  ACK,
  buildSendDataPacket,
  decodeApplicationCommand,
  hasAcknowledge,
  splitPackets,
  toHex,
  type CommandFrame,
  type Packet,
  type SendOptions,
} from "./protocol/index.js";

const SERIAL_BAUD_RATE = 115200;
const DEFAULT_TIMEOUT_MS = 1000;
const DEFAULT_RETRIES = 3;
const REPLY_TIMEOUT_MS = 5000;

/** The part of a serial port the connection uses */
export interface PortLike {
  write(data: Buffer): unknown;
  on(event: "data", listener: (data: Buffer) => void): unknown;
  removeListener(event: "data", listener: (data: Buffer) => void): unknown;
  close(): unknown;
}

/**
 * Encapsulates serial communication with a Z-Wave controller.
 */
export class ZWaveConnection {
  private callbackId = 0;

  constructor(
    private port: PortLike,
    private logger: Logger = createLogger()
  ) {}

  /**
   * Find and connect to a controller.
   * @param manualPort - Optional manual port path, auto-detects if not provided
   */
  static async connect(manualPort?: string, logger: Logger = createLogger()): Promise<ZWaveConnection> {
    const portPath = await findDevice(manualPort, logger);
    const port = await openPort(portPath);
    return new ZWaveConnection(port, logger);
  }

  /**
   * Close the connection.
   */
  close(): void {
    this.port.close();
  }

  /**
   * Send a packet and wait for a response matching the parser.
   * Data frames arriving meanwhile are acknowledged.
   */
  async sendAndWait<T>(
    packet: Packet,
    parser: (buffer: Buffer) => T | null,
    options: Partial<SendOptions> = {}
  ): Promise<T> {
    const { timeout = DEFAULT_TIMEOUT_MS, retries = DEFAULT_RETRIES, debug = false } = options;

    return new Promise((resolve, reject) => {
      let timeoutId: NodeJS.Timeout;
      let attempt = 0;
      let acked = 0;
      let buffer = Buffer.alloc(0);

      const cleanup = () => {
        clearTimeout(timeoutId);
        this.port.removeListener("data", onData);
      };

      const sendPacket = () => {
        attempt++;
        acked = 0;
        buffer = Buffer.alloc(0);
        clearTimeout(timeoutId);

        timeoutId = setTimeout(() => {
          if (attempt < retries) {
            sendPacket();
          } else {
            cleanup();
            reject(new Error(`Timeout after ${retries} attempts`));
          }
        }, timeout);

        if (debug) {
          this.logger.debug(`Sending ${toHex(packet.serial)}`);
        }
        this.port.write(Buffer.from(packet.serial));
      };

      const onData = (data: Buffer) => {
        buffer = Buffer.concat([buffer, data]);

        if (debug) {
          this.logger.debug(`Received ${data.length} bytes: ${buffer.toString("hex").slice(0, 100)}`);
        }

        const { frames } = splitPackets(buffer);
        for (; acked < frames.length; acked++) {
          this.port.write(Buffer.from([ACK]));
        }

        const result = parser(buffer);
        if (result !== null) {
          cleanup();
          resolve(result);
        }
      };

      this.port.on("data", onData);
      sendPacket();
    });
  }

  /**
   * Send a packet and wait for the controller's ACK.
   */
  async sendAndWaitAck(packet: Packet, options: Partial<SendOptions> = {}): Promise<void> {
    await this.sendAndWait(packet, (buf) => (hasAcknowledge(buf) ? true : null), options);
  }

  /**
   * Wrap a command in SEND_DATA and wait for the controller to accept it.
   */
  async sendCommand(frame: CommandFrame, options: Partial<SendOptions> = {}): Promise<void> {
    await this.sendAndWaitAck(this.nextPacket(frame), options);
  }

  /**
   * Send a command and, when it expects a reply, wait for that reply from
   * the target node and dispatch it into the node.
   * @returns whether the node handled the reply (true when none was expected)
   */
  async request(node: ZWaveNode, frame: CommandFrame, options: Partial<SendOptions> = {}): Promise<boolean> {
    const expected = frame.expectedReply;
    if (!expected) {
      await this.sendCommand(frame, options);
      return true;
    }

    const parser = (buffer: Buffer): boolean | null => {
      for (const decoded of splitPackets(buffer).frames) {
        const command = decodeApplicationCommand(decoded);
        if (
          command &&
          command.sourceNodeId === frame.nodeId &&
          command.commandClassId === expected.commandClassId &&
          command.data[0] === expected.command
        ) {
          return node.applicationCommand(command);
        }
      }
      return null;
    };

    return this.sendAndWait(this.nextPacket(frame), parser, {
      ...options,
      timeout: options.timeout ?? REPLY_TIMEOUT_MS,
      retries: options.retries ?? 1,
    });
  }

  /**
   * Send every command the node has queued, one at a time.
   */
  async flush(node: ZWaveNode, options: Partial<SendOptions> = {}): Promise<number> {
    const frames = node.takeMessages();
    for (const frame of frames) {
      this.logger.debug(`Sending ${frame.label} to node ${frame.nodeId}`);
      await this.request(node, frame, options);
    }
    return frames.length;
  }

  private nextPacket(frame: CommandFrame): Packet {
    this.callbackId = (this.callbackId % MAX_CALLBACK_ID) + 1;
    return buildSendDataPacket(frame, this.callbackId);
  }
}

/**
 * Find a controller by scanning USB ports.
 */
async function findDevice(manualPort: string | undefined, logger: Logger): Promise<string> {
  if (manualPort) return manualPort;

  const ports = await SerialPort.list();

  for (const port of ports) {
    if (matchesUsbFilter(port.vendorId, port.productId)) {
      logger.info(`Found Z-Wave controller: ${port.path} (VID: ${port.vendorId}, PID: ${port.productId})`);
      return port.path;
    }
  }

  logger.info("\nAvailable ports:");
  for (const port of ports) {
    logger.info(`  ${port.path} - ${port.manufacturer ?? "Unknown"} (VID: ${port.vendorId}, PID: ${port.productId})`);
  }

  throw new Error("No Z-Wave controller found. Connect one or specify --port.");
}

/**
 * Open a serial port connection.
 */
async function openPort(portPath: string): Promise<SerialPort> {
  const port = new SerialPort({
    path: portPath,
    baudRate: SERIAL_BAUD_RATE,
  });

  await new Promise<void>((resolve, reject) => {
    port.once("open", resolve);
    port.once("error", reject);
  });

  return port;
}
