/**
 * Z-Wave Serial API packet building and parsing.
 */

import type { ApplicationCommand, CommandFrame, DecodedFrame, Packet, SplitResult } from "./types.js";

/** Frame control bytes */
export const SOF = 0x01;
export const ACK = 0x06;
export const NAK = 0x15;
export const CAN = 0x18;

/** Frame types */
export const REQUEST = 0x00;
export const RESPONSE = 0x01;

/** Serial API function ids */
export const FUNC_ID_APPLICATION_COMMAND_HANDLER = 0x04;
export const FUNC_ID_ZW_SEND_DATA = 0x13;

/** Transmit option flags appended to SEND_DATA */
export const TRANSMIT_OPTION_ACK = 0x01;
export const TRANSMIT_OPTION_AUTO_ROUTE = 0x04;

export const DEFAULT_TRANSMIT_OPTIONS = TRANSMIT_OPTION_ACK | TRANSMIT_OPTION_AUTO_ROUTE;

/** Smallest legal length byte: itself, type and function id */
const MIN_LENGTH = 3;

/**
 * Node-addressed bytes of a command: [nodeId][length][...command][transmitOptions].
 */
export function frameBytes(frame: CommandFrame): number[] {
  return [frame.nodeId, frame.command.length, ...frame.command, frame.transmitOptions];
}

/**
 * XOR checksum seeded with 0xFF, over the length byte through the last parameter.
 */
export function checksum(bytes: readonly number[]): number {
  return bytes.reduce((acc, b) => acc ^ b, 0xff);
}

/**
 * Wrap a command in a SEND_DATA request.
 */
export function buildSendDataPacket(frame: CommandFrame, callbackId: number): Packet {
  const body = [REQUEST, FUNC_ID_ZW_SEND_DATA, ...frameBytes(frame), callbackId];
  const length = body.length + 1;
  return {
    serial: [SOF, length, ...body, checksum([length, ...body])],
    id: callbackId,
  };
}

/**
 * Scan a receive buffer for complete frames. Frames with a bad checksum are
 * dropped; a trailing partial frame is returned as the remainder.
 */
export function splitPackets(data: Buffer): SplitResult {
  const bytes = Array.from(data);
  const frames: DecodedFrame[] = [];
  const controls: number[] = [];

  let i = 0;
  while (i < bytes.length) {
    const b = bytes[i];
    if (b === ACK || b === NAK || b === CAN) {
      controls.push(b);
      i++;
      continue;
    }
    if (b !== SOF) {
      i++;
      continue;
    }
    if (i + 1 >= bytes.length) break;

    const length = bytes[i + 1];
    if (length < MIN_LENGTH) {
      i++;
      continue;
    }

    const end = i + length + 2;
    if (end > bytes.length) break;

    const raw = bytes.slice(i, end);
    if (checksum(raw.slice(1, -1)) === raw[raw.length - 1]) {
      frames.push({ type: raw[2], functionId: raw[3], params: raw.slice(4, -1), raw });
    }
    i = end;
  }

  return { frames, controls, remainder: data.subarray(i) };
}

/**
 * Parse the first complete data frame in a buffer.
 */
export function parsePacket(data: Buffer): DecodedFrame | null {
  return splitPackets(data).frames[0] ?? null;
}

/**
 * Extract the command carried by an APPLICATION_COMMAND_HANDLER request.
 */
export function decodeApplicationCommand(frame: DecodedFrame): ApplicationCommand | null {
  if (frame.type !== REQUEST || frame.functionId !== FUNC_ID_APPLICATION_COMMAND_HANDLER) {
    return null;
  }

  const [rxStatus, sourceNodeId, commandLength] = frame.params;
  if (commandLength === undefined || commandLength < 1 || frame.params.length < 3 + commandLength) {
    return null;
  }

  const command = frame.params.slice(3, 3 + commandLength);
  return {
    rxStatus,
    sourceNodeId,
    commandClassId: command[0],
    data: command.slice(1),
  };
}

/**
 * Parse the first application command in a buffer, optionally only one
 * sent by `sourceNodeId`.
 */
export function parseApplicationCommand(data: Buffer, sourceNodeId?: number): ApplicationCommand | null {
  for (const frame of splitPackets(data).frames) {
    const command = decodeApplicationCommand(frame);
    if (command && (sourceNodeId === undefined || command.sourceNodeId === sourceNodeId)) {
      return command;
    }
  }
  return null;
}

/**
 * Check if a response contains an ACK, wherever it falls among data frames.
 */
export function hasAcknowledge(data: Buffer): boolean {
  return splitPackets(data).controls.includes(ACK);
}

export function toHex(bytes: readonly number[]): string {
  return bytes.map((b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Parse hex text such as "01 09 00", "0x01,0x09" or "010900".
 */
export function parseHex(text: string): number[] {
  const digits = text.replace(/0x/gi, "").replace(/[\s,:]/g, "");
  if (!/^[0-9a-f]*$/i.test(digits) || digits.length % 2 !== 0) {
    throw new Error(`Invalid hex input: ${text}`);
  }

  const bytes: number[] = [];
  for (let i = 0; i < digits.length; i += 2) {
    bytes.push(parseInt(digits.slice(i, i + 2), 16));
  }
  return bytes;
}
