/**
 * Protocol types for Z-Wave controller communication.
 */

/** A command addressed to one node, before serial framing */
export interface CommandFrame {
  /** Short name used in diagnostics, e.g. "ProtectionCmd_Get" */
  label: string;
  nodeId: number;
  /** [commandClassId, command, ...parameters] */
  command: number[];
  transmitOptions: number;
  /** The command the node is expected to answer with, if any */
  expectedReply?: { commandClassId: number; command: number };
}

/** Encoded packet ready for transmission */
export interface Packet {
  serial: number[];
  id: number;
}

/** A checksum-valid data frame received from the controller */
export interface DecodedFrame {
  type: number;
  functionId: number;
  params: number[];
  raw: number[];
}

/** Payload of an APPLICATION_COMMAND_HANDLER request */
export interface ApplicationCommand {
  rxStatus: number;
  sourceNodeId: number;
  commandClassId: number;
  /** Command bytes after the command class id: [command, ...parameters] */
  data: number[];
}

/** Result of scanning a receive buffer */
export interface SplitResult {
  frames: DecodedFrame[];
  /** Single-byte control frames (ACK, NAK, CAN) in arrival order */
  controls: number[];
  remainder: Buffer;
}

/** Options for send and wait operations */
export interface SendOptions {
  timeout: number;
  retries: number;
  debug?: boolean;
}
