/**
 * Z-Wave protocol module - serial framing and command frames.
 */

export type { ApplicationCommand, CommandFrame, DecodedFrame, Packet, SendOptions, SplitResult } from "./types.js";
export {
  SOF,
  ACK,
  NAK,
  CAN,
  REQUEST,
  RESPONSE,
  FUNC_ID_APPLICATION_COMMAND_HANDLER,
  FUNC_ID_ZW_SEND_DATA,
  TRANSMIT_OPTION_ACK,
  TRANSMIT_OPTION_AUTO_ROUTE,
  DEFAULT_TRANSMIT_OPTIONS,
  frameBytes,
  checksum,
  buildSendDataPacket,
  splitPackets,
  parsePacket,
  decodeApplicationCommand,
  parseApplicationCommand,
  hasAcknowledge,
  toHex,
  parseHex,
} from "./packet.js";
