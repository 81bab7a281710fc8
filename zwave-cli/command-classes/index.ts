export type { CommandClassContext, CommandClassDefinition, CommandClassHandler, MessageSink } from "./types.js";
export { RequestFlags } from "./types.js";
export { CommandClassRegistry } from "./registry.js";
export {
  COMMAND_CLASS_PROTECTION,
  PROTECTION_STATES,
  PROTECTION_VALUE_INDEX,
  ProtectionCommand,
  ProtectionState,
  ProtectionCommandClass,
  buildGetRequest,
  buildSetRequest,
  extractRequestedOption,
  lookupProtectionState,
  parseProtectionState,
  protectionCommandClass,
} from "./protection.js";
