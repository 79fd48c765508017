/**
 * extcap-kit: build external capture providers for Wireshark in TypeScript.
 */

export { createExtcap } from './extcap.js';
export type { CaptureContext, Extcap, ExtcapConfig, ExtcapListener, RunOptions } from './extcap.js';
export { exitCodeFor, formatFailure, launch } from './entrypoint.js';

export { defineInterface } from './capture-interface.js';
export type { CaptureInterface, InterfaceOptions } from './capture-interface.js';
export { createArgument, renderArgument, renderArgumentValue, replaceArgumentValues, takesValue } from './argument.js';
export type { ArgumentOptions, ArgumentSpec, ArgumentValue, ArgumentValueOptions } from './argument.js';
export { createControl, renderControl, renderControlValue } from './control.js';
export type { ControlOptions, ControlValue, ControlValueOptions, ToolbarControl } from './control.js';

export { deriveStep, parseFlags, resolveStep } from './flags.js';
export type { FlagDefinition, FlagRegistry } from './flags.js';

export { Channel } from './channel.js';
export type { Receiver, Sender } from './channel.js';
export { createControlPipe, openControlPipe } from './control-pipe.js';
export type { ControlPipe, ControlPipeOptions, ControlPipeState, ControlQueues } from './control-pipe.js';
export {
  ControlMessageDecoder,
  commandName,
  createControlMessage,
  decodeFrame,
  encodeControlMessage,
} from './control-message.js';

export { PcapWriter, encodeGlobalHeader, encodeRecord, openPcapWriter } from './pcap-writer.js';
export type { PcapHeaderOptions, PcapPacket, PcapWriterOptions } from './pcap-writer.js';

export {
  CONTROL_QUEUE_CAPACITY,
  DEFAULT_SNAP_LENGTH,
  DLT_USER0,
  EXIT_CONFIG,
  EXIT_RUNTIME,
  FLAGS,
  MAX_CONTROLS,
} from './constants.js';
export { ExtcapError, isConfigurationError } from './errors.js';
export type { ExtcapErrorKind } from './errors.js';
export { configureLogger, logDebug, logError, logInfo, logWarn } from './logger.js';
export type { LoggerOptions, LogLevel } from './logger.js';
export { ValidationError } from './validation.js';
export type { DefinitionKind } from './validation.js';

export { ARGUMENT_KINDS, CONTROL_COMMANDS } from './types.js';
export type {
  ArgumentKind,
  ButtonRole,
  ControlCommandName,
  ControlKind,
  ControlMessage,
  ParsedFlags,
  ProtocolStep,
  ProtocolStepKind,
} from './types.js';
