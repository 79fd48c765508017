/**
 * Shared shapes of the extcap calling convention: argument and control kinds,
 * the protocol step and the toolbar control message.
 */

// --- Interface configuration arguments ---

export const ARGUMENT_KINDS = [
  'integer',
  'unsigned',
  'long',
  'double',
  'string',
  'password',
  'boolean',
  'boolflag',
  'fileselect',
  'selector',
  'radio',
  'multicheck',
  'timestamp',
] as const;

export type ArgumentKind = (typeof ARGUMENT_KINDS)[number];

/** Kinds whose selectable values are rendered as `value` lines. */
export const VALUE_ARGUMENT_KINDS: readonly ArgumentKind[] = ['selector', 'radio', 'multicheck'];

// --- Toolbar controls ---

export type ControlKind = 'boolean' | 'button' | 'selector' | 'string';

export type ButtonRole = 'control' | 'logger' | 'help' | 'restore';

// --- Protocol step (derived once per run from the parsed flags) ---

export type ProtocolStep =
  | { kind: 'none' }
  | { kind: 'query-interfaces' }
  | { kind: 'query-link-types' }
  | { kind: 'configure-interface'; reload: boolean }
  | { kind: 'capture'; hasControlPipe: boolean };

export type ProtocolStepKind = ProtocolStep['kind'];

/** Parsed flag values keyed by long flag name; boolean flags are `true` when present. */
export type ParsedFlags = Readonly<Record<string, string | boolean | undefined>>;

// --- Control pipe messages ---

/** Command codes carried in byte 5 of a control frame. Other codes pass through unchanged. */
export const CONTROL_COMMANDS = {
  INITIALIZED: 0,
  SET: 1,
  ADD: 2,
  REMOVE: 3,
  ENABLE: 4,
  DISABLE: 5,
  STATUSBAR_MESSAGE: 6,
  INFORMATION_MESSAGE: 7,
  WARNING_MESSAGE: 8,
  ERROR_MESSAGE: 9,
} as const;

export type ControlCommandName = keyof typeof CONTROL_COMMANDS;

export interface ControlMessage {
  readonly controlNumber: number;
  /** Raw command code; compare against CONTROL_COMMANDS. */
  readonly command: number;
  readonly payload: Buffer;
}
