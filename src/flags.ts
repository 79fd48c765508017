/**
 * Command-line flags of the extcap calling convention: the declared flag table,
 * parsing with cross-flag checks, and derivation of the protocol step.
 */

import { parseArgs } from 'node:util';
import type { ParseArgsConfig } from 'node:util';
import type { CaptureInterface } from './capture-interface.js';
import { FLAGS } from './constants.js';
import { ExtcapError, errorMessage } from './errors.js';
import type { ExtcapConfig } from './extcap.js';
import type { ParsedFlags, ProtocolStep } from './types.js';

export interface FlagDefinition {
  name: string;
  takesValue: boolean;
  help?: string;
  valueName?: string;
  /** Flags that must also be present when this one is. */
  requires?: readonly string[];
  conflictsWith?: readonly string[];
}

export interface FlagRegistry {
  /** Declares a flag; a name that is already declared is left as it is. Returns true if added. */
  declare(definition: FlagDefinition): boolean;
  has(name: string): boolean;
  get(name: string): FlagDefinition | undefined;
  list(): FlagDefinition[];
}

/** Step flags; at most one may be given and each needs --extcap-interface. */
export const INTERFACE_ACTION_FLAGS: readonly string[] = [FLAGS.DLTS, FLAGS.CONFIG, FLAGS.CAPTURE];

export const BUILTIN_FLAGS: readonly FlagDefinition[] = [
  { name: FLAGS.VERSION, takesValue: true, valueName: 'ver', help: 'Wireshark version' },
  { name: FLAGS.INTERFACES, takesValue: false, help: 'List the extcap Interfaces' },
  {
    name: FLAGS.INTERFACE,
    takesValue: true,
    valueName: 'iface',
    help: 'Specify the extcap interface',
    conflictsWith: [FLAGS.INTERFACES],
  },
  { name: FLAGS.DLTS, takesValue: false, help: 'List the DLTs' },
  { name: FLAGS.CONFIG, takesValue: false, help: 'List the additional configuration for an interface' },
  { name: FLAGS.CAPTURE, takesValue: false, help: 'Run the capture', requires: [FLAGS.FIFO] },
  {
    name: FLAGS.CAPTURE_FILTER,
    takesValue: true,
    valueName: 'filter',
    help: 'The capture filter',
    requires: [FLAGS.CAPTURE],
  },
  {
    name: FLAGS.FIFO,
    takesValue: true,
    valueName: 'file',
    help: 'Dump data to file or fifo',
    requires: [FLAGS.CAPTURE],
  },
  { name: FLAGS.HELP, takesValue: false, help: 'Print help information' },
  { name: FLAGS.SHOW_VERSION, takesValue: false, help: 'Print version information' },
];

export const RELOAD_OPTION_FLAG: FlagDefinition = {
  name: FLAGS.RELOAD_OPTION,
  takesValue: true,
  valueName: 'option',
  help: 'Reload values for the given argument',
  requires: [FLAGS.INTERFACE, FLAGS.CONFIG],
};

export const CONTROL_FLAGS: readonly FlagDefinition[] = [
  {
    name: FLAGS.CONTROL_IN,
    takesValue: true,
    valueName: 'in-pipe',
    help: 'The pipe for control messages from toolbar',
    requires: [FLAGS.CAPTURE],
  },
  {
    name: FLAGS.CONTROL_OUT,
    takesValue: true,
    valueName: 'out-pipe',
    help: 'The pipe for control messages to toolbar',
    requires: [FLAGS.CAPTURE],
  },
];

export const DEBUG_FLAGS: readonly FlagDefinition[] = [
  { name: FLAGS.DEBUG, takesValue: false, help: 'Print additional messages' },
  { name: FLAGS.DEBUG_FILE, takesValue: true, valueName: 'file', help: 'Print debug messages to file' },
];

export function createFlagRegistry(initial: readonly FlagDefinition[] = BUILTIN_FLAGS): FlagRegistry {
  const flags = new Map<string, FlagDefinition>();

  const registry: FlagRegistry = {
    declare(definition: FlagDefinition): boolean {
      if (flags.has(definition.name)) return false;
      flags.set(definition.name, definition);
      return true;
    },
    has(name: string): boolean {
      return flags.has(name);
    },
    get(name: string): FlagDefinition | undefined {
      return flags.get(name);
    },
    list(): FlagDefinition[] {
      return [...flags.values()];
    },
  };

  for (const definition of initial) {
    registry.declare(definition);
  }
  return registry;
}

export function isFlagSet(flags: ParsedFlags, name: string): boolean {
  const value = flags[name];
  return value !== undefined && value !== false;
}

export function flagValue(flags: ParsedFlags, name: string): string | undefined {
  const value = flags[name];
  return typeof value === 'string' ? value : undefined;
}

const NEGATIVE_NUMBER = /^-\d+(\.\d+)?([eE][-+]?\d+)?$|^-\.\d+$/;

/** Joins `--name -5` into `--name=-5` for value-taking flags, so a negative value is not read as a flag. */
function joinNegativeValues(argv: readonly string[], registry: FlagRegistry): string[] {
  const joined: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg.startsWith('--') && !arg.includes('=') && next !== undefined && NEGATIVE_NUMBER.test(next)) {
      const definition = registry.get(arg.slice(2));
      if (definition?.takesValue) {
        joined.push(`${arg}=${next}`);
        i++;
        continue;
      }
    }
    joined.push(arg);
  }
  return joined;
}

/**
 * Parses argv against the declared flags. Unknown flags, missing values, conflicts,
 * unmet requirements and more than one step flag all fail with a FlagParse error.
 */
export function parseFlags(argv: readonly string[], registry: FlagRegistry): ParsedFlags {
  const options: NonNullable<ParseArgsConfig['options']> = {};
  for (const definition of registry.list()) {
    options[definition.name] = { type: definition.takesValue ? 'string' : 'boolean' };
  }

  let values: Record<string, unknown>;
  try {
    values = parseArgs({ args: joinNegativeValues(argv, registry), options, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw ExtcapError.flagParse(errorMessage(err), err);
  }

  const flags: Record<string, string | boolean> = {};
  for (const [name, value] of Object.entries(values)) {
    if (typeof value === 'string' || typeof value === 'boolean') {
      flags[name] = value;
    }
  }

  for (const name of Object.keys(flags)) {
    const definition = registry.get(name);
    if (!definition) continue;
    for (const required of definition.requires ?? []) {
      if (!isFlagSet(flags, required)) {
        throw ExtcapError.flagParse(`--${name} requires --${required}`);
      }
    }
    for (const conflicting of definition.conflictsWith ?? []) {
      if (isFlagSet(flags, conflicting)) {
        throw ExtcapError.flagParse(`--${name} cannot be used with --${conflicting}`);
      }
    }
  }

  const actions = INTERFACE_ACTION_FLAGS.filter((name) => isFlagSet(flags, name));
  if (actions.length > 1) {
    throw ExtcapError.flagParse(
      `Only one of ${INTERFACE_ACTION_FLAGS.map((n) => `--${n}`).join(', ')} may be given (got ${actions.map((n) => `--${n}`).join(', ')})`
    );
  }

  return flags;
}

/** Step precedence: interfaces, dlts, config, capture, none. */
export function deriveStep(flags: ParsedFlags): ProtocolStep {
  if (isFlagSet(flags, FLAGS.INTERFACES)) {
    return { kind: 'query-interfaces' };
  }
  if (isFlagSet(flags, FLAGS.DLTS)) {
    return { kind: 'query-link-types' };
  }
  if (isFlagSet(flags, FLAGS.CONFIG)) {
    return { kind: 'configure-interface', reload: isFlagSet(flags, FLAGS.RELOAD_OPTION) };
  }
  if (isFlagSet(flags, FLAGS.CAPTURE)) {
    return {
      kind: 'capture',
      hasControlPipe: isFlagSet(flags, FLAGS.CONTROL_IN) && isFlagSet(flags, FLAGS.CONTROL_OUT),
    };
  }
  return { kind: 'none' };
}

export type InterfaceStep = Exclude<ProtocolStep, { kind: 'none' } | { kind: 'query-interfaces' }>;

export type ResolvedStep =
  | { step: { kind: 'query-interfaces' }; iface?: undefined }
  | { step: InterfaceStep; iface: CaptureInterface };

/**
 * Derives the step and selects the interface every step but query-interfaces works on.
 * Fails with MissingInterface, InvalidInterface or UnknownStep before anything is printed.
 */
export function resolveStep(flags: ParsedFlags, interfaces: readonly CaptureInterface[]): ResolvedStep {
  const step = deriveStep(flags);
  if (step.kind === 'query-interfaces') {
    return { step };
  }

  const name = flagValue(flags, FLAGS.INTERFACE);
  if (name === undefined) {
    throw ExtcapError.missingInterface();
  }
  const iface = interfaces.find((i) => i.name === name);
  if (!iface) {
    throw ExtcapError.invalidInterface(name);
  }
  if (step.kind === 'none') {
    throw ExtcapError.unknownStep();
  }
  return { step, iface };
}

function flagColumn(definition: FlagDefinition): string {
  return definition.takesValue ? `--${definition.name} <${definition.valueName ?? 'value'}>` : `--${definition.name}`;
}

/** Usage text printed for --help. */
export function renderHelp(config: ExtcapConfig, registry: FlagRegistry): string[] {
  const lines: string[] = [config.version !== undefined ? `${config.name} ${config.version}` : config.name];
  if (config.author !== undefined) lines.push(config.author);
  if (config.about !== undefined) lines.push(config.about);
  lines.push('', 'USAGE:', `    ${config.usage ?? `${config.name} [OPTIONS]`}`, '', 'OPTIONS:');

  const definitions = registry.list();
  const width = Math.max(...definitions.map((d) => flagColumn(d).length));
  for (const definition of definitions) {
    const column = flagColumn(definition);
    lines.push(definition.help !== undefined ? `    ${column.padEnd(width)}    ${definition.help}` : `    ${column}`);
  }

  if (config.afterHelp !== undefined) {
    lines.push('', config.afterHelp);
  }
  return lines;
}
