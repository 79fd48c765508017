/**
 * One capturable interface: its link type and its ordered configuration arguments.
 */

import { createArgument, renderArgument } from './argument.js';
import type { ArgumentOptions, ArgumentSpec } from './argument.js';
import { DLT_USER0 } from './constants.js';
import { field, optionalField } from './descriptor.js';
import { validateInterfaceOptions } from './validation.js';

export interface InterfaceOptions {
  name: string;
  description?: string;
  /** Defaults to LINKTYPE_USER0 (147). */
  linkType?: number;
  linkTypeName?: string;
  linkTypeDescription?: string;
  /** Adds the debug/debug-file arguments and the matching process flags. */
  debug?: boolean;
  args?: ArgumentOptions[];
}

export interface CaptureInterface {
  readonly name: string;
  readonly description?: string;
  readonly linkType: number;
  readonly linkTypeName?: string;
  readonly linkTypeDescription?: string;
  readonly args: readonly ArgumentSpec[];
  readonly hasDebugArgs: boolean;

  /** Adds an argument at the next ordinal. Returns the existing one if the name is taken. */
  addArgument(options: ArgumentOptions): ArgumentSpec;
  /** Adds the debug/debug-file arguments once. */
  enableDebug(): void;
  findArgument(name: string): ArgumentSpec | undefined;
  hasReloadableArgument(): boolean;

  renderInterface(): string;
  renderLinkType(): string;
  renderArguments(): string[];
}

const DEBUG_ARGUMENTS: ArgumentOptions[] = [
  {
    name: 'debug',
    kind: 'boolflag',
    display: 'Run in debug mode',
    default: false,
    tooltip: 'Print debug messages',
    group: 'Debug',
  },
  {
    name: 'debug-file',
    kind: 'string',
    display: 'Use a file for debug',
    tooltip: 'Set a file where the debug messages are written',
    group: 'Debug',
  },
];

export function defineInterface(options: InterfaceOptions): CaptureInterface {
  validateInterfaceOptions(options);

  const args: ArgumentSpec[] = [];
  let hasDebugArgs = false;

  const iface: CaptureInterface = {
    name: options.name,
    description: options.description,
    linkType: options.linkType ?? DLT_USER0,
    linkTypeName: options.linkTypeName,
    linkTypeDescription: options.linkTypeDescription,
    args,

    get hasDebugArgs(): boolean {
      return hasDebugArgs;
    },

    addArgument(argOptions: ArgumentOptions): ArgumentSpec {
      const existing = iface.findArgument(argOptions.name);
      if (existing) return existing;
      const arg = createArgument(args.length, argOptions);
      args.push(arg);
      return arg;
    },

    enableDebug(): void {
      if (hasDebugArgs) return;
      hasDebugArgs = true;
      for (const debugArg of DEBUG_ARGUMENTS) {
        iface.addArgument(debugArg);
      }
    },

    findArgument(name: string): ArgumentSpec | undefined {
      return args.find((a) => a.name === name);
    },

    hasReloadableArgument(): boolean {
      return args.some((a) => a.reload === true);
    },

    renderInterface(): string {
      return 'interface ' + field('value', iface.name) + optionalField('display', iface.description);
    },

    renderLinkType(): string {
      return (
        'dlt ' +
        field('number', iface.linkType) +
        field('name', iface.linkTypeName ?? iface.name) +
        optionalField('display', iface.linkTypeDescription)
      );
    },

    renderArguments(): string[] {
      return args.flatMap(renderArgument);
    },
  };

  for (const argOptions of options.args ?? []) {
    iface.addArgument(argOptions);
  }
  if (options.debug === true) {
    iface.enableDebug();
  }
  return iface;
}
