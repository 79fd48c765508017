/**
 * Extcap provider instance: registries, flag parsing, step dispatch and the capture session.
 * Public API: createExtcap(config), addInterface(), addControl(), run(listener).
 */

import type { Writable } from 'node:stream';
import { renderArgument, replaceArgumentValues, takesValue } from './argument.js';
import type { ArgumentSpec, ArgumentValueOptions } from './argument.js';
import { defineInterface } from './capture-interface.js';
import type { CaptureInterface, InterfaceOptions } from './capture-interface.js';
import { DEFAULT_SNAP_LENGTH, FLAGS, MAX_CONTROLS } from './constants.js';
import { createControl, renderControl } from './control.js';
import type { ControlOptions, ToolbarControl } from './control.js';
import { openControlPipe } from './control-pipe.js';
import type { ControlPipe, ControlQueues } from './control-pipe.js';
import { field, optionalField, writeLines } from './descriptor.js';
import { ExtcapError, errorMessage } from './errors.js';
import {
  CONTROL_FLAGS,
  DEBUG_FLAGS,
  RELOAD_OPTION_FLAG,
  createFlagRegistry,
  deriveStep,
  flagValue,
  isFlagSet,
  parseFlags,
  renderHelp,
  resolveStep,
} from './flags.js';
import type { FlagDefinition, InterfaceStep } from './flags.js';
import { configureLogger, logDebug, logInfo, logWarn } from './logger.js';
import { openPcapWriter } from './pcap-writer.js';
import type { PcapHeaderOptions, PcapWriter } from './pcap-writer.js';
import type { ParsedFlags, ProtocolStep } from './types.js';
import { ValidationError, validateExtcapConfig } from './validation.js';

export interface ExtcapConfig {
  /** Program name, used in help output and error messages. */
  name: string;
  version?: string;
  /** URL printed as {help=...} on the version line. */
  helpPage?: string;
  about?: string;
  author?: string;
  usage?: string;
  afterHelp?: string;
}

export interface CaptureContext {
  extcap: Extcap;
  iface: CaptureInterface;
  writer: PcapWriter;
  captureFilter: string | undefined;
  /** Present when both control pipes were given and could be opened. */
  controls: ControlQueues | undefined;
  /** Aborted on SIGINT/SIGTERM while the capture runs. */
  signal: AbortSignal;
}

/**
 * Provider callbacks. Every operation is optional: a missing initLog configures the built-in
 * logger, a missing reloadOption changes nothing, a missing captureHeader uses the interface's
 * link type, and a missing capture fails the capture step with NotImplemented.
 */
export interface ExtcapListener {
  initLog?(extcap: Extcap, debug: boolean, debugFile: string | undefined): void;
  /** Called after parsing, before the step runs; may add interfaces whose flags are already declared. */
  updateInterfaces?(extcap: Extcap): void | Promise<void>;
  reloadOption?(
    extcap: Extcap,
    iface: CaptureInterface,
    arg: ArgumentSpec
  ): ArgumentValueOptions[] | undefined | Promise<ArgumentValueOptions[] | undefined>;
  captureHeader?(extcap: Extcap, iface: CaptureInterface): PcapHeaderOptions;
  capture?(context: CaptureContext): void | Promise<void>;
}

export interface RunOptions {
  /** Defaults to process.argv.slice(2). */
  argv?: readonly string[];
  /** Descriptor output and the `--fifo -` capture sink. Defaults to process.stdout. */
  stdout?: Writable;
}

export interface Extcap {
  readonly config: Readonly<ExtcapConfig>;
  /** Derived by run(); 'none' before that. */
  readonly step: ProtocolStep;
  readonly interfaces: readonly CaptureInterface[];
  readonly controls: readonly ToolbarControl[];
  /** Host version from --extcap-version. */
  readonly hostVersion: string | undefined;

  addInterface(iface: CaptureInterface | InterfaceOptions): CaptureInterface;
  addControl(options: ControlOptions): ToolbarControl;
  /** Parsed flag value; throws a State error before run() parsed the flags. */
  getFlag(name: string): string | boolean | undefined;
  getFlags(): ParsedFlags;
  /** Parses the flags and performs the requested step. Legal once per instance. */
  run(listener: ExtcapListener, options?: RunOptions): Promise<void>;
}

function isCaptureInterface(value: CaptureInterface | InterfaceOptions): value is CaptureInterface {
  return 'renderInterface' in value && typeof value.renderInterface === 'function';
}

function argumentFlag(arg: ArgumentSpec): FlagDefinition {
  return { name: arg.name, takesValue: takesValue(arg), help: arg.display };
}

export function createExtcap(config: ExtcapConfig): Extcap {
  validateExtcapConfig(config);

  const registry = createFlagRegistry();
  const interfaces: CaptureInterface[] = [];
  const controls: ToolbarControl[] = [];
  let flags: ParsedFlags | undefined;
  let step: ProtocolStep = { kind: 'none' };
  let hostVersion: string | undefined;
  let ran = false;

  function declareFlag(definition: FlagDefinition): void {
    if (registry.has(definition.name)) return;
    if (flags !== undefined) {
      throw ExtcapError.state(`--${definition.name} declared after flags were parsed`);
    }
    registry.declare(definition);
  }

  function declareInterfaceFlags(iface: CaptureInterface): void {
    if (iface.hasReloadableArgument()) declareFlag(RELOAD_OPTION_FLAG);
    if (iface.hasDebugArgs) DEBUG_FLAGS.forEach(declareFlag);
    for (const arg of iface.args) declareFlag(argumentFlag(arg));
  }

  function parsedFlags(): ParsedFlags {
    if (flags === undefined) {
      throw ExtcapError.state('Flags are not parsed yet; call run() first');
    }
    return flags;
  }

  function renderVersion(): string {
    return 'extcap ' + field('version', config.version ?? 'unknown') + optionalField('help', config.helpPage);
  }

  async function reloadOption(
    listener: ExtcapListener,
    iface: CaptureInterface,
    argName: string,
    stdout: Writable
  ): Promise<void> {
    const arg = iface.findArgument(argName);
    if (!arg) {
      logWarn('Reload option argument not available for interface', { argument: argName, interface: iface.name });
      return;
    }
    const values = listener.reloadOption ? await listener.reloadOption(extcap, iface, arg) : undefined;
    if (values) {
      logDebug('Reload option argument has new values', { argument: argName, interface: iface.name, count: values.length });
      replaceArgumentValues(arg, values);
    } else {
      logDebug('Reload option argument unchanged', { argument: argName, interface: iface.name });
    }
    writeLines(stdout, renderArgument(arg));
  }

  async function openControls(current: ParsedFlags): Promise<ControlPipe | undefined> {
    const controlIn = flagValue(current, FLAGS.CONTROL_IN);
    const controlOut = flagValue(current, FLAGS.CONTROL_OUT);
    if (controlIn === undefined || controlOut === undefined) return undefined;
    logDebug('Capture with control pipes', { in: controlIn, out: controlOut });
    try {
      return await openControlPipe(controlIn, controlOut);
    } catch (err) {
      logWarn('Control pipes unavailable; capturing without them', { in: controlIn, out: controlOut, error: errorMessage(err) });
      return undefined;
    }
  }

  async function capture(
    listener: ExtcapListener,
    iface: CaptureInterface,
    current: { kind: 'capture'; hasControlPipe: boolean },
    stdout: Writable
  ): Promise<void> {
    const captureRoutine = listener.capture;
    if (!captureRoutine) {
      throw ExtcapError.notImplemented('capture');
    }
    const currentFlags = parsedFlags();
    const fifo = flagValue(currentFlags, FLAGS.FIFO);
    if (fifo === undefined) {
      throw ExtcapError.flagParse(`--${FLAGS.CAPTURE} requires --${FLAGS.FIFO}`);
    }
    const captureFilter = flagValue(currentFlags, FLAGS.CAPTURE_FILTER);
    logDebug('Capture required', { fifo, captureFilter });

    const pipe = current.hasControlPipe ? await openControls(currentFlags) : undefined;
    let writer: PcapWriter;
    try {
      const header: PcapHeaderOptions = listener.captureHeader?.(extcap, iface) ?? {};
      const resolvedHeader = {
        linkType: header.linkType ?? iface.linkType,
        snapLength: header.snapLength ?? DEFAULT_SNAP_LENGTH,
      };
      logDebug('Capture pcap header', resolvedHeader);
      writer = await openPcapWriter(fifo, resolvedHeader, stdout);
    } catch (err) {
      pipe?.dispose();
      throw err;
    }

    const queues = pipe?.start();
    const abort = new AbortController();
    const onSignal = (signal: NodeJS.Signals): void => {
      logInfo(`Received ${signal}, stopping capture`);
      abort.abort();
    };
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);

    logDebug(`Capture starting ${queues ? 'with' : 'without'} control pipes`);
    let failure: { error: unknown } | undefined;
    try {
      await captureRoutine.call(listener, {
        extcap,
        iface,
        writer,
        captureFilter,
        controls: queues,
        signal: abort.signal,
      });
    } catch (err) {
      failure = { error: err };
    }
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);

    if (pipe) await pipe.stop();
    try {
      await writer.close();
    } catch (err) {
      if (!failure) throw err;
      logWarn('Capture sink close failed after capture error', { error: errorMessage(err) });
    }
    if (failure) {
      logDebug('Capture failed', { error: errorMessage(failure.error) });
      throw failure.error;
    }
    logDebug('Capture finished');
  }

  async function dispatch(
    listener: ExtcapListener,
    resolved: { step: InterfaceStep; iface: CaptureInterface },
    stdout: Writable
  ): Promise<void> {
    const { step: current, iface } = resolved;
    logDebug('Interface selected', { interface: iface.name });
    switch (current.kind) {
      case 'query-link-types':
        logDebug('Interface DLTs required');
        writeLines(stdout, [iface.renderLinkType()]);
        return;
      case 'configure-interface': {
        const argName = flagValue(parsedFlags(), FLAGS.RELOAD_OPTION);
        if (current.reload && argName !== undefined) {
          logDebug('Interface config reload required', { argument: argName });
          await reloadOption(listener, iface, argName, stdout);
        } else {
          logDebug('Interface config required');
          writeLines(stdout, iface.renderArguments());
        }
        return;
      }
      case 'capture':
        await capture(listener, iface, current, stdout);
        return;
    }
  }

  const extcap: Extcap = {
    config,

    get step(): ProtocolStep {
      return step;
    },
    get hostVersion(): string | undefined {
      return hostVersion;
    },
    interfaces,
    controls,

    addInterface(ifaceOrOptions: CaptureInterface | InterfaceOptions): CaptureInterface {
      const iface = isCaptureInterface(ifaceOrOptions) ? ifaceOrOptions : defineInterface(ifaceOrOptions);
      if (interfaces.some((i) => i.name === iface.name)) {
        throw new ValidationError('interface', `interface '${iface.name}' is already registered`, 'name');
      }
      declareInterfaceFlags(iface);
      interfaces.push(iface);
      return iface;
    },

    addControl(options: ControlOptions): ToolbarControl {
      if (controls.length >= MAX_CONTROLS) {
        throw new ValidationError('control', `at most ${MAX_CONTROLS} controls can be registered`, 'controls');
      }
      const control = createControl(controls.length, options);
      CONTROL_FLAGS.forEach(declareFlag);
      controls.push(control);
      return control;
    },

    getFlag(name: string): string | boolean | undefined {
      return parsedFlags()[name];
    },

    getFlags(): ParsedFlags {
      return parsedFlags();
    },

    async run(listener: ExtcapListener, options: RunOptions = {}): Promise<void> {
      if (ran) {
        throw ExtcapError.state('run() already called');
      }
      ran = true;
      const argv = options.argv ?? process.argv.slice(2);
      const stdout = options.stdout ?? process.stdout;

      // Arguments added to an interface after addInterface() still get their flags.
      interfaces.forEach(declareInterfaceFlags);
      const current = parseFlags(argv, registry);
      flags = current;

      if (isFlagSet(current, FLAGS.HELP)) {
        writeLines(stdout, renderHelp(config, registry));
        return;
      }
      if (isFlagSet(current, FLAGS.SHOW_VERSION)) {
        writeLines(stdout, [`${config.name} ${config.version ?? 'unknown'}`]);
        return;
      }

      step = deriveStep(current);

      const debug = isFlagSet(current, FLAGS.DEBUG);
      const rawDebugFile = flagValue(current, FLAGS.DEBUG_FILE);
      const debugFile = rawDebugFile !== undefined && rawDebugFile.trim() !== '' ? rawDebugFile : undefined;
      if (listener.initLog) {
        listener.initLog(extcap, debug, debugFile);
      } else {
        configureLogger({ debug, debugFile });
      }
      logDebug('Log initialized', { debug, debugFile: debugFile ?? '' });
      logDebug('Step derived', { step });
      logDebug('Arguments', { argv: [...argv] });

      hostVersion = flagValue(current, FLAGS.VERSION);
      logDebug('Wireshark version', { version: hostVersion ?? '-not provided-' });

      await listener.updateInterfaces?.(extcap);

      const resolved = resolveStep(current, interfaces);
      if (resolved.iface === undefined) {
        logDebug('List of interfaces required');
        writeLines(stdout, [
          renderVersion(),
          ...interfaces.map((i) => i.renderInterface()),
          ...controls.flatMap(renderControl),
        ]);
        return;
      }
      await dispatch(listener, resolved, stdout);
    },
  };

  return extcap;
}
