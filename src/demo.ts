/**
 * Demo provider: two interfaces, a reloadable selector and a small toolbar.
 * The capture writes one packet per tick, echoes toolbar messages to the log control
 * and stops on the Stop button, on SIGINT/SIGTERM, or after --count packets.
 *
 * Run: npm run demo -- --extcap-interfaces
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { pathToFileURL } from 'node:url';
import type { ArgumentValueOptions } from './argument.js';
import type { ControlQueues } from './control-pipe.js';
import { commandName, createControlMessage } from './control-message.js';
import { launch } from './entrypoint.js';
import { ExtcapError, errorMessage } from './errors.js';
import { createExtcap } from './extcap.js';
import type { CaptureContext, Extcap, ExtcapListener } from './extcap.js';
import { logDebug, logInfo } from './logger.js';
import { CONTROL_COMMANDS } from './types.js';
import type { ControlMessage } from './types.js';

/** Control numbers, in registration order. */
export const DEMO_CONTROLS = { MESSAGE: 0, LOGGER: 1, STOP: 2 } as const;

const REMOTE_VALUES: ArgumentValueOptions[] = [
  { value: 'if1', display: 'Remote interface 1', isDefault: true },
  { value: 'if2', display: 'Remote interface 2' },
];

export function createDemoExtcap(): Extcap {
  const extcap = createExtcap({
    name: 'extcap-demo',
    version: '0.1.0',
    helpPage: 'https://www.wireshark.org/docs/man-pages/extcap.html',
    about: 'Writes synthetic packets to demonstrate the extcap protocol',
  });

  extcap.addInterface({
    name: 'demo1',
    description: 'Demo interface 1',
    linkTypeName: 'USER0',
    linkTypeDescription: 'Demo text packets',
    debug: true,
    args: [
      { name: 'delay', kind: 'integer', display: 'Delay (ms)', default: 1000, range: '10,10000', tooltip: 'Time between packets' },
      { name: 'message', kind: 'string', display: 'Message', default: 'hello', placeholder: 'Packet text' },
      { name: 'count', kind: 'unsigned', display: 'Packet count', default: 0, tooltip: 'Stop after this many packets (0 = never)' },
      { name: 'remote', kind: 'selector', display: 'Remote', reload: true, values: REMOTE_VALUES },
    ],
  });
  extcap.addInterface({
    name: 'demo2',
    description: 'Demo interface 2',
    linkType: 148,
    linkTypeName: 'USER1',
  });

  extcap.addControl({ kind: 'string', display: 'Message', tooltip: 'Text of the next packets', placeholder: 'hello' });
  extcap.addControl({ kind: 'button', role: 'logger', display: 'Log' });
  extcap.addControl({ kind: 'button', role: 'control', display: 'Stop' });
  return extcap;
}

function numberFlag(extcap: Extcap, name: string, fallback: number): number {
  const raw = extcap.getFlag(name);
  if (typeof raw !== 'string') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw ExtcapError.user(`--${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

/** false when the signal aborted first */
async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal.aborted) return false;
    throw err;
  }
}

interface DemoState {
  message: string;
}

function describeMessage(message: ControlMessage): string {
  return `control ${message.controlNumber} ${commandName(message.command)}: ${message.payload.toString('utf8')}\n`;
}

async function serveControls(controls: ControlQueues, state: DemoState, stop: AbortController): Promise<void> {
  await controls.outgoing.send(
    createControlMessage(0, CONTROL_COMMANDS.STATUSBAR_MESSAGE, 'Demo capture started'),
    stop.signal
  );
  for (;;) {
    const message = await controls.incoming.receive(stop.signal);
    if (message === undefined) return;
    logDebug('Demo control message', { control: message.controlNumber, command: commandName(message.command) });
    if (message.command === CONTROL_COMMANDS.SET) {
      if (message.controlNumber === DEMO_CONTROLS.MESSAGE) {
        state.message = message.payload.toString('utf8');
      } else if (message.controlNumber === DEMO_CONTROLS.STOP) {
        stop.abort();
        return;
      }
    }
    await controls.outgoing.send(
      createControlMessage(DEMO_CONTROLS.LOGGER, CONTROL_COMMANDS.ADD, describeMessage(message)),
      stop.signal
    );
  }
}

async function captureDemo(ctx: CaptureContext): Promise<void> {
  const delay = numberFlag(ctx.extcap, 'delay', 1000);
  const count = numberFlag(ctx.extcap, 'count', 0);
  const rawMessage = ctx.extcap.getFlag('message');
  const state: DemoState = { message: typeof rawMessage === 'string' ? rawMessage : 'hello' };

  const stop = new AbortController();
  const onAbort = (): void => stop.abort();
  ctx.signal.addEventListener('abort', onAbort, { once: true });
  const controlsDone = ctx.controls
    ? serveControls(ctx.controls, state, stop).catch((err: unknown) => {
        logDebug('Demo control loop ended with error', { error: errorMessage(err) });
      })
    : Promise.resolve();

  logInfo('Demo capture running', { interface: ctx.iface.name, delay, count, filter: ctx.captureFilter });
  let written = 0;
  try {
    while (count === 0 || written < count) {
      if (written > 0 && !(await pause(delay, stop.signal))) break;
      if (stop.signal.aborted) break;
      written++;
      await ctx.writer.write({ data: Buffer.from(`${state.message} #${written}`, 'utf8') });
    }
  } finally {
    ctx.signal.removeEventListener('abort', onAbort);
    stop.abort();
    await controlsDone;
  }
  logInfo('Demo capture done', { packets: written });
}

export const demoListener: ExtcapListener = {
  reloadOption(_extcap, _iface, arg): ArgumentValueOptions[] | undefined {
    if (arg.name !== 'remote') return undefined;
    return [
      { value: 'if3', display: 'Remote interface 3' },
      { value: 'if4', display: 'Remote interface 4', isDefault: true },
    ];
  },
  capture: captureDemo,
};

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  launch(createDemoExtcap(), demoListener);
}
