/**
 * Control pipe engine: bridges the toolbar's two named pipes to bounded in-process queues.
 *
 * Lifecycle new -> started -> stopped. start() spawns an inbound pump (decode frames from the
 * in-pipe into `incoming`) and an outbound pump (encode messages from `outgoing` onto the
 * out-pipe). Each pump fails on its own: a framing or read error ends only the inbound pump,
 * a write error ends only the outbound pump. stop() cancels both and resolves once both exited.
 */

import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';
import { Channel } from './channel.js';
import type { Receiver, Sender } from './channel.js';
import { CONTROL_QUEUE_CAPACITY } from './constants.js';
import { ControlMessageDecoder, commandName, encodeControlMessage } from './control-message.js';
import { ExtcapError, errorMessage } from './errors.js';
import { logDebug, logError, logWarn } from './logger.js';
import type { ControlMessage } from './types.js';

export interface ControlQueues {
  /** Messages from the toolbar, in the order their frames completed on the wire. */
  incoming: Receiver<ControlMessage>;
  /** Messages to the toolbar, written in submission order. */
  outgoing: Sender<ControlMessage>;
}

export type ControlPipeState = 'new' | 'started' | 'stopped';

export interface ControlPipe {
  readonly state: ControlPipeState;
  /** Starts both pumps. Legal once, from 'new'. */
  start(): ControlQueues;
  /** Cancels both pumps and closes the pipes. Legal once, from 'started'. */
  stop(): Promise<void>;
  /** Closes the pipes of a pipe that was never started. */
  dispose(): void;
}

export interface ControlPipeOptions {
  /** Capacity of each queue (default 128). */
  capacity?: number;
}

type InternalState =
  | { kind: 'new' }
  | { kind: 'started'; cancelInbound: AbortController; cancelOutbound: AbortController; pumps: Promise<void> }
  | { kind: 'stopped' };

/** Resolves with the promise's value, or undefined as soon as the signal aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
  return new Promise<T | undefined>((resolve, reject) => {
    const onAbort = (): void => resolve(undefined);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

function toBuffer(chunk: unknown): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw ExtcapError.io(`Unexpected chunk from control pipe: ${typeof chunk}`);
}

function describe(message: ControlMessage): Record<string, unknown> {
  return {
    controlNumber: message.controlNumber,
    command: commandName(message.command),
    code: message.command,
    payloadLength: message.payload.length,
  };
}

/** Non-blocking hand-off of frames already decoded when the inbound pump is cancelled. */
function deliverDecoded(first: ControlMessage, decoder: ControlMessageDecoder, incoming: Channel<ControlMessage>): void {
  let undelivered = 0;
  const pending = [first];
  try {
    pending.push(...decoder.drain());
  } catch (err) {
    logDebug('Discarding undecodable bytes after cancellation', { error: errorMessage(err) });
  }
  for (const message of pending) {
    if (!incoming.trySend(message)) undelivered++;
  }
  if (undelivered > 0) {
    logWarn('Control messages not delivered before stop', { count: undelivered });
  }
}

async function pumpInbound(input: Readable, incoming: Channel<ControlMessage>, signal: AbortSignal): Promise<void> {
  logDebug('Control inbound pump started');
  const decoder = new ControlMessageDecoder();
  const chunks: AsyncIterable<unknown> = input;
  const iterator = chunks[Symbol.asyncIterator]();
  try {
    for (;;) {
      const next = await untilAborted(iterator.next(), signal);
      if (next === undefined) break;
      if (next.done === true) {
        logDebug('Control in-pipe closed by peer');
        break;
      }
      decoder.push(toBuffer(next.value));
      for (let message = decoder.next(); message !== undefined; message = decoder.next()) {
        logDebug('Control message received', describe(message));
        if (!(await incoming.send(message, signal))) {
          deliverDecoded(message, decoder, incoming);
          return;
        }
      }
    }
  } catch (err) {
    if (signal.aborted) {
      logDebug('Control inbound pump cancelled during read', { error: errorMessage(err) });
    } else if (err instanceof ExtcapError && err.kind === 'Framing') {
      logError('Control in-pipe framing error; inbound pump stopped', { error: err.message });
    } else {
      logError('Control in-pipe read failed; inbound pump stopped', { error: errorMessage(err) });
    }
  } finally {
    incoming.close();
    logDebug('Control inbound pump stopped', { buffered: decoder.bufferedLength });
  }
}

function writeFrame(output: Writable, frame: Buffer, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    // stop() does not wait for a write in flight
    const onAbort = (): void => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
    output.write(frame, (err) => {
      signal.removeEventListener('abort', onAbort);
      if (err) reject(err);
      else resolve();
    });
  });
}

async function pumpOutbound(output: Writable, outgoing: Channel<ControlMessage>, signal: AbortSignal): Promise<void> {
  logDebug('Control outbound pump started');
  try {
    for (;;) {
      const message = await outgoing.receive(signal);
      if (message === undefined) break;
      logDebug('Control message sending', describe(message));
      await writeFrame(output, encodeControlMessage(message), signal);
    }
  } catch (err) {
    if (signal.aborted) {
      logDebug('Control outbound pump cancelled during write', { error: errorMessage(err) });
    } else {
      logError('Control out-pipe write failed; outbound pump stopped', { error: errorMessage(err) });
    }
  } finally {
    outgoing.close();
    logDebug('Control outbound pump stopped');
  }
}

/**
 * Creates an engine over already-open streams. The engine owns them from here on:
 * they are closed by stop() or dispose().
 */
export function createControlPipe(input: Readable, output: Writable, options: ControlPipeOptions = {}): ControlPipe {
  const capacity = options.capacity ?? CONTROL_QUEUE_CAPACITY;
  let state: InternalState = { kind: 'new' };

  // Errors surfacing after a pump has exited (e.g. EPIPE on close) must not crash the process.
  input.on('error', (err: Error) => logDebug('Control in-pipe error', { error: err.message }));
  output.on('error', (err: Error) => logDebug('Control out-pipe error', { error: err.message }));

  function closeStreams(): void {
    input.destroy();
    output.end();
  }

  return {
    get state(): ControlPipeState {
      return state.kind;
    },

    start(): ControlQueues {
      if (state.kind !== 'new') {
        logError('Control pipe start() called in wrong state', { state: state.kind });
        throw ExtcapError.state(`start() called in state '${state.kind}'`);
      }
      const incoming = new Channel<ControlMessage>(capacity);
      const outgoing = new Channel<ControlMessage>(capacity);
      const cancelInbound = new AbortController();
      const cancelOutbound = new AbortController();

      const pumps = Promise.all([
        pumpInbound(input, incoming, cancelInbound.signal),
        pumpOutbound(output, outgoing, cancelOutbound.signal),
      ]).then(() => undefined);

      state = { kind: 'started', cancelInbound, cancelOutbound, pumps };
      logDebug('Control pipe started', { capacity });
      return { incoming, outgoing };
    },

    async stop(): Promise<void> {
      if (state.kind !== 'started') {
        logError('Control pipe stop() called in wrong state', { state: state.kind });
        throw ExtcapError.state(`stop() called in state '${state.kind}'`);
      }
      const { cancelInbound, cancelOutbound, pumps } = state;
      state = { kind: 'stopped' };
      cancelInbound.abort();
      cancelOutbound.abort();
      await pumps;
      closeStreams();
      logDebug('Control pipe stopped');
    },

    dispose(): void {
      if (state.kind !== 'new') {
        throw ExtcapError.state(`dispose() called in state '${state.kind}'`);
      }
      state = { kind: 'stopped' };
      input.destroy();
      output.destroy();
      logDebug('Control pipe disposed');
    },
  };
}

async function closeQuietly(handle: FileHandle, path: string): Promise<void> {
  try {
    await handle.close();
  } catch (err) {
    logWarn('Failed to close control pipe', { path, error: errorMessage(err) });
  }
}

/** Opens the in-pipe for reading and the out-pipe for writing. Fails with an Io error. */
export async function openControlPipe(inPath: string, outPath: string, options: ControlPipeOptions = {}): Promise<ControlPipe> {
  let inHandle: FileHandle;
  try {
    inHandle = await open(inPath, 'r');
  } catch (err) {
    throw ExtcapError.io(`Cannot open control in-pipe ${inPath}: ${errorMessage(err)}`, err);
  }
  let outHandle: FileHandle;
  try {
    outHandle = await open(outPath, 'w');
  } catch (err) {
    await closeQuietly(inHandle, inPath);
    throw ExtcapError.io(`Cannot open control out-pipe ${outPath}: ${errorMessage(err)}`, err);
  }
  return createControlPipe(inHandle.createReadStream(), outHandle.createWriteStream(), options);
}
