/**
 * Control pipe framing.
 *
 *   byte 0      'T' sync
 *   bytes 1..3  uint24 BE length of what follows (control number + command + payload, >= 2)
 *   byte 4      control number
 *   byte 5      command code
 *   bytes 6..   payload
 */

import {
  CONTROL_HEADER_LENGTH,
  CONTROL_SUBHEADER_LENGTH,
  CONTROL_SYNC_BYTE,
  MAX_CONTROL_FRAME_LENGTH,
} from './constants.js';
import { ExtcapError } from './errors.js';
import { CONTROL_COMMANDS } from './types.js';
import type { ControlCommandName, ControlMessage } from './types.js';

const MAX_PAYLOAD_LENGTH = MAX_CONTROL_FRAME_LENGTH - CONTROL_SUBHEADER_LENGTH;

function isUint8(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= 0xff;
}

export function createControlMessage(
  controlNumber: number,
  command: number,
  payload: string | Uint8Array = Buffer.alloc(0)
): ControlMessage {
  if (!isUint8(controlNumber)) {
    throw new RangeError(`controlNumber must be an integer between 0 and 255, got ${controlNumber}`);
  }
  if (!isUint8(command)) {
    throw new RangeError(`command must be an integer between 0 and 255, got ${command}`);
  }
  const bytes = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : Buffer.from(payload);
  if (bytes.length > MAX_PAYLOAD_LENGTH) {
    throw new RangeError(`payload must be at most ${MAX_PAYLOAD_LENGTH} bytes, got ${bytes.length}`);
  }
  return { controlNumber, command, payload: bytes };
}

const COMMAND_NAME_LIST: readonly ControlCommandName[] = [
  'INITIALIZED',
  'SET',
  'ADD',
  'REMOVE',
  'ENABLE',
  'DISABLE',
  'STATUSBAR_MESSAGE',
  'INFORMATION_MESSAGE',
  'WARNING_MESSAGE',
  'ERROR_MESSAGE',
];

const COMMAND_NAMES = new Map<number, ControlCommandName>(
  COMMAND_NAME_LIST.map((name): [number, ControlCommandName] => [CONTROL_COMMANDS[name], name])
);

/** Name of a known command code, or 'UNKNOWN' for codes passed through as-is. */
export function commandName(code: number): ControlCommandName | 'UNKNOWN' {
  return COMMAND_NAMES.get(code) ?? 'UNKNOWN';
}

export function encodeControlMessage(message: ControlMessage): Buffer {
  const length = CONTROL_SUBHEADER_LENGTH + message.payload.length;
  const frame = Buffer.alloc(CONTROL_HEADER_LENGTH + length);
  frame.writeUInt8(CONTROL_SYNC_BYTE, 0);
  frame.writeUIntBE(length, 1, 3);
  frame.writeUInt8(message.controlNumber, 4);
  frame.writeUInt8(message.command, 5);
  message.payload.copy(frame, CONTROL_HEADER_LENGTH + CONTROL_SUBHEADER_LENGTH);
  return frame;
}

export interface DecodedFrame {
  message: ControlMessage;
  /** Bytes the frame occupied at the start of the buffer. */
  consumed: number;
}

/**
 * Decodes the frame at the start of `buffer`. Returns undefined until the whole frame is
 * present, and the sync byte is only checked once the 4-byte header is; throws a Framing error on a bad sync byte or a declared length below 2.
 */
export function decodeFrame(buffer: Buffer): DecodedFrame | undefined {
  if (buffer.length < CONTROL_HEADER_LENGTH) return undefined;
  if (buffer[0] !== CONTROL_SYNC_BYTE) {
    throw ExtcapError.framing(`Sync pipe indication 0x${buffer[0].toString(16).padStart(2, '0')} != 'T'`);
  }
  const length = buffer.readUIntBE(1, 3);
  if (length < CONTROL_SUBHEADER_LENGTH) {
    throw ExtcapError.framing(`Message length ${length} < ${CONTROL_SUBHEADER_LENGTH}`);
  }
  const consumed = CONTROL_HEADER_LENGTH + length;
  if (buffer.length < consumed) return undefined;

  const message: ControlMessage = {
    controlNumber: buffer.readUInt8(4),
    command: buffer.readUInt8(5),
    payload: Buffer.from(buffer.subarray(CONTROL_HEADER_LENGTH + CONTROL_SUBHEADER_LENGTH, consumed)),
  };
  return { message, consumed };
}

/**
 * Incremental decoder over a growing byte buffer. Bytes stay buffered until a complete
 * frame is available; a framing error leaves the decoder unusable.
 */
export class ControlMessageDecoder {
  private buffer = Buffer.alloc(0);
  private failed: ExtcapError | undefined;

  push(chunk: Uint8Array): void {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
  }

  /** The next complete message, or undefined when more bytes are needed. */
  next(): ControlMessage | undefined {
    if (this.failed) throw this.failed;
    let frame: DecodedFrame | undefined;
    try {
      frame = decodeFrame(this.buffer);
    } catch (err) {
      if (err instanceof ExtcapError) this.failed = err;
      throw err;
    }
    if (!frame) return undefined;
    this.buffer = this.buffer.subarray(frame.consumed);
    return frame.message;
  }

  /** Every complete message currently buffered, in wire order. */
  drain(): ControlMessage[] {
    const messages: ControlMessage[] = [];
    for (let message = this.next(); message !== undefined; message = this.next()) {
      messages.push(message);
    }
    return messages;
  }

  get bufferedLength(): number {
    return this.buffer.length;
  }
}
