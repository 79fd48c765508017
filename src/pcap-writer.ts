/**
 * Minimal libpcap stream writer (little-endian, microsecond timestamps).
 * Format: https://wiki.wireshark.org/Development/LibpcapFileFormat
 */

import { once } from 'node:events';
import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { DEFAULT_SNAP_LENGTH, MAX_LINK_TYPE, STDOUT_FIFO } from './constants.js';
import { ExtcapError, errorMessage } from './errors.js';
import { logWarn } from './logger.js';

export const PCAP_MAGIC_NUMBER = 0xa1b2c3d4;
export const PCAP_GLOBAL_HEADER_LENGTH = 24;
export const PCAP_RECORD_HEADER_LENGTH = 16;

export interface PcapHeaderOptions {
  /** Defaults to the capture interface's link type. */
  linkType?: number;
  snapLength?: number;
}

export interface PcapPacket {
  data: Uint8Array;
  /** Defaults to now. */
  timestamp?: Date;
  /** Overrides the timestamp when set. */
  timestampSeconds?: number;
  timestampMicros?: number;
  /** Length on the wire; defaults to data length. */
  originalLength?: number;
}

export function encodeGlobalHeader(linkType: number, snapLength: number = DEFAULT_SNAP_LENGTH): Buffer {
  if (!Number.isInteger(linkType) || linkType < 0 || linkType > MAX_LINK_TYPE) {
    throw new RangeError(`linkType must be a uint32, got ${linkType}`);
  }
  const header = Buffer.alloc(PCAP_GLOBAL_HEADER_LENGTH);
  header.writeUInt32LE(PCAP_MAGIC_NUMBER, 0);
  header.writeUInt16LE(2, 4); // major version
  header.writeUInt16LE(4, 6); // minor version
  header.writeInt32LE(0, 8); // GMT to local correction
  header.writeUInt32LE(0, 12); // accuracy of timestamps
  header.writeUInt32LE(snapLength, 16);
  header.writeUInt32LE(linkType, 20);
  return header;
}

export function encodeRecord(packet: PcapPacket): Buffer {
  let seconds = packet.timestampSeconds;
  let micros = packet.timestampMicros ?? 0;
  if (seconds === undefined) {
    const ms = (packet.timestamp ?? new Date()).getTime();
    seconds = Math.floor(ms / 1000);
    micros = (ms % 1000) * 1000;
  }
  const record = Buffer.alloc(PCAP_RECORD_HEADER_LENGTH + packet.data.byteLength);
  record.writeUInt32LE(seconds >>> 0, 0);
  record.writeUInt32LE(micros >>> 0, 4);
  record.writeUInt32LE(packet.data.byteLength, 8);
  record.writeUInt32LE(packet.originalLength ?? packet.data.byteLength, 12);
  record.set(packet.data, PCAP_RECORD_HEADER_LENGTH);
  return record;
}

export interface PcapWriterOptions {
  /** End the stream on close(); false for process.stdout. */
  endOnClose?: boolean;
}

/** Writes the global header on construction, then one record per write(). */
export class PcapWriter {
  private closed = false;
  private failure: Error | undefined;
  private readonly endOnClose: boolean;

  constructor(
    private readonly stream: Writable,
    header: Required<PcapHeaderOptions>,
    options: PcapWriterOptions = {}
  ) {
    this.endOnClose = options.endOnClose ?? true;
    this.stream.on('error', (err: Error) => {
      if (!this.failure) logWarn('Capture sink failed', { error: err.message });
      this.failure = err;
    });
    this.stream.write(encodeGlobalHeader(header.linkType, header.snapLength));
  }

  /** Resolves once the stream can take more data; rejects with an Io error once the sink failed. */
  async write(packet: PcapPacket): Promise<void> {
    if (this.closed) {
      throw ExtcapError.state('PcapWriter is closed');
    }
    this.throwIfFailed();
    if (!this.stream.write(encodeRecord(packet))) {
      try {
        await once(this.stream, 'drain');
      } catch (err) {
        throw ExtcapError.io(`Capture sink failed: ${errorMessage(err)}`, err);
      }
    }
  }

  get failed(): boolean {
    return this.failure !== undefined;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (!this.endOnClose || this.failure) return;
    const finished = once(this.stream, 'finish');
    this.stream.end();
    try {
      await finished;
    } catch (err) {
      throw ExtcapError.io(`Capture sink failed on close: ${errorMessage(err)}`, err);
    }
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw ExtcapError.io(`Capture sink failed: ${this.failure.message}`, this.failure);
    }
  }
}

/** Opens the capture sink: '-' writes to `stdout` (left open on close), anything else is a path. */
export async function openPcapWriter(
  fifo: string,
  header: Required<PcapHeaderOptions>,
  stdout: Writable
): Promise<PcapWriter> {
  if (fifo === STDOUT_FIFO) {
    return new PcapWriter(stdout, header, { endOnClose: false });
  }
  let handle: FileHandle;
  try {
    handle = await open(fifo, 'w');
  } catch (err) {
    throw ExtcapError.io(`Cannot open capture output ${fifo}: ${errorMessage(err)}`, err);
  }
  return new PcapWriter(handle.createWriteStream(), header);
}
