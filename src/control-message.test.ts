import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ControlMessageDecoder,
  commandName,
  createControlMessage,
  decodeFrame,
  encodeControlMessage,
} from './control-message.js';
import { ExtcapError } from './errors.js';
import { CONTROL_COMMANDS } from './types.js';

function isFraming(message: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof ExtcapError && err.kind === 'Framing' && err.message === message;
}

describe('createControlMessage', () => {
  it('encodes a string payload as UTF-8', () => {
    const message = createControlMessage(2, CONTROL_COMMANDS.SET, 'hé');
    assert.deepEqual([...message.payload], [0x68, 0xc3, 0xa9]);
  });

  it('defaults to an empty payload', () => {
    assert.equal(createControlMessage(0, CONTROL_COMMANDS.INITIALIZED).payload.length, 0);
  });

  it('rejects numbers outside a byte', () => {
    assert.throws(() => createControlMessage(256, 1), RangeError);
    assert.throws(() => createControlMessage(0, -1), RangeError);
    assert.throws(() => createControlMessage(1.5, 1), RangeError);
  });

  it('rejects a payload the 24-bit length cannot describe', () => {
    assert.throws(() => createControlMessage(0, 1, Buffer.alloc(0xffffff - 1)), RangeError);
    assert.doesNotThrow(() => createControlMessage(0, 1, Buffer.alloc(0xffffff - 2)));
  });
});

describe('commandName', () => {
  it('names known codes and passes unknown ones as UNKNOWN', () => {
    assert.equal(commandName(6), 'STATUSBAR_MESSAGE');
    assert.equal(commandName(CONTROL_COMMANDS.ERROR_MESSAGE), 'ERROR_MESSAGE');
    assert.equal(commandName(42), 'UNKNOWN');
  });
});

describe('encodeControlMessage', () => {
  it('writes sync, 24-bit big-endian length, control, command and payload', () => {
    const frame = encodeControlMessage(createControlMessage(1, CONTROL_COMMANDS.SET, 'hi'));
    assert.deepEqual([...frame], [0x54, 0x00, 0x00, 0x04, 0x01, 0x01, 0x68, 0x69]);
  });

  it('writes length 2 for an empty payload', () => {
    const frame = encodeControlMessage(createControlMessage(7, CONTROL_COMMANDS.ENABLE));
    assert.deepEqual([...frame], [0x54, 0x00, 0x00, 0x02, 0x07, 0x04]);
  });
});

describe('decodeFrame', () => {
  it('needs more data until the whole frame is present', () => {
    assert.equal(decodeFrame(Buffer.alloc(0)), undefined);
    assert.equal(decodeFrame(Buffer.from([0x54])), undefined);
    assert.equal(decodeFrame(Buffer.from([0x54, 0x00, 0x00])), undefined);
    assert.equal(decodeFrame(Buffer.from([0x00])), undefined);
    assert.equal(decodeFrame(Buffer.from([0x41, 0x00, 0x00])), undefined);
    assert.equal(decodeFrame(Buffer.from([0x54, 0x00, 0x00, 0x04, 0x01, 0x01, 0x68])), undefined);
  });

  it('decodes one frame and reports the bytes it used', () => {
    const decoded = decodeFrame(Buffer.from([0x54, 0x00, 0x00, 0x03, 0x09, 0x2a, 0x21, 0x54]));
    assert.ok(decoded);
    assert.equal(decoded.consumed, 7);
    assert.equal(decoded.message.controlNumber, 9);
    assert.equal(decoded.message.command, 42);
    assert.deepEqual([...decoded.message.payload], [0x21]);
  });

  it('decodes what encodeControlMessage wrote, unknown command codes included', () => {
    const original = createControlMessage(17, 200, Buffer.from([0, 1, 254, 255]));
    const decoded = decodeFrame(encodeControlMessage(original));
    assert.ok(decoded);
    assert.deepEqual(decoded.message, original);
  });

  it('rejects a bad sync byte once the header is complete', () => {
    assert.throws(() => decodeFrame(Buffer.from([0x41, 0x00, 0x00, 0x02])), isFraming("Sync pipe indication 0x41 != 'T'"));
  });

  it('rejects a declared length below 2', () => {
    assert.throws(() => decodeFrame(Buffer.from([0x54, 0x00, 0x00, 0x01, 0x00])), isFraming('Message length 1 < 2'));
  });
});

describe('ControlMessageDecoder', () => {
  it('reassembles frames split across chunks', () => {
    const bytes = Buffer.concat([
      encodeControlMessage(createControlMessage(0, CONTROL_COMMANDS.SET, 'one')),
      encodeControlMessage(createControlMessage(1, CONTROL_COMMANDS.ADD, 'two')),
    ]);
    const decoder = new ControlMessageDecoder();
    const seen: string[] = [];
    for (const byte of bytes) {
      decoder.push(Buffer.from([byte]));
      for (let message = decoder.next(); message !== undefined; message = decoder.next()) {
        seen.push(`${message.controlNumber}:${message.payload.toString('utf8')}`);
      }
    }
    assert.deepEqual(seen, ['0:one', '1:two']);
    assert.equal(decoder.bufferedLength, 0);
  });

  it('drains every complete frame and keeps the partial one', () => {
    const decoder = new ControlMessageDecoder();
    decoder.push(encodeControlMessage(createControlMessage(3, CONTROL_COMMANDS.DISABLE)));
    decoder.push(encodeControlMessage(createControlMessage(4, CONTROL_COMMANDS.ENABLE)));
    decoder.push(Buffer.from([0x54, 0x00]));
    assert.deepEqual(
      decoder.drain().map((m) => m.controlNumber),
      [3, 4]
    );
    assert.equal(decoder.bufferedLength, 2);
  });

  it('stays failed after a framing error', () => {
    const decoder = new ControlMessageDecoder();
    decoder.push(Buffer.from([0x00, 0x54, 0x00, 0x00, 0x02, 0x00, 0x00]));
    assert.throws(() => decoder.next(), isFraming("Sync pipe indication 0x00 != 'T'"));
    assert.throws(() => decoder.next(), isFraming("Sync pipe indication 0x00 != 'T'"));
  });
});
