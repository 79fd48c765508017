import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Channel } from './channel.js';

interface Item {
  n: number;
}

function item(n: number): Item {
  return { n };
}

describe('Channel', () => {
  it('rejects a capacity below 1', () => {
    assert.throws(() => new Channel<Item>(0), RangeError);
  });

  it('delivers values in send order', async () => {
    const channel = new Channel<Item>(4);
    assert.equal(channel.trySend(item(1)), true);
    assert.equal(await channel.send(item(2)), true);
    assert.equal((await channel.receive())?.n, 1);
    assert.equal((await channel.receive())?.n, 2);
  });

  it('refuses trySend when full', () => {
    const channel = new Channel<Item>(2);
    assert.equal(channel.trySend(item(1)), true);
    assert.equal(channel.trySend(item(2)), true);
    assert.equal(channel.trySend(item(3)), false);
    assert.equal(channel.length, 2);
  });

  it('holds a sender until a slot frees up', async () => {
    const channel = new Channel<Item>(1);
    channel.trySend(item(1));
    let queued: boolean | undefined;
    const pending = channel.send(item(2)).then((ok) => {
      queued = ok;
    });
    await Promise.resolve();
    assert.equal(queued, undefined);
    assert.equal(channel.length, 2);

    assert.equal((await channel.receive())?.n, 1);
    await pending;
    assert.equal(queued, true);
    assert.equal((await channel.receive())?.n, 2);
  });

  it('hands a value straight to a waiting receiver', async () => {
    const channel = new Channel<Item>(1);
    const received = channel.receive();
    assert.equal(channel.trySend(item(7)), true);
    assert.equal((await received)?.n, 7);
    assert.equal(channel.length, 0);
  });

  it('gives up a blocked send when the signal aborts', async () => {
    const channel = new Channel<Item>(1);
    channel.trySend(item(1));
    const abort = new AbortController();
    const pending = channel.send(item(2), abort.signal);
    abort.abort();
    assert.equal(await pending, false);
    assert.equal(channel.length, 1);
    assert.equal((await channel.receive())?.n, 1);
  });

  it('gives up a waiting receive when the signal aborts', async () => {
    const channel = new Channel<Item>(1);
    const abort = new AbortController();
    const pending = channel.receive(abort.signal);
    abort.abort();
    assert.equal(await pending, undefined);
    // the aborted receiver must not swallow the next value
    channel.trySend(item(5));
    assert.equal((await channel.receive())?.n, 5);
  });

  it('keeps queued values readable after close and refuses blocked senders', async () => {
    const channel = new Channel<Item>(1);
    channel.trySend(item(1));
    const blocked = channel.send(item(2));
    channel.close();

    assert.equal(channel.closed, true);
    assert.equal(await blocked, false);
    assert.equal(await channel.send(item(3)), false);
    assert.equal(channel.trySend(item(3)), false);
    assert.equal(channel.length, 1);
    assert.equal((await channel.receive())?.n, 1);
    assert.equal(await channel.receive(), undefined);
  });

  it('settles a blocked send on close with no receiver left', async () => {
    const channel = new Channel<Item>(1);
    channel.trySend(item(1));
    const blocked = channel.send(item(2));
    setImmediate(() => channel.close());
    assert.equal(await blocked, false);
  });

  it('wakes waiting receivers on close', async () => {
    const channel = new Channel<Item>(1);
    const pending = channel.receive();
    channel.close();
    assert.equal(await pending, undefined);
  });

  it('moves more values than its capacity through a slow consumer, in order', async () => {
    const channel = new Channel<Item>(128);
    const producer = (async () => {
      for (let n = 0; n < 200; n++) {
        assert.equal(await channel.send(item(n)), true);
      }
      channel.close();
    })();

    const seen: number[] = [];
    for await (const value of channel) {
      seen.push(value.n);
      if (seen.length % 50 === 0) await new Promise((r) => setTimeout(r, 1));
    }
    await producer;
    assert.deepEqual(
      seen,
      Array.from({ length: 200 }, (_, n) => n)
    );
  });
});
