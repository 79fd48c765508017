/**
 * Bounded FIFO queue between two async parties. A full queue makes send() wait;
 * closing keeps queued values readable and ends the receiver once they are drained,
 * while senders still waiting for a slot get false.
 */

export interface Sender<T> {
  /** Resolves true once queued; false if the channel is closed or the signal aborts first. */
  send(value: T, signal?: AbortSignal): Promise<boolean>;
  /** Queues without waiting; false when full or closed. */
  trySend(value: T): boolean;
  close(): void;
  readonly closed: boolean;
}

export interface Receiver<T> extends AsyncIterable<T> {
  /** Next value in order; undefined once the channel is closed and drained, or the signal aborts. */
  receive(signal?: AbortSignal): Promise<T | undefined>;
  readonly closed: boolean;
}

interface BlockedSender<T> {
  value: T;
  resolve: (queued: boolean) => void;
}

export class Channel<T extends object> implements Sender<T>, Receiver<T> {
  private readonly queue: T[] = [];
  private readonly blockedSenders: BlockedSender<T>[] = [];
  private readonly waitingReceivers: Array<(value: T | undefined) => void> = [];
  private isClosed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Values queued or waiting on a blocked sender. */
  get length(): number {
    return this.queue.length + this.blockedSenders.length;
  }

  trySend(value: T): boolean {
    if (this.isClosed) return false;
    const receiver = this.waitingReceivers.shift();
    if (receiver) {
      receiver(value);
      return true;
    }
    if (this.queue.length < this.capacity) {
      this.queue.push(value);
      return true;
    }
    return false;
  }

  send(value: T, signal?: AbortSignal): Promise<boolean> {
    if (this.trySend(value)) return Promise.resolve(true);
    if (this.isClosed || signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        const index = this.blockedSenders.indexOf(entry);
        if (index >= 0) this.blockedSenders.splice(index, 1);
        resolve(false);
      };
      const entry: BlockedSender<T> = {
        value,
        resolve: (queued) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(queued);
        },
      };
      this.blockedSenders.push(entry);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  receive(signal?: AbortSignal): Promise<T | undefined> {
    const value = this.queue.shift();
    if (value !== undefined) {
      const blocked = this.blockedSenders.shift();
      if (blocked) {
        this.queue.push(blocked.value);
        blocked.resolve(true);
      }
      return Promise.resolve(value);
    }
    // capacity >= 1, so a blocked sender implies a non-empty queue
    if (this.isClosed || signal?.aborted) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      const onAbort = (): void => {
        const index = this.waitingReceivers.indexOf(waiter);
        if (index >= 0) this.waitingReceivers.splice(index, 1);
        resolve(undefined);
      };
      const waiter = (received: T | undefined): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(received);
      };
      this.waitingReceivers.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    // Receivers only wait on an empty channel, so there is nothing left for them.
    for (const waiter of this.waitingReceivers.splice(0)) {
      waiter(undefined);
    }
    // Values of blocked senders were never queued; they are dropped.
    for (const blocked of this.blockedSenders.splice(0)) {
      blocked.resolve(false);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const value = await this.receive();
      if (value === undefined) return;
      yield value;
    }
  }
}
