/** Rejection reason for `send()` on a closed or cancelled channel. */
export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

interface PendingSend<T> {
  readonly item: T;
  readonly resolve: () => void;
  readonly reject: (error: Error) => void;
}

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * FIFO channel with a fixed capacity connecting async producers and consumers.
 *
 * `send()` suspends while the buffer is full; `receive()` suspends while it is
 * empty and open. `close()` lets consumers drain what is buffered; `cancel()`
 * discards it. Either way, suspended senders are rejected and suspended
 * receivers see `done`.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: { readonly value: T }[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private closed = false;
  private cancelled = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('Channel capacity must be at least 1');
    }
  }

  /** Items buffered and not yet received. Never exceeds `capacity`. */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Whether `cancel()` was called. */
  get isCancelled(): boolean {
    return this.cancelled;
  }

  send(item: T): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value: item });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value: item });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const slot = this.buffer.shift();
    if (slot) {
      this.admitPendingSender();
      return Promise.resolve({ done: false, value: slot.value });
    }

    if (this.closed) return Promise.resolve({ done: true, value: undefined });

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Stop accepting items. Buffered items stay available to receivers. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rejectSenders();
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
  }

  /** Close and discard every buffered item. */
  cancel(): void {
    this.cancelled = true;
    this.buffer.length = 0;
    this.close();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }

  private admitPendingSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    this.buffer.push({ value: sender.item });
    sender.resolve();
  }

  private rejectSenders(): void {
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }
}
