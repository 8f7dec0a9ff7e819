export class QueueClosedError extends Error {
  readonly name = "QueueClosedError" as const;
  constructor() {
    super("Queue is closed");
  }
}

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Zero-capacity FIFO hand-off between producers and a consumer.
 *
 * `send` settles only once a receiver has taken the item, so a producer is held
 * back until the consumer is ready for more work. Items are handed over in the
 * order their `send` calls were made.
 */
export class RendezvousQueue<T extends object> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Array<(item: T | null) => void> = [];
  private closed = false;

  send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  /** Take the next item, waiting for a sender if none is pending. Resolves `null` once closed. */
  receive(): Promise<T | null> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve(sender.item);
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Reject every blocked sender and wake every blocked receiver with `null`. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.reject(new QueueClosedError());
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver(null);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of producers blocked in `send`. */
  get pendingSends(): number {
    return this.senders.length;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.receive();
      if (item === null) return;
      yield item;
    }
  }
}
