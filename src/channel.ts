type BlockedSender<T> = {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
};

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

export class ChannelClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChannelClosedError";
  }
}

/**
 * Bounded FIFO channel for many producers and a single consumer.
 *
 * Values buffered before `close()` are still delivered; after the buffer is
 * drained the consumer sees `done`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly blockedSenders: BlockedSender<T>[] = [];
  private waitingReceiver: Receiver<T> | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T): Promise<void> {
    if (this.closed) {
      throw new ChannelClosedError("send on closed channel");
    }

    const receiver = this.waitingReceiver;
    if (receiver !== null) {
      this.waitingReceiver = null;
      receiver({ done: false, value });
      return;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return;
    }

    return new Promise<void>((resolve, reject) => {
      this.blockedSenders.push({ value, resolve, reject });
    });
  }

  async receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      const sender = this.blockedSenders.shift();
      if (sender !== undefined) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return { done: false, value };
    }

    if (this.closed) {
      return { done: true, value: undefined };
    }

    if (this.waitingReceiver !== null) {
      throw new Error("Channel already has a waiting receiver");
    }

    return new Promise<IteratorResult<T, undefined>>((resolve) => {
      this.waitingReceiver = resolve;
    });
  }

  close(): void {
    if (this.closed) {
      throw new ChannelClosedError("close of closed channel");
    }
    this.closed = true;

    for (const sender of this.blockedSenders.splice(0)) {
      sender.reject(new ChannelClosedError("send on closed channel"));
    }

    const receiver = this.waitingReceiver;
    if (receiver !== null) {
      this.waitingReceiver = null;
      receiver({ done: true, value: undefined });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.receive();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }
}
