// ============================================
// Channel
// ============================================
// Unbuffered rendezvous channel: a send completes only when a receiver takes
// the value, so a slow consumer stalls its producer instead of growing a queue.

/**
 * Raised when sending on a closed channel.
 */
export class ChannelClosedError extends Error {
  constructor() {
    super("send on closed channel");
    this.name = "ChannelClosedError";
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

type PendingReceive<T> = (value: T | undefined) => void;

/**
 * Unbuffered, FIFO, closable channel.
 * `undefined` marks a closed channel on receive, so `T` should not include it.
 *
 * @example
 * ```typescript
 * const events = new Channel<LogicalEvent>();
 *
 * // producer
 * await events.send({ name: "src/a.ts", time: Date.now() });
 *
 * // consumer
 * for await (const event of events) {
 *   console.log(event.name);
 * }
 * ```
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  /** Number of senders blocked waiting for a receiver. */
  get pendingSends(): number {
    return this.senders.length;
  }

  /**
   * Offer a value. Resolves once a receiver has taken it.
   *
   * @throws ChannelClosedError if the channel is (or becomes) closed before delivery
   */
  send(value: T): Promise<void> {
    if (this._closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Take the next value. Resolves `undefined` once the channel is closed or
   * `signal` aborts.
   */
  receive(signal?: AbortSignal): Promise<T | undefined> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve(sender.value);
    }
    if (this._closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      const onAbort = (): void => {
        const index = this.receivers.indexOf(deliver);
        if (index !== -1) {
          this.receivers.splice(index, 1);
        }
        resolve(undefined);
      };
      const deliver: PendingReceive<T> = (value) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };

      this.receivers.push(deliver);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Close the channel. Idempotent.
   * Pending receivers get `undefined`; pending senders are rejected.
   */
  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const value = await this.receive();
      if (value === undefined) {
        return;
      }
      yield value;
    }
  }
}
