// ============================================================================
// RENDEZVOUS CHANNEL - Capacity-zero hand-off between producers and one consumer
// ============================================================================

export class ChannelClosedError extends Error {
  constructor() {
    super('Cannot send on a closed channel');
    this.name = 'ChannelClosedError';
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbuffered channel: `send` settles only once a receiver has taken the value.
 *
 * Senders that are already waiting when {@link close} is called are still
 * delivered; only sends that start after the close are rejected. Receivers
 * see `done` once the channel is closed and no sender is left.
 *
 * @example
 * ```typescript
 * const channel = new RendezvousChannel<string>();
 *
 * (async () => {
 *   for await (const value of channel) console.log(value);
 * })();
 *
 * await channel.send('a'); // resolves when the loop above has taken 'a'
 * channel.close();
 * ```
 */
export class RendezvousChannel<T> implements AsyncIterable<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of senders blocked waiting for a receiver */
  get pendingSends(): number {
    return this.senders.length;
  }

  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.senders.push({ value, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    // A waiting receiver implies no waiting sender
    while (this.receivers.length > 0) {
      const receiver = this.receivers.shift();
      receiver?.({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }
}
