import { ChannelClosedError } from "./ChannelClosedError";

export type TrySendResult = "sent" | "full" | "closed";

export type TryRecvResult<T> =
  | { status: "value"; value: T }
  | { status: "empty" }
  | { status: "closed" };

type PendingSend<T> = {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
};

type Waiter = {
  promise: Promise<void>;
  resolve: () => void;
};

/**
 * Shared state between every Sender clone and the single Receiver of a channel.
 * Items beyond `capacity` are never stored; `send` callers queue behind them
 * in arrival order instead.
 */
class ChannelState<T> {
  public queue: Array<T> = [];
  public pendingSends: Array<PendingSend<T>> = [];
  public openSenders = 1;
  public receiverClosed = false;
  private readableWaiter: Waiter | null = null;

  constructor(public readonly capacity: number) {}

  public get sendersClosed(): boolean {
    return this.openSenders === 0;
  }

  public hasCapacity(): boolean {
    return this.queue.length < this.capacity && this.pendingSends.length === 0;
  }

  public push(value: T) {
    this.queue.push(value);
    this.wakeReceiver();
  }

  // Callers check that the queue is non-empty first
  public take(): T {
    const [value] = this.queue.splice(0, 1);
    const pending = this.pendingSends.shift();
    if (pending) {
      this.queue.push(pending.value);
      pending.resolve();
    }
    return value;
  }

  public readable(): Promise<void> {
    if (this.queue.length > 0 || this.sendersClosed || this.receiverClosed) {
      return Promise.resolve();
    }
    if (this.readableWaiter === null) {
      let resolve: () => void = () => {};
      const promise = new Promise<void>((res) => {
        resolve = res;
      });
      this.readableWaiter = { promise, resolve };
    }
    return this.readableWaiter.promise;
  }

  public wakeReceiver() {
    if (this.readableWaiter !== null) {
      const { resolve } = this.readableWaiter;
      this.readableWaiter = null;
      resolve();
    }
  }

  public rejectPendingSends() {
    const pendingSends = this.pendingSends;
    this.pendingSends = [];
    for (const pending of pendingSends) {
      pending.reject(new ChannelClosedError());
    }
  }
}

/**
 * The producing half of a channel. Clone it to hand out additional producers;
 * the channel closes for the receiver once every clone has been closed.
 */
export class Sender<T> {
  private closed = false;

  /** @internal */
  constructor(private state: ChannelState<T>) {}

  public get isClosed(): boolean {
    return this.closed || this.state.receiverClosed;
  }

  /**
   * Enqueues without waiting. Returns "full" rather than exceeding capacity.
   */
  public trySend(value: T): TrySendResult {
    if (this.isClosed) {
      return "closed";
    }
    if (!this.state.hasCapacity()) {
      return "full";
    }
    this.state.push(value);
    return "sent";
  }

  /**
   * Enqueues, waiting for capacity if the channel is full. Waiting senders are
   * admitted in the order they called `send`.
   * @throws ChannelClosedError if this sender or the receiver is closed
   */
  public send(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError());
    }
    if (this.state.hasCapacity()) {
      this.state.push(value);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.state.pendingSends.push({ value, resolve, reject });
    });
  }

  public clone(): Sender<T> {
    if (this.closed) {
      throw new ChannelClosedError("Cannot clone a closed sender");
    }
    this.state.openSenders++;
    return new Sender(this.state);
  }

  /**
   * Releases this sender. Idempotent.
   */
  public close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.state.openSenders--;
    if (this.state.sendersClosed) {
      this.state.wakeReceiver();
    }
  }
}

/**
 * The single consuming half of a channel.
 */
export class Receiver<T> {
  /** @internal */
  constructor(private state: ChannelState<T>) {}

  /**
   * True once every sender is closed and every queued item has been taken, or
   * once the receiver itself has been closed.
   */
  public get isClosed(): boolean {
    return (
      this.state.receiverClosed ||
      (this.state.sendersClosed &&
        this.state.queue.length === 0 &&
        this.state.pendingSends.length === 0)
    );
  }

  public get length(): number {
    return this.state.queue.length;
  }

  public get capacity(): number {
    return this.state.capacity;
  }

  public tryRecv(): TryRecvResult<T> {
    if (this.state.receiverClosed) {
      return { status: "closed" };
    }
    if (this.state.queue.length > 0) {
      return { status: "value", value: this.state.take() };
    }
    return this.isClosed ? { status: "closed" } : { status: "empty" };
  }

  /**
   * Waits for the next item. Resolves with null once the channel is closed and
   * drained.
   */
  public async recv(): Promise<T | null> {
    for (;;) {
      const result = this.tryRecv();
      if (result.status === "value") {
        return result.value;
      }
      if (result.status === "closed") {
        return null;
      }
      await this.state.readable();
    }
  }

  /**
   * Resolves when an item is available or the channel has closed, without
   * taking the item. Repeated calls while waiting share one promise.
   */
  public readable(): Promise<void> {
    return this.state.readable();
  }

  /**
   * Stops receiving. Queued items are discarded and every sender observes the
   * channel as closed. Idempotent.
   */
  public close() {
    if (this.state.receiverClosed) {
      return;
    }
    this.state.receiverClosed = true;
    this.state.queue = [];
    this.state.rejectPendingSends();
    this.state.wakeReceiver();
  }
}

/**
 * Creates a bounded channel. The returned sender may be cloned for any number
 * of producers; the receiver must have a single consumer.
 */
export function createChannel<T>(capacity: number): [Sender<T>, Receiver<T>] {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`Channel capacity must be a positive integer, received ${capacity}`);
  }
  const state = new ChannelState<T>(capacity);
  return [new Sender(state), new Receiver(state)];
}
