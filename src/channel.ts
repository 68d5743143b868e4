// src/channel.ts
//
// Unbounded in-process channels and a multiplexed wait over several of them.
// Each event source owns the sending half; the supervisor holds the
// receivers and waits on all of them at once.

export type RecvResult<T> =
  | { status: "message"; value: T }
  | { status: "empty" }
  | { status: "disconnected" };

type Listener = () => void;

export interface Sender<T> {
  send(value: T): boolean;
  close(): void;
  readonly closed: boolean;
}

export class Receiver<T> {
  private readonly queue: T[] = [];
  private readonly listeners = new Set<Listener>();
  private senderClosed = false;

  /** @internal used by the paired sender */
  push(value: T): boolean {
    if (this.senderClosed) return false;
    this.queue.push(value);
    this.notify();
    return true;
  }

  /** @internal used by the paired sender */
  disconnect(): void {
    if (this.senderClosed) return;
    this.senderClosed = true;
    this.notify();
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Sender gone and nothing left to read. */
  get disconnected(): boolean {
    return this.senderClosed && this.queue.length === 0;
  }

  tryRecv(): RecvResult<T> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return { status: "message", value };
    }
    return this.senderClosed ? { status: "disconnected" } : { status: "empty" };
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify() {
    for (const listener of Array.from(this.listeners)) {
      listener();
    }
  }
}

export function channel<T>(): [Sender<T>, Receiver<T>] {
  const receiver = new Receiver<T>();
  let closed = false;
  const sender: Sender<T> = {
    send: (value) => !closed && receiver.push(value),
    close: () => {
      closed = true;
      receiver.disconnect();
    },
    get closed() {
      return closed;
    },
  };
  return [sender, receiver];
}

/**
 * A fixed set of receivers to wait on together. The set never shrinks; it is
 * rebuilt from scratch when the sources change.
 *
 * A receiver is ready when it holds a message. A disconnected receiver is
 * reported ready exactly once, so a closed source cannot spin the loop.
 */
export class WaitSet<T> {
  private readonly disconnectReported = new Set<number>();
  private cursor = 0;

  constructor(private readonly receivers: readonly Receiver<T>[]) {}

  get size(): number {
    return this.receivers.length;
  }

  receiver(index: number): Receiver<T> | undefined {
    return this.receivers[index];
  }

  private readyIndex(): number | null {
    const n = this.receivers.length;
    for (let k = 0; k < n; k++) {
      // rotate the starting point so one busy source cannot starve the rest
      const i = (this.cursor + k) % n;
      const rx = this.receivers[i];
      if (rx.pending > 0) {
        this.cursor = (i + 1) % n;
        return i;
      }
      if (rx.disconnected && !this.disconnectReported.has(i)) {
        this.disconnectReported.add(i);
        this.cursor = (i + 1) % n;
        return i;
      }
    }
    return null;
  }

  /**
   * Resolve with the index of the first ready receiver, or null once
   * `timeoutMs` passes with none ready.
   */
  select(timeoutMs: number): Promise<number | null> {
    const now = this.readyIndex();
    if (now != null) return Promise.resolve(now);

    return new Promise((resolve) => {
      let done = false;
      const unsubscribers: Array<() => void> = [];
      const finish = (value: number | null) => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        for (const unsubscribe of unsubscribers) unsubscribe();
        resolve(value);
      };
      const timer = setTimeout(() => finish(null), Math.max(0, timeoutMs));
      for (const rx of this.receivers) {
        unsubscribers.push(
          rx.subscribe(() => {
            const idx = this.readyIndex();
            if (idx != null) finish(idx);
          }),
        );
      }
    });
  }
}
