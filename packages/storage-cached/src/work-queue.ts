/**
 * Bounded work queue shared by a fixed pool of consumers.
 *
 * Producers wait while the queue is full; consumers wait while it is empty.
 * A capacity of 0 makes every enqueue a direct handoff: the producer waits
 * until a consumer takes the item.
 *
 * Items must not be `undefined`; `dequeue` uses it to signal the end.
 */

import { CacheError } from "@tiercache/storage-core";

type Sender<T> = { item: T; resolve: (accepted: boolean) => void };
type Receiver<T> = (item: T | undefined) => void;

export class WorkQueue<T> {
  private readonly buffer: T[] = [];
  private readonly senders: Sender<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new CacheError("InvalidConfig", `queue capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  /**
   * Number of buffered items (not counting producers still waiting)
   */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Add an item, waiting for room if the queue is full.
   *
   * @returns true once a consumer or the buffer holds the item, false if the
   *   queue was cancelled while waiting
   */
  enqueue(item: T): Promise<boolean> {
    if (this.closed) {
      return Promise.reject(new CacheError("QueueClosed", "enqueue on closed queue"));
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      this.senders.push({ item, resolve });
    });
  }

  /**
   * Take the next item, waiting while the queue is empty.
   *
   * @returns undefined once the queue is closed and drained
   */
  dequeue(): Promise<T | undefined> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.admitWaitingSender();
      return Promise.resolve(item);
    }

    // Unbuffered handoff
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve(true);
      return Promise.resolve(sender.item);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Stop accepting items. Consumers still drain everything buffered or
   * waiting to be enqueued, then see the end.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    // Receivers only wait when nothing is buffered or pending
    this.wakeReceivers();
  }

  /**
   * Close and drop every buffered and waiting item.
   *
   * @returns Number of items dropped
   */
  cancel(): number {
    this.closed = true;
    const dropped = this.buffer.length + this.senders.length;
    this.buffer.length = 0;
    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
    this.wakeReceivers();
    return dropped;
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push(sender.item);
      sender.resolve(true);
    }
  }

  private wakeReceivers(): void {
    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
  }
}
