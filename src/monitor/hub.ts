/**
 * Monitor Hub
 *
 * Broadcasts every published event to all current subscribers. Each
 * subscriber owns a fixed-size circular buffer; when it is full the oldest
 * event is overwritten. Publishing is synchronous and never waits on a
 * subscriber.
 */

import { MONITOR_BUFFER_CAPACITY } from '../constants.js';
import type { MonitorEvent } from './events.js';

export interface MonitorSubscription extends AsyncIterable<MonitorEvent> {
  readonly id: number;
  /** Events lost to overflow since subscribing */
  readonly dropped: number;
  /** Events currently buffered */
  size(): number;
  /** Next event in publish order, or undefined once closed and drained */
  next(): Promise<MonitorEvent | undefined>;
  close(): void;
  isClosed(): boolean;
}

class Subscriber implements MonitorSubscription {
  private buffer: (MonitorEvent | null)[];
  private head = 0;
  private count = 0;
  private droppedCount = 0;
  private closed = false;
  private waiter: ((event: MonitorEvent | undefined) => void) | null = null;

  constructor(
    readonly id: number,
    private readonly capacity: number,
    private readonly onClose: (id: number) => void
  ) {
    this.buffer = Array.from({ length: capacity }, () => null);
  }

  get dropped(): number {
    return this.droppedCount;
  }

  size(): number {
    return this.count;
  }

  isClosed(): boolean {
    return this.closed;
  }

  push(event: MonitorEvent): void {
    if (this.closed) return;

    // A pending next() takes the event directly
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(event);
      return;
    }

    const tail = (this.head + this.count) % this.capacity;
    this.buffer[tail] = event;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
      this.droppedCount++;
    }
  }

  next(): Promise<MonitorEvent | undefined> {
    if (this.count > 0) {
      const event = this.buffer[this.head];
      this.buffer[this.head] = null;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      return Promise.resolve(event ?? undefined);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error('Monitor subscription already has a pending read'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
    this.onClose(this.id);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<MonitorEvent> {
    while (true) {
      const event = await this.next();
      if (event === undefined) return;
      yield event;
    }
  }
}

export class MonitorHub {
  private subscribers = new Map<number, Subscriber>();
  private nextId = 1;

  constructor(private readonly capacity: number = MONITOR_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Monitor buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  subscribe(): MonitorSubscription {
    const subscriber = new Subscriber(this.nextId++, this.capacity, (id) => this.subscribers.delete(id));
    this.subscribers.set(subscriber.id, subscriber);
    return subscriber;
  }

  publish(event: MonitorEvent): void {
    for (const subscriber of this.subscribers.values()) {
      subscriber.push(event);
    }
  }

  subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Close every subscription. Buffered events stay readable.
   */
  closeAll(): void {
    for (const subscriber of [...this.subscribers.values()]) {
      subscriber.close();
    }
  }
}
