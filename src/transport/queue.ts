/**
 * Unbounded single-direction queue with suspending reads
 */

import { ConnectionError } from '../error.js';

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export class AsyncQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  constructor(private readonly label: string) {}

  /**
   * Returns false when the queue is already closed
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Next item; rejects with ConnectionError once closed and drained
   */
  shift(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.reject(this.closedError());
    }
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(this.closedError());
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  private closedError(): ConnectionError {
    return new ConnectionError('Channel closed', { channel: this.label });
  }
}
