import type { StoreEvent } from "../../shared/events.js";

/**
 * Unbounded push queue exposed as an async iterator. A backend pushes events in,
 * one consumer pulls them out. Once closed it cannot be reopened.
 */
export class EventStream implements AsyncIterableIterator<StoreEvent> {
  private readonly buffer: StoreEvent[] = [];
  private pending?: (result: IteratorResult<StoreEvent>) => void;
  private closed = false;

  constructor(
    public readonly channel: string,
    private readonly onClose: (stream: EventStream) => void
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Called by the backend; events pushed after close are dropped. */
  push(event: StoreEvent) {
    if (this.closed) return;
    if (this.pending) {
      const resolve = this.pending;
      this.pending = undefined;
      resolve({ value: event, done: false });
      return;
    }
    this.buffer.push(event);
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.buffer.length = 0;
    if (this.pending) {
      const resolve = this.pending;
      this.pending = undefined;
      resolve({ value: undefined, done: true });
    }
    this.onClose(this);
  }

  next(): Promise<IteratorResult<StoreEvent>> {
    const queued = this.buffer.shift();
    if (queued) return Promise.resolve({ value: queued, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    if (this.pending) {
      return Promise.reject(new Error(`Stream for ${this.channel} already has a pending reader`));
    }
    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  return(): Promise<IteratorResult<StoreEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<StoreEvent> {
    return this;
  }
}
