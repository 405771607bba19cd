import type { CallEvent } from '../types/index.js';

/**
 * In-process, ordered CallEvent stream. Each pushed event is delivered to
 * exactly one `next()` call; after `close()` buffered events drain and the
 * iterator completes.
 */
export class CallEventQueue implements AsyncIterableIterator<CallEvent> {
  private buffer: CallEvent[] = [];
  private waiters: Array<(result: IteratorResult<CallEvent>) => void> = [];
  private closed = false;

  push(event: CallEvent): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed call event queue');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
  }

  /**
   * Push a user utterance
   */
  say(text: string): void {
    this.push({ type: 'utterance', role: 'user', text });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<CallEvent>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  async return(): Promise<IteratorResult<CallEvent>> {
    this.buffer = [];
    this.close();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<CallEvent> {
    return this;
  }
}
