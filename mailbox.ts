import { List } from 'immutable';

export interface Message {
  readonly type: string;
}

// FIFO of messages waiting for one actor
export class Mailbox<M extends Message> {
  private queue = List<M>();

  enqueue(message: M): void {
    this.queue = this.queue.push(message);
  }

  dequeue(): M | undefined {
    const front = this.queue.first();
    this.queue = this.queue.shift();
    return front;
  }

  peek(): M | undefined { return this.queue.first(); }

  /** Empties the mailbox, returning what was still queued. */
  drain(): List<M> {
    const rest = this.queue;
    this.queue = List<M>();
    return rest;
  }

  get size(): number { return this.queue.size; }
  get isEmpty(): boolean { return this.queue.size === 0; }
}
