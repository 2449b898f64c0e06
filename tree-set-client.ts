import { ActorSystem, type ActorRef } from './actor';
import { resolveOptions, type TreeSetConfig, type TreeSetOptions } from './config';
import { createTreeSet } from './tree-set';
import { contains, gc, insert, remove, terminate, type Operation, type OperationReply, type TreeSetMessage } from './types';

export class TreeSetClosedError extends Error {
  constructor() {
    super('Tree set is closed');
    this.name = 'TreeSetClosedError';
  }
}

export interface TreeSetStats {
  liveActors: number;
  deadLetters: number;
  /** Requests still waiting for their reply. */
  pending: number;
}

interface PendingReply {
  resolve(reply: OperationReply): void;
  reject(error: Error): void;
}

function checkElement(elem: number): void {
  if (!Number.isSafeInteger(elem)) throw new TypeError(`Tree set elements must be safe integers, got ${elem}`);
}

/**
 * Promise-based front end: correlates each request with its reply through a
 * private inbox actor.
 */
export class TreeSetClient {
  private readonly pending = new Map<number, PendingReply>();
  private readonly inbox: ActorRef<OperationReply>;
  private nextId = 0;
  private removesSinceGC = 0;
  private closed = false;

  private constructor(
    readonly system: ActorSystem,
    private readonly coordinator: ActorRef<TreeSetMessage>,
    private readonly options: TreeSetOptions,
  ) {
    this.inbox = system.spawn<OperationReply>('client-inbox', () => ({ receive: reply => this.settle(reply) }));
  }

  static create(config?: TreeSetConfig): TreeSetClient {
    const options = resolveOptions(config);
    const system = new ActorSystem('actor-tree-set', options);
    return new TreeSetClient(system, createTreeSet(system, options), options);
  }

  insert(elem: number): Promise<void> {
    checkElement(elem);
    return this.request(id => insert(this.inbox, id, elem)).then(() => undefined);
  }

  contains(elem: number): Promise<boolean> {
    checkElement(elem);
    return this.request(id => contains(this.inbox, id, elem)).then(reply => {
      if (reply.type !== 'ContainsResult') throw new Error(`Expected ContainsResult for request ${reply.id}, got ${reply.type}`);
      return reply.result;
    });
  }

  remove(elem: number): Promise<void> {
    checkElement(elem);
    const done = this.request(id => remove(this.inbox, id, elem)).then(() => undefined);
    const { enabled, removeThreshold } = this.options.autoGC;
    if (enabled && !this.closed && ++this.removesSinceGC >= removeThreshold) {
      this.removesSinceGC = 0;
      this.gc();
    }
    return done;
  }

  /** Starts a compaction cycle. Completion is not reported. Throws {@link TreeSetClosedError} after close, as every request does. */
  gc(): void {
    if (this.closed) throw new TreeSetClosedError();
    this.coordinator.tell(gc);
  }

  stats(): TreeSetStats {
    return { liveActors: this.system.liveActors, deadLetters: this.system.deadLetters, pending: this.pending.size };
  }

  /** Rejects outstanding requests, shuts the tree down and stops the actor system. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const error = new TreeSetClosedError();
    for (const entry of this.pending.values()) entry.reject(error);
    this.pending.clear();
    this.coordinator.tell(terminate);
    await this.system.idle();
    this.system.terminate();
  }

  private request(build: (id: number) => Operation): Promise<OperationReply> {
    if (this.closed) throw new TreeSetClosedError();
    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.coordinator.tell(build(id));
    });
  }

  private settle(reply: OperationReply): void {
    const entry = this.pending.get(reply.id);
    if (entry === undefined) {
      this.system.log.debug(`reply ${reply.id} matches no pending request`);
      return;
    }
    this.pending.delete(reply.id);
    entry.resolve(reply);
  }
}
