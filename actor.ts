/**
 * In-process actor runtime: every actor is a task with private state and a
 * mailbox, reachable only through an {@link ActorRef}.
 */
import { resolveOptions, type SupervisionPolicy, type TreeSetOptions } from './config';
import { createLogger, type Logger } from './log';
import { Mailbox, type Message } from './mailbox';

export type { Message };

/** Opaque handle to an actor. Handles compare by identity. */
export interface ActorRef<M> {
  readonly name: string;
  readonly isStopped: boolean;
  tell(message: M): void;
}

export interface Actor<M> {
  receive(message: M): void;
}

export interface ActorContext<M> {
  readonly self: ActorRef<M>;
  readonly log: Logger;
  spawn<C extends Message>(name: string, factory: ActorFactory<C>): ActorRef<C>;
  /** Stops this actor; whatever is still queued becomes dead letters. */
  stop(): void;
}

export type ActorFactory<M> = (context: ActorContext<M>) => Actor<M>;

export type ActorSystemOptions = Pick<TreeSetOptions, 'throughput' | 'supervision' | 'logLevel' | 'logSink'>;

interface Stoppable {
  stop(): void;
}

class LocalActorRef<M extends Message> implements ActorRef<M> {
  constructor(readonly name: string, private readonly cell: ActorCell<M>) {}

  get isStopped(): boolean { return this.cell.stopped; }

  tell(message: M): void { this.cell.post(message); }

  toString(): string { return `ActorRef(${this.name})`; }
}

class ActorCell<M extends Message> implements Stoppable {
  readonly ref: LocalActorRef<M>;
  stopped = false;
  private readonly mailbox = new Mailbox<M>();
  private actor: Actor<M> | undefined;
  private scheduled = false;

  constructor(private readonly system: ActorSystem, name: string) {
    this.ref = new LocalActorRef(name, this);
  }

  start(actor: Actor<M>): void {
    this.actor = actor;
    this.schedule();
  }

  post(message: M): void {
    if (this.stopped) {
      this.system.deadLetter(this.ref.name, message);
      return;
    }
    this.mailbox.enqueue(message);
    this.schedule();
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.actor = undefined;
    for (const message of this.mailbox.drain()) this.system.deadLetter(this.ref.name, message);
    this.system.unregister(this.ref);
  }

  private schedule(): void {
    if (this.scheduled || this.stopped || this.actor === undefined || this.mailbox.isEmpty) return;
    this.scheduled = true;
    this.system.schedule(() => this.run());
  }

  private run(): void {
    this.scheduled = false;
    for (let processed = 0; processed < this.system.throughput; processed++) {
      const actor = this.actor;
      if (actor === undefined) break;
      const message = this.mailbox.dequeue();
      if (message === undefined) break;
      this.invoke(actor, message);
    }
    this.schedule();
  }

  private invoke(actor: Actor<M>, message: M): void {
    try {
      actor.receive(message);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.system.log.error(`${this.ref.name} failed on ${message.type}: ${reason}`);
      if (this.system.supervision === 'stop') this.stop();
    }
  }
}

export class ActorSystem {
  readonly log: Logger;
  readonly throughput: number;
  readonly supervision: SupervisionPolicy;
  private readonly cells = new Map<ActorRef<never>, Stoppable>();
  private pendingRuns = 0;
  private idleWaiters: Array<() => void> = [];
  private _deadLetters = 0;

  constructor(readonly name: string, options: ActorSystemOptions = resolveOptions()) {
    this.log = createLogger(name, options.logLevel, options.logSink);
    this.throughput = options.throughput;
    this.supervision = options.supervision;
  }

  spawn<M extends Message>(name: string, factory: ActorFactory<M>): ActorRef<M> {
    const cell = new ActorCell<M>(this, name);
    this.cells.set(cell.ref, cell);
    const context: ActorContext<M> = {
      self: cell.ref,
      log: this.log,
      spawn: (childName, childFactory) => this.spawn(childName, childFactory),
      stop: () => cell.stop(),
    };
    cell.start(factory(context));
    return cell.ref;
  }

  stop<M>(ref: ActorRef<M>): void {
    this.cells.get(ref)?.stop();
  }

  /** Stops every actor still running. */
  terminate(): void {
    for (const cell of [...this.cells.values()]) cell.stop();
  }

  get liveActors(): number { return this.cells.size; }
  get deadLetters(): number { return this._deadLetters; }

  /** Resolves once no mailbox has work scheduled. */
  idle(): Promise<void> {
    if (this.pendingRuns === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /** @internal */
  schedule(run: () => void): void {
    this.pendingRuns++;
    setImmediate(() => {
      try {
        run();
      } finally {
        this.pendingRuns--;
        if (this.pendingRuns === 0) this.wakeIdleWaiters();
      }
    });
  }

  /** @internal */
  deadLetter(recipient: string, message: Message): void {
    this._deadLetters++;
    this.log.debug(`dead letter to ${recipient}: ${message.type}`);
  }

  /** @internal */
  unregister<M>(ref: ActorRef<M>): void {
    this.cells.delete(ref);
  }

  private wakeIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
