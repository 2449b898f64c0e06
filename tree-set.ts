import { List } from 'immutable';
import type { Actor, ActorContext, ActorRef, ActorSystem } from './actor';
import type { OperationsDuringGC, TreeSetOptions } from './config';
import { treeNode } from './tree-node';
import { terminate, type CopyFinished, type NodeMessage, type Operation, type TreeSetMessage } from './types';

/** Element held by every root. Roots start tombstoned; inserting this value clears the tombstone. */
export const SENTINEL_ELEM = 0;

type CoordinatorState =
  | { readonly kind: 'Normal' }
  | {
      readonly kind: 'CollectingGarbage';
      readonly newRoot: ActorRef<NodeMessage>;
      /** Operations held back under `queue`, in arrival order. */
      readonly pending: List<Operation>;
    };

/**
 * Routes every operation to the current root and runs GC cycles by copying
 * the live elements into a fresh tree, then swapping roots.
 */
export class TreeSetCoordinator implements Actor<TreeSetMessage> {
  private root: ActorRef<NodeMessage>;
  private state: CoordinatorState = { kind: 'Normal' };
  private generation = 0;

  constructor(
    private readonly context: ActorContext<TreeSetMessage>,
    private readonly operationsDuringGC: OperationsDuringGC,
  ) {
    this.root = this.createRoot();
  }

  receive(message: TreeSetMessage): void {
    const state = this.state;
    switch (message.type) {
      case 'Insert':
      case 'Contains':
      case 'Remove':
        if (state.kind === 'CollectingGarbage' && this.operationsDuringGC === 'queue') {
          this.state = { ...state, pending: state.pending.push(message) };
        } else {
          this.root.tell(message);
        }
        break;
      case 'GC':
        if (state.kind === 'CollectingGarbage') {
          this.context.log.debug('GC requested while collecting, ignored');
          break;
        }
        this.startCollection();
        break;
      case 'CopyFinished':
        if (state.kind !== 'CollectingGarbage' || message.from !== this.root) {
          this.context.log.debug(`unexpected CopyFinished from ${message.from.name}`);
          break;
        }
        this.finishCollection(state.newRoot, state.pending);
        break;
      case 'Terminate':
        this.root.tell(terminate);
        if (state.kind === 'CollectingGarbage') state.newRoot.tell(terminate);
        this.context.stop();
        break;
    }
  }

  private createRoot(): ActorRef<NodeMessage> {
    return this.context.spawn(`root(${this.generation++})`, treeNode(SENTINEL_ELEM, true));
  }

  private startCollection(): void {
    const newRoot = this.createRoot();
    this.state = { kind: 'CollectingGarbage', newRoot, pending: List<Operation>() };
    this.context.log.info(`GC started, copying ${this.root.name} into ${newRoot.name}`);
    const replyTo: ActorRef<CopyFinished> = this.context.self;
    this.root.tell({ type: 'CopyTo', newRoot, replyTo });
  }

  private finishCollection(newRoot: ActorRef<NodeMessage>, pending: List<Operation>): void {
    const oldRoot = this.root;
    this.root = newRoot;
    oldRoot.tell(terminate);
    this.state = { kind: 'Normal' };
    this.context.log.info(`GC finished, ${newRoot.name} is now the root, replaying ${pending.size} operations`);
    for (const op of pending) newRoot.tell(op);
  }
}

export function createTreeSet(
  system: ActorSystem,
  options: Pick<TreeSetOptions, 'operationsDuringGC'> = { operationsDuringGC: 'forward' },
): ActorRef<TreeSetMessage> {
  return system.spawn<TreeSetMessage>('tree-set', context => new TreeSetCoordinator(context, options.operationsDuringGC));
}
