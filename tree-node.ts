import { Map as ImmutableMap, Set as ImmutableSet } from 'immutable';
import type { Actor, ActorContext, ActorFactory, ActorRef } from './actor';
import {
  containsResult,
  insert,
  isOperation,
  operationFinished,
  terminate,
  type CopyFinished,
  type CopyTo,
  type NodeMessage,
  type Operation,
  type Position,
} from './types';

export type Evaluation = 'Equal' | Position;

/**
 * `expected` holds the children whose CopyFinished is outstanding plus the
 * parent that will receive ours; it is emptied once we have reported.
 */
type NodeState =
  | { readonly kind: 'Normal' }
  | {
      readonly kind: 'Copying';
      readonly expected: ImmutableSet<ActorRef<CopyFinished>>;
      readonly insertConfirmed: boolean;
      readonly token: number;
    };

export class TreeNode implements Actor<NodeMessage> {
  private removed: boolean;
  private children = ImmutableMap<Position, ActorRef<NodeMessage>>();
  private state: NodeState = { kind: 'Normal' };
  private copies = 0;

  constructor(
    private readonly context: ActorContext<NodeMessage>,
    readonly elem: number,
    initiallyRemoved: boolean,
  ) {
    this.removed = initiallyRemoved;
  }

  evaluate(target: number): Evaluation {
    if (target === this.elem) return 'Equal';
    return target > this.elem ? 'Right' : 'Left';
  }

  receive(message: NodeMessage): void {
    if (isOperation(message)) {
      this.handleOperation(message);
      return;
    }
    if (message.type === 'Terminate') {
      this.terminate();
      return;
    }
    const state = this.state;
    if (state.kind === 'Normal' && message.type === 'CopyTo') {
      this.startCopy(message);
      return;
    }
    if (state.kind === 'Copying') {
      if (message.type === 'OperationFinished' && message.id === state.token) {
        this.state = { ...state, insertConfirmed: true };
        this.reportIfCopied();
        return;
      }
      if (message.type === 'CopyFinished') {
        this.state = { ...state, expected: state.expected.remove(message.from) };
        this.reportIfCopied();
        return;
      }
    }
    this.context.log.debug(`${this.context.self.name} discarded ${message.type}`);
  }

  private handleOperation(op: Operation): void {
    const position = this.evaluate(op.elem);
    if (position === 'Equal') {
      switch (op.type) {
        case 'Insert':
          this.removed = false;
          op.requester.tell(operationFinished(op.id));
          break;
        case 'Contains':
          op.requester.tell(containsResult(op.id, !this.removed));
          break;
        case 'Remove':
          this.removed = true;
          op.requester.tell(operationFinished(op.id));
          break;
      }
      return;
    }

    const child = this.children.get(position);
    if (child !== undefined) {
      child.tell(op);
      return;
    }
    switch (op.type) {
      case 'Insert':
        this.children = this.children.set(position, this.context.spawn(`node(${op.elem})`, treeNode(op.elem, false)));
        op.requester.tell(operationFinished(op.id));
        break;
      case 'Contains':
        op.requester.tell(containsResult(op.id, false));
        break;
      case 'Remove':
        op.requester.tell(operationFinished(op.id));
        break;
    }
  }

  private startCopy({ newRoot, replyTo }: CopyTo): void {
    const self = this.context.self;
    const token = ++this.copies;
    this.state = {
      kind: 'Copying',
      expected: ImmutableSet<ActorRef<CopyFinished>>(this.children.values()).add(replyTo),
      insertConfirmed: this.removed,
      token,
    };
    for (const child of this.children.values()) child.tell({ type: 'CopyTo', newRoot, replyTo: self });
    if (!this.removed) newRoot.tell(insert(self, token, this.elem));
    // a tombstoned leaf has nothing to wait for
    this.reportIfCopied();
  }

  private reportIfCopied(): void {
    const state = this.state;
    if (state.kind !== 'Copying' || state.expected.size !== 1 || !state.insertConfirmed) return;
    const parent = state.expected.first();
    if (parent === undefined) return;
    parent.tell({ type: 'CopyFinished', from: this.context.self });
    this.state = { ...state, expected: state.expected.clear() };
  }

  private terminate(): void {
    for (const child of this.children.values()) child.tell(terminate);
    this.context.stop();
  }
}

export function treeNode(elem: number, initiallyRemoved: boolean): ActorFactory<NodeMessage> {
  return context => new TreeNode(context, elem, initiallyRemoved);
}
