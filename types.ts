// Message definitions shared by the coordinator, the tree nodes and clients
import type { ActorRef } from './actor';

export type Position = 'Left' | 'Right';

export interface Insert {
  readonly type: 'Insert';
  readonly requester: ActorRef<OperationReply>;
  readonly id: number;
  readonly elem: number;
}

export interface Contains {
  readonly type: 'Contains';
  readonly requester: ActorRef<OperationReply>;
  readonly id: number;
  readonly elem: number;
}

export interface Remove {
  readonly type: 'Remove';
  readonly requester: ActorRef<OperationReply>;
  readonly id: number;
  readonly elem: number;
}

export type Operation = Insert | Contains | Remove;

export interface OperationFinished {
  readonly type: 'OperationFinished';
  readonly id: number;
}

export interface ContainsResult {
  readonly type: 'ContainsResult';
  readonly id: number;
  readonly result: boolean;
}

export type OperationReply = OperationFinished | ContainsResult;

export interface GC {
  readonly type: 'GC';
}

/** Asks a node to replicate its live subtree under `newRoot`, acknowledging to `replyTo`. */
export interface CopyTo {
  readonly type: 'CopyTo';
  readonly newRoot: ActorRef<Operation>;
  readonly replyTo: ActorRef<CopyFinished>;
}

/** Sent by `from` once it and its whole subtree are present in the new tree. */
export interface CopyFinished {
  readonly type: 'CopyFinished';
  readonly from: ActorRef<CopyFinished>;
}

export interface Terminate {
  readonly type: 'Terminate';
}

export type NodeMessage = Operation | OperationReply | CopyTo | CopyFinished | Terminate;
export type TreeSetMessage = Operation | GC | CopyFinished | Terminate;

export const gc: GC = { type: 'GC' };
export const terminate: Terminate = { type: 'Terminate' };

export function insert(requester: ActorRef<OperationReply>, id: number, elem: number): Insert {
  return { type: 'Insert', requester, id, elem };
}

export function contains(requester: ActorRef<OperationReply>, id: number, elem: number): Contains {
  return { type: 'Contains', requester, id, elem };
}

export function remove(requester: ActorRef<OperationReply>, id: number, elem: number): Remove {
  return { type: 'Remove', requester, id, elem };
}

export function operationFinished(id: number): OperationFinished {
  return { type: 'OperationFinished', id };
}

export function containsResult(id: number, result: boolean): ContainsResult {
  return { type: 'ContainsResult', id, result };
}

export function isOperation(message: { readonly type: string }): message is Operation {
  return message.type === 'Insert' || message.type === 'Contains' || message.type === 'Remove';
}
