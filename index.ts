/**
 * Concurrent integer set backed by a binary search tree of actors
 */
export { ActorSystem } from './actor';
export type { Actor, ActorContext, ActorFactory, ActorRef, ActorSystemOptions } from './actor';
export { configureAutoGC, configureTreeSet, resetConfig, resolveOptions, LOG_LEVEL_ENV } from './config';
export type { AutoGCOptions, OperationsDuringGC, SupervisionPolicy, TreeSetConfig, TreeSetOptions } from './config';
export { createLogger } from './log';
export type { LogLevel, LogSink, Logger } from './log';
export { TreeNode, treeNode } from './tree-node';
export { TreeSetCoordinator, createTreeSet, SENTINEL_ELEM } from './tree-set';
export { TreeSetClient, TreeSetClosedError } from './tree-set-client';
export type { TreeSetStats } from './tree-set-client';
export * from './types';
