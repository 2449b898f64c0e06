import { isLogLevel, type LogLevel, type LogSink } from './log';

/**
 * What the coordinator does with client operations while a GC cycle runs:
 * `forward` keeps sending them to the old tree, `queue` holds them back and
 * replays them against the new tree once the root has been swapped.
 */
export type OperationsDuringGC = 'forward' | 'queue';

/** Applied when an actor's behavior throws. */
export type SupervisionPolicy = 'stop' | 'resume';

export interface AutoGCOptions {
  enabled: boolean;
  /** Number of removes issued through a client between two GC triggers. */
  removeThreshold: number;
}

export interface TreeSetOptions {
  operationsDuringGC: OperationsDuringGC;
  supervision: SupervisionPolicy;
  /** Messages an actor handles before yielding to other actors. */
  throughput: number;
  logLevel: LogLevel;
  logSink: LogSink;
  autoGC: AutoGCOptions;
}

export type TreeSetConfig = Partial<Omit<TreeSetOptions, 'autoGC'>> & { autoGC?: Partial<AutoGCOptions> };

export const LOG_LEVEL_ENV = 'ACTOR_TREE_SET_LOG_LEVEL';

function builtinDefaults(): TreeSetOptions {
  const envLevel = process.env[LOG_LEVEL_ENV];
  return {
    operationsDuringGC: 'forward',
    supervision: 'stop',
    throughput: 16,
    logLevel: isLogLevel(envLevel) ? envLevel : 'warn',
    logSink: console,
    autoGC: { enabled: false, removeThreshold: 1000 },
  };
}

let defaults = builtinDefaults();

function checkPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) throw new RangeError(`${name} must be a positive integer, got ${value}`);
}

function merge(base: TreeSetOptions, config: TreeSetConfig): TreeSetOptions {
  const { autoGC, ...rest } = config;
  const merged: TreeSetOptions = { ...base, ...rest, autoGC: { ...base.autoGC, ...autoGC } };
  checkPositiveInteger('throughput', merged.throughput);
  checkPositiveInteger('autoGC.removeThreshold', merged.autoGC.removeThreshold);
  return merged;
}

export function configureTreeSet(config: TreeSetConfig): void {
  defaults = merge(defaults, config);
}

export function configureAutoGC(options: Partial<AutoGCOptions>): void {
  defaults = merge(defaults, { autoGC: options });
}

export function resetConfig(): void {
  defaults = builtinDefaults();
}

export function resolveOptions(config: TreeSetConfig = {}): TreeSetOptions {
  return merge(defaults, config);
}
