import { describe, test, expect } from 'vitest';
import { ActorSystem, type ActorRef } from './actor';
import type { OperationsDuringGC } from './config';
import { createTreeSet } from './tree-set';
import { contains, gc, insert, remove, terminate, type OperationReply, type TreeSetMessage } from './types';

function createSystem() {
  const ignore = () => {};
  return new ActorSystem('tree-set', {
    throughput: 16,
    supervision: 'stop',
    logLevel: 'silent',
    logSink: { error: ignore, warn: ignore, info: ignore, debug: ignore },
  });
}

// Deterministic PRNG so failures reproduce
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6D2B79F5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function setup(operationsDuringGC: OperationsDuringGC = 'forward') {
  const system = createSystem();
  const replies: OperationReply[] = [];
  const requester = system.spawn<OperationReply>('requester', () => ({ receive: reply => { replies.push(reply); } }));
  const set = createTreeSet(system, { operationsDuringGC });
  let nextId = 1_000_000;
  return {
    system,
    replies,
    requester,
    set,
    async membership(values: number[]): Promise<boolean[]> {
      const ids = values.map(v => {
        const id = nextId++;
        set.tell(contains(requester, id, v));
        return id;
      });
      await system.idle();
      return ids.map(id => {
        const reply = replies.find(r => r.id === id);
        return reply !== undefined && reply.type === 'ContainsResult' && reply.result;
      });
    },
  };
}

function sortedById(replies: OperationReply[]): OperationReply[] {
  return [...replies].sort((a, b) => a.id - b.id);
}

async function fill(system: ActorSystem, set: ActorRef<TreeSetMessage>, requester: ActorRef<OperationReply>, values: number[]) {
  values.forEach((v, i) => set.tell(insert(requester, i, v)));
  await system.idle();
}

describe('TreeSetCoordinator', () => {
  test('insert, contains and remove scenario', async () => {
    const { system, replies, requester, set } = setup();
    set.tell(insert(requester, 1, 5));
    set.tell(insert(requester, 2, 3));
    set.tell(insert(requester, 3, 8));
    set.tell(contains(requester, 4, 3));
    set.tell(remove(requester, 5, 3));
    set.tell(contains(requester, 6, 3));
    set.tell(contains(requester, 7, 5));
    set.tell(contains(requester, 8, 8));
    await system.idle();
    expect(sortedById(replies)).toEqual([
      { type: 'OperationFinished', id: 1 },
      { type: 'OperationFinished', id: 2 },
      { type: 'OperationFinished', id: 3 },
      { type: 'ContainsResult', id: 4, result: true },
      { type: 'OperationFinished', id: 5 },
      { type: 'ContainsResult', id: 6, result: false },
      { type: 'ContainsResult', id: 7, result: true },
      { type: 'ContainsResult', id: 8, result: true },
    ]);
  });

  test('every operation gets exactly one reply with its id', async () => {
    const { system, replies, requester, set } = setup();
    const random = mulberry32(7);
    const count = 300;
    for (let id = 0; id < count; id++) {
      const elem = Math.floor(random() * 50) - 25;
      const pick = random();
      set.tell(pick < 0.4 ? insert(requester, id, elem) : pick < 0.7 ? remove(requester, id, elem) : contains(requester, id, elem));
      if (id === 150) set.tell(gc);
    }
    await system.idle();
    expect(replies.map(r => r.id).sort((a, b) => a - b)).toEqual(Array.from({ length: count }, (_, i) => i));
  });

  test('repeated inserts are idempotent', async () => {
    const { system, requester, set, membership } = setup();
    await fill(system, set, requester, [4, 4, 4]);
    expect(system.liveActors).toBe(4);
    expect(await membership([4])).toEqual([true]);
    set.tell(remove(requester, 10, 4));
    await system.idle();
    expect(await membership([4])).toEqual([false]);
  });

  test('the sentinel value behaves like any other element', async () => {
    const { system, requester, set, membership } = setup();
    expect(await membership([0])).toEqual([false]);
    await fill(system, set, requester, [0]);
    expect(await membership([0])).toEqual([true]);
    set.tell(gc);
    await system.idle();
    expect(await membership([0])).toEqual([true]);
    set.tell(remove(requester, 10, 0));
    await system.idle();
    expect(await membership([0])).toEqual([false]);
  });

  test('GC keeps membership and drops tombstoned nodes', async () => {
    const { system, requester, set, membership } = setup();
    const values = [50, 20, 80, 10, 30, 70, 90, 25, 85];
    await fill(system, set, requester, values);
    [20, 90, 25].forEach((v, i) => set.tell(remove(requester, 100 + i, v)));
    await system.idle();
    const before = await membership(values);
    expect(system.liveActors).toBe(3 + values.length);

    set.tell(gc);
    await system.idle();
    expect(await membership(values)).toEqual(before);
    expect(before).toEqual([true, false, true, true, true, true, false, false, true]);
    // requester, coordinator, new root and the six live elements
    expect(system.liveActors).toBe(9);
    expect(system.deadLetters).toBe(0);
  });

  test('a second GC trigger during collection is ignored', async () => {
    const { system, requester, set, membership } = setup();
    await fill(system, set, requester, [1, 2, 3]);
    set.tell(gc);
    set.tell(gc);
    await system.idle();
    expect(system.liveActors).toBe(6);
    expect(await membership([1, 2, 3])).toEqual([true, true, true]);
  });

  test('operations queued during GC are replayed on the new tree', async () => {
    const { system, replies, requester, set, membership } = setup('queue');
    await fill(system, set, requester, [1, 2, 3, 4, 5]);
    set.tell(remove(requester, 10, 2));
    await system.idle();

    set.tell(gc);
    set.tell(insert(requester, 11, 10));
    set.tell(remove(requester, 12, 4));
    set.tell(contains(requester, 13, 10));
    await system.idle();

    expect(sortedById(replies).filter(r => r.id > 10)).toEqual([
      { type: 'OperationFinished', id: 11 },
      { type: 'OperationFinished', id: 12 },
      { type: 'ContainsResult', id: 13, result: true },
    ]);
    expect(await membership([1, 2, 3, 4, 5, 10])).toEqual([true, false, true, false, true, true]);
    // requester, coordinator, new root, 1, 3, 4 (tombstoned after the copy), 5, 10
    expect(system.liveActors).toBe(8);
  });

  test('under forward, an insert that reaches an old node after its copy is lost', async () => {
    const { system, replies, requester, set, membership } = setup();
    await fill(system, set, requester, [1]);

    set.tell(gc);
    set.tell(insert(requester, 11, 205));
    await system.idle();

    // acknowledged by node 1 of the old tree, which had already been copied
    expect(replies.filter(r => r.id === 11)).toEqual([{ type: 'OperationFinished', id: 11 }]);
    expect(await membership([1, 205])).toEqual([true, false]);
    // requester, coordinator, new root and 1
    expect(system.liveActors).toBe(4);
  });

  test('random workload matches a reference set across GC', async () => {
    const { system, requester, set, membership } = setup();
    const random = mulberry32(42);
    const reference = new Set<number>();
    const values = Array.from({ length: 400 }, () => Math.floor(random() * 2000) - 1000);
    values.forEach((v, i) => {
      set.tell(insert(requester, i, v));
      reference.add(v);
    });
    await system.idle();
    values.forEach((v, i) => {
      if (random() < 0.4) {
        set.tell(remove(requester, 1000 + i, v));
        reference.delete(v);
      }
    });
    await system.idle();

    set.tell(gc);
    const duringGC = membership(values);
    const expected = values.map(v => reference.has(v));
    expect(await duringGC).toEqual(expected);
    await system.idle();
    expect(await membership(values)).toEqual(expected);
    // 0 lives in the root itself
    const nodes = reference.size - (reference.has(0) ? 1 : 0);
    expect(system.liveActors).toBe(3 + nodes);
  });

  test('terminate shuts down the coordinator and its tree', async () => {
    const { system, requester, set } = setup();
    await fill(system, set, requester, [3, 1, 4, 5, 9]);
    set.tell(terminate);
    await system.idle();
    expect(set.isStopped).toBe(true);
    expect(system.liveActors).toBe(1);
  });
});
