import { Set as ImmutableSet } from 'immutable';
import { TreeSetClient } from './tree-set-client';

async function bench(fn: () => Promise<void>, iterations: number): Promise<number> {
  for (let i = 0; i < Math.min(3, iterations); i++) await fn();
  const start = performance.now();
  for (let i = 0; i < iterations; i++) await fn();
  return (performance.now() - start) / iterations;
}

function benchSync(fn: () => void, iterations: number): number {
  for (let i = 0; i < Math.min(50, iterations); i++) fn();
  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  return (performance.now() - start) / iterations;
}

function printRow(op: string, actorMs: number, immMs: number, nativeMs: number) {
  const vs = (other: number) => actorMs < other ? `${(other / actorMs).toFixed(2)}x faster` : `${(actorMs / other).toFixed(2)}x slower`;
  console.log(`${op.padEnd(12)} │ ${actorMs.toFixed(4).padStart(10)} │ ${immMs.toFixed(4).padStart(8)} │ ${vs(immMs).padEnd(16)} │ ${nativeMs.toFixed(4).padStart(8)} │ ${vs(nativeMs)}`);
}

function header() {
  console.log('Operation     │ Actor (ms) │ Imm (ms) │ vs Imm           │ Nat (ms) │ vs Native');
  console.log('──────────────┼────────────┼──────────┼──────────────────┼──────────┼──────────');
}

function shuffled(n: number): number[] {
  const values = Array.from({ length: n }, (_, i) => i + 1);
  for (let i = values.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    [values[i], values[j]] = [values[j], values[i]];
  }
  return values;
}

async function filled(values: number[]): Promise<TreeSetClient> {
  const client = TreeSetClient.create({ logLevel: 'error' });
  await Promise.all(values.map(v => client.insert(v)));
  return client;
}

async function benchTreeSet() {
  console.log(`\n${'='.repeat(60)}`);
  console.log(`Actor tree set vs Immutable.Set vs Native Set`);
  console.log(`${'='.repeat(60)}`);

  for (const N of [100, 1000, 5000]) {
    const iterations = Math.max(5, Math.floor(20000 / N));
    const values = shuffled(N);

    console.log(`\n--- N=${N} (${iterations} iterations) ---`);
    header();

    printRow('insert',
      await bench(async () => { const c = await filled(values); await c.close(); }, iterations),
      benchSync(() => { let s = ImmutableSet<number>(); for (const v of values) s = s.add(v); }, iterations),
      benchSync(() => { const s = new Set<number>(); for (const v of values) s.add(v); }, iterations));

    const client = await filled(values);
    const imm = ImmutableSet<number>(values);
    const nat = new Set<number>(values);

    printRow('contains',
      await bench(async () => { await Promise.all(values.map(v => client.contains(v))); }, iterations),
      benchSync(() => { for (const v of values) imm.has(v); }, iterations),
      benchSync(() => { for (const v of values) nat.has(v); }, iterations));

    printRow('remove+ins',
      await bench(async () => {
        await Promise.all(values.map(v => client.remove(v)));
        await Promise.all(values.map(v => client.insert(v)));
      }, iterations),
      benchSync(() => { let s = imm; for (const v of values) s = s.delete(v); for (const v of values) s = s.add(v); }, iterations),
      benchSync(() => { const s = new Set(nat); for (const v of values) s.delete(v); for (const v of values) s.add(v); }, iterations));
    await client.close();

    const half = values.slice(0, N >> 1);
    const gcMs = await bench(async () => {
      const c = await filled(values);
      await Promise.all(half.map(v => c.remove(v)));
      c.gc();
      await c.system.idle();
      await c.close();
    }, iterations);
    console.log(`${'gc (fill+)'.padEnd(12)} │ ${gcMs.toFixed(4).padStart(10)} │ ${'-'.padStart(8)} │ ${'-'.padEnd(16)} │ ${'-'.padStart(8)} │ -`);
  }
}

async function main() {
  await benchTreeSet();
  console.log(`\n${'='.repeat(60)}`);
  console.log(`Actor tree set trades raw speed for per-node concurrency`);
  console.log(`and compaction that never blocks client operations.`);
  console.log(`${'='.repeat(60)}`);
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
