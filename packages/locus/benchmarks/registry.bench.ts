/**
 * Locator Lookup Performance Benchmark
 *
 * Compares the two placement modes on the hot path.
 *
 * Scenarios:
 * 1. Registry get of a built entry
 * 2. Registry get through a name filter
 * 3. Tree lookup from a shallow and a deep position
 * 4. Register + unregister churn
 * 5. Mount + unmount of a binding through HostBinding
 */

import { Bench } from 'tinybench';

import { Registry } from '../src/core/registry.js';
import { TreeScope, type TreeHost } from '../src/core/tree-scope.js';
import { ChangeNotifier } from '../src/core/observable.js';
import { HostBinding } from '../src/host/host-binding.js';

// ==================== Setup ====================

interface Node {
  readonly parent: Node | null;
}

class Counter extends ChangeNotifier {
  count = 0;
}

class Settings {
  theme = 'light';
}

const host: TreeHost<Node> = {
  parentOf: (node) => node.parent,
  scheduleUpdate: () => undefined,
};

const registry = new Registry({ name: 'bench' });
const scope = new TreeScope<Node>(host, registry);
const binding = new HostBinding(scope);

registry.register(Counter, { useValue: new Counter() });
for (let i = 0; i < 10; i++) {
  registry.register(Settings, { useValue: new Settings() }, { name: `page-${i}` });
}

const root: Node = { parent: null };
scope.bind(root, Counter, { useFactory: () => new Counter() });

const shallow: Node = { parent: root };
let deep: Node = shallow;
for (let i = 0; i < 50; i++) deep = { parent: deep };

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('registry: get', () => {
  const counter = registry.get(Counter);
  if (counter.count !== 0) throw new Error('Invalid');
});

bench.add('registry: get with filter (10 names)', () => {
  const settings = registry.get(Settings, { filter: (names) => names[names.length - 1] });
  if (settings.theme !== 'light') throw new Error('Invalid');
});

bench.add('tree: non-reactive, depth 1', () => {
  const counter = scope.resolveNonReactive(shallow, Counter);
  if (counter.count !== 0) throw new Error('Invalid');
});

bench.add('tree: non-reactive, depth 51', () => {
  const counter = scope.resolveNonReactive(deep, Counter);
  if (counter.count !== 0) throw new Error('Invalid');
});

bench.add('registry: register + unregister', () => {
  registry.register(Settings, { useFactory: () => new Settings() }, { name: 'churn' });
  registry.unregister(Settings, { name: 'churn' });
});

bench.add('host: mount + resolve + unmount', () => {
  const node: Node = { parent: root };
  const child: Node = { parent: node };
  binding.onMount(node, { type: Counter, provider: { useFactory: () => new Counter() } });
  scope.resolveReactive(child, Counter);
  binding.onUnmount(child);
  binding.onUnmount(node);
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Locator Lookup Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.hz
      ? task.result.hz.toLocaleString('en-US', { maximumFractionDigits: 0 })
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
  }))
);

const shallowTask = bench.tasks.find((t) => t.name === 'tree: non-reactive, depth 1');
const deepTask = bench.tasks.find((t) => t.name === 'tree: non-reactive, depth 51');

if (shallowTask?.result?.period && deepTask?.result?.period) {
  const perLevel = ((deepTask.result.period - shallowTask.result.period) / 50) * 1_000_000;
  console.log(`\nTree walk cost per level: ${perLevel.toFixed(2)}ns`);
}
