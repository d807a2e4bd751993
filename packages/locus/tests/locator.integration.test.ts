import { describe, expect, it, vi } from 'vitest';

import {
  BindingGroup,
  HostBinding,
  Location,
  NotFoundError,
  NotRegisteredError,
  Observer,
  Registry,
  TreeScope,
  groupEntry,
} from '../src/index.js';
import { MemoryTree, type MemoryNode } from './support/memory-tree.js';
import { Counter, Model, Settings } from './support/models.js';

describe('locator integration', () => {
  it('mounts a page, serves consumers from both locations and cleans up on unmount', () => {
    const tree = new MemoryTree();
    const registry = new Registry({ name: 'app' });
    const scope = new TreeScope<MemoryNode>(tree, registry);
    const host = new HostBinding(scope);
    const group = new BindingGroup(registry);

    const app = tree.root('app');
    const page = tree.child(app, 'page');
    const header = tree.child(page, 'header');
    const body = tree.child(page, 'body');

    const services = [groupEntry(Settings, { useValue: new Settings('dark') })];
    group.mount('app-services', services);
    host.onMount(page, { type: Model, provider: { useFactory: () => new Model('page') } });
    host.onMount(page, {
      type: Counter,
      provider: { useFactory: () => new Counter() },
      location: Location.Registry,
      name: 'visits',
    });

    const observer = new Observer({ registry, scope });
    const onVisit = vi.fn();
    const visits = observer.listenTo(Counter, { name: 'visits', listener: onVisit });
    const model = scope.resolveReactive(header, Model);
    expect(observer.get(Model, { from: body })).toBe(model);
    expect(observer.get(Settings).theme).toBe('dark');

    visits.increment();
    model.touch();

    expect(onVisit).toHaveBeenCalledTimes(1);
    expect(tree.updates).toEqual(['page', 'page', 'header']);

    observer.register(body, Model);
    expect(registry.get(Model)).toBe(model);

    observer.cancelSubscriptions();
    host.onUnmount(page);
    group.unmount('app-services', services);

    expect(registry.size).toBe(0);
    expect(visits.isDisposed).toBe(true);
    expect(model.isDisposed).toBe(true);
    expect(() => registry.get(Counter, { name: 'visits' })).toThrow(NotRegisteredError);
    expect(() => scope.resolveNonReactive(header, Model)).toThrow(NotFoundError);
  });
});
