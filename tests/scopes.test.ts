import { describe, it, expect, vi } from 'vitest';
import { DIKey, Injector, ModuleDef, Reflected, Scope, Singleton } from '../src';

let created: string[] = [];

@Singleton()
class Registry {
  constructor() {
    created.push('Registry');
  }
}

class Cache {
  constructor() {
    created.push('Cache');
  }
}

@Reflected(Cache)
class Warmup {
  constructor(public readonly cache: Cache) {
    created.push('Warmup');
  }
}

describe('Scopes', () => {
  it('should honor @Singleton() when the binding declares no scope', () => {
    const module = new ModuleDef().make(Registry).from().type(Registry);
    const injector = Injector.create([module]);

    expect(injector.getInstance(Registry)).toBe(injector.getInstance(Registry));
  });

  it('should let the binding scope override @Singleton()', () => {
    const module = new ModuleDef().make(Registry).in(Scope.Unscoped).from().type(Registry);
    const injector = Injector.create([module]);

    expect(injector.getInstance(Registry)).not.toBe(injector.getInstance(Registry));
  });

  it('should keep one singleton per injector', () => {
    const module = new ModuleDef().make(Cache).in(Scope.Singleton).from().type(Cache);

    const first = Injector.create([module]);
    const second = Injector.create([module]);

    expect(first.getInstance(Cache)).not.toBe(second.getInstance(Cache));
  });

  it('should build nothing before it is requested', () => {
    created = [];
    const module = new ModuleDef()
      .make(Cache).in(Scope.Singleton).from().type(Cache)
      .make(Registry).from().type(Registry);

    const injector = Injector.create([module]);
    expect(created).toEqual([]);

    injector.getInstance(Registry);
    expect(created).toEqual(['Registry']);
  });

  it('should instantiate eager singletons with the injector, in registration order', () => {
    created = [];
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const module = new ModuleDef()
      .make(Warmup).asEagerSingleton().from().type(Warmup)
      .make(Cache).in(Scope.Singleton).from().type(Cache)
      .make(Registry).asEagerSingleton().from().type(Registry);

    const injector = Injector.create([module], { logger });

    expect(created).toEqual(['Cache', 'Warmup', 'Registry']);
    expect(injector.getInstance(Warmup).cache).toBe(injector.getInstance(Cache));
    expect(created).toEqual(['Cache', 'Warmup', 'Registry']);
    expect(logger.debug).toHaveBeenCalledWith('Instantiating eager singleton Warmup');
  });

  it('should drop eagerness when a later scope is not singleton', () => {
    created = [];
    const module = new ModuleDef()
      .make(Cache).asEagerSingleton().in(Scope.Unscoped).from().type(Cache)
      .make(Warmup).asEagerSingleton().in(Scope.Singleton).from().type(Warmup);

    const injector = Injector.create([module]);

    expect(created).toEqual(['Cache', 'Warmup']);
    expect(injector.getBinding(Cache)?.eager).toBe(false);
    expect(injector.getBinding(Warmup)?.eager).toBe(true);
  });

  it('should cache singleton aliases separately from their targets', () => {
    const module = new ModuleDef()
      .make(Cache).from().type(Cache)
      .make(Cache).named('shared').in(Scope.Singleton).from().alias(Cache);

    const injector = Injector.create([module]);

    const shared = injector.getInstance(DIKey.named(Cache, 'shared'));

    expect(shared).toBeInstanceOf(Cache);
    expect(injector.getInstance(DIKey.named(Cache, 'shared'))).toBe(shared);
    expect(injector.getInstance(Cache)).not.toBe(shared);
  });
});
