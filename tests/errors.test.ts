import { describe, it, expect } from 'vitest';
import {
  ApplyReflection,
  AsyncProvisionError,
  ConfigurationError,
  DIKey,
  DuplicateBindingError,
  InjectionError,
  Injector,
  InjectorClosedError,
  MissingBindingError,
  ModuleDef,
  RegistryFrozenError,
  Scope,
  Bindings,
  Composer,
} from '../src';

class Config {
  constructor(public readonly value: string = 'default') {}
}

class Unreflected {
  constructor(public readonly config: Config) {}
}

class Pair {
  constructor(public readonly first: Config, public readonly second?: Config) {}
}

let attempts = 0;

class Flaky {
  constructor() {
    attempts++;
    if (attempts === 1) {
      throw new Error('boom');
    }
  }
}

describe('Error handling', () => {
  it('should derive every error from InjectionError and name it after its class', () => {
    const error = new MissingBindingError(DIKey.of(Config));

    expect(error).toBeInstanceOf(InjectionError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MissingBindingError');
    expect(new DuplicateBindingError(DIKey.of(Config), true).message).toBe(
      'A binding for Config already exists in the parent injector',
    );
  });

  it('should reject constructors with parameters but no declared dependencies', () => {
    const module = new ModuleDef()
      .make(Config).from().type(Config)
      .make(Unreflected).from().type(Unreflected);

    const injector = Injector.create([module]);

    expect(() => injector.getInstance(Unreflected)).toThrow(ConfigurationError);
    expect(() => injector.getInstance(Unreflected)).toThrow(
      'Cannot construct Unreflected: its constructor takes 1 parameter(s) but declares no dependencies',
    );
  });

  it('should check the parameter count of ApplyReflection', () => {
    expect(() => ApplyReflection(Pair, Config)).toThrow(
      'ApplyReflection: Parameter count mismatch for Pair. Expected 2 types, got 1.',
    );
  });

  it('should propagate constructor errors unchanged and cache nothing', () => {
    attempts = 0;
    const module = new ModuleDef().make(Flaky).in(Scope.Singleton).from().type(Flaky);
    const injector = Injector.create([module]);

    expect(() => injector.getInstance(Flaky)).toThrow('boom');

    const flaky = injector.getInstance(Flaky);
    expect(injector.getInstance(Flaky)).toBe(flaky);
    expect(attempts).toBe(2);
  });

  it('should refuse async factories in synchronous resolution', () => {
    const module = new ModuleDef()
      .make(Config).from().factory(async () => new Config('async'));

    const injector = Injector.create([module]);

    expect(() => injector.getInstance(Config)).toThrow(AsyncProvisionError);
    expect(() => injector.getInstance(Config)).toThrow(
      'The factory for Config returned a promise. Use getInstanceAsync() to resolve bindings with async factories.',
    );
  });

  it('should refuse promise-returning factories in synchronous resolution', () => {
    const module = new ModuleDef()
      .make(Config).from().factory(() => Promise.resolve(new Config('later')));

    const injector = Injector.create([module], { logger: { debug: () => undefined, warn: () => undefined } });

    expect(() => injector.getInstance(Config)).toThrow(AsyncProvisionError);
  });

  it('should refuse resolution after close()', async () => {
    const module = new ModuleDef().make(Config).from().type(Config);
    const injector = Injector.create([module]);

    await injector.close();

    expect(injector.isClosed()).toBe(true);
    expect(() => injector.getInstance(Config)).toThrow(InjectorClosedError);
    await expect(injector.getInstanceAsync(Config)).rejects.toThrow(
      'Cannot resolve Config: the injector has been closed',
    );
  });

  it('should refuse registry mutation after composition', () => {
    const registry = new Composer().compose([new ModuleDef().make(Config).from().type(Config)]);

    expect(() => registry.register(Bindings.instance(DIKey.named(Config, 'late'), new Config()))).toThrow(
      RegistryFrozenError,
    );
    expect(() => registry.register(Bindings.instance(DIKey.named(Config, 'late'), new Config()))).toThrow(
      'Cannot register Config@Id("late"): the binding registry is frozen',
    );
  });
});
