import type { DIKey } from '@/model/DIKey';

/**
 * Base class of every error raised by the container
 */
export class InjectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateBindingError extends InjectionError {
  constructor(
    public readonly key: DIKey,
    public readonly inParent = false,
  ) {
    super(
      inParent
        ? `A binding for ${key.toString()} already exists in the parent injector`
        : `A binding for ${key.toString()} was already configured`,
    );
  }
}

export class MissingBindingError extends InjectionError {
  constructor(
    public readonly key: DIKey,
    public readonly requiredBy?: DIKey,
  ) {
    const msg = requiredBy
      ? `Missing binding for ${key.toString()}, required by ${requiredBy.toString()}`
      : `Missing binding for ${key.toString()}`;
    super(msg);
  }
}

export class CircularDependencyError extends InjectionError {
  constructor(public readonly cycle: readonly DIKey[]) {
    const cycleStr = cycle.map(k => k.toString()).join(' -> ');
    super(`Circular dependency detected: ${cycleStr}`);
  }
}

export class DuplicateElementError extends InjectionError {
  constructor(
    public readonly setKey: DIKey,
    public readonly firstIndex: number,
    public readonly index: number,
  ) {
    super(
      `${setKey.toString()} received the same element twice: ` +
      `contribution ${index + 1} resolved to the value of contribution ${firstIndex + 1}`,
    );
  }
}

export class RegistryFrozenError extends InjectionError {
  constructor(public readonly key?: DIKey) {
    super(
      key
        ? `Cannot register ${key.toString()}: the binding registry is frozen`
        : 'The binding registry is frozen',
    );
  }
}

/**
 * Invalid declarations: missing constructor metadata, token count mismatch, unfinished bindings
 */
export class ConfigurationError extends InjectionError {}

export class AsyncProvisionError extends InjectionError {
  constructor(public readonly key: DIKey) {
    super(
      `The factory for ${key.toString()} returned a promise. ` +
      `Use getInstanceAsync() to resolve bindings with async factories.`,
    );
  }
}

export class InjectorClosedError extends InjectionError {
  constructor(public readonly key: DIKey) {
    super(`Cannot resolve ${key.toString()}: the injector has been closed`);
  }
}
