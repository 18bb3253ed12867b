import { DIKey } from '@/model/DIKey';
import { AnyBinding, BindingKind, Bindings, ElementBinding, Scope, SetBinding } from '@/model/Binding';
import type { TypeMatcher } from '@/model/Matcher';
import type { TypeListener } from '@/core/TypeObservation';
import { DuplicateBindingError, RegistryFrozenError } from '@/core/Errors';

/**
 * A type listener together with the matcher selecting the classes it hears
 */
export interface ListenerBinding {
  readonly matcher: TypeMatcher;
  readonly listener: TypeListener;
}

/**
 * Mapping from DIKey to Binding.
 * Append-only while modules are composed, read-only once frozen.
 *
 * At most one binding is held per key, except for set keys: those map to an
 * aggregate SetBinding listing the element keys contributed so far.
 */
export class BindingRegistry {
  private readonly bindingsByKey = new Map<string, AnyBinding>();
  private readonly listenerBindings: ListenerBinding[] = [];
  private frozen = false;

  constructor(private readonly parent?: BindingRegistry) {}

  /**
   * Register a binding under its key
   * @throws DuplicateBindingError if the key is already bound here or in a parent registry
   * @throws RegistryFrozenError after freeze()
   */
  register(binding: AnyBinding): void {
    this.ensureMutable(binding.key);
    this.ensureUnbound(binding.key);
    this.bindingsByKey.set(binding.key.toMapKey(), binding);
  }

  /**
   * Register an element binding and append its key to the aggregate set binding of setKey,
   * creating the aggregate when absent. Elements keep registration order.
   */
  registerMultiElement(setKey: DIKey<Set<unknown>>, element: ElementBinding): void {
    this.ensureMutable(setKey);
    const aggregate = this.aggregateFor(setKey);
    this.register(element);
    this.bindingsByKey.set(
      setKey.toMapKey(),
      Bindings.set(setKey, [...aggregate.elements, element.key], aggregate.scope),
    );
  }

  /**
   * Declare a set binding, so that it resolves even without elements.
   * A singleton declaration makes the whole aggregate singleton.
   */
  declareSet(setKey: DIKey<Set<unknown>>, scope: Scope = Scope.Unscoped): void {
    this.ensureMutable(setKey);
    const aggregate = this.aggregateFor(setKey);
    const merged = aggregate.scope === Scope.Singleton ? Scope.Singleton : scope;
    this.bindingsByKey.set(setKey.toMapKey(), Bindings.set(setKey, aggregate.elements, merged));
  }

  registerListener(listener: ListenerBinding): void {
    this.ensureMutable();
    this.listenerBindings.push(listener);
  }

  /**
   * Find the binding for a key, looking into the parent registry when not bound here
   */
  lookup(key: DIKey<unknown>): AnyBinding | undefined {
    return this.bindingsByKey.get(key.toMapKey()) ?? this.parent?.lookup(key);
  }

  /**
   * Whether the key is bound in this registry itself (not in a parent)
   */
  isLocal(key: DIKey<unknown>): boolean {
    return this.bindingsByKey.has(key.toMapKey());
  }

  keys(): DIKey[] {
    return Array.from(this.bindingsByKey.values(), binding => binding.key);
  }

  bindings(): readonly AnyBinding[] {
    return Array.from(this.bindingsByKey.values());
  }

  listeners(): readonly ListenerBinding[] {
    return this.listenerBindings;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  size(): number {
    return this.bindingsByKey.size;
  }

  private aggregateFor(setKey: DIKey<Set<unknown>>): SetBinding {
    const existing = this.bindingsByKey.get(setKey.toMapKey());
    if (existing === undefined) {
      if (this.parent?.lookup(setKey) !== undefined) {
        throw new DuplicateBindingError(setKey, true);
      }
      return Bindings.set(setKey, []);
    }
    if (existing.kind !== BindingKind.Set) {
      throw new DuplicateBindingError(setKey);
    }
    return existing;
  }

  private ensureUnbound(key: DIKey<unknown>): void {
    if (this.bindingsByKey.has(key.toMapKey())) {
      throw new DuplicateBindingError(key);
    }
    if (this.parent?.lookup(key) !== undefined) {
      throw new DuplicateBindingError(key, true);
    }
  }

  private ensureMutable(key?: DIKey<unknown>): void {
    if (this.frozen) {
      throw new RegistryFrozenError(key);
    }
  }
}
