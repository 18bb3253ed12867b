import { Constructor, DIKey } from '@/model/DIKey';
import type { Functoid } from '@/core/Functoid';

/**
 * Lifetime policy of a binding's instances
 */
export enum Scope {
  /** A new instance per resolution */
  Unscoped = 'Unscoped',
  /** One instance per injector */
  Singleton = 'Singleton',
}

/**
 * Types of bindings supported by the registry
 */
export enum BindingKind {
  Instance = 'Instance',
  Class = 'Class',
  Factory = 'Factory',
  Alias = 'Alias',
  Set = 'Set',
}

/**
 * Base interface for all binding types
 */
export interface Binding<T = unknown> {
  readonly key: DIKey<T>;
  readonly kind: BindingKind;
  readonly scope: Scope;
  /** Singleton created as soon as the injector is */
  readonly eager: boolean;
}

/**
 * Binding that provides a pre-existing instance
 */
export interface InstanceBinding<T = unknown> extends Binding<T> {
  readonly kind: BindingKind.Instance;
  readonly instance: T;
}

/**
 * Binding that instantiates a class using its constructor
 */
export interface ClassBinding<T = unknown> extends Binding<T> {
  readonly kind: BindingKind.Class;
  readonly implementation: Constructor<T & object>;
}

/**
 * Binding that uses a factory function (Functoid) to create instances
 */
export interface FactoryBinding<T = unknown> extends Binding<T> {
  readonly kind: BindingKind.Factory;
  readonly factory: Functoid<T>;
}

/**
 * Binding that links its key to another key
 */
export interface AliasBinding<T = unknown> extends Binding<T> {
  readonly kind: BindingKind.Alias;
  readonly target: DIKey<T>;
}

/**
 * Aggregate binding of a multibound set.
 * Each element is bound on its own under the listed keys, in contribution order.
 */
export interface SetBinding<T = unknown> extends Binding<Set<T>> {
  readonly kind: BindingKind.Set;
  readonly elements: readonly DIKey<T>[];
}

/**
 * Union type of all binding types
 */
export type AnyBinding =
  | InstanceBinding
  | ClassBinding
  | FactoryBinding
  | AliasBinding
  | SetBinding;

/**
 * Bindings that can be contributed to a set
 */
export type ElementBinding = InstanceBinding | ClassBinding | FactoryBinding | AliasBinding;

export interface BindingOptions {
  scope?: Scope;
  eager?: boolean;
}

/**
 * Helper functions to create bindings
 */
export const Bindings = {
  instance<T>(key: DIKey<T>, instance: T, options: BindingOptions = {}): InstanceBinding<T> {
    return {
      key,
      kind: BindingKind.Instance,
      scope: options.scope ?? Scope.Unscoped,
      eager: false,
      instance,
    };
  },

  class<T>(key: DIKey<T>, implementation: Constructor<T & object>, options: BindingOptions = {}): ClassBinding<T> {
    return {
      key,
      kind: BindingKind.Class,
      scope: options.scope ?? Scope.Unscoped,
      eager: options.eager ?? false,
      implementation,
    };
  },

  factory<T>(key: DIKey<T>, factory: Functoid<T>, options: BindingOptions = {}): FactoryBinding<T> {
    return {
      key,
      kind: BindingKind.Factory,
      scope: options.scope ?? Scope.Unscoped,
      eager: options.eager ?? false,
      factory,
    };
  },

  alias<T>(key: DIKey<T>, target: DIKey<T>, options: BindingOptions = {}): AliasBinding<T> {
    return {
      key,
      kind: BindingKind.Alias,
      scope: options.scope ?? Scope.Unscoped,
      eager: options.eager ?? false,
      target,
    };
  },

  set<T>(key: DIKey<Set<T>>, elements: readonly DIKey<T>[], scope: Scope = Scope.Unscoped): SetBinding<T> {
    return {
      key,
      kind: BindingKind.Set,
      scope,
      eager: false,
      elements,
    };
  },
};
