import { Callable, DIKey, Target, toKey } from '@/model/DIKey';

/**
 * A lazily evaluated handle to an instance.
 * Each call to get() performs a full resolution of the underlying key.
 */
export interface Provider<T> {
  get(): T;
}

/**
 * An edge resolved before the dependent is constructed.
 * Direct edges take part in cycle detection.
 */
export interface DirectDependency<T = unknown> {
  readonly kind: 'direct';
  readonly key: DIKey<T>;
}

/**
 * An edge injected as a Provider and resolved on demand.
 */
export interface DeferredDependency<T = unknown> {
  readonly kind: 'deferred';
  readonly key: DIKey<T>;
}

export type Dependency<T = unknown> = DirectDependency<T> | DeferredDependency<T>;

export const Dependency = {
  direct<T>(target: Target<T>): DirectDependency<T> {
    return { kind: 'direct', key: toKey(target) };
  },

  deferred<T>(target: Target<T>): DeferredDependency<T> {
    return { kind: 'deferred', key: toKey(target) };
  },

  isDependency(value: unknown): value is Dependency {
    return (
      typeof value === 'object' &&
      value !== null &&
      'key' in value &&
      value.key instanceof DIKey &&
      'kind' in value &&
      (value.kind === 'direct' || value.kind === 'deferred')
    );
  },

  withId<T>(dependency: Dependency<T>, id: string | symbol): Dependency<T> {
    return { kind: dependency.kind, key: dependency.key.withId(id) };
  },

  toString(dependency: Dependency): string {
    return dependency.kind === 'deferred'
      ? `Provider<${dependency.key.toString()}>`
      : dependency.key.toString();
  },
};

/**
 * Declare a dependency on Provider<T> instead of T.
 *
 * Example:
 *   @Reflected(providerOf(Database))
 *   class Repository {
 *     constructor(private readonly db: Provider<Database>) {}
 *   }
 */
export function providerOf<T>(target: Target<T>): DeferredDependency<T> {
  return Dependency.deferred(target);
}

/**
 * Anything accepted where a dependency is declared:
 * a class, a primitive constructor, a DIKey, or an explicit edge.
 */
export type InjectionToken = Callable | DIKey | Dependency;

/**
 * The value a token is resolved to.
 * Maps [typeof Database, DeferredDependency<Config>] -> [Database, Provider<Config>]
 */
export type Resolved<Tok> = Tok extends DeferredDependency<infer R>
  ? Provider<R>
  : Tok extends DirectDependency<infer R>
    ? R
    : Tok extends DIKey<infer R>
      ? R
      : Tok extends StringConstructor
        ? string
        : Tok extends NumberConstructor
          ? number
          : Tok extends BooleanConstructor
            ? boolean
            : Tok extends abstract new (...args: any[]) => infer R
              ? R
              : Tok extends (...args: any[]) => infer R
                ? R
                : never;

/**
 * Helper type to extract instance types from a tuple of tokens.
 */
export type ResolvedTypes<T extends readonly unknown[]> = T extends readonly [infer First, ...infer Rest]
  ? [Resolved<First>, ...ResolvedTypes<Rest>]
  : [];

/**
 * Normalize a token into a dependency edge
 */
export function toDependency(token: InjectionToken): Dependency {
  if (Dependency.isDependency(token)) return token;
  return Dependency.direct(token);
}
