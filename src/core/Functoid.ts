import { Constructor } from '@/model/DIKey';
import { Dependency, InjectionToken, ResolvedTypes, toDependency } from '@/model/Dependency';
import { getAllParameterIds } from '@/model/Id';
import { getConstructorTypes } from '@/model/Reflected';
import { ConfigurationError } from '@/core/Errors';

/**
 * Represents information about a function parameter
 */
export interface ParameterInfo {
  index: number;
  dependency: Dependency;
}

/**
 * A Functoid represents a function with its dependencies.
 * It's the core abstraction for representing dependency constructors.
 *
 * Functoids can be created from:
 * - Regular functions (sync or async)
 * - Class constructors
 * - Other functoids (for composition)
 *
 * Async factories return Promise<T>; such functoids can only be resolved
 * through Injector.getInstanceAsync().
 */
export class Functoid<T = unknown> {
  private dependencies: readonly Dependency[] = [];
  private readonly isAsync: boolean;

  constructor(
    private readonly fn: (...args: any[]) => T | Promise<T>,
    private readonly description: string = fn.name || '<anonymous>',
  ) {
    // Detect if function is async by checking if it's an AsyncFunction
    this.isAsync = fn.constructor.name === 'AsyncFunction';
  }

  /**
   * Manually set dependency tokens.
   *
   * Example:
   *   new Functoid((a, b) => new Service(a, b))
   *     .withDependencies([Database, DIKey.named(Config, 'prod')])
   */
  withDependencies(tokens: readonly InjectionToken[]): this {
    this.dependencies = tokens.map(toDependency);
    return this;
  }

  /**
   * Get information about all parameters this functoid depends on
   */
  getParameters(): ParameterInfo[] {
    return this.dependencies.map((dependency, index) => ({ index, dependency }));
  }

  /**
   * Get all dependency edges
   */
  getDependencies(): readonly Dependency[] {
    // Validate that dependencies are properly set if the function has parameters
    if (this.dependencies.length < this.fn.length) {
      throw new ConfigurationError(
        `Cannot resolve dependencies of ${this.description}: type information is missing. ` +
        `The function has ${this.fn.length} parameter(s) but ${this.dependencies.length} dependencies were declared. ` +
        `Use @Reflected(), ApplyReflection() or .withDependencies() to declare them.`
      );
    }
    return this.dependencies;
  }

  /**
   * Check if this functoid is async
   */
  isAsyncFunctoid(): boolean {
    return this.isAsync;
  }

  /**
   * Execute the functoid with the given arguments.
   * Returns T for sync functions, Promise<T> for async functions.
   */
  execute(args: readonly unknown[]): T | Promise<T> {
    return this.fn(...args);
  }

  toString(): string {
    return `Functoid(${this.description})`;
  }

  /**
   * Create a Functoid from a constructor.
   *
   * Dependencies come from @Reflected / ApplyReflection, qualified by @Id
   * parameter decorators where present.
   */
  static fromConstructor<T>(ctor: Constructor<T>): Functoid<T> {
    const functoid = new Functoid<T>((...args: unknown[]) => new ctor(...args), ctor.name);
    functoid.dependencies = constructorDependencies(ctor);
    return functoid;
  }

  /**
   * Create a type-safe Functoid from a factory function with explicit dependency tokens.
   * TypeScript infers parameter types from the tokens array.
   *
   * Supports both synchronous and asynchronous factories:
   * - Sync: (db, config) => new UserService(db, config)
   * - Async: async (db, config) => { await ...; return new UserService(db, config); }
   *
   * Example:
   *   const functoid = Functoid.fromFunction(
   *     [Database, providerOf(Config)],
   *     (db, config) => new UserService(db, config.get())
   *   );
   */
  static fromFunction<const Args extends readonly InjectionToken[], R>(
    tokens: Args,
    fn: (...params: ResolvedTypes<Args>) => R | Promise<R>
  ): Functoid<R> {
    const functoid = new Functoid<R>(fn);
    functoid.dependencies = tokens.map(toDependency);
    return functoid;
  }

  /**
   * Create a Functoid that returns a constant value
   */
  static constant<T>(value: T): Functoid<T> {
    return new Functoid(() => value, 'constant');
  }

  /**
   * Map the result of this functoid.
   * For async functoids, the mapper is applied after the promise resolves.
   */
  map<R>(mapper: (value: T) => R): Functoid<R> {
    const mapped = new Functoid<R>((...args: unknown[]) => {
      const result = this.execute(args);
      // If the result is a promise, map after it resolves
      if (result instanceof Promise) {
        return result.then(mapper);
      }
      return mapper(result);
    }, this.description);
    // Copy dependencies from the original functoid
    mapped.dependencies = [...this.dependencies];
    return mapped;
  }
}

/**
 * Dependency edges of a class constructor, qualified by its @Id parameter annotations.
 * Throws when the constructor takes parameters but declares no tokens.
 */
export function constructorDependencies(ctor: Constructor): readonly Dependency[] {
  const declared = getConstructorTypes(ctor);
  if (declared === undefined) {
    if (ctor.length > 0) {
      throw new ConfigurationError(
        `Cannot construct ${ctor.name}: its constructor takes ${ctor.length} parameter(s) ` +
        `but declares no dependencies. Use @Reflected() or ApplyReflection().`,
      );
    }
    return [];
  }

  // Note: @Id stores metadata on the constructor itself, not the prototype
  const paramIds = getAllParameterIds(ctor, 'constructor');
  return declared.map((dependency, index) => {
    const id = paramIds.get(index);
    return id === undefined ? dependency : Dependency.withId(dependency, id);
  });
}
