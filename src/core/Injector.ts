import { AsyncLocalStorage } from 'node:async_hooks';
import { Constructor, DIKey, Target, toKey } from '@/model/DIKey';
import { AnyBinding, BindingKind, Scope } from '@/model/Binding';
import { Dependency, Provider } from '@/model/Dependency';
import { getPropertyInjections } from '@/model/Reflected';
import { Closeable, isCloseable, LifecycleManager } from '@/model/Lifecycle';
import { BindingRegistry } from '@/core/BindingRegistry';
import { Composer } from '@/core/Composer';
import {
  AsyncProvisionError,
  CircularDependencyError,
  DuplicateElementError,
  InjectorClosedError,
  MissingBindingError,
} from '@/core/Errors';
import { constructorDependencies } from '@/core/Functoid';
import type { Logger } from '@/core/Logger';
import { ScopeCache } from '@/core/ScopeCache';
import { MembersInjector, TypeObservationPipeline } from '@/core/TypeObservation';
import type { ModuleDef } from '@/dsl/ModuleDef';

/**
 * Options for creating an Injector
 */
export interface InjectorOptions {
  /**
   * Where diagnostics go (default: console)
   */
  logger?: Logger;

  /**
   * Parent injector. The new injector sees every binding of the parent
   * and may not rebind any of them.
   */
  parent?: Injector;
}

/**
 * Keys currently under construction on one call stack, outermost first.
 * Immutable: entering a key yields a new context.
 */
class ResolutionContext {
  private static readonly EMPTY = new ResolutionContext([]);

  private constructor(private readonly path: readonly DIKey[]) {}

  static root(): ResolutionContext {
    return ResolutionContext.EMPTY;
  }

  /**
   * @throws CircularDependencyError when the key is already under construction
   */
  enter(key: DIKey): ResolutionContext {
    const index = this.path.findIndex(k => k.equals(key));
    if (index >= 0) {
      throw new CircularDependencyError([...this.path.slice(index), key]);
    }
    return new ResolutionContext([...this.path, key]);
  }

  /**
   * The key whose construction is in progress, if any
   */
  current(): DIKey | undefined {
    return this.path[this.path.length - 1];
  }
}

/**
 * Resolution context of the async construction the current code runs inside.
 * Lets an async factory that calls back into its injector extend the chain
 * instead of starting a new one.
 */
interface ResolutionScope {
  readonly owner: Injector;
  readonly context: ResolutionContext;
}

const resolutionScope = new AsyncLocalStorage<ResolutionScope>();

/**
 * The Injector owns a frozen binding registry and builds object graphs from it on demand.
 *
 * Instances are created lazily, the first time they are requested; singletons are
 * kept for the lifetime of the injector and released by close().
 *
 * Supports both synchronous and asynchronous resolution:
 * - getInstance() for bindings whose factories return plain values
 * - getInstanceAsync() for graphs containing async factories
 *
 * Usage:
 *   const injector = Injector.create([module]);
 *
 *   // Synchronous
 *   const service = injector.getInstance(MyService);
 *
 *   // Asynchronous
 *   const pool = await injector.getInstanceAsync(ConnectionPool);
 *
 *   await injector.close();
 */
export class Injector {
  /**
   * Always resolves to the injector handling the request
   */
  static readonly KEY: DIKey<Injector> = DIKey.of(Injector);

  private readonly cache = new ScopeCache();
  private readonly lifecycle = new LifecycleManager();
  private readonly pipeline: TypeObservationPipeline;
  private readonly acyclic = new Set<string>();
  private readonly observedInstances = new WeakSet<object>();
  private activeContext?: ResolutionContext;
  private closed = false;

  /**
   * Wrap an already composed registry. Prefer Injector.create(), which also
   * composes the modules and instantiates eager singletons.
   */
  constructor(
    private readonly registry: BindingRegistry,
    private readonly logger: Logger = console,
    private readonly parent?: Injector,
  ) {
    this.pipeline = new TypeObservationPipeline(target => this.getProvider(target));
    for (const { matcher, listener } of registry.listeners()) {
      this.pipeline.addListener(matcher, listener);
    }
    // Bound instances are heard once, up front
    for (const binding of registry.bindings()) {
      if (binding.kind === BindingKind.Instance) {
        this.observeValue(binding.instance);
      }
    }
  }

  /**
   * Compose the modules and build an injector over them.
   * Eager singletons are instantiated before this returns, in registration order.
   */
  static create(modules: readonly ModuleDef[], options: InjectorOptions = {}): Injector {
    const injector = Injector.compose(modules, options);
    for (const key of injector.eagerKeys()) {
      injector.logger.debug(`Instantiating eager singleton ${key.toString()}`);
      injector.getInstance(key);
    }
    return injector;
  }

  /**
   * Like create(), for graphs whose eager singletons have async factories
   */
  static async createAsync(modules: readonly ModuleDef[], options: InjectorOptions = {}): Promise<Injector> {
    const injector = Injector.compose(modules, options);
    for (const key of injector.eagerKeys()) {
      injector.logger.debug(`Instantiating eager singleton ${key.toString()}`);
      await injector.getInstanceAsync(key);
    }
    return injector;
  }

  private static compose(modules: readonly ModuleDef[], options: InjectorOptions): Injector {
    const logger = options.logger ?? options.parent?.logger ?? console;
    const registry = new Composer(logger).compose(modules, options.parent?.registry);
    return new Injector(registry, logger, options.parent);
  }

  /**
   * Resolve an instance synchronously.
   *
   * @throws MissingBindingError when nothing is bound to the target
   * @throws CircularDependencyError when the target depends on itself through direct edges
   * @throws AsyncProvisionError when a factory on the way returns a promise
   */
  getInstance<T>(target: Target<T>): T {
    const key = toKey(target);
    return this.narrow(key, this.resolve(key, this.currentContext()));
  }

  /**
   * Resolve an instance, awaiting async factories.
   * Independent dependencies are resolved concurrently, and concurrent requests
   * for a singleton under construction share that construction.
   */
  async getInstanceAsync<T>(target: Target<T>): Promise<T> {
    const key = toKey(target);
    const context = this.currentContext();
    this.ensureAcyclic(key, []);
    return this.narrow(key, await this.resolveAsync(key, context));
  }

  /**
   * Provider whose get() resolves the target on every call
   * @throws MissingBindingError right away when nothing is bound to the target
   */
  getProvider<T>(target: Target<T>): Provider<T> {
    return this.providerFor(toKey(target), this.currentContext().current());
  }

  /**
   * Property injection and type listener injectors for instances built outside the injector
   */
  getMembersInjector<T extends object>(type: Constructor<T>): MembersInjector<T> {
    return instance => this.injectMembers(type, instance, this.currentContext());
  }

  /**
   * Binding for the target, in this injector or its ancestors
   */
  getBinding<T>(target: Target<T>): AnyBinding | undefined {
    return this.registry.lookup(toKey(target));
  }

  /**
   * Keys bound in this injector, excluding its ancestors
   */
  keys(): DIKey[] {
    return this.registry.keys();
  }

  getParent(): Injector | undefined {
    return this.parent;
  }

  /**
   * Injector sharing this one's bindings, singletons and listeners, extended with the given modules
   * @throws DuplicateBindingError when a module rebinds a key bound here
   */
  createChildInjector(...modules: ModuleDef[]): Injector {
    return Injector.create(modules, { logger: this.logger, parent: this });
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Release every closeable singleton this injector constructed, most recent first.
   * Afterwards every resolution fails with InjectorClosedError.
   *
   * @throws AggregateLifecycleError when some resources failed to close
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.lifecycle.releaseAll();
    } finally {
      this.cache.clear();
    }
  }

  // ============================================================================
  // Synchronous resolution
  // ============================================================================

  private resolve(key: DIKey, context: ResolutionContext): unknown {
    this.ensureOpen(key);
    if (key.equals(Injector.KEY)) {
      return this;
    }

    const binding = this.localBinding(key);
    if (binding === undefined) {
      if (this.parent !== undefined) {
        return this.parent.resolve(key, context);
      }
      throw new MissingBindingError(key, context.current());
    }

    const singleton = binding.scope === Scope.Singleton;
    if (singleton && this.cache.has(key)) {
      return this.cache.get(key);
    }

    const inner = context.enter(key);
    const instance = this.withContext(inner, () => this.construct(binding, inner));
    return singleton ? this.commit(binding, instance) : instance;
  }

  private construct(binding: AnyBinding, context: ResolutionContext): unknown {
    switch (binding.kind) {
      case BindingKind.Instance:
        return binding.instance;

      case BindingKind.Class: {
        const args = constructorDependencies(binding.implementation)
          .map(dependency => this.resolveDependency(dependency, context));
        const instance = new binding.implementation(...args);
        this.injectMembers(binding.implementation, instance, context);
        return instance;
      }

      case BindingKind.Factory: {
        if (binding.factory.isAsyncFunctoid()) {
          throw new AsyncProvisionError(binding.key);
        }
        const args = binding.factory.getDependencies()
          .map(dependency => this.resolveDependency(dependency, context));
        const result = binding.factory.execute(args);
        if (result instanceof Promise) {
          // Nobody will await the abandoned promise
          void result.then(undefined, (error: unknown) => {
            this.logger.debug(`Abandoned async factory of ${binding.key.toString()} failed: ${String(error)}`);
          });
          throw new AsyncProvisionError(binding.key);
        }
        this.observeValue(result);
        return result;
      }

      case BindingKind.Alias:
        return this.resolve(binding.target, context);

      case BindingKind.Set:
        return collectElements(binding.key, binding.elements.map(element => this.resolve(element, context)));
    }
  }

  private resolveDependency(dependency: Dependency, context: ResolutionContext): unknown {
    return dependency.kind === 'deferred'
      ? this.providerFor(dependency.key, context.current())
      : this.resolve(dependency.key, context);
  }

  private injectMembers<I extends object>(type: Constructor<I>, instance: I, context: ResolutionContext): void {
    for (const { property, dependency } of getPropertyInjections(type.prototype)) {
      Reflect.set(instance, property, this.resolveDependency(dependency, context));
    }
    this.observe(type, instance);
  }

  /**
   * Hear the class of an object built outside a class binding.
   * An object is observed once, however many bindings or calls yield it.
   */
  private observeValue(value: unknown): void {
    if (typeof value !== 'object' || value === null || this.observedInstances.has(value)) {
      return;
    }
    this.observedInstances.add(value);
    const type: unknown = value.constructor;
    if (isConstructor(type)) {
      this.observe(type, value);
    }
  }

  /**
   * Run listener injectors, ancestors' listeners first
   */
  private observe<I extends object>(type: Constructor<I>, instance: I): void {
    this.parent?.observe(type, instance);
    this.pipeline.injectMembers(type, instance);
  }

  // ============================================================================
  // Asynchronous resolution
  // ============================================================================

  private async resolveAsync(key: DIKey, context: ResolutionContext): Promise<unknown> {
    this.ensureOpen(key);
    if (key.equals(Injector.KEY)) {
      return this;
    }

    const binding = this.localBinding(key);
    if (binding === undefined) {
      if (this.parent !== undefined) {
        return this.parent.resolveAsync(key, context);
      }
      throw new MissingBindingError(key, context.current());
    }

    if (binding.scope !== Scope.Singleton) {
      return this.constructInScope(binding, context.enter(key));
    }
    if (this.cache.has(key)) {
      return this.cache.get(key);
    }

    const inner = context.enter(key);
    const inFlight = this.cache.inFlight(key);
    if (inFlight !== undefined) {
      return inFlight;
    }

    const construction: Promise<unknown> = (async () => {
      try {
        return this.commit(binding, await this.constructInScope(binding, inner));
      } finally {
        this.cache.settle(key, construction);
      }
    })();
    this.cache.track(key, construction);
    return construction;
  }

  private constructInScope(binding: AnyBinding, context: ResolutionContext): Promise<unknown> {
    return resolutionScope.run({ owner: this.chainRoot(), context }, () => this.constructAsync(binding, context));
  }

  private async constructAsync(binding: AnyBinding, context: ResolutionContext): Promise<unknown> {
    switch (binding.kind) {
      case BindingKind.Instance:
        return binding.instance;

      case BindingKind.Class: {
        const args = await Promise.all(
          constructorDependencies(binding.implementation)
            .map(dependency => this.resolveDependencyAsync(dependency, context)),
        );
        const instance = new binding.implementation(...args);
        await this.injectMembersAsync(binding.implementation, instance, context);
        return instance;
      }

      case BindingKind.Factory: {
        const args = await Promise.all(
          binding.factory.getDependencies()
            .map(dependency => this.resolveDependencyAsync(dependency, context)),
        );
        const result = await binding.factory.execute(args);
        this.observeValue(result);
        return result;
      }

      case BindingKind.Alias:
        return this.resolveAsync(binding.target, context);

      case BindingKind.Set:
        return collectElements(
          binding.key,
          await Promise.all(binding.elements.map(element => this.resolveAsync(element, context))),
        );
    }
  }

  private async resolveDependencyAsync(dependency: Dependency, context: ResolutionContext): Promise<unknown> {
    return dependency.kind === 'deferred'
      ? this.providerFor(dependency.key, context.current())
      : this.resolveAsync(dependency.key, context);
  }

  private async injectMembersAsync<I extends object>(
    type: Constructor<I>,
    instance: I,
    context: ResolutionContext,
  ): Promise<void> {
    const injections = getPropertyInjections(type.prototype);
    const values = await Promise.all(
      injections.map(({ dependency }) => this.resolveDependencyAsync(dependency, context)),
    );
    injections.forEach(({ property }, index) => {
      Reflect.set(instance, property, values[index]);
    });
    this.observe(type, instance);
  }

  /**
   * Walk the direct edges reachable from a key without constructing anything.
   * Async resolution joins constructions in flight, so a cycle would otherwise wait on itself.
   */
  private ensureAcyclic(key: DIKey, path: readonly DIKey[]): void {
    if (this.acyclic.has(key.toMapKey()) || key.equals(Injector.KEY)) {
      return;
    }
    const index = path.findIndex(k => k.equals(key));
    if (index >= 0) {
      throw new CircularDependencyError([...path.slice(index), key]);
    }

    const binding = this.registry.lookup(key);
    if (binding !== undefined) {
      const next = [...path, key];
      for (const dependency of directEdges(binding)) {
        this.ensureAcyclic(dependency, next);
      }
    }
    this.acyclic.add(key.toMapKey());
  }

  // ============================================================================
  // Shared
  // ============================================================================

  private providerFor<T>(key: DIKey<T>, requiredBy?: DIKey): Provider<T> {
    if (!key.equals(Injector.KEY) && this.registry.lookup(key) === undefined) {
      throw new MissingBindingError(key, requiredBy);
    }
    return {
      get: () => this.narrow(key, this.resolve(key, this.currentContext())),
    };
  }

  /**
   * Commit a freshly built singleton; the loser of a race gets the winner's instance
   */
  private commit(binding: AnyBinding, instance: unknown): unknown {
    const commit = this.cache.commit(binding.key, instance);
    // Only what the injector built is its to close
    const owned =
      (binding.kind === BindingKind.Class || binding.kind === BindingKind.Factory) && isCloseable(instance)
        ? instance
        : undefined;
    if (!commit.won) {
      this.logger.warn(
        `Discarding a duplicate instance of singleton ${binding.key.toString()}: another resolution committed first`,
      );
      if (owned !== undefined) {
        this.closeDiscarded(binding.key, owned);
      }
      return commit.instance;
    }
    if (owned !== undefined) {
      this.lifecycle.track(owned);
    }
    return instance;
  }

  private closeDiscarded(key: DIKey, instance: Closeable): void {
    // A synchronous close() failure surfaces as a rejection of the wrapper
    const closing = (async () => instance.close())();
    void closing.catch((error: unknown) => {
      this.logger.warn(`Failed to close the discarded instance of singleton ${key.toString()}: ${String(error)}`);
    });
  }

  /**
   * The context of the construction this call is nested in, if any
   */
  private currentContext(): ResolutionContext {
    if (this.activeContext !== undefined) {
      return this.activeContext;
    }
    const scope = resolutionScope.getStore();
    return scope !== undefined && scope.owner === this.chainRoot() ? scope.context : ResolutionContext.root();
  }

  private chainRoot(): Injector {
    return this.parent?.chainRoot() ?? this;
  }

  private withContext<R>(context: ResolutionContext, fn: () => R): R {
    const previous = this.activeContext;
    this.activeContext = context;
    try {
      return fn();
    } finally {
      this.activeContext = previous;
    }
  }

  private localBinding(key: DIKey): AnyBinding | undefined {
    return this.registry.isLocal(key) ? this.registry.lookup(key) : undefined;
  }

  private eagerKeys(): DIKey[] {
    return this.registry.bindings().filter(binding => binding.eager).map(binding => binding.key);
  }

  private ensureOpen(key: DIKey): void {
    if (this.closed) {
      throw new InjectorClosedError(key);
    }
  }

  /**
   * Bindings are stored type-erased; whatever a key's binding yields has the key's type
   */
  private narrow<T>(_key: DIKey<T>, value: unknown): T {
    return value as T;
  }
}

function isConstructor(value: unknown): value is Constructor<object> {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

/**
 * One entry per contribution; two contributions resolving to the same value are rejected
 */
function collectElements(setKey: DIKey, elements: readonly unknown[]): Set<unknown> {
  const set = new Set<unknown>();
  elements.forEach((element, index) => {
    if (set.has(element)) {
      throw new DuplicateElementError(setKey, elements.indexOf(element), index);
    }
    set.add(element);
  });
  return set;
}

function directEdges(binding: AnyBinding): DIKey[] {
  const direct = (dependencies: readonly Dependency[]) =>
    dependencies.filter(dependency => dependency.kind === 'direct').map(dependency => dependency.key);

  switch (binding.kind) {
    case BindingKind.Instance:
      return [];
    case BindingKind.Class:
      return [
        ...direct(constructorDependencies(binding.implementation)),
        ...direct(getPropertyInjections(binding.implementation.prototype).map(({ dependency }) => dependency)),
      ];
    case BindingKind.Factory:
      return direct(binding.factory.getDependencies());
    case BindingKind.Alias:
      return [binding.target];
    case BindingKind.Set:
      return [...binding.elements];
  }
}
