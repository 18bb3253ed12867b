import { Callable, Constructor, DIKey, Qualifier, Target, toKey } from '@/model/DIKey';
import { AnyBinding, BindingOptions, Bindings, ElementBinding, Scope } from '@/model/Binding';
import { InjectionToken, ResolvedTypes } from '@/model/Dependency';
import { getScopeAnnotation } from '@/model/Reflected';
import type { TypeMatcher } from '@/model/Matcher';
import type { TypeListener } from '@/core/TypeObservation';
import { Functoid } from '@/core/Functoid';
import { Multibinder } from '@/dsl/Multibinder';

/**
 * One entry of a module, replayed in order by the composer
 */
export type ModuleDeclaration =
  | { readonly kind: 'binding'; readonly binding: AnyBinding }
  | { readonly kind: 'set'; readonly setKey: DIKey<Set<unknown>>; readonly scope: Scope }
  | { readonly kind: 'element'; readonly setKey: DIKey<Set<unknown>>; readonly binding: ElementBinding }
  | { readonly kind: 'listener'; readonly matcher: TypeMatcher; readonly listener: TypeListener };

/**
 * A builder that was started but not given a source yet
 */
export interface PendingBuilder {
  describe(): string;
}

/**
 * Anything that turns a binding into a module declaration once its source is known
 */
export interface BindingSink<T> {
  finalize(createBinding: (key: DIKey<T>, options: BindingOptions) => ElementBinding): ModuleDef;
}

/**
 * Builder for specifying the source of a binding or of a set element
 */
export class BindingFromBuilder<T> {
  constructor(
    private readonly sink: BindingSink<T>,
  ) {}

  /**
   * Bind to a class (instantiated via constructor injection).
   * A @Singleton() annotation on the class applies when no scope was declared.
   */
  type(implementation: Constructor<T & object>): ModuleDef {
    return this.sink.finalize((key, options) =>
      Bindings.class(key, implementation, {
        ...options,
        scope: options.scope ?? getScopeAnnotation(implementation),
      })
    );
  }

  /**
   * Bind to a specific value instance
   */
  value(instance: T): ModuleDef {
    return this.sink.finalize((key, options) =>
      Bindings.instance(key, instance, options)
    );
  }

  /**
   * Bind to a Functoid, or to a factory function taking no parameters
   */
  factory(factoryOrFunctoid: (() => T | Promise<T>) | Functoid<T>): ModuleDef {
    return this.sink.finalize((key, options) => {
      const functoid =
        factoryOrFunctoid instanceof Functoid
          ? factoryOrFunctoid
          : new Functoid<T>(factoryOrFunctoid);
      return Bindings.factory(key, functoid, options);
    });
  }

  /**
   * Bind to a factory function whose parameters are resolved from the given tokens.
   *
   * Example:
   *   .make(UserService).from().func(
   *     [Database, providerOf(Config)],
   *     (db, config) => new UserService(db, config.get())
   *   )
   */
  func<const Args extends readonly InjectionToken[]>(
    tokens: Args,
    fn: (...params: ResolvedTypes<Args>) => T | Promise<T>,
  ): ModuleDef {
    return this.sink.finalize((key, options) =>
      Bindings.factory(key, Functoid.fromFunction<Args, T>(tokens, fn), options)
    );
  }

  /**
   * Link to another binding, resolved whenever this one is
   */
  alias(target: Target<T>, targetId?: Qualifier): ModuleDef {
    return this.sink.finalize((key, options) => {
      const targetKey = targetId === undefined ? toKey(target) : toKey(target).withId(targetId);
      return Bindings.alias(key, targetKey, options);
    });
  }
}

/**
 * Builder for creating a single binding with fluent API
 */
export class BindingBuilder<T> implements BindingSink<T>, PendingBuilder {
  private currentId?: Qualifier;
  private options: BindingOptions = {};

  constructor(
    private readonly target: Target<T>,
    private readonly module: ModuleDef,
  ) {
    module.begin(this);
  }

  /**
   * Add a qualifier to this binding
   */
  named(id: Qualifier): this {
    this.currentId = id;
    return this;
  }

  /**
   * Set the scope of this binding. Only a singleton can stay eager.
   */
  in(scope: Scope): this {
    this.options = { scope, eager: scope === Scope.Singleton && this.options.eager === true };
    return this;
  }

  /**
   * Singleton created as soon as the injector is
   */
  asEagerSingleton(): this {
    this.options = { scope: Scope.Singleton, eager: true };
    return this;
  }

  /**
   * Start specifying where the binding comes from
   */
  from(): BindingFromBuilder<T> {
    return new BindingFromBuilder(this);
  }

  describe(): string {
    return this.getKey().toString();
  }

  private getKey(): DIKey<T> {
    const key = toKey(this.target);
    return this.currentId === undefined ? key : key.withId(this.currentId);
  }

  /**
   * @internal
   */
  finalize(createBinding: (key: DIKey<T>, options: BindingOptions) => ElementBinding): ModuleDef {
    const binding = createBinding(this.getKey(), this.options);
    return this.module.complete(this, { kind: 'binding', binding });
  }
}

/**
 * Builder for one contribution to a set. Elements are keyed by a fresh element key,
 * so they cannot be named; only their scope can be chosen.
 */
export class ElementBuilder<T> implements BindingSink<T>, PendingBuilder {
  private options: BindingOptions = {};

  constructor(
    private readonly setKey: DIKey<Set<T>>,
    private readonly elementKey: DIKey<T>,
    private readonly module: ModuleDef,
  ) {
    module.begin(this);
  }

  in(scope: Scope): this {
    this.options = { scope };
    return this;
  }

  from(): BindingFromBuilder<T> {
    return new BindingFromBuilder(this);
  }

  describe(): string {
    return `element of ${this.setKey.toString()}`;
  }

  /**
   * @internal
   */
  finalize(createBinding: (key: DIKey<T>, options: BindingOptions) => ElementBinding): ModuleDef {
    const binding = createBinding(this.elementKey, this.options);
    return this.module.complete(this, { kind: 'element', setKey: this.setKey, binding });
  }
}

/**
 * Main DSL for defining dependency injection modules.
 *
 * Example:
 *   const module = new ModuleDef()
 *     .make(Database).in(Scope.Singleton).from().type(PostgresDatabase)
 *     .make(UserService).from().type(UserService)
 *     .make(Config).named('db').from().value(dbConfig)
 *     .many(Plugin).from().type(AuthPlugin)
 *     .many(Plugin).from().type(LoggingPlugin)
 *     .install(new MetricsModule());
 *
 * The .from() method returns a builder that supports:
 *   - .type(Class) - bind to a class (constructor injection)
 *   - .value(instance) - bind to a specific instance
 *   - .factory(fn) - bind to a factory function or Functoid
 *   - .func(tokens, fn) - bind to a factory with typed dependencies
 *   - .alias(Target) - link to another binding
 *
 * Subclasses may declare their bindings in the constructor:
 *   class StorageModule extends ModuleDef {
 *     constructor() {
 *       super();
 *       this.make(Storage).from().type(DiskStorage);
 *     }
 *   }
 */
export class ModuleDef {
  private readonly declarations: ModuleDeclaration[] = [];
  private readonly installed: ModuleDef[] = [];
  private readonly pending = new Set<PendingBuilder>();

  /**
   * Start defining a binding for a type
   */
  make<T>(target: Target<T>): BindingBuilder<T> {
    return new BindingBuilder(target, this);
  }

  /**
   * Start defining one element of the set of `type`
   */
  many<T>(type: Callable<T> | symbol, id?: Qualifier): ElementBuilder<T> {
    return Multibinder.newSetBinder<T>(this, type, id).addBinding();
  }

  /**
   * Install another module. Each module instance is installed at most once per injector.
   */
  install(module: ModuleDef): this {
    this.installed.push(module);
    return this;
  }

  /**
   * Register a type listener for every class accepted by the matcher
   */
  bindListener(matcher: TypeMatcher, listener: TypeListener): this {
    this.addDeclaration({ kind: 'listener', matcher, listener });
    return this;
  }

  /**
   * @internal
   */
  addDeclaration(declaration: ModuleDeclaration): void {
    this.declarations.push(declaration);
  }

  /**
   * @internal
   */
  begin(builder: PendingBuilder): void {
    this.pending.add(builder);
  }

  /**
   * @internal
   */
  complete(builder: PendingBuilder, declaration: ModuleDeclaration): this {
    this.pending.delete(builder);
    this.addDeclaration(declaration);
    return this;
  }

  getDeclarations(): readonly ModuleDeclaration[] {
    return this.declarations;
  }

  getInstalledModules(): readonly ModuleDef[] {
    return this.installed;
  }

  /**
   * Descriptions of builders never given a source
   */
  getUnfinished(): string[] {
    return Array.from(this.pending, builder => builder.describe());
  }

  toString(): string {
    return this.constructor.name;
  }
}
