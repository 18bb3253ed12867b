import { Callable, DIKey, Qualifier, toKey } from '@/model/DIKey';
import { Scope } from '@/model/Binding';
import { ElementBuilder, ModuleDef } from '@/dsl/ModuleDef';

/**
 * Contributes elements to a set binding from within a module.
 *
 * Binders created for the same element type and qualifier, in one module or in several,
 * all add to the same set. The set resolves to one element per contribution,
 * in registration order.
 *
 * Example:
 *   const plugins = Multibinder.newSetBinder<Plugin>(module, Plugin);
 *   plugins.addBinding().from().type(AuthPlugin);
 *   plugins.addBinding().from().value(new LoggingPlugin());
 *
 *   injector.getInstance(DIKey.set(Plugin)); // Set { AuthPlugin, LoggingPlugin }
 */
export class Multibinder<T> {
  private constructor(
    private readonly module: ModuleDef,
    private readonly elementKey: DIKey<T>,
    public readonly setKey: DIKey<Set<T>>,
  ) {}

  static newSetBinder<T>(module: ModuleDef, elementPrototype: Callable<T> | symbol, id?: Qualifier): Multibinder<T> {
    const base = toKey<T>(elementPrototype);
    const elementKey = id === undefined ? base : base.withId(id);
    const binder = new Multibinder(module, elementKey, elementKey.toSetKey());
    // Declared up front so that a set without elements still resolves
    module.addDeclaration({ kind: 'set', setKey: binder.setKey, scope: Scope.Unscoped });
    return binder;
  }

  /**
   * Start a new element of the set
   */
  addBinding(): ElementBuilder<T> {
    return new ElementBuilder(this.setKey, this.elementKey.freshElement(), this.module);
  }

  /**
   * Set the scope of the set itself. A singleton set is resolved once and cached.
   */
  in(scope: Scope): this {
    this.module.addDeclaration({ kind: 'set', setKey: this.setKey, scope });
    return this;
  }
}
