import { BindingRegistry } from '@/core/BindingRegistry';
import { ConfigurationError } from '@/core/Errors';
import type { Logger } from '@/core/Logger';
import type { ModuleDef, ModuleDeclaration } from '@/dsl/ModuleDef';

/**
 * Flattens a tree of modules into a frozen BindingRegistry.
 *
 * Modules are visited depth-first: a module's own declarations first, in order,
 * then its installed modules, in order. A module instance reachable through
 * several paths is installed once; later installs are skipped.
 */
export class Composer {
  constructor(private readonly logger: Logger = console) {}

  /**
   * Compose modules into a new registry, layered over the parent registry when given.
   * @throws DuplicateBindingError when two declarations bind the same key
   * @throws ConfigurationError when a module holds a binding without a source
   */
  compose(modules: readonly ModuleDef[], parent?: BindingRegistry): BindingRegistry {
    const registry = new BindingRegistry(parent);
    const installed = new Set<ModuleDef>();

    for (const module of modules) {
      this.install(module, registry, installed);
    }

    return registry.freeze();
  }

  private install(module: ModuleDef, registry: BindingRegistry, installed: Set<ModuleDef>): void {
    if (installed.has(module)) {
      this.logger.debug(`Module ${module.toString()} is already installed, skipping`);
      return;
    }
    // Marked before recursing so that a module installing itself terminates
    installed.add(module);

    const unfinished = module.getUnfinished();
    if (unfinished.length > 0) {
      throw new ConfigurationError(
        `Module ${module.toString()} has unfinished bindings: ${unfinished.join(', ')}. ` +
        `Complete them with .from().`,
      );
    }

    for (const declaration of module.getDeclarations()) {
      this.apply(declaration, registry);
    }

    for (const child of module.getInstalledModules()) {
      this.install(child, registry, installed);
    }
  }

  private apply(declaration: ModuleDeclaration, registry: BindingRegistry): void {
    switch (declaration.kind) {
      case 'binding':
        registry.register(declaration.binding);
        break;
      case 'set':
        registry.declareSet(declaration.setKey, declaration.scope);
        break;
      case 'element':
        registry.registerMultiElement(declaration.setKey, declaration.binding);
        break;
      case 'listener':
        registry.registerListener({ matcher: declaration.matcher, listener: declaration.listener });
        break;
    }
  }
}
