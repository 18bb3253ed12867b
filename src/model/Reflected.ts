import 'reflect-metadata';
import { Constructor } from '@/model/DIKey';
import { Scope } from '@/model/Binding';
import { Dependency, InjectionToken, ResolvedTypes, toDependency } from '@/model/Dependency';
import {
  CONSTRUCTOR_TOKENS_METADATA_KEY,
  PROPERTY_INJECTIONS_METADATA_KEY,
  SCOPE_METADATA_KEY,
} from '@/model/metadata';
import { ConfigurationError } from '@/core/Errors';

/**
 * A property assigned by the injector after construction
 */
export interface PropertyInjection {
  readonly property: string | symbol;
  readonly dependency: Dependency;
}

/**
 * Type-safe decorator to mark a class as injectable and store its constructor dependency tokens.
 * This allows automatic dependency resolution without listing dependencies at the binding site.
 *
 * TypeScript validates at compile-time that the tokens line up with the constructor parameters.
 *
 * Example:
 *   @Reflected(Database, Config)
 *   class MyService {
 *     constructor(db: Database, config: Config) {}
 *   }
 *
 * For named dependencies, combine with @Id. For lazy ones, use providerOf():
 *   @Reflected(Database, providerOf(Mailer))
 *   class MyService {
 *     constructor(@Id('primary') db: Database, mailer: Provider<Mailer>) {}
 *   }
 *
 * The parameter count is also checked at runtime.
 */
export function Reflected<const Args extends readonly InjectionToken[]>(...tokens: Args) {
  return <C extends new (...params: ResolvedTypes<Args>) => object>(constructor: C): C => {
    storeConstructorTokens('@Reflected', constructor, tokens);
    return constructor;
  };
}

/**
 * Function to add reflection metadata to third-party classes.
 * Use this when you cannot modify the original class (e.g., from a library).
 *
 * Example:
 *   ApplyReflection(ThirdPartyService, Database, Config);
 */
export function ApplyReflection<const Args extends readonly InjectionToken[]>(
  targetClass: new (...params: ResolvedTypes<Args>) => object,
  ...tokens: Args
): void {
  storeConstructorTokens('ApplyReflection', targetClass, tokens);
}

function storeConstructorTokens(source: string, target: Constructor, tokens: readonly InjectionToken[]): void {
  if (tokens.length !== target.length) {
    throw new ConfigurationError(
      `${source}: Parameter count mismatch for ${target.name}. ` +
      `Expected ${target.length} types, got ${tokens.length}.`,
    );
  }
  Reflect.defineMetadata(CONSTRUCTOR_TOKENS_METADATA_KEY, tokens.map(toDependency), target);
}

/**
 * Get the constructor dependencies stored by @Reflected() or ApplyReflection()
 */
export function getConstructorTypes(target: Constructor): readonly Dependency[] | undefined {
  const stored: unknown = Reflect.getOwnMetadata(CONSTRUCTOR_TOKENS_METADATA_KEY, target);
  return Array.isArray(stored) ? stored.filter(Dependency.isDependency) : undefined;
}

/**
 * Class decorator binding the class as a singleton wherever a binding declares no scope of its own.
 */
export function Singleton(): ClassDecorator {
  return target => {
    Reflect.defineMetadata(SCOPE_METADATA_KEY, Scope.Singleton, target);
  };
}

/**
 * Scope declared on a class with @Singleton(), if any
 */
export function getScopeAnnotation(target: Constructor): Scope | undefined {
  const stored: unknown = Reflect.getOwnMetadata(SCOPE_METADATA_KEY, target);
  return stored === Scope.Singleton ? Scope.Singleton : undefined;
}

/**
 * Property decorator declaring an injection point filled in after construction.
 *
 * Example:
 *   class ReportJob {
 *     @InjectProperty(Clock) clock!: Clock;
 *     @InjectProperty(providerOf(Mailer)) mailer!: Provider<Mailer>;
 *   }
 */
export function InjectProperty(token: InjectionToken): PropertyDecorator {
  return (target, property) => {
    // Inherited entries are copied so a subclass never mutates its parent's list
    const injections = [...getPropertyInjections(target), { property, dependency: toDependency(token) }];
    Reflect.defineMetadata(PROPERTY_INJECTIONS_METADATA_KEY, injections, target);
  };
}

/**
 * Property injection points of a prototype, including inherited ones
 */
export function getPropertyInjections(prototype: object): readonly PropertyInjection[] {
  const stored: unknown = Reflect.getMetadata(PROPERTY_INJECTIONS_METADATA_KEY, prototype);
  return Array.isArray(stored) ? stored.filter(isPropertyInjection) : [];
}

function isPropertyInjection(value: unknown): value is PropertyInjection {
  return (
    typeof value === 'object' &&
    value !== null &&
    'property' in value &&
    (typeof value.property === 'string' || typeof value.property === 'symbol') &&
    'dependency' in value &&
    Dependency.isDependency(value.dependency)
  );
}
