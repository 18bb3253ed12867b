/**
 * keystone-di - dependency injection runtime for TypeScript
 * Modules, scopes, type listeners and set multibindings
 */

import 'reflect-metadata';

// Core
export { Injector } from '@/core/Injector';
export type { InjectorOptions } from '@/core/Injector';
export { Composer } from '@/core/Composer';
export { BindingRegistry } from '@/core/BindingRegistry';
export type { ListenerBinding } from '@/core/BindingRegistry';
export { ScopeCache } from '@/core/ScopeCache';
export type { Commit } from '@/core/ScopeCache';
export { TypeObservationPipeline } from '@/core/TypeObservation';
export type { MembersInjector, TypeEncounter, TypeListener, ProviderSource } from '@/core/TypeObservation';
export { Functoid, constructorDependencies } from '@/core/Functoid';
export type { ParameterInfo } from '@/core/Functoid';
export type { Logger } from '@/core/Logger';
export {
  InjectionError,
  DuplicateBindingError,
  DuplicateElementError,
  MissingBindingError,
  CircularDependencyError,
  RegistryFrozenError,
  ConfigurationError,
  AsyncProvisionError,
  InjectorClosedError,
} from '@/core/Errors';

// DSL
export { ModuleDef, BindingBuilder, BindingFromBuilder, ElementBuilder } from '@/dsl/ModuleDef';
export type { ModuleDeclaration } from '@/dsl/ModuleDef';
export { Multibinder } from '@/dsl/Multibinder';

// Model
export { DIKey, TypeTag, toKey } from '@/model/DIKey';
export type { Callable, Constructor, PrimitiveType, Qualifier, Target } from '@/model/DIKey';
export { Dependency, providerOf, toDependency } from '@/model/Dependency';
export type {
  Provider,
  DirectDependency,
  DeferredDependency,
  InjectionToken,
  Resolved,
  ResolvedTypes,
} from '@/model/Dependency';
export { Id, getAllParameterIds } from '@/model/Id';
export {
  Reflected,
  ApplyReflection,
  getConstructorTypes,
  Singleton,
  getScopeAnnotation,
  InjectProperty,
  getPropertyInjections,
} from '@/model/Reflected';
export type { PropertyInjection } from '@/model/Reflected';
export { FieldMarker } from '@/model/FieldMarker';
export { Matcher, Matchers } from '@/model/Matcher';
export type { TypeMatcher } from '@/model/Matcher';
export { Scope, BindingKind, Bindings } from '@/model/Binding';
export type {
  Binding,
  InstanceBinding,
  ClassBinding,
  FactoryBinding,
  AliasBinding,
  SetBinding,
  AnyBinding,
  ElementBinding,
  BindingOptions,
} from '@/model/Binding';
export { LifecycleManager, AggregateLifecycleError, isCloseable } from '@/model/Lifecycle';
export type { Closeable } from '@/model/Lifecycle';
