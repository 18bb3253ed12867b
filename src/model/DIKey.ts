/**
 * Helper type to represent any callable that can be used as a dependency source
 * This accepts:
 * - Concrete classes (new (...args) => T)
 * - Abstract classes (abstract new (...args) => T)
 * - Plain functions ((...args) => T)
 */
export type Callable<T = unknown> =
  | (new (...args: any[]) => T)
  | (abstract new (...args: any[]) => T)
  | ((...args: any[]) => T);

/**
 * A concrete class producing T
 */
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Primitive type constructors
 */
export type PrimitiveType =
  | typeof String
  | typeof Number
  | typeof Boolean
  | typeof Symbol
  | typeof BigInt;

/**
 * Qualifier distinguishing several bindings of the same type
 */
export type Qualifier = string | symbol;

/**
 * TypeTag - An ADT representing a type identifier for dependency injection
 *
 * Can be one of:
 * - CallableTag: A class, abstract class, or function
 * - PrimitiveTag: A JavaScript primitive type (String, Number, Boolean, Symbol, BigInt)
 * - TokenTag: A Symbol instance used to represent an interface
 * - SetTag: A set of elements of a given type
 */
export type TypeTag<T = unknown> =
  | { readonly kind: 'callable'; readonly value: Callable<T> }
  | { readonly kind: 'primitive'; readonly value: PrimitiveType; readonly name: string }
  | { readonly kind: 'token'; readonly value: symbol; readonly description: string }
  | { readonly kind: 'set'; readonly elementTag: TypeTag };

const PRIMITIVES = new Map<unknown, string>([
  [String, 'String'],
  [Number, 'Number'],
  [Boolean, 'Boolean'],
  [Symbol, 'Symbol'],
  [BigInt, 'BigInt'],
]);

function isPrimitiveType(value: unknown): value is PrimitiveType {
  return PRIMITIVES.has(value);
}

// Map keys are built from interned identities, so two classes sharing a name never collide.
const callableIdentities = new WeakMap<object, number>();
const symbolIdentities = new Map<symbol, number>();
let nextIdentity = 0;
let nextElementOrdinal = 0;

function identityOf(value: object | symbol): number {
  if (typeof value === 'symbol') {
    let id = symbolIdentities.get(value);
    if (id === undefined) {
      id = nextIdentity++;
      symbolIdentities.set(value, id);
    }
    return id;
  }
  let id = callableIdentities.get(value);
  if (id === undefined) {
    id = nextIdentity++;
    callableIdentities.set(value, id);
  }
  return id;
}

/**
 * Helper functions to create TypeTags
 */
export const TypeTag = {
  /**
   * Create a TypeTag from a callable (class or function).
   * Primitive constructors map to their primitive tag.
   */
  of<T>(callable: Callable<T>): TypeTag<T> {
    if (isPrimitiveType(callable)) {
      return { kind: 'primitive', value: callable, name: PRIMITIVES.get(callable) ?? callable.name };
    }
    return { kind: 'callable', value: callable };
  },

  /**
   * Create a TypeTag from a symbol token (for representing interfaces)
   */
  token<T>(token: symbol): TypeTag<T> {
    return { kind: 'token', value: token, description: token.description || 'anonymous' };
  },

  /**
   * Create a TypeTag for a set of elements
   */
  set<T>(elementTag: TypeTag<T>): TypeTag<Set<T>> {
    return { kind: 'set', elementTag };
  },

  /**
   * Get a string representation of a TypeTag
   */
  toString(tag: TypeTag): string {
    switch (tag.kind) {
      case 'callable':
        return tag.value.name || '<anonymous>';
      case 'primitive':
        return tag.name;
      case 'token':
        return `token:${tag.description}`;
      case 'set':
        return `Set<${TypeTag.toString(tag.elementTag)}>`;
    }
  },

  /**
   * Stable hash of a TypeTag, structural over its identity
   */
  hash(tag: TypeTag): string {
    switch (tag.kind) {
      case 'callable':
        return `c${identityOf(tag.value)}`;
      case 'primitive':
        return `p:${tag.name}`;
      case 'token':
        return `t${identityOf(tag.value)}`;
      case 'set':
        return `s(${TypeTag.hash(tag.elementTag)})`;
    }
  },
};

/**
 * Unique identifier for a dependency in the dependency injection graph.
 * Can identify types by constructor, named bindings using @Id, or set bindings.
 */
export class DIKey<T = unknown> {
  private readonly _brand!: T; // Brand for type safety
  private readonly mapKey: string;

  constructor(
    public readonly type: TypeTag<T>,
    public readonly id?: Qualifier,
    private readonly ordinal?: number,
  ) {
    const base = `${TypeTag.hash(type)}|${DIKey.hashQualifier(id)}`;
    this.mapKey = ordinal === undefined ? base : `${base}|e${ordinal}`;
  }

  /**
   * Create a DIKey for a type
   */
  static of<T>(type: Callable<T>): DIKey<T> {
    return new DIKey(TypeTag.of(type));
  }

  /**
   * Create a named DIKey (for @Id bindings)
   */
  static named<T>(type: Callable<T>, id: Qualifier): DIKey<T> {
    return new DIKey(TypeTag.of(type), id);
  }

  /**
   * Create a DIKey for a symbol token (for interface bindings)
   */
  static token<T>(token: symbol, id?: Qualifier): DIKey<T> {
    return new DIKey<T>(TypeTag.token<T>(token), id);
  }

  /**
   * Create a DIKey for a set binding, optionally named
   */
  static set<T>(type: Callable<T>, id?: Qualifier): DIKey<Set<T>> {
    return new DIKey<Set<T>>(TypeTag.set(TypeTag.of(type)), id);
  }

  /**
   * Create a DIKey for a set binding using a symbol token
   */
  static setToken<T>(token: symbol, id?: Qualifier): DIKey<Set<T>> {
    return new DIKey<Set<T>>(TypeTag.set(TypeTag.token<T>(token)), id);
  }

  /**
   * Key of the set aggregating elements bound under this key's type and qualifier
   */
  toSetKey(): DIKey<Set<T>> {
    return new DIKey<Set<T>>(TypeTag.set(this.type), this.id);
  }

  /**
   * A key of the same type and qualifier that no other key equals,
   * used to address one contribution to a set
   */
  freshElement(): DIKey<T> {
    return new DIKey(this.type, this.id, nextElementOrdinal++);
  }

  /**
   * Same type, different qualifier
   */
  withId(id: Qualifier | undefined): DIKey<T> {
    return new DIKey(this.type, id);
  }

  /**
   * Check if this key matches another key
   */
  equals(other: DIKey<unknown>): boolean {
    return this.mapKey === other.mapKey;
  }

  /**
   * Get a string representation of this key for debugging and error messages
   */
  toString(): string {
    const typeName = TypeTag.toString(this.type);
    const element = this.ordinal === undefined ? '' : `#${this.ordinal}`;
    if (this.id === undefined) {
      return `${typeName}${element}`;
    }
    const idPart = typeof this.id === 'symbol' ? this.id.toString() : `"${this.id}"`;
    return `${typeName}@Id(${idPart})${element}`;
  }

  /**
   * Get a hashable key for use in Maps
   */
  toMapKey(): string {
    return this.mapKey;
  }

  private static hashQualifier(id: Qualifier | undefined): string {
    if (id === undefined) return '';
    return typeof id === 'symbol' ? `y${identityOf(id)}` : `n:${id}`;
  }
}

/**
 * Anything a binding or a lookup can be addressed by
 */
export type Target<T> = DIKey<T> | Callable<T> | symbol;

/**
 * Normalize a target into a DIKey
 */
export function toKey<T>(target: Target<T>): DIKey<T> {
  if (target instanceof DIKey) return target;
  if (typeof target === 'symbol') return DIKey.token<T>(target);
  return DIKey.of(target);
}
