import 'reflect-metadata';
import { PARAM_IDS_METADATA_KEY } from '@/model/metadata';
import type { Qualifier } from '@/model/DIKey';

/**
 * Decorator to mark a constructor parameter with a named identifier.
 * Used to distinguish multiple bindings of the same type.
 *
 * Example:
 *   @Reflected(Database)
 *   class MyService {
 *     constructor(@Id('primary') db: Database) {}
 *   }
 *
 * Symbols work as well:
 *   const Replica = Symbol('replica');
 *   class MyService {
 *     constructor(@Id(Replica) db: Database) {}
 *   }
 */
export function Id(id: Qualifier): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    // For constructor parameters: target is the constructor, propertyKey is undefined
    // For method parameters: target is the prototype, propertyKey is the method name
    const property = propertyKey ?? 'constructor';
    const ids = new Map(getAllParameterIds(target, property));
    ids.set(parameterIndex, id);
    Reflect.defineMetadata(PARAM_IDS_METADATA_KEY, ids, target, property);
  };
}

/**
 * Get all @Id annotations for a constructor's parameters
 */
export function getAllParameterIds(
  target: object,
  propertyKey: string | symbol = 'constructor',
): ReadonlyMap<number, Qualifier> {
  const stored: unknown = Reflect.getOwnMetadata(PARAM_IDS_METADATA_KEY, target, propertyKey);
  return stored instanceof Map ? stored : new Map();
}
