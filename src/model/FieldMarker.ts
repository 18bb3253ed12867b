import 'reflect-metadata';
import type { Constructor } from '@/model/DIKey';

/**
 * A user-defined field annotation.
 * The container never acts on a marker by itself; type listeners read the marked
 * fields of the classes they hear and register members injectors for them.
 *
 * Example:
 *   const InjectSetting = new FieldMarker('InjectSetting');
 *
 *   class Mailer {
 *     @InjectSetting.mark() host?: string;
 *   }
 *
 *   module.bindListener(Matchers.annotatedWith(InjectSetting), {
 *     hear(type, encounter) {
 *       for (const field of InjectSetting.fieldsOf(type)) {
 *         encounter.register(instance => Reflect.set(instance, field, settings[String(field)]));
 *       }
 *     },
 *   });
 */
export class FieldMarker {
  private readonly metadataKey: symbol;

  constructor(public readonly name: string) {
    this.metadataKey = Symbol(`keystone:field-marker:${name}`);
  }

  /**
   * Property decorator recording the decorated field
   */
  mark(): PropertyDecorator {
    return (target, property) => {
      const fields = [...this.fieldsOfPrototype(target), property];
      Reflect.defineMetadata(this.metadataKey, fields, target);
    };
  }

  /**
   * Fields of a class carrying this marker, inherited ones first
   */
  fieldsOf(type: Constructor): readonly (string | symbol)[] {
    return this.fieldsOfPrototype(type.prototype);
  }

  isPresentOn(type: Constructor): boolean {
    return this.fieldsOf(type).length > 0;
  }

  toString(): string {
    return `@${this.name}`;
  }

  private fieldsOfPrototype(prototype: object): readonly (string | symbol)[] {
    const stored: unknown = Reflect.getMetadata(this.metadataKey, prototype);
    return Array.isArray(stored)
      ? stored.filter((field): field is string | symbol => typeof field === 'string' || typeof field === 'symbol')
      : [];
  }
}
