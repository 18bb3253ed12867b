import type { Constructor, Target } from '@/model/DIKey';
import type { Provider } from '@/model/Dependency';
import type { TypeMatcher } from '@/model/Matcher';

/**
 * A deferred action applied to a freshly constructed instance before it is returned
 */
export type MembersInjector<T> = (instance: T) => void;

/**
 * Handle given to a listener while it hears a type
 */
export interface TypeEncounter<I> {
  /**
   * Run the injector on every instance of the heard type, this one and all later ones
   */
  register(membersInjector: MembersInjector<I>): void;

  /**
   * Provider for a binding of the injector, usable from members injectors
   */
  getProvider<T>(target: Target<T>): Provider<T>;
}

/**
 * Observer invoked the first time the injector materializes a matching class.
 */
export interface TypeListener {
  hear<I extends object>(type: Constructor<I>, encounter: TypeEncounter<I>): void;
}

/**
 * Source of providers handed to encounters
 */
export type ProviderSource = <T>(target: Target<T>) => Provider<T>;

type ErasedInjector = (instance: object) => void;

/**
 * Matches classes against registered listeners and remembers the members injectors
 * they registered, so each class is heard exactly once.
 */
export class TypeObservationPipeline {
  private readonly listeners: { matcher: TypeMatcher; listener: TypeListener }[] = [];
  private readonly heard = new WeakMap<Constructor, readonly ErasedInjector[]>();

  constructor(private readonly providers: ProviderSource) {}

  addListener(matcher: TypeMatcher, listener: TypeListener): void {
    this.listeners.push({ matcher, listener });
  }

  /**
   * Apply the members injectors of a class to an instance of it,
   * hearing the class first if it was never heard before.
   */
  injectMembers<I extends object>(type: Constructor<I>, instance: I): void {
    for (const injector of this.injectorsFor(type)) {
      injector(instance);
    }
  }

  private injectorsFor<I extends object>(type: Constructor<I>): readonly ErasedInjector[] {
    const known = this.heard.get(type);
    if (known !== undefined) {
      return known;
    }

    const injectors: ErasedInjector[] = [];
    const encounter: TypeEncounter<I> = {
      register: membersInjector => {
        injectors.push(instance => {
          if (instance instanceof type) {
            membersInjector(instance);
          }
        });
      },
      getProvider: target => this.providers(target),
    };

    // A listener that throws leaves the class unheard, so the next resolution retries
    for (const { matcher, listener } of this.listeners) {
      if (matcher.matches(type)) {
        listener.hear(type, encounter);
      }
    }

    this.heard.set(type, injectors);
    return injectors;
  }
}
