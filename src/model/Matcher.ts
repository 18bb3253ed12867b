import type { Callable, Constructor } from '@/model/DIKey';
import type { FieldMarker } from '@/model/FieldMarker';

/**
 * A pure predicate, composable with and() / or() / not().
 */
export abstract class Matcher<T> {
  abstract matches(value: T): boolean;

  and(other: Matcher<T>): Matcher<T> {
    return Matchers.predicate(value => this.matches(value) && other.matches(value), `and(${this}, ${other})`);
  }

  or(other: Matcher<T>): Matcher<T> {
    return Matchers.predicate(value => this.matches(value) || other.matches(value), `or(${this}, ${other})`);
  }

  toString(): string {
    return this.constructor.name;
  }
}

/**
 * Matcher over the classes the injector materializes
 */
export type TypeMatcher = Matcher<Constructor>;

class PredicateMatcher<T> extends Matcher<T> {
  constructor(
    private readonly predicate: (value: T) => boolean,
    private readonly description: string,
  ) {
    super();
  }

  matches(value: T): boolean {
    return this.predicate(value);
  }

  toString(): string {
    return this.description;
  }
}

export const Matchers = {
  /**
   * Matches everything
   */
  any<T = Constructor>(): Matcher<T> {
    return new PredicateMatcher<T>(() => true, 'any()');
  },

  /**
   * Matches exactly the given class
   */
  only(type: Callable): TypeMatcher {
    return new PredicateMatcher<Constructor>(candidate => candidate === type, `only(${type.name})`);
  },

  /**
   * Matches a class and every class extending it
   */
  subclassesOf(base: Callable): TypeMatcher {
    return new PredicateMatcher<Constructor>(
      candidate => candidate === base || candidate.prototype instanceof base,
      `subclassesOf(${base.name})`,
    );
  },

  /**
   * Capability check: matches classes whose instances expose a method with the given name
   */
  hasMethod(name: string | symbol): TypeMatcher {
    return new PredicateMatcher<Constructor>(
      candidate => typeof Reflect.get(candidate.prototype, name) === 'function',
      `hasMethod(${String(name)})`,
    );
  },

  /**
   * Matches classes with at least one field carrying the marker
   */
  annotatedWith(marker: FieldMarker): TypeMatcher {
    return new PredicateMatcher<Constructor>(candidate => marker.isPresentOn(candidate), `annotatedWith(${marker})`);
  },

  not<T>(matcher: Matcher<T>): Matcher<T> {
    return new PredicateMatcher<T>(value => !matcher.matches(value), `not(${matcher})`);
  },

  /**
   * Wrap an arbitrary pure predicate
   */
  predicate<T>(predicate: (value: T) => boolean, description = 'predicate'): Matcher<T> {
    return new PredicateMatcher(predicate, description);
  },
};
