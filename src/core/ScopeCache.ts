import type { DIKey } from '@/model/DIKey';

/**
 * Outcome of a commit: the canonical instance and whether this caller's instance became it
 */
export interface Commit {
  readonly instance: unknown;
  readonly won: boolean;
}

/**
 * Singleton instances of one injector.
 *
 * Each key is committed at most once; a later commit gets the existing instance back.
 * Async constructions in flight are tracked so that concurrent callers join them
 * instead of starting their own.
 */
export class ScopeCache {
  private readonly instances = new Map<string, unknown>();
  private readonly pending = new Map<string, Promise<unknown>>();

  has(key: DIKey<unknown>): boolean {
    return this.instances.has(key.toMapKey());
  }

  get(key: DIKey<unknown>): unknown {
    return this.instances.get(key.toMapKey());
  }

  /**
   * Store an instance unless one is already committed (first writer wins)
   */
  commit(key: DIKey<unknown>, instance: unknown): Commit {
    const mapKey = key.toMapKey();
    if (this.instances.has(mapKey)) {
      return { instance: this.instances.get(mapKey), won: false };
    }
    this.instances.set(mapKey, instance);
    return { instance, won: true };
  }

  /**
   * The async construction in flight for a key, if any
   */
  inFlight(key: DIKey<unknown>): Promise<unknown> | undefined {
    return this.pending.get(key.toMapKey());
  }

  track(key: DIKey<unknown>, construction: Promise<unknown>): void {
    this.pending.set(key.toMapKey(), construction);
  }

  /**
   * Forget an in-flight construction once it settled, unless another one replaced it
   */
  settle(key: DIKey<unknown>, construction: Promise<unknown>): void {
    const mapKey = key.toMapKey();
    if (this.pending.get(mapKey) === construction) {
      this.pending.delete(mapKey);
    }
  }

  clear(): void {
    this.instances.clear();
    this.pending.clear();
  }
}
