/**
 * Anything holding a resource released on shutdown
 */
export interface Closeable {
  close(): void | Promise<void>;
}

export function isCloseable(value: unknown): value is Closeable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'close' in value &&
    typeof value.close === 'function'
  );
}

/**
 * Tracks closeable singletons and releases them in reverse order of creation
 * (LIFO - Last In, First Out), so dependents close before their dependencies.
 */
export class LifecycleManager {
  private resources: Closeable[] = [];

  /**
   * Track a resource for cleanup
   */
  track(resource: Closeable): void {
    this.resources.push(resource);
  }

  size(): number {
    return this.resources.length;
  }

  /**
   * Release all tracked resources in reverse order (LIFO)
   */
  async releaseAll(): Promise<void> {
    const errors: Error[] = [];

    let resource = this.resources.pop();
    while (resource !== undefined) {
      try {
        await resource.close();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
      resource = this.resources.pop();
    }

    if (errors.length > 0) {
      throw new AggregateLifecycleError(errors);
    }
  }
}

/**
 * Error that aggregates multiple cleanup errors
 */
export class AggregateLifecycleError extends Error {
  constructor(public readonly errors: Error[]) {
    super(
      `Multiple errors during lifecycle cleanup:\n` +
      errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n')
    );
    this.name = 'AggregateLifecycleError';
  }
}
