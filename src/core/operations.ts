/**
 * core/operations.ts
 *
 * Tracks in-flight tool calls so a shutdown can wait for them.
 */

export class OperationTracker {
  private readonly active = new Set<Promise<unknown>>();

  get size(): number {
    return this.active.size;
  }

  track<T>(operation: Promise<T>): Promise<T> {
    this.active.add(operation);
    const settle = (): void => {
      this.active.delete(operation);
    };
    operation.then(settle, settle);
    return operation;
  }

  /** Resolves once nothing is in flight, including work tracked while waiting. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.allSettled(Array.from(this.active));
    }
  }
}
