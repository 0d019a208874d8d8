/**
 * De-duplicates concurrent async operations sharing a key: while one is
 * pending, later callers with the same key receive the same promise.
 */
export class SingleFlight<T> {
  private readonly pending = new Map<string, Promise<T>>();

  public run(key: string, operation: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key);
    if (existing) {
      return existing;
    }

    const promise = operation().finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, promise);
    return promise;
  }

  public isPending(key: string): boolean {
    return this.pending.has(key);
  }

  public get size(): number {
    return this.pending.size;
  }
}
