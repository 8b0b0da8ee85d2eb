/**
 * Coalesces concurrent calls for the same key into one promise.
 *
 * The entry is dropped once the promise settles, so a rejection is shared by
 * the callers that were waiting on it and never reused afterwards.
 */
export class InflightRequests<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  /**
   * Runs `fn` unless a call for `key` is already pending, in which case the
   * pending promise is returned.
   */
  coalesce(key: string, fn: () => Promise<T>): { promise: Promise<T>; shared: boolean } {
    const existing = this.inflight.get(key);
    if (existing) {
      return { promise: existing, shared: true };
    }

    const promise = fn().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return { promise, shared: false };
  }

  get size(): number {
    return this.inflight.size;
  }
}
