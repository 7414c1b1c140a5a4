/**
 * Per-invocation memoization
 * Each key is computed at most once; the published value is frozen and shared by every caller.
 */

import { deepFreeze } from './freeze';

/**
 * Typed cache key. Keys compare by identity, so two keys with the same name never collide.
 */
export interface OnceKey<T> {
  readonly name: string;
  /** Phantom field carrying the value type */
  readonly __value?: T;
}

export function createOnceKey<T>(name: string): OnceKey<T> {
  return Object.freeze({ name });
}

type Entry =
  | { state: 'pending'; promise: Promise<unknown> }
  | { state: 'done'; value: unknown }
  | { state: 'failed'; error: unknown };

export class OnceCache {
  private readonly _entries = new Map<OnceKey<unknown>, Entry>();

  /**
   * @param fingerprint - identity of the configuration this cache belongs to
   */
  constructor(readonly fingerprint: string) {}

  get size(): number {
    return this._entries.size;
  }

  has(key: OnceKey<unknown>): boolean {
    const entry = this._entries.get(key);
    return entry !== undefined && entry.state !== 'pending';
  }

  /**
   * Synchronous get-or-compute. A factory that throws is not retried: the error is stored and
   * rethrown to every later caller.
   */
  once<T>(key: OnceKey<T>, factory: () => T): T {
    const entry = this._entries.get(key);
    if (entry !== undefined) {
      return this.settled<T>(key, entry);
    }

    try {
      const value = deepFreeze(factory());
      this._entries.set(key, { state: 'done', value });
      return value;
    } catch (error) {
      this._entries.set(key, { state: 'failed', error });
      throw error;
    }
  }

  /**
   * Single-flight get-or-compute. Concurrent first callers share one in-flight computation;
   * none of them sees the value before it is complete.
   */
  getOrCompute<T>(key: OnceKey<T>, factory: () => T | Promise<T>): Promise<T> {
    const entry = this._entries.get(key);
    if (entry !== undefined) {
      if (entry.state === 'pending') {
        return this.pending<T>(entry.promise);
      }
      try {
        return Promise.resolve(this.settled<T>(key, entry));
      } catch (error) {
        return Promise.reject(error);
      }
    }

    const promise = Promise.resolve()
      .then(factory)
      .then(
        (result) => {
          const value = deepFreeze(result);
          this._entries.set(key, { state: 'done', value });
          return value;
        },
        (error: unknown) => {
          this._entries.set(key, { state: 'failed', error });
          throw error;
        },
      );
    this._entries.set(key, { state: 'pending', promise });
    return promise;
  }

  private settled<T>(key: OnceKey<T>, entry: Entry): T {
    switch (entry.state) {
      case 'done':
        return entry.value as T;
      case 'failed':
        throw entry.error;
      case 'pending':
        throw new Error(`Value for "${key.name}" is still being computed asynchronously`);
    }
  }

  private async pending<T>(promise: Promise<unknown>): Promise<T> {
    return (await promise) as T;
  }
}
