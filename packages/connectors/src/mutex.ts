/**
 * Keyed mutual exclusion.
 *
 * One promise chain per key, created on demand and dropped once idle.
 * Callers for different keys never wait on each other.
 */

import createDebug from "debug";

const debug = createDebug("calbot:connectors:mutex");

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier `run` for the same key has settled.
   * The result (or error) of `fn` is passed through unchanged.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key);
    if (previous) {
      debug("Waiting for lock on %s", key);
    }

    const result = (previous ?? Promise.resolve()).then(fn);
    // The chain continues whether fn resolved or threw
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether some caller currently holds or waits for the key */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a holder or waiters. Visible for testing. */
  get size(): number {
    return this.tails.size;
  }
}
