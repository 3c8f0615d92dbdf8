import { ConcurrencyConflict } from "../utils/errors.js";

type Release = () => void;

/**
 * FIFO mutex per key. Used by the memory store as the per-parent
 * serialization point that row locks provide in a database.
 */
export class KeyedLock {
  private readonly held = new Set<string>();
  private readonly waiters = new Map<string, Array<(release: Release) => void>>();

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  queueDepth(key: string): number {
    return this.waiters.get(key)?.length ?? 0;
  }

  /**
   * Resolves with a release function once `key` is free. Rejects with
   * ConcurrencyConflict when the wait exceeds `timeoutMs`.
   */
  acquire(key: string, timeoutMs: number): Promise<Release> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      const queue = this.waiters.get(key) ?? [];
      let timer: ReturnType<typeof setTimeout> | undefined;

      const grant = (release: Release) => {
        if (timer) clearTimeout(timer);
        resolve(release);
      };

      timer = setTimeout(() => {
        const index = queue.indexOf(grant);
        if (index >= 0) queue.splice(index, 1);
        if (queue.length === 0) this.waiters.delete(key);
        reject(new ConcurrencyConflict(`Timed out after ${timeoutMs}ms waiting for lock "${key}"`, { key }));
      }, timeoutMs);

      queue.push(grant);
      this.waiters.set(key, queue);
    });
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const queue = this.waiters.get(key);
      const next = queue?.shift();
      if (queue && queue.length === 0) this.waiters.delete(key);

      // Ownership passes straight to the next waiter; the key stays held.
      if (next) next(this.releaser(key));
      else this.held.delete(key);
    };
  }
}
