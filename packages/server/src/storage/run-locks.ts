import { LockTimeoutError } from './errors.js';

/**
 * Releases a held lock. Calling it more than once has no effect.
 */
export type LockRelease = () => void;

interface LockWaiter {
  grant: () => void;
}

/**
 * Exclusive per-run locks with FIFO hand-off.
 *
 * A run id is locked while it has an entry in `queues`; the entry holds the
 * callers waiting for it, in arrival order.
 */
export class RunLockManager {
  private readonly queues = new Map<string, LockWaiter[]>();

  /**
   * Wait for the lock on `runId`, failing with LockTimeoutError after
   * `timeoutMs`.
   */
  acquire(runId: string, timeoutMs: number): Promise<LockRelease> {
    const queue = this.queues.get(runId);
    if (!queue) {
      this.queues.set(runId, []);
      return Promise.resolve(this.createRelease(runId));
    }

    return new Promise<LockRelease>((resolve, reject) => {
      const waiter: LockWaiter = {
        grant: () => {
          clearTimeout(timer);
          resolve(this.createRelease(runId));
        },
      };

      const timer = setTimeout(() => {
        const index = queue.indexOf(waiter);
        if (index !== -1) {
          queue.splice(index, 1);
        }
        reject(new LockTimeoutError(runId, timeoutMs));
      }, timeoutMs);

      queue.push(waiter);
    });
  }

  isLocked(runId: string): boolean {
    return this.queues.has(runId);
  }

  /**
   * Number of callers waiting on a run's lock.
   */
  getWaitingCount(runId: string): number {
    return this.queues.get(runId)?.length ?? 0;
  }

  private createRelease(runId: string): LockRelease {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const queue = this.queues.get(runId);
      const next = queue?.shift();
      if (next) {
        next.grant();
      } else {
        this.queues.delete(runId);
      }
    };
  }
}
