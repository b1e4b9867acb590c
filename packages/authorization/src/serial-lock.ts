/**
 * SerialLock: runs async tasks one at a time, in arrival order.
 *
 * Each component owns one lock and routes every mutating operation
 * through it, so an operation's effects are never interleaved with
 * another's.
 *
 * The lock is re-entrant within the async context of the running task:
 * a collaborator called from inside a task (e.g. a transfer recipient
 * calling back into the vault) runs immediately as part of that task
 * instead of queueing behind it. Once the task settles its context
 * no longer counts as holding the lock.
 */

import { AsyncLocalStorage } from "node:async_hooks";

interface Hold {
  active: boolean;
}

export class SerialLock {
  private readonly context = new AsyncLocalStorage<Hold>();
  private tail: Promise<void> = Promise.resolve();

  /**
   * Whether the caller is running inside a task of this lock.
   */
  get held(): boolean {
    return this.context.getStore()?.active === true;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    if (this.held) {
      return new Promise<T>((resolve) => resolve(task()));
    }

    const hold: Hold = { active: true };
    const result = this.tail
      .then(() => this.context.run(hold, task))
      .finally(() => {
        hold.active = false;
      });

    // The tail only orders tasks; failures reach callers through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );

    return result;
  }
}
