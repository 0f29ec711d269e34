import { DomainLockedError } from '../errors/errors.js';

/**
 * Mutual exclusion for one state domain.
 *
 * Store operations are synchronous, so on a single thread two units can never
 * interleave inside `run()`. What can happen is re-entry: a backing store whose
 * `set()` calls back into the same domain. The lock refuses that instead of
 * letting the inner mutation land between the outer read and write.
 */
export class DomainLock {
  private held = false;

  constructor(readonly domain: string) {}

  get isHeld(): boolean {
    return this.held;
  }

  run<T>(fn: () => T): T {
    if (this.held) throw new DomainLockedError(this.domain);
    this.held = true;
    try {
      return fn();
    } finally {
      this.held = false;
    }
  }
}
