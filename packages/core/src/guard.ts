import { CustomError } from './errors.js';

/**
 * Per-instance mutual exclusion for state-mutating entry points.
 * A call that re-enters while the lock is held fails with
 * `ReentrancyGuardReentrantCall`; the lock is released on every exit path.
 */
export class ReentrancyGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.entered) {
      throw new CustomError('ReentrancyGuardReentrantCall', [], 'state');
    }
    this.entered = true;
    try {
      return await fn();
    } finally {
      this.entered = false;
    }
  }
}
