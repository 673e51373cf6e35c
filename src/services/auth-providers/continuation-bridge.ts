/**
 * Continuation Bridge
 *
 * Single-slot result channel that turns one delegate callback into one
 * awaited value. At most one waiter exists; a second request while one is
 * pending is refused rather than replacing the first caller's waiter.
 */

export class BridgeBusyError extends Error {
  constructor(message = 'A request is already waiting for a result') {
    super(message);
    this.name = 'BridgeBusyError';
  }
}

export class ContinuationBridge<T> {
  private waiter: ((value: T) => void) | null = null;

  get isPending(): boolean {
    return this.waiter !== null;
  }

  /**
   * Install the waiter, then run `start` (which triggers the callback source).
   * Rejects with BridgeBusyError when the slot is taken; `start` is not called.
   */
  await(start: () => void): Promise<T> {
    if (this.waiter) {
      return Promise.reject(new BridgeBusyError());
    }

    return new Promise<T>((resolve, reject) => {
      this.waiter = resolve;
      try {
        start();
      } catch (error) {
        this.waiter = null;
        reject(error);
      }
    });
  }

  /**
   * Settle the pending waiter. Returns false (and does nothing) when no
   * waiter is installed.
   */
  resolve(value: T): boolean {
    const waiter = this.waiter;
    if (!waiter) return false;
    this.waiter = null;
    waiter(value);
    return true;
  }
}
