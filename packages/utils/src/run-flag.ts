/**
 * Run flag shared by the channel loop and the liveness reporter.
 *
 * Starts running and is cleared exactly once; there is no way back to running.
 * `sleep()` resolves early when the flag is cleared so waiting tasks wind down
 * on their next check instead of after a full interval.
 */

export type StopListener = (reason: string) => void;

export class RunFlag {
  private running = true;
  private reason?: string;
  private listeners = new Set<StopListener>();

  get isRunning(): boolean {
    return this.running;
  }

  get stopReason(): string | undefined {
    return this.reason;
  }

  /**
   * Clear the flag. Returns false when it was already cleared.
   */
  stop(reason = 'stop requested'): boolean {
    if (!this.running) return false;
    this.running = false;
    this.reason = reason;

    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
    return true;
  }

  /**
   * Register a listener for the stop transition. Returns an unsubscribe function.
   * Listeners registered after the flag is cleared run immediately.
   */
  onStop(listener: StopListener): () => void {
    if (!this.running) {
      listener(this.reason ?? 'stop requested');
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Wait `ms`, or less if the flag is cleared meanwhile.
   */
  sleep(ms: number): Promise<void> {
    if (!this.running) return Promise.resolve();

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve();
      }, ms);
      const unsubscribe = this.onStop(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}
