/**
 * Fixed request pacing.
 *
 * Waits a flat delay before every request. The delay does not adapt to
 * response latency or to earlier failures.
 *
 * @module pacer
 */

export class RequestPacer {
  private readonly delayMs: number;

  constructor(delayMs: number) {
    this.delayMs = Math.max(0, delayMs);
  }

  get delay(): number {
    return this.delayMs;
  }

  /**
   * Wait the configured delay. Resolves immediately when the delay is 0.
   */
  async wait(): Promise<void> {
    if (this.delayMs > 0) {
      await this.sleep(this.delayMs);
    }
  }

  /**
   * Sleep for a given number of milliseconds.
   * Extracted as a method so tests can override it.
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
