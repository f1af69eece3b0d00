/**
 * MessageQueue - Promise-chain-based FIFO queue
 *
 * Runs async tasks one after another, in the order they were enqueued,
 * off the caller's stack. Callers get no result back.
 */

import type { Logger } from "pino";
import { createLogger } from "./logger";

export class MessageQueue {
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;
  private processing = false;
  private log: Logger;

  constructor(logger: Logger = createLogger("queue")) {
    this.log = logger;
  }

  /**
   * Adds an async operation to the FIFO queue.
   * If queue was empty, execution begins on the next microtask.
   */
  enqueue(fn: () => Promise<void> | void): void {
    const wasIdle = !this.processing && this.pending === 0;

    if (wasIdle) {
      this.processing = true;
    } else {
      this.pending++;
    }

    this.chain = this.chain.then(async () => {
      if (!wasIdle) {
        this.pending--;
      }

      try {
        await fn();
      } catch (error) {
        // Logged, not rethrown, so later tasks still run
        this.log.error({ error }, "Queue task failed");
      } finally {
        if (this.pending === 0) {
          this.processing = false;
        }
      }
    });
  }

  /**
   * Resolves once every task enqueued so far has settled.
   */
  drain(): Promise<void> {
    return this.chain;
  }

  /**
   * Returns pending (not yet started) items count
   */
  size(): number {
    return this.pending;
  }

  /**
   * Returns true if a queued function is currently executing
   */
  isProcessing(): boolean {
    return this.processing;
  }
}
