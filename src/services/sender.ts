/**
 * HttpSender - posts persisted batches to the collection endpoint
 *
 * A batch is deleted after a 2xx response and released otherwise. Retry
 * policy belongs to whoever triggers sending next; nothing here loops.
 */

import type { Logger } from "pino";
import type { Persistence, Sender } from "../types/telemetry";
import { type BatchStore, isBatchStore } from "./persistence";

export interface HttpSenderOptions {
  serverUrl: string;
  maxConcurrentRequests: number;
  fetchFn?: typeof fetch;
}

export class HttpSender implements Sender {
  private serverUrl: string;
  private maxConcurrentRequests: number;
  private fetchFn: typeof fetch;
  private store: BatchStore | null = null;
  private activeRequests = 0;
  private log: Logger;

  constructor(options: HttpSenderOptions, logger: Logger) {
    this.serverUrl = options.serverUrl;
    this.maxConcurrentRequests = options.maxConcurrentRequests;
    this.fetchFn = options.fetchFn ?? fetch;
    this.log = logger;
  }

  setPersistence(persistence: Persistence): void {
    if (!isBatchStore(persistence)) {
      this.log.warn("Persistence does not expose stored batches; nothing will be sent");
      this.store = null;
      return;
    }
    this.store = persistence;
  }

  setCustomServerURL(url: string): void {
    this.serverUrl = url;
    this.log.info({ serverUrl: url }, "Custom server URL set");
  }

  getServerURL(): string {
    return this.serverUrl;
  }

  /**
   * Start sending the next batch unless the request limit is reached.
   * Keeps going while batches are delivered.
   */
  triggerSending(): void {
    if (!this.store) {
      this.log.debug("No persistence attached, skipping send");
      return;
    }
    if (this.activeRequests >= this.maxConcurrentRequests) {
      this.log.debug({ activeRequests: this.activeRequests }, "Request limit reached");
      return;
    }

    this.activeRequests++;
    this.send()
      .then((sent) => {
        this.activeRequests--;
        if (sent) this.triggerSending();
      })
      .catch((error: unknown) => {
        this.activeRequests--;
        this.log.error({ error }, "Sending failed");
      });
  }

  /**
   * Send one batch. Resolves true when a batch was delivered and deleted.
   */
  async send(): Promise<boolean> {
    const store = this.store;
    if (!store) return false;

    const batchPath = await store.nextAvailableBatch();
    if (!batchPath) return false;

    try {
      const body = await store.load(batchPath);
      const response = await this.fetchFn(this.serverUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-json-stream" },
        body,
      });

      if (!response.ok) {
        this.log.warn({ status: response.status, batchPath }, "Batch rejected by server");
        store.makeAvailable(batchPath);
        return false;
      }

      await store.deleteBatch(batchPath);
      this.log.debug({ batchPath }, "Batch delivered");
      return true;
    } catch (error: unknown) {
      store.makeAvailable(batchPath);
      this.log.warn({ error, batchPath }, "Failed to deliver batch");
      return false;
    }
  }
}
