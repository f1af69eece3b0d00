/**
 * TelemetryChannel - buffers envelopes and hands batches to persistence
 *
 * Flushes when the buffer reaches maxBatchCount or maxBatchIntervalMs after
 * the first buffered item. Writes run one at a time on a MessageQueue.
 */

import type { Logger } from "pino";
import type { Channel, Data, Persistence, TelemetryItem } from "../types/telemetry";
import { MessageQueue } from "../utils/queue";
import type { TelemetryContext } from "./context";

export interface ChannelOptions {
  maxBatchCount: number;
  maxBatchIntervalMs: number;
}

export class TelemetryChannel implements Channel {
  private telemetryContext: TelemetryContext;
  private persistence: Persistence;
  private options: ChannelOptions;
  private buffer: TelemetryItem[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private writes: MessageQueue;
  private logger: Logger;

  constructor(
    telemetryContext: TelemetryContext,
    persistence: Persistence,
    options: ChannelOptions,
    logger: Logger
  ) {
    this.telemetryContext = telemetryContext;
    this.persistence = persistence;
    this.options = options;
    this.logger = logger;
    this.writes = new MessageQueue(logger);
  }

  log(envelope: Data): void {
    this.buffer.push({
      time: new Date().toISOString(),
      context: this.telemetryContext.snapshot(),
      data: envelope,
    });

    if (this.buffer.length >= this.options.maxBatchCount) {
      this.enqueueFlush();
    } else if (!this.timer) {
      this.timer = setTimeout(() => this.enqueueFlush(), this.options.maxBatchIntervalMs);
      this.timer.unref();
    }
  }

  /**
   * Flush buffered items and wait for every pending write.
   */
  flush(): Promise<void> {
    this.enqueueFlush();
    return this.writes.drain();
  }

  bufferedCount(): number {
    return this.buffer.length;
  }

  private enqueueFlush(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.buffer.length === 0) return;

    const items = this.buffer;
    this.buffer = [];
    this.writes.enqueue(async () => {
      await this.persistence.persist(items);
      this.logger.debug({ count: items.length }, "Channel flushed");
    });
  }
}
