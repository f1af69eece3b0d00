/**
 * FilePersistence - durable queue of telemetry batches
 *
 * Each batch is one JSON-lines file, written atomically (temp file, rename).
 * A batch handed to the sender is reserved until it is deleted or made
 * available again.
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, readdir, rename, unlink, writeFile } from "fs/promises";
import { join } from "path";
import type { Logger } from "pino";
import type { Persistence, Sender, TelemetryItem } from "../types/telemetry";

const BATCH_EXTENSION = ".jsonl";

/**
 * Persistence that also lets a sender walk the stored batches.
 */
export interface BatchStore extends Persistence {
  nextAvailableBatch(): Promise<string | null>;
  load(batchPath: string): Promise<string>;
  deleteBatch(batchPath: string): Promise<void>;
  makeAvailable(batchPath: string): void;
}

export function isBatchStore(persistence: Persistence): persistence is BatchStore {
  const candidate: Partial<BatchStore> = persistence;
  return (
    typeof candidate.nextAvailableBatch === "function" &&
    typeof candidate.load === "function" &&
    typeof candidate.deleteBatch === "function" &&
    typeof candidate.makeAvailable === "function"
  );
}

export class FilePersistence implements BatchStore {
  private directory: string;
  private sender: Sender;
  private reserved = new Set<string>();
  private log: Logger;

  constructor(context: { dataDir: string }, sender: Sender, logger: Logger) {
    this.directory = join(context.dataDir, "telemetry");
    this.sender = sender;
    this.log = logger;
  }

  /**
   * Write items as a new batch and nudge the sender.
   * Returns the batch path, or null when there was nothing to write.
   */
  async persist(items: TelemetryItem[]): Promise<string | null> {
    if (items.length === 0) return null;

    await mkdir(this.directory, { recursive: true });

    const batchPath = join(this.directory, `${Date.now()}-${randomUUID()}${BATCH_EXTENSION}`);
    const tmpFile = `${batchPath}.tmp`;
    const body = items.map((item) => JSON.stringify(item)).join("\n");

    await writeFile(tmpFile, body);
    await rename(tmpFile, batchPath);
    this.log.debug({ batchPath, count: items.length }, "Batch persisted");

    this.sender.triggerSending?.();
    return batchPath;
  }

  /**
   * Reserve the oldest batch nobody is working on.
   */
  async nextAvailableBatch(): Promise<string | null> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error: unknown) {
      const err = error as Record<string, unknown>;
      if (err?.["code"] !== "ENOENT") {
        this.log.warn({ error: err?.["message"] }, "Failed to list batches");
      }
      return null;
    }

    const next = entries
      .filter((name) => name.endsWith(BATCH_EXTENSION))
      .sort()
      .map((name) => join(this.directory, name))
      .find((batchPath) => !this.reserved.has(batchPath));

    if (!next) return null;

    this.reserved.add(next);
    return next;
  }

  async load(batchPath: string): Promise<string> {
    return readFile(batchPath, "utf-8");
  }

  async deleteBatch(batchPath: string): Promise<void> {
    try {
      await unlink(batchPath);
      this.log.debug({ batchPath }, "Batch deleted");
    } finally {
      this.reserved.delete(batchPath);
    }
  }

  makeAvailable(batchPath: string): void {
    this.reserved.delete(batchPath);
  }
}
