/**
 * Configuration types for lifecycle telemetry
 */

export interface TelemetryConfig {
  /** App identifier attached to every telemetry item (empty = not configured) */
  appIdentifier: string;

  /** Collection endpoint batches are posted to */
  serverUrl: string;

  /** Base directory for persisted telemetry batches */
  dataDir: string;

  /** Number of buffered items that forces a channel flush */
  maxBatchCount: number;

  /** Longest time an item may sit in the channel buffer, in milliseconds */
  maxBatchIntervalMs: number;

  /** Upper bound on batches the sender posts at the same time */
  maxConcurrentRequests: number;

  /** Environment mode */
  nodeEnv: "development" | "production" | "test";

  /** Log level */
  logLevel: "debug" | "info" | "warn" | "error";
}
