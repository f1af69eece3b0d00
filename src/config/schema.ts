/**
 * Configuration schema validation with Zod
 */

import { join } from "path";
import { z } from "zod";

const homeDir = process.env["HOME"] || "~";
const defaultDataDir = join(homeDir, ".lifecycle-telemetry");

export const DEFAULT_SERVER_URL = "https://telemetry.example.com/v2/track";

export const configSchema = z.object({
  appIdentifier: z.string().default("").describe("App identifier attached to telemetry items"),

  serverUrl: z
    .string()
    .url("TELEMETRY_SERVER_URL must be a valid URL")
    .default(DEFAULT_SERVER_URL)
    .describe("Collection endpoint for telemetry batches"),

  dataDir: z.string().default(defaultDataDir).describe("Base directory for persisted batches"),

  maxBatchCount: z
    .number()
    .int()
    .positive()
    .default(50)
    .describe("Buffered items that force a channel flush"),

  maxBatchIntervalMs: z
    .number()
    .int()
    .positive()
    .default(15000)
    .describe("Longest buffering time before a flush in milliseconds (default 15s)"),

  maxConcurrentRequests: z
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Batches the sender may post at once"),

  nodeEnv: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Environment mode"),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info").describe("Log level"),
});

export type ConfigInput = z.input<typeof configSchema>;
export type ConfigOutput = z.output<typeof configSchema>;

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? Number.parseInt(raw, 10) : undefined;
}

/**
 * Parse environment variables into config input
 */
export function parseEnvVars(): ConfigInput {
  return {
    appIdentifier: process.env["TELEMETRY_APP_ID"] || "",
    serverUrl: process.env["TELEMETRY_SERVER_URL"] || undefined,
    dataDir: process.env["TELEMETRY_DATA_DIR"] || undefined,
    maxBatchCount: parseIntEnv("TELEMETRY_MAX_BATCH_COUNT"),
    maxBatchIntervalMs: parseIntEnv("TELEMETRY_MAX_BATCH_INTERVAL_MS"),
    maxConcurrentRequests: parseIntEnv("TELEMETRY_MAX_CONCURRENT_REQUESTS"),
    nodeEnv: (process.env["NODE_ENV"] as ConfigOutput["nodeEnv"]) || "production",
    logLevel: (process.env["LOG_LEVEL"] as ConfigOutput["logLevel"]) || "info",
  };
}
