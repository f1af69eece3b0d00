/**
 * Structured logging with Pino
 *
 * LOG_LEVEL and NODE_ENV go through the config schema, so an unknown level
 * ends up as the schema default.
 */

import pino, { type Logger } from "pino";
import { configSchema } from "../config/schema";
import type { TelemetryConfig } from "../types/config";

export type LogLevel = TelemetryConfig["logLevel"];

const levelSetting = configSchema.shape.logLevel.safeParse(process.env["LOG_LEVEL"] || undefined);
const envSetting = configSchema.shape.nodeEnv.safeParse(process.env["NODE_ENV"] || undefined);

export const logLevel: LogLevel = levelSetting.success ? levelSetting.data : "info";

export const logger = pino({
  level: logLevel,
  transport:
    envSetting.success && envSetting.data === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  base: {
    service: "lifecycle-telemetry",
  },
});

/**
 * Child logger tagged with the module that owns it
 */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
