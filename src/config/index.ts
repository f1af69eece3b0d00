/**
 * Configuration loader with validation
 */

import { ZodError } from "zod";
import type { TelemetryConfig } from "../types/config";
import { configSchema, parseEnvVars } from "./schema";

export { configSchema, DEFAULT_SERVER_URL } from "./schema";

/**
 * Load and validate configuration from environment variables
 * @throws Error if a value is present but invalid
 */
export function loadConfig(): TelemetryConfig {
  const input = parseEnvVars();

  try {
    return configSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
      throw new Error(`Configuration validation failed:\n${issues.join("\n")}`);
    }
    throw error;
  }
}

/**
 * Load configuration, replacing only the invalid values with their defaults.
 * errors lists the values that were replaced.
 */
export function loadConfigWithFallback(): { config: TelemetryConfig; errors: string[] } {
  const input = parseEnvVars();
  const result = configSchema.safeParse(input);
  if (result.success) {
    return { config: result.data, errors: [] };
  }

  const invalid = new Set(result.error.issues.map((i) => String(i.path[0])));
  const valid = Object.fromEntries(Object.entries(input).filter(([key]) => !invalid.has(key)));

  return {
    config: configSchema.parse(valid),
    errors: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
  };
}

/**
 * Validate configuration without throwing
 * Returns validation result with errors if any
 */
export function validateConfig():
  | { success: true; config: TelemetryConfig }
  | { success: false; errors: string[] } {
  try {
    const config = loadConfig();
    return { success: true, config };
  } catch (error) {
    if (error instanceof Error) {
      return { success: false, errors: [error.message] };
    }
    return { success: false, errors: ["Unknown configuration error"] };
  }
}
