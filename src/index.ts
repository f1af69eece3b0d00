/**
 * Lifecycle Telemetry - package entry point
 *
 * A host creates one TelemetryManager in its composition root:
 *
 *   const telemetry = new TelemetryManager();
 *   telemetry.register({ dataDir }, application, "my-app-id");
 */

export * from "./types";
export * from "./config";
export * from "./services";
export * from "./utils";
