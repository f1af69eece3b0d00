/**
 * Centralized utility exports
 */

export { logger, createLogger, type LogLevel } from "./logger";
export { createExclusiveLock, type ExclusiveLock } from "./lock";
export { MessageQueue } from "./queue";
export { defaultPlatform } from "./platform";
