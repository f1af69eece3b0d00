/**
 * Service module exports
 */

export { TelemetryChannel, type ChannelOptions } from "./channel";
export { SessionClock } from "./clock";
export { SDK_VERSION, TelemetryContext } from "./context";
export {
  SESSION_RENEWAL_INTERVAL_MS,
  SessionController,
  type SessionControllerOptions,
} from "./controller";
export { createData, SessionStateData } from "./envelope";
export {
  TelemetryManager,
  TelemetryNotRegisteredError,
  type RegisterOverrides,
  type TelemetryManagerOptions,
} from "./manager";
export { FilePersistence, isBatchStore, type BatchStore } from "./persistence";
export { HttpSender, type HttpSenderOptions } from "./sender";
