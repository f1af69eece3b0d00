/**
 * Centralized type exports
 */

export type { TelemetryConfig } from "./config";
export type {
  Activity,
  ActivityLifecycleCallbacks,
  Application,
  HostContext,
  Platform,
  SavedState,
} from "./host";
export type {
  Channel,
  ContextSnapshot,
  Data,
  Persistence,
  Sender,
  SessionState,
  TelemetryData,
  TelemetryItem,
} from "./telemetry";
