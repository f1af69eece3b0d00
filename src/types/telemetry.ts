/**
 * Telemetry payload and pipeline types
 */

export type SessionState = "Start" | "End";

/**
 * A typed telemetry payload that knows its schema names.
 */
export interface TelemetryData {
  readonly baseType: string;
  readonly envelopeName: string;
}

/**
 * Envelope handed to the delivery pipeline.
 */
export interface Data<T extends TelemetryData = TelemetryData> {
  baseData: T;
  baseType: string;
  qualifiedName: string;
}

/**
 * Snapshot of the telemetry context stamped onto queued items.
 */
export interface ContextSnapshot {
  appIdentifier: string;
  appVersion: string | null;
  sdkVersion: string;
  sessionId: string | null;
  sessionIsFirst: boolean;
}

/**
 * Item as buffered by the channel and written by persistence.
 */
export interface TelemetryItem {
  time: string;
  context: ContextSnapshot;
  data: Data;
}

export interface Sender {
  setPersistence(persistence: Persistence): void;
  setCustomServerURL(url: string): void;

  /** Called by persistence after a batch is stored */
  triggerSending?(): void;
}

/**
 * The core never calls persistence directly; the channel and sender do.
 */
export interface Persistence {
  persist(items: TelemetryItem[]): Promise<string | null>;
}

export interface Channel {
  log(envelope: Data): void;
}
