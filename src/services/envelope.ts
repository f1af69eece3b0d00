/**
 * Session-state payload and the envelope builder for the delivery pipeline
 */

import type { Data, SessionState, TelemetryData } from "../types/telemetry";

export class SessionStateData implements TelemetryData {
  readonly ver = 2;
  readonly baseType = "SessionStateData";
  readonly envelopeName = "Telemetry.SessionState";
  readonly state: SessionState;

  constructor(state: SessionState) {
    this.state = state;
  }
}

/**
 * Wrap a payload in an envelope tagged with its declared type and schema name.
 */
export function createData<T extends TelemetryData>(telemetryData: T): Data<T> {
  return {
    baseData: telemetryData,
    baseType: telemetryData.baseType,
    qualifiedName: telemetryData.envelopeName,
  };
}
