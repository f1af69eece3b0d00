/**
 * TelemetryContext - meta information attached to queued telemetry
 *
 * Holds the current session id. Only renewal writes it; readers take a
 * snapshot so a rotation never shows up half-applied.
 */

import type { HostContext } from "../types/host";
import type { ContextSnapshot } from "../types/telemetry";

export const SDK_VERSION = "0.1.0";

export class TelemetryContext {
  private appIdentifier: string;
  private appVersion: string | null;
  private sessionId: string | null = null;
  private sessionIsFirst = false;

  constructor(context: HostContext, appIdentifier: string) {
    this.appIdentifier = appIdentifier;
    this.appVersion = context.appVersion ?? null;
  }

  /**
   * Install a new session id. The first session seen by this context is
   * flagged as such.
   */
  updateSessionContext(sessionId: string): void {
    this.sessionIsFirst = this.sessionId === null;
    this.sessionId = sessionId;
  }

  getSessionId(): string | null {
    return this.sessionId;
  }

  snapshot(): ContextSnapshot {
    return {
      appIdentifier: this.appIdentifier,
      appVersion: this.appVersion,
      sdkVersion: SDK_VERSION,
      sessionId: this.sessionId,
      sessionIsFirst: this.sessionIsFirst,
    };
  }
}
