/**
 * SessionController - decides when a session starts
 *
 * Subscribed to host lifecycle notifications. Only resume and pause matter:
 * the host has already started its first screen by the time the SDK
 * subscribes, so created/started never fire for it and resume is the one
 * reliable first-session trigger.
 */

import { randomUUID } from "crypto";
import type { Logger } from "pino";
import type { Activity, ActivityLifecycleCallbacks, SavedState } from "../types/host";
import type { Channel, SessionState } from "../types/telemetry";
import { MessageQueue } from "../utils/queue";
import { SessionClock } from "./clock";
import type { TelemetryContext } from "./context";
import { createData, SessionStateData } from "./envelope";

/** Time in the background after which a resume starts a new session */
export const SESSION_RENEWAL_INTERVAL_MS = 20 * 1000;

export interface SessionControllerOptions {
  /** Millisecond clock, Date.now by default */
  now?: () => number;

  /** Queue that runs emission off the callback's stack */
  queue?: MessageQueue;
}

export class SessionController implements ActivityLifecycleCallbacks {
  private telemetryContext: TelemetryContext;
  private channel: Channel;
  private now: () => number;
  private clock: SessionClock;
  private emitter: MessageQueue;
  private sessionTrackingDisabled = false;
  private log: Logger;

  constructor(
    telemetryContext: TelemetryContext,
    channel: Channel,
    options: SessionControllerOptions,
    logger: Logger
  ) {
    this.telemetryContext = telemetryContext;
    this.channel = channel;
    this.now = options.now ?? Date.now;
    this.clock = new SessionClock(this.now());
    this.emitter = options.queue ?? new MessageQueue(logger);
    this.log = logger;
  }

  isSessionTrackingEnabled(): boolean {
    return !this.sessionTrackingDisabled;
  }

  setSessionTrackingDisabled(disabled: boolean): void {
    this.sessionTrackingDisabled = disabled;
  }

  onActivityCreated(_activity: Activity, _savedState?: SavedState): void {}

  onActivityStarted(_activity: Activity): void {}

  onActivityResumed(_activity: Activity): void {
    this.updateSession();
  }

  onActivityPaused(_activity: Activity): void {
    // Refreshed on every pause, including moves between screens of the app
    this.clock.markBackgrounded(this.now());
  }

  onActivityStopped(_activity: Activity): void {}

  onActivitySaveInstanceState(_activity: Activity, _outState: SavedState): void {}

  onActivityDestroyed(_activity: Activity): void {}

  /**
   * Start a session on the first resume of the process. After that, start a
   * new one when the app was in the background for at least
   * SESSION_RENEWAL_INTERVAL_MS.
   */
  updateSession(): void {
    const count = this.clock.getAndIncrementForeground();

    if (count === 0) {
      if (this.isSessionTrackingEnabled()) {
        this.log.debug("Starting & tracking session");
        this.renewSession();
      } else {
        this.log.debug("Session management disabled by the developer");
      }
      return;
    }

    const now = this.now();
    const then = this.clock.getAndSetLastBackgrounded(now);
    const elapsed = now - then;
    this.log.debug({ elapsed }, "Checking if the session should be renewed");

    if (elapsed >= SESSION_RENEWAL_INTERVAL_MS && this.isSessionTrackingEnabled()) {
      this.log.debug("Renewing session");
      this.renewSession();
    }
  }

  renewSession(): void {
    const sessionId = randomUUID();
    this.telemetryContext.updateSessionContext(sessionId);
    this.log.info({ sessionId }, "Session started");
    this.trackSessionState("Start");
  }

  /**
   * Resolves once every emission queued so far has reached the channel.
   */
  drain(): Promise<void> {
    return this.emitter.drain();
  }

  getSessionId(): string | null {
    return this.telemetryContext.getSessionId();
  }

  getClock(): SessionClock {
    return this.clock;
  }

  private trackSessionState(state: SessionState): void {
    this.emitter.enqueue(() => {
      const data = createData(new SessionStateData(state));
      this.channel.log(data);
    });
  }
}
