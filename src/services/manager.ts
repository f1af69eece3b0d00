/**
 * TelemetryManager - registration and tracking switches for session telemetry
 *
 * The host's composition root creates one manager and passes it around.
 * register() builds the controller at most once: a lock-free check first,
 * then a re-check inside the exclusive section.
 */

import type { Logger } from "pino";
import { DEFAULT_SERVER_URL, loadConfigWithFallback } from "../config";
import type { TelemetryConfig } from "../types/config";
import type { Application, HostContext, Platform } from "../types/host";
import type { Channel, Persistence, Sender } from "../types/telemetry";
import { createExclusiveLock, type ExclusiveLock } from "../utils/lock";
import { createLogger } from "../utils/logger";
import { defaultPlatform } from "../utils/platform";
import { TelemetryChannel } from "./channel";
import { TelemetryContext } from "./context";
import { SessionController } from "./controller";
import { FilePersistence } from "./persistence";
import { HttpSender } from "./sender";

export class TelemetryNotRegisteredError extends Error {
  constructor(operation: string) {
    super(`${operation} called before TelemetryManager.register(...)`);
    this.name = "TelemetryNotRegisteredError";
  }
}

/**
 * Collaborators a host may supply instead of the defaults.
 */
export interface RegisterOverrides {
  sender?: Sender;
  persistence?: Persistence;
  channel?: Channel;
  platform?: Platform;
}

export interface TelemetryManagerOptions {
  /** Defaults to the environment, with invalid values replaced by their defaults */
  config?: TelemetryConfig;
  logger?: Logger;
  now?: () => number;
}

export class TelemetryManager {
  private instance: SessionController | null = null;
  private sender: Sender | null = null;
  private channel: Channel | null = null;
  private weakApplication: WeakRef<Application> | null = null;
  private platform: Platform = defaultPlatform;
  private subscribed = false;
  private lock: ExclusiveLock;
  private options: TelemetryManagerOptions;
  private log: Logger;

  constructor(options: TelemetryManagerOptions = {}) {
    this.options = options;
    this.log = options.logger ?? createLogger("telemetry");
    this.lock = createExclusiveLock("telemetry");
  }

  /**
   * Register and start collecting session telemetry.
   * Calls after the first one change nothing.
   *
   * @param appIdentifier - falls back to TELEMETRY_APP_ID
   */
  register(
    context: HostContext,
    application: Application,
    appIdentifier?: string,
    overrides: RegisterOverrides = {}
  ): void {
    if (this.instance) {
      this.log.debug("TelemetryManager already registered");
      return;
    }

    this.lock.runExclusive(() => {
      if (this.instance) {
        this.log.debug("TelemetryManager registered concurrently");
        return;
      }

      const config = this.resolveConfig();
      const controller = this.createController(
        context,
        appIdentifier ?? config.appIdentifier,
        config,
        overrides
      );
      this.weakApplication = new WeakRef(application);
      this.platform = overrides.platform ?? defaultPlatform;

      const supported = this.platform.sessionTrackingSupported();
      controller.setSessionTrackingDisabled(!supported);
      this.instance = controller;
      this.log.info({ sessionTracking: supported }, "TelemetryManager registered");

      if (supported) {
        this.setSessionTrackingDisabled(false);
      }
    });
  }

  /**
   * @throws TelemetryNotRegisteredError before register()
   */
  sessionTrackingEnabled(): boolean {
    if (!this.instance) {
      throw new TelemetryNotRegisteredError("sessionTrackingEnabled()");
    }
    return this.instance.isSessionTrackingEnabled();
  }

  /**
   * Enable or disable session tracking. Forced off when the platform can't
   * track sessions.
   */
  setSessionTrackingDisabled(disabled: boolean): void {
    const instance = this.instance;
    if (!instance) {
      this.log.warn("TelemetryManager hasn't been registered");
      return;
    }

    this.lock.runExclusive(() => {
      if (this.platform.sessionTrackingSupported()) {
        instance.setSessionTrackingDisabled(disabled);
        // TODO: persist this setting so hosts don't have to reapply it on every launch
        if (disabled) {
          this.unsubscribe(instance);
        } else {
          this.subscribe(instance);
        }
      } else {
        instance.setSessionTrackingDisabled(true);
        this.unsubscribe(instance);
      }
    });
  }

  /**
   * Send telemetry to your own collection endpoint. The URL is passed to the
   * sender as is.
   */
  setCustomServerURL(url: string): void {
    if (this.sender) {
      this.sender.setCustomServerURL(url);
    } else {
      this.log.warn(
        "Couldn't set the custom server URL. Call register(...) before setting the server URL."
      );
    }
  }

  /**
   * Wait until queued session events have reached the channel.
   */
  async drain(): Promise<void> {
    await this.instance?.drain();
  }

  getController(): SessionController | null {
    return this.instance;
  }

  getChannel(): Channel | null {
    return this.channel;
  }

  getSender(): Sender | null {
    return this.sender;
  }

  private createController(
    context: HostContext,
    appIdentifier: string,
    config: TelemetryConfig,
    overrides: RegisterOverrides
  ): SessionController {
    if (!appIdentifier) {
      this.log.warn("No app identifier configured; set TELEMETRY_APP_ID or pass one to register()");
    }
    if (!overrides.sender && config.serverUrl === DEFAULT_SERVER_URL) {
      this.log.warn(
        "No collection endpoint configured; set TELEMETRY_SERVER_URL or call setCustomServerURL()"
      );
    }
    const telemetryContext = new TelemetryContext(context, appIdentifier);

    // Order matters: persistence captures the sender, the channel captures persistence
    const sender =
      overrides.sender ??
      new HttpSender(
        { serverUrl: config.serverUrl, maxConcurrentRequests: config.maxConcurrentRequests },
        this.log.child({ module: "sender" })
      );
    const persistence =
      overrides.persistence ??
      new FilePersistence(
        { dataDir: context.dataDir ?? config.dataDir },
        sender,
        this.log.child({ module: "persistence" })
      );
    sender.setPersistence(persistence);

    const channel =
      overrides.channel ??
      new TelemetryChannel(
        telemetryContext,
        persistence,
        { maxBatchCount: config.maxBatchCount, maxBatchIntervalMs: config.maxBatchIntervalMs },
        this.log.child({ module: "channel" })
      );

    this.sender = sender;
    this.channel = channel;

    return new SessionController(
      telemetryContext,
      channel,
      { now: this.options.now },
      this.log.child({ module: "session" })
    );
  }

  private resolveConfig(): TelemetryConfig {
    if (this.options.config) return this.options.config;

    const { config, errors } = loadConfigWithFallback();
    if (errors.length > 0) {
      this.log.error({ errors }, "Invalid telemetry configuration, using defaults for invalid values");
    }
    return config;
  }

  private getApplication(): Application | null {
    return this.weakApplication?.deref() ?? null;
  }

  private subscribe(controller: SessionController): void {
    const application = this.getApplication();
    if (!application) {
      this.log.debug("Application released, skipping lifecycle subscription");
      return;
    }
    if (this.subscribed) return;

    application.registerActivityLifecycleCallbacks(controller);
    this.subscribed = true;
    this.log.debug("Subscribed to lifecycle callbacks");
  }

  private unsubscribe(controller: SessionController): void {
    const application = this.getApplication();
    if (!application) {
      this.log.debug("Application released, skipping lifecycle unsubscription");
      return;
    }
    if (!this.subscribed) return;

    application.unregisterActivityLifecycleCallbacks(controller);
    this.subscribed = false;
    this.log.debug("Unsubscribed from lifecycle callbacks");
  }
}
