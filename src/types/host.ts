/**
 * Host integration types
 *
 * The host application owns these objects; the SDK only observes them.
 */

/**
 * A screen or view whose lifecycle the host reports.
 */
export interface Activity {
  readonly name: string;
}

export type SavedState = Record<string, unknown>;

/**
 * Full set of lifecycle notifications a subscriber must accept.
 */
export interface ActivityLifecycleCallbacks {
  onActivityCreated(activity: Activity, savedState?: SavedState): void;
  onActivityStarted(activity: Activity): void;
  onActivityResumed(activity: Activity): void;
  onActivityPaused(activity: Activity): void;
  onActivityStopped(activity: Activity): void;
  onActivitySaveInstanceState(activity: Activity, outState: SavedState): void;
  onActivityDestroyed(activity: Activity): void;
}

/**
 * Application handle used to (un)subscribe for lifecycle notifications.
 */
export interface Application {
  registerActivityLifecycleCallbacks(callbacks: ActivityLifecycleCallbacks): void;
  unregisterActivityLifecycleCallbacks(callbacks: ActivityLifecycleCallbacks): void;
}

/**
 * Environment the SDK runs in.
 */
export interface HostContext {
  /** Directory the SDK may write its own files under (default: TELEMETRY_DATA_DIR) */
  dataDir?: string;

  /** Host app version, reported with every telemetry item */
  appVersion?: string;
}

/**
 * Runtime capability checks.
 */
export interface Platform {
  sessionTrackingSupported(): boolean;
}
