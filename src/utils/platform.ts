/**
 * Host capability checks
 */

import type { Platform } from "../types/host";

/**
 * Default platform: session tracking needs WeakRef, because the SDK must hold
 * the application handle without keeping it alive.
 */
export const defaultPlatform: Platform = {
  sessionTrackingSupported(): boolean {
    return typeof WeakRef === "function";
  },
};
