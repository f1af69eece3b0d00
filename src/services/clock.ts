/**
 * SessionClock - shared counters read by concurrent lifecycle callbacks
 *
 * The foreground counter and the background timestamp are swapped
 * independently. A resume racing a pause may read a timestamp written by a
 * logically later pause; renewal tolerates that.
 */

export class SessionClock {
  private foregroundCount = 0;
  private lastBackgroundedAt: number;

  constructor(startedAt: number) {
    this.lastBackgroundedAt = startedAt;
  }

  /**
   * Increment the foreground counter, returning the value before the increment.
   */
  getAndIncrementForeground(): number {
    const previous = this.foregroundCount;
    this.foregroundCount = previous + 1;
    return previous;
  }

  /**
   * Record a transition to the background.
   */
  markBackgrounded(at: number): void {
    this.lastBackgroundedAt = at;
  }

  /**
   * Replace the background timestamp, returning the previous one.
   */
  getAndSetLastBackgrounded(at: number): number {
    const previous = this.lastBackgroundedAt;
    this.lastBackgroundedAt = at;
    return previous;
  }

  getForegroundCount(): number {
    return this.foregroundCount;
  }

  getLastBackgroundedAt(): number {
    return this.lastBackgroundedAt;
  }
}
