export const DEFAULT_COOLDOWN_MS = 2000;
export const DEFAULT_DEBOUNCE_CAPACITY = 1024;

export type EventDebouncerOptions = {
  cooldownMs?: number;
  capacity?: number;
};

/**
 * Drops repeated events for the same path inside the cooldown window.
 *
 * Entries live in a Map, whose insertion order doubles as recency order:
 * recording a path re-inserts it at the end, and eviction takes from the
 * front. Entries whose cooldown has elapsed are purged before anything that
 * could still suppress an event is evicted.
 */
export class EventDebouncer {
  private readonly lastProcessed = new Map<string, number>();
  private readonly cooldownMs: number;
  private readonly capacity: number;

  constructor(options: EventDebouncerOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_DEBOUNCE_CAPACITY);
  }

  shouldProcess(path: string, nowMs: number): boolean {
    const last = this.lastProcessed.get(path);
    if (last !== undefined && nowMs - last < this.cooldownMs) {
      return false;
    }

    this.lastProcessed.delete(path);
    if (this.lastProcessed.size >= this.capacity) {
      this.evict(nowMs);
    }
    this.lastProcessed.set(path, nowMs);
    return true;
  }

  get size(): number {
    return this.lastProcessed.size;
  }

  private evict(nowMs: number): void {
    for (const [key, at] of this.lastProcessed) {
      if (nowMs - at >= this.cooldownMs) this.lastProcessed.delete(key);
    }

    while (this.lastProcessed.size >= this.capacity) {
      const oldest = this.lastProcessed.keys().next();
      if (oldest.done) break;
      this.lastProcessed.delete(oldest.value);
    }
  }
}
