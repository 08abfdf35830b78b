import type { CooldownRegistry } from './CooldownRegistry.js';
import type { ChangeKind, FlushHandler, PendingChange } from './types.js';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { log } from '../utils/logger.js';

export interface ChangeAggregatorOptions {
  debounceMs: number;
  cooldown: CooldownRegistry;
  onFlush: FlushHandler;
}

/**
 * Collects file changes per watched directory and flushes each directory once
 * its events have been quiet for `debounceMs`.
 *
 * Every directory owns its pending map, its timer and its in-flight flush, so a
 * slow notification for one directory never delays another.
 */
export class ChangeAggregator {
  private pending = new Map<string, Map<string, ChangeKind>>();
  private timers = new Map<string, NodeJS.Timeout>();
  private inFlight = new Map<string, Promise<void>>();
  private readonly debounceMs: number;

  constructor(private options: ChangeAggregatorOptions) {
    this.debounceMs = Math.max(options.debounceMs, WATCHER_CONSTANTS.MIN_DEBOUNCE_MS);
  }

  getDebounceMs(): number {
    return this.debounceMs;
  }

  /**
   * Record a change for a directory and restart that directory's timer.
   * Returns false when the file is still cooling down from its last notification.
   */
  recordChange(directoryKey: string, filePath: string, kind: ChangeKind): boolean {
    if (this.options.cooldown.isCoolingDown(filePath)) {
      log.debug('Ignoring change during cooldown', { file: filePath, kind });
      return false;
    }

    let changes = this.pending.get(directoryKey);
    if (!changes) {
      changes = new Map();
      this.pending.set(directoryKey, changes);
    }
    // Re-inserting moves the path to the end; the latest kind wins.
    changes.delete(filePath);
    changes.set(filePath, kind);

    this.scheduleFlush(directoryKey);
    return true;
  }

  /**
   * Schedule a debounced flush, replacing any timer the directory already has
   */
  private scheduleFlush(directoryKey: string): void {
    const existing = this.timers.get(directoryKey);
    if (existing) {
      clearTimeout(existing);
    }

    const timer = setTimeout(() => {
      this.timers.delete(directoryKey);
      void this.flush(directoryKey);
    }, this.debounceMs);
    this.timers.set(directoryKey, timer);
  }

  /**
   * Flush one directory now. Waits for that directory's previous flush first,
   * then takes the pending set in one synchronous step.
   */
  async flush(directoryKey: string): Promise<void> {
    const previous = this.inFlight.get(directoryKey);
    if (previous) {
      await previous;
    }

    const changes = this.takePending(directoryKey);
    if (changes.length === 0) {
      return;
    }

    const run = this.executeFlush(directoryKey, changes);
    this.inFlight.set(directoryKey, run);
    try {
      await run;
    } finally {
      if (this.inFlight.get(directoryKey) === run) {
        this.inFlight.delete(directoryKey);
      }
    }
  }

  private takePending(directoryKey: string): PendingChange[] {
    const changes = this.pending.get(directoryKey);
    if (!changes || changes.size === 0) {
      return [];
    }
    this.pending.delete(directoryKey);
    return Array.from(changes, ([path, kind]) => ({ path, kind }));
  }

  private async executeFlush(directoryKey: string, changes: PendingChange[]): Promise<void> {
    try {
      await this.options.onFlush(directoryKey, changes);
    } catch (error) {
      log.error('Flush handler failed', error, { directory: directoryKey, files: changes.length });
    }
  }

  /**
   * Flush every directory that has pending changes, cancelling their timers.
   */
  async flushAll(): Promise<void> {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();

    await Promise.all(Array.from(this.pending.keys(), key => this.flush(key)));
  }

  /**
   * Cancel all pending timers and discard what they would have flushed.
   * In-flight flushes keep running; see waitForIdle().
   */
  cancel(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.pending.clear();
  }

  /**
   * Resolve once every in-flight flush has settled
   */
  async waitForIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight.values()));
    }
  }

  hasPending(directoryKey?: string): boolean {
    if (directoryKey === undefined) {
      return Array.from(this.pending.values()).some(changes => changes.size > 0);
    }
    return (this.pending.get(directoryKey)?.size ?? 0) > 0;
  }

  hasTimer(directoryKey: string): boolean {
    return this.timers.has(directoryKey);
  }

  getPendingCount(directoryKey: string): number {
    return this.pending.get(directoryKey)?.size ?? 0;
  }

  /**
   * Snapshot of the pending kinds for a directory (path → kind)
   */
  getPendingKinds(directoryKey: string): Record<string, ChangeKind> {
    return Object.fromEntries(this.pending.get(directoryKey) ?? []);
  }
}
