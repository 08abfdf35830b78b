/**
 * Remembers when each file was last notified so that a file that was just
 * emailed cannot start a new notification cycle until `cooldownMs` has passed.
 */
export class CooldownRegistry {
  private lastNotified = new Map<string, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly now: () => number = Date.now
  ) {}

  getCooldownMs(): number {
    return this.cooldownMs;
  }

  isCoolingDown(filePath: string, at = this.now()): boolean {
    const stamp = this.lastNotified.get(filePath);
    if (stamp === undefined) {
      return false;
    }
    return at - stamp < this.cooldownMs;
  }

  /**
   * Stamp every path with the same notification time and evict expired entries.
   */
  markNotified(filePaths: Iterable<string>, at = this.now()): void {
    for (const filePath of filePaths) {
      this.lastNotified.set(filePath, at);
    }
    this.prune(at);
  }

  /**
   * Drop entries whose cooldown has expired. Returns the number removed.
   */
  prune(at = this.now()): number {
    let removed = 0;
    for (const [filePath, stamp] of this.lastNotified) {
      if (at - stamp >= this.cooldownMs) {
        this.lastNotified.delete(filePath);
        removed++;
      }
    }
    return removed;
  }

  lastNotifiedAt(filePath: string): number | undefined {
    return this.lastNotified.get(filePath);
  }

  get size(): number {
    return this.lastNotified.size;
  }

  clear(): void {
    this.lastNotified.clear();
  }
}
