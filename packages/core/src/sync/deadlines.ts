/**
 * Per-key deadlines for debouncing. Each `touch` pushes the key's deadline
 * to `now + windowMs`; `takeDue` hands back the keys whose deadline passed.
 * Knows nothing about timers: the owner decides when to poll.
 */
export class DeadlineMap<K> {
  private readonly deadlines = new Map<K, number>();

  constructor(private readonly windowMs: number) {}

  get size(): number {
    return this.deadlines.size;
  }

  touch(key: K, now: number): void {
    // Re-insert so iteration order follows the latest touch.
    this.deadlines.delete(key);
    this.deadlines.set(key, now + this.windowMs);
  }

  /** Removes and returns due keys, oldest deadline first. */
  takeDue(now: number): K[] {
    const due: Array<[K, number]> = [];
    for (const [key, deadline] of this.deadlines) {
      if (deadline <= now) due.push([key, deadline]);
    }
    for (const [key] of due) this.deadlines.delete(key);
    return due.sort((a, b) => a[1] - b[1]).map(([key]) => key);
  }

  /** Earliest pending deadline, or `undefined` when nothing is pending. */
  next(): number | undefined {
    let earliest: number | undefined;
    for (const deadline of this.deadlines.values()) {
      if (earliest === undefined || deadline < earliest) earliest = deadline;
    }
    return earliest;
  }

  clear(): void {
    this.deadlines.clear();
  }
}
