/**
 * Receives "re-render `target` within `delay` seconds" demands. Implementations may coalesce
 * requests but must never drop one.
 */
export interface RedrawScheduler {
  redraw(target: object, delay: number): void;
}

/**
 * Coalesces redraw demands per target to the earliest deadline.
 *
 * Times are interaction time (seconds), advanced by the driver through `setTime`/`drain`.
 */
export class RedrawQueue implements RedrawScheduler {
  private now = 0;
  private readonly deadlines = new Map<object, number>();

  setTime(now: number): void {
    this.now = now;
  }

  redraw(target: object, delay: number): void {
    const deadline = this.now + Math.max(0, delay);
    const existing = this.deadlines.get(target);
    if (existing === undefined || deadline < existing) {
      this.deadlines.set(target, deadline);
    }
  }

  pending(target: object): number | null {
    return this.deadlines.get(target) ?? null;
  }

  get size(): number {
    return this.deadlines.size;
  }

  nextDeadline(): number | null {
    let next: number | null = null;
    for (const deadline of this.deadlines.values()) {
      if (next === null || deadline < next) next = deadline;
    }
    return next;
  }

  /** Removes and returns every target due at or before `now`. */
  drain(now: number): object[] {
    this.now = now;
    const due: object[] = [];
    for (const [target, deadline] of this.deadlines) {
      if (deadline <= now) due.push(target);
    }
    for (const target of due) this.deadlines.delete(target);
    return due;
  }
}
