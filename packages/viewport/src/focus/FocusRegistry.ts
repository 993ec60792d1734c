export interface FocusTarget {
  /**
   * True for widgets that take the grab to drag. While one of them holds the grab, the others
   * drop their pending drags.
   */
  readonly grabsForDrag: boolean;
}

/**
 * Process-wide pointer grab and keyboard focus, injected into widgets instead of living in
 * module state. At most one target holds the grab at a time.
 */
export interface FocusContext {
  getGrab(): FocusTarget | null;
  /** Unconditionally replaces the grab holder (`null` clears it). */
  setGrab(target: FocusTarget | null): void;
  /** Takes the grab only if it is free or already held by `target`. */
  acquire(target: FocusTarget): boolean;
  /** Clears the grab only if `target` holds it. */
  release(target: FocusTarget): boolean;
  /** Takes the grab from whoever holds it and returns the previous holder. */
  steal(target: FocusTarget): FocusTarget | null;
  getFocused(): FocusTarget | null;
  isFocused(target: FocusTarget): boolean;
  /**
   * Moves focus to `target`. A result other than `undefined` is a redirect the caller must hand
   * back up the event chain.
   */
  forceFocus(target: FocusTarget): unknown;
}

export type FocusChangeHook = (next: FocusTarget | null, previous: FocusTarget | null) => unknown;

export class FocusRegistry implements FocusContext {
  private grab: FocusTarget | null = null;
  private focused: FocusTarget | null = null;
  private readonly onFocusChange: FocusChangeHook | null;

  constructor(options: { onFocusChange?: FocusChangeHook } = {}) {
    this.onFocusChange = options.onFocusChange ?? null;
  }

  getGrab(): FocusTarget | null {
    return this.grab;
  }

  setGrab(target: FocusTarget | null): void {
    this.grab = target;
  }

  acquire(target: FocusTarget): boolean {
    if (this.grab !== null && this.grab !== target) return false;
    this.grab = target;
    return true;
  }

  release(target: FocusTarget): boolean {
    if (this.grab !== target) return false;
    this.grab = null;
    return true;
  }

  steal(target: FocusTarget): FocusTarget | null {
    const previous = this.grab;
    this.grab = target;
    return previous === target ? null : previous;
  }

  getFocused(): FocusTarget | null {
    return this.focused;
  }

  isFocused(target: FocusTarget): boolean {
    return this.focused === target;
  }

  setFocused(target: FocusTarget | null): void {
    this.focused = target;
  }

  forceFocus(target: FocusTarget): unknown {
    const previous = this.focused;
    this.focused = target;
    if (previous === target || !this.onFocusChange) return undefined;
    return this.onFocusChange(target, previous);
  }
}
