/**
 * `false` never snaps, `true` snaps every change to a multiple of `step`, and `"release"` only
 * snaps when a drag is released.
 */
export type ForceStep = boolean | "release";

/** Maps linear animation progress in `[0, 1]` to eased progress in `[0, 1]`. */
export type AnimationWarper = (done: number) => number;

/**
 * Called when the value actually changes. Returning anything other than `undefined` is treated
 * as an override result that the caller hands back up the event chain.
 */
export type AdjustmentChangedHook = (value: number) => unknown;

export interface AdjustmentObserver {
  adjustmentChanged(adjustment: Adjustment): void;
}

export interface AdjustmentOptions {
  range?: number;
  value?: number;
  step?: number | null;
  page?: number | null;
  changed?: AdjustmentChangedHook | null;
  adjustable?: boolean | null;
  forceStep?: ForceStep;
}

export const inertiaWarper: AnimationWarper = (done) => 1 - Math.exp(-done * 6);

interface AdjustmentAnimation {
  amplitude: number;
  target: number;
  delay: number;
  warper: AnimationWarper;
  // Anchored lazily by the first `periodic` tick when the caller didn't know the time.
  start: number | null;
}

/**
 * A bounded scalar range `[0, range]` with a current value. Viewports use one per axis as the
 * single source of truth for scroll position; scrollbars and other observers share it.
 */
export class Adjustment {
  adjustable: boolean | null;
  forceStep: ForceStep;
  changed: AdjustmentChangedHook | null;

  private _range: number;
  private _value: number;
  private _page: number | null;
  private _step: number | null;

  private animation: AdjustmentAnimation | null = null;
  private readonly observers = new Set<AdjustmentObserver>();

  constructor(options: AdjustmentOptions = {}) {
    this._range = Math.max(0, options.range ?? 1);
    this._value = clamp(options.value ?? 0, 0, this._range);
    this._page = options.page ?? null;
    this._step = options.step ?? null;
    this.changed = options.changed ?? null;
    this.adjustable = options.adjustable ?? null;
    this.forceStep = options.forceStep ?? false;
  }

  get range(): number {
    return this._range;
  }

  set range(range: number) {
    this._range = Math.max(0, range);
    if (this._value > this._range) this._value = this._range;
  }

  get value(): number {
    return this._value;
  }

  set value(value: number) {
    this._value = clamp(value, 0, this._range);
  }

  get page(): number {
    return this._page ?? this._range / 10;
  }

  set page(page: number | null) {
    this._page = page;
  }

  get step(): number {
    if (this._step !== null) return this._step;
    if (this._page !== null && this._page > 0) return this._page / 10;
    return 1;
  }

  set step(step: number | null) {
    this._step = step;
  }

  register(observer: AdjustmentObserver): void {
    this.observers.add(observer);
  }

  unregister(observer: AdjustmentObserver): void {
    this.observers.delete(observer);
  }

  /**
   * Drops every registration. Drivers call this at the start of each interaction cycle, before
   * the live widgets re-register from `perInteract`.
   */
  beginInteraction(): void {
    this.observers.clear();
  }

  /** Notifies registered observers that range or page changed. */
  update(): void {
    for (const observer of this.observers) {
      observer.adjustmentChanged(this);
    }
  }

  change(value: number, options: { endAnimation?: boolean } = {}): unknown {
    if (options.endAnimation ?? true) this.endAnimation({ instantly: true });

    const next = clamp(value, 0, this._range);
    if (next === this._value) return undefined;

    this._value = next;
    this.update();

    return this.changed ? this.changed(next) : undefined;
  }

  roundValue(value: number, release: boolean): number {
    // The ends of the range are always reachable, whatever the step.
    if (value <= 0) return 0;
    if (value >= this._range) return this._range;

    if (this.forceStep === false) return value;
    if (!release && this.forceStep === "release") return value;

    const step = this.step;
    if (!(step > 0)) return value;
    return step * Math.round(value / step);
  }

  isAnimating(): boolean {
    return this.animation !== null;
  }

  animate(amplitude: number, delay: number, warper: AnimationWarper, st: number | null = null): void {
    if (!amplitude || !this._range) {
      this.endAnimation();
      return;
    }

    this.animation = {
      amplitude,
      target: this._value + amplitude,
      delay,
      warper,
      start: st,
    };
    this.update();
  }

  /** Decays toward `value + amplitude`, settling after `6 * timeConstant` seconds. */
  inertia(amplitude: number, timeConstant: number, st: number | null = null): void {
    this.animate(amplitude, timeConstant * 6, inertiaWarper, st);
  }

  endAnimation(options: { instantly?: boolean } = {}): void {
    const animation = this.animation;
    if (!animation) return;

    this.animation = null;
    if (!options.instantly) this.change(animation.target, { endAnimation: false });
  }

  /**
   * Advances a running animation to time `st`.
   *
   * Returns `0` while more frames are needed, `null` when idle.
   */
  periodic(st: number): number | null {
    const animation = this.animation;
    if (!animation) return null;

    if (animation.start === null) animation.start = st;

    const elapsed = st - animation.start;
    const done = animation.delay > 0 ? clamp(elapsed / animation.delay, 0, 1) : 1;
    const value = animation.target - animation.amplitude * (1 - animation.warper(done));

    this.change(value, { endAnimation: false });

    if (elapsed >= animation.delay) {
      this.endAnimation({ instantly: true });
      return null;
    }

    return 0;
  }

  /** Carries a running animation over from the adjustment this one is replacing. */
  viewportReplaces(other: Adjustment): void {
    if (other === this) return;
    this.animation = other.animation ? { ...other.animation } : null;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
