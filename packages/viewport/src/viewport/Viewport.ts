import type { Logger } from "pino";

import { Adjustment, type AdjustmentObserver } from "../adjustment/Adjustment";
import { resolveViewportConfig, type ViewportConfig } from "../config/viewportConfig";
import type { FocusTarget } from "../focus/FocusRegistry";
import { isPointerEvent, type InputEvent } from "../input/events";
import { getSilentLogger } from "../logger";
import type { Canvas, Surface } from "../rendering/Canvas";
import { edgeFactor } from "./edgeScroll";
import { SingleChildLayout } from "./SingleChildLayout";
import {
  CONSUMED,
  DEFAULT_VIEWPORT_STYLE,
  UNHANDLED,
  edgescrollProportional,
  redirect,
  type EdgeFunction,
  type EdgeScrollOptions,
  type EventResult,
  type LayoutPass,
  type MousewheelMode,
  type OffsetResult,
  type OffsetTarget,
  type Point,
  type ViewportHost,
  type ViewportLayout,
  type ViewportStyle,
} from "./types";

// Drag speed smoothing and inertia amplitude are calibrated against this frame rate.
const REFERENCE_FRAME_RATE = 60;

export interface ViewportOptions<TChild> {
  host: ViewportHost<TChild>;
  child?: TChild | null;
  /** Sizing/placement strategy. Defaults to a single scrolled child. */
  layout?: ViewportLayout<TChild>;
  /** Fixed size to render the child at; `null` uses the viewport's own size on that axis. */
  childSize?: [number | null, number | null];
  /** One-shot initial scroll targets. Take precedence over `xinitial`/`yinitial`. */
  offsets?: [OffsetTarget | null, OffsetTarget | null];
  xinitial?: OffsetTarget | null;
  yinitial?: OffsetTarget | null;
  xadjustment?: Adjustment | null;
  yadjustment?: Adjustment | null;
  /** When false, the adjustments belong to the caller and their range/page are never written. */
  setAdjustments?: boolean;
  mousewheel?: MousewheelMode;
  /** A platform variant name makes the viewport draggable only when that variant is active. */
  draggable?: boolean | string;
  edgescroll?: EdgeScrollOptions | null;
  arrowkeys?: boolean;
  pagekeys?: boolean;
  style?: Partial<ViewportStyle>;
  /** A viewport from the previous layout whose scroll and drag state should carry over. */
  replaces?: Viewport<TChild> | null;
}

/**
 * Scrolling controller shared by every viewport flavour.
 *
 * Each frame, `render` asks the layout strategy for content, feeds the content size through
 * `updateOffsets` to sync the adjustments, and clips the result to the visible window. `event`
 * runs between frames and mutates adjustments or drag/edge-scroll state; the next render picks
 * the changes up.
 */
export class Viewport<TChild> implements FocusTarget, AdjustmentObserver {
  readonly grabsForDrag = true;

  readonly host: ViewportHost<TChild>;
  readonly layout: ViewportLayout<TChild>;
  readonly config: ViewportConfig;
  readonly logger: Logger;

  readonly xadjustment: Adjustment;
  readonly yadjustment: Adjustment;
  readonly setAdjustments: boolean;

  readonly children: TChild[] = [];
  childWidth: number | null;
  childHeight: number | null;
  style: ViewportStyle;

  xoffset: OffsetTarget | null;
  yoffset: OffsetTarget | null;

  dragPosition: Point | null = null;
  dragPositionTime: number | null = null;
  /** Smoothed drag velocity in px/s, positive when content scrolls toward the end of the range. */
  dragSpeed: Point = { x: 0, y: 0 };

  draggable: boolean;
  mousewheel: MousewheelMode;
  arrowkeys: boolean;
  pagekeys: boolean;

  edgeSize: number;
  edgeSpeed: number;
  edgeFunction: EdgeFunction;
  edgeXSpeed = 0;
  edgeYSpeed = 0;
  edgeLastSt: number | null = null;

  /** Visible size from the latest render. */
  width = 0;
  height = 0;

  /** Child offsets from the latest render, in child order. */
  placements: Point[] = [];

  constructor(options: ViewportOptions<TChild>) {
    this.host = options.host;
    this.layout = options.layout ?? new SingleChildLayout<TChild>();
    this.config = options.host.config ?? resolveViewportConfig();
    this.logger = options.host.logger ?? getSilentLogger();
    this.style = { ...DEFAULT_VIEWPORT_STYLE, ...options.style };

    if (options.child !== undefined && options.child !== null) this.add(options.child);

    this.xadjustment = options.xadjustment ?? new Adjustment({ range: 1, value: 0 });
    this.yadjustment = options.yadjustment ?? new Adjustment({ range: 1, value: 0 });
    if (this.xadjustment.adjustable === null) this.xadjustment.adjustable = true;
    if (this.yadjustment.adjustable === null) this.yadjustment.adjustable = true;

    this.setAdjustments = options.setAdjustments ?? true;

    const [xoffset, yoffset] = options.offsets ?? [null, null];
    this.xoffset = xoffset ?? options.xinitial ?? null;
    this.yoffset = yoffset ?? options.yinitial ?? null;

    const [childWidth, childHeight] = options.childSize ?? [null, null];
    this.childWidth = childWidth;
    this.childHeight = childHeight;

    const draggable = options.draggable ?? false;
    this.draggable = typeof draggable === "string" ? this.config.variants.includes(draggable) : draggable;
    this.mousewheel = options.mousewheel ?? false;
    this.arrowkeys = options.arrowkeys ?? false;
    this.pagekeys = options.pagekeys ?? false;

    const edgescroll = options.edgescroll ?? null;
    this.edgeSize = edgescroll?.size ?? 0;
    this.edgeSpeed = edgescroll?.speed ?? 0;
    this.edgeFunction = edgescroll?.fn ?? edgescrollProportional;

    const replaces = options.replaces ?? null;
    if (replaces instanceof Viewport && replaces.placements.length > 0) {
      this.inheritInteractiveState(replaces);
    }
  }

  /** Whether the viewport takes part in focus, so drags migrate across layout rebuilds. */
  get focusable(): boolean {
    return this.draggable || this.arrowkeys;
  }

  add(child: TChild): void {
    this.layout.beforeAdd?.(this.children.length, this.config);
    this.children.push(child);
  }

  /**
   * Runs once per interaction cycle, after the driver has called `beginInteraction` on the
   * adjustments so that viewports from earlier cycles stop receiving changes.
   */
  perInteract(): void {
    this.xadjustment.register(this);
    this.yadjustment.register(this);
    this.layout.perInteract?.(this.children.length, this.config, this.logger);
  }

  adjustmentChanged(): void {
    this.host.redraw.redraw(this, 0);
  }

  setXOffset(target: OffsetTarget | null): void {
    this.xoffset = target;
    this.host.redraw.redraw(this, 0);
  }

  setYOffset(target: OffsetTarget | null): void {
    this.yoffset = target;
    this.host.redraw.redraw(this, 0);
  }

  /**
   * Syncs the adjustments with rendered content of `contentWidth` by `contentHeight` and returns
   * the (non-positive) offsets to draw it at, plus the visible size.
   */
  updateOffsets(contentWidth: number, contentHeight: number, st: number): OffsetResult {
    const cw = Math.ceil(contentWidth);
    const ch = Math.ceil(contentHeight);

    let width = this.width;
    let height = this.height;

    if (!this.style.xfill) width = Math.min(cw, width);
    if (!this.style.yfill) height = Math.min(ch, height);

    width = Math.max(width, this.style.xminimum);
    height = Math.max(height, this.style.yminimum);

    const measuring = this.host.measuring?.() ?? false;
    if (!measuring && this.setAdjustments) {
      syncRange(this.xadjustment, Math.max(cw - width, 0), width);
      syncRange(this.yadjustment, Math.max(ch - height, 0), height);
    }

    if (this.xoffset !== null) {
      this.xadjustment.value = resolveOffsetTarget(this.xoffset, Math.max(cw - width, 0));
      this.xoffset = null;
    }

    if (this.yoffset !== null) {
      this.yadjustment.value = resolveOffsetTarget(this.yoffset, Math.max(ch - height, 0));
      this.yoffset = null;
    }

    if (this.edgeSize && this.edgeLastSt !== null && (this.edgeXSpeed || this.edgeYSpeed)) {
      const duration = Math.max(st - this.edgeLastSt, 0);
      this.xadjustment.change(this.xadjustment.value + duration * this.edgeXSpeed);
      this.yadjustment.change(this.yadjustment.value + duration * this.edgeYSpeed);

      this.checkEdgeRedraw(st);
    }

    for (const adjustment of [this.xadjustment, this.yadjustment]) {
      const redraw = adjustment.periodic(st);
      if (redraw !== null) this.host.redraw.redraw(this, redraw);
    }

    this.width = width;
    this.height = height;

    return {
      // `0 - x` keeps an unscrolled offset at +0.
      xOffset: 0 - Math.round(this.xadjustment.value),
      yOffset: 0 - Math.round(this.yadjustment.value),
      width,
      height,
    };
  }

  render(width: number, height: number, st: number, at: number): Canvas {
    this.width = width;
    this.height = height;

    const pass: LayoutPass<TChild> = {
      children: this.children,
      width,
      height,
      childWidth: this.childWidth || width,
      childHeight: this.childHeight || height,
      style: this.style,
      st,
      at,
      renderChild: (child, w, h) => this.host.renderChild(child, w, h, st, at),
      placeChild: (child, canvas, x, y, w, h, surface) => this.placeChild(child, canvas, x, y, w, h, surface),
      updateOffsets: (cw, ch) => this.updateOffsets(cw, ch, st),
    };

    const result = this.layout.render(pass);
    this.placements = result.placements;

    if (!result.visible) return result.canvas;

    const rect = { x: 0, y: 0, width: result.visible.width, height: result.visible.height };
    const clipped = result.canvas.subsurface(rect, { focus: true });

    // Keyboard/drag focus only: children under the pointer still get direct hits.
    if (this.arrowkeys || this.draggable) {
      clipped.addFocus(this, rect, { mouse: false });
    }

    return clipped;
  }

  event(ev: InputEvent, x: number, y: number, st: number): EventResult {
    this.xoffset = null;
    this.yoffset = null;

    const { focus, actions } = this.host;

    const inside = x >= 0 && x < this.width && y >= 0 && y < this.height;
    if (!inside) {
      this.edgeXSpeed = 0;
      this.edgeYSpeed = 0;
      this.edgeLastSt = null;
    }

    const draggable = this.draggable && (this.xadjustment.range > 0 || this.yadjustment.range > 0);

    const grab = focus.getGrab();
    if (grab !== null && grab.grabsForDrag && grab !== this) {
      this.dragPosition = null;
    } else if (draggable) {
      if (grab === null && actions.matches(ev, "viewport_drag_end")) this.dragPosition = null;
    } else {
      this.dragPosition = null;
    }

    if (inside && draggable && this.dragPosition !== null && grab !== this && ev.type === "pointermove") {
      const anchor = this.dragPosition;
      const grabbed = grab !== null && grab.grabsForDrag && focus.isFocused(grab);

      if (Math.hypot(anchor.x - x, anchor.y - y) >= this.config.dragRadius && !grabbed) {
        const focusResult = focus.forceFocus(this);
        focus.setGrab(this);
        this.startDrag(x, y, st);

        if (focusResult !== undefined) return redirect(focusResult);
      }
    }

    if (focus.getGrab() === this) {
      const released = this.dragWhileGrabbed(ev, x, y, st);
      if (released) return released;
    }

    if (inside && this.mousewheel) {
      const mode = this.mousewheel;
      const adjustment = mode === "horizontal" || mode === "horizontal-change" ? this.xadjustment : this.yadjustment;
      const stopsAtEnds = mode === "change" || mode === "horizontal-change";

      if (actions.matches(ev, "viewport_wheelup")) {
        if (stopsAtEnds && adjustment.value === 0) return UNHANDLED;
        return changeResult(adjustment.change(adjustment.value - adjustment.step));
      }

      if (actions.matches(ev, "viewport_wheeldown")) {
        if (stopsAtEnds && adjustment.value === adjustment.range) return UNHANDLED;
        return changeResult(adjustment.change(adjustment.value + adjustment.step));
      }
    }

    if (this.arrowkeys) {
      const xadj = this.xadjustment;
      const yadj = this.yadjustment;

      if (actions.matches(ev, "viewport_leftarrow")) {
        if (xadj.value === 0) return UNHANDLED;
        return changeResult(xadj.change(xadj.value - xadj.step));
      }

      if (actions.matches(ev, "viewport_rightarrow")) {
        if (xadj.value === xadj.range) return UNHANDLED;
        return changeResult(xadj.change(xadj.value + xadj.step));
      }

      if (actions.matches(ev, "viewport_uparrow")) {
        if (yadj.value === 0) return UNHANDLED;
        return changeResult(yadj.change(yadj.value - yadj.step));
      }

      if (actions.matches(ev, "viewport_downarrow")) {
        if (yadj.value === yadj.range) return UNHANDLED;
        return changeResult(yadj.change(yadj.value + yadj.step));
      }
    }

    if (this.pagekeys) {
      const yadj = this.yadjustment;

      if (actions.matches(ev, "viewport_pageup")) {
        return changeResult(yadj.change(yadj.value - yadj.page));
      }

      if (actions.matches(ev, "viewport_pagedown")) {
        return changeResult(yadj.change(yadj.value + yadj.page));
      }
    }

    if (inside && this.edgeSize && isPointerEvent(ev)) {
      const xfactor = edgeFactor(x, this.width, this.edgeSize);
      const yfactor = edgeFactor(y, this.height, this.edgeSize);

      this.edgeXSpeed = this.edgeSpeed * this.edgeFunction(xfactor);
      this.edgeYSpeed = this.edgeSpeed * this.edgeFunction(yfactor);

      if (xfactor || yfactor) {
        // Keep the existing anchor so updateOffsets integrates over the whole hold.
        this.checkEdgeRedraw(st, false);
      } else {
        this.edgeLastSt = null;
      }
    }

    let consume = false;

    if (inside && draggable && actions.matches(ev, "viewport_drag_start")) {
      this.dragPosition = { x, y };
      this.dragPositionTime = st;
      this.dragSpeed = { x: 0, y: 0 };

      this.xadjustment.endAnimation({ instantly: true });
      this.yadjustment.endAnimation({ instantly: true });

      if (!focus.getFocused()) {
        focus.setGrab(this);
        this.logger.debug({ x, y, st }, "viewport drag started");
      }

      consume = true;
    }

    const childResult = this.dispatchToChildren(ev, x, y, st);
    if (childResult.kind !== "unhandled") return childResult;

    return consume ? CONSUMED : UNHANDLED;
  }

  checkEdgeRedraw(st: number, resetSt = true): void {
    const x = this.xadjustment;
    const y = this.yadjustment;

    const moving =
      (this.edgeXSpeed > 0 && x.value < x.range) ||
      (this.edgeXSpeed < 0 && x.value > 0) ||
      (this.edgeYSpeed > 0 && y.value < y.range) ||
      (this.edgeYSpeed < 0 && y.value > 0);

    if (moving) {
      this.host.redraw.redraw(this, 0);
      if (resetSt || this.edgeLastSt === null) this.edgeLastSt = st;
    } else {
      this.edgeLastSt = null;
    }
  }

  private startDrag(x: number, y: number, st: number): void {
    this.dragPosition = { x, y };
    this.dragPositionTime = st;
    this.dragSpeed = { x: 0, y: 0 };
    this.logger.debug({ x, y, st }, "viewport drag started");
  }

  /**
   * Applies pointer motion while this viewport holds the grab. Returns a result only when the
   * event ended the drag.
   */
  private dragWhileGrabbed(ev: InputEvent, x: number, y: number, st: number): EventResult | null {
    const oldXValue = this.xadjustment.value;
    const oldYValue = this.yadjustment.value;

    const anchor = this.dragPosition ?? { x, y };
    const dx = x - anchor.x;
    const dy = y - anchor.y;

    const dt = this.dragPositionTime === null ? 0 : st - this.dragPositionTime;
    if (dt > 0) {
      // A long gap replaces the estimate outright instead of over-weighting the stale one.
      const done = Math.min(1, dt * REFERENCE_FRAME_RATE);
      const previous = this.dragSpeed;
      this.dragSpeed = {
        x: previous.x + done * (-dx / dt - previous.x),
        y: previous.y + done * (-dy / dt - previous.y),
      };
    }

    if (this.host.actions.matches(ev, "viewport_drag_end")) {
      this.host.focus.release(this);

      this.releaseAxis(this.xadjustment, this.dragSpeed.x, oldXValue, this.config.screenWidth, st);
      this.releaseAxis(this.yadjustment, this.dragSpeed.y, oldYValue, this.config.screenHeight, st);

      this.logger.debug({ speed: this.dragSpeed, st }, "viewport drag released");

      this.dragPosition = null;
      this.dragPositionTime = null;

      return CONSUMED;
    }

    // The anchor only follows the pointer on axes where the (step-rounded) value moved, so fine
    // steps accumulate motion instead of stalling.
    let anchorX = anchor.x;
    const newXValue = this.xadjustment.roundValue(oldXValue - dx, false);
    if (newXValue !== oldXValue) {
      this.xadjustment.change(newXValue);
      anchorX = x;
    }

    let anchorY = anchor.y;
    const newYValue = this.yadjustment.roundValue(oldYValue - dy, false);
    if (newYValue !== oldYValue) {
      this.yadjustment.change(newYValue);
      anchorY = y;
    }

    this.dragPosition = { x: anchorX, y: anchorY };
    this.dragPositionTime = st;

    return null;
  }

  private releaseAxis(adjustment: Adjustment, speed: number, oldValue: number, screenSize: number, st: number): void {
    const amplitude = this.config.inertiaAmplitude;

    if (speed && amplitude && !adjustment.forceStep) {
      adjustment.inertia((amplitude * speed) / REFERENCE_FRAME_RATE, this.config.inertiaTimeConstant, st);
    } else if (adjustment.forceStep === "release") {
      const value = adjustment.roundValue(oldValue, true);
      adjustment.inertia(value - oldValue, adjustment.step / (screenSize * 2), st);
    } else {
      adjustment.change(adjustment.roundValue(oldValue, true));
    }
  }

  private placeChild(
    child: TChild,
    canvas: Canvas,
    x: number,
    y: number,
    width: number,
    height: number,
    surface: Surface,
  ): Point {
    if (this.host.place) return this.host.place(child, canvas, x, y, width, height, surface);
    canvas.blit(surface, x, y);
    return { x, y };
  }

  private dispatchToChildren(ev: InputEvent, x: number, y: number, st: number): EventResult {
    const dispatch = this.host.dispatch;
    if (!dispatch) return UNHANDLED;

    // Topmost (last placed) child first.
    for (let index = this.children.length - 1; index >= 0; index--) {
      const placement = this.placements[index];
      if (!placement) continue;

      const result = dispatch(this.children[index], ev, x - placement.x, y - placement.y, st);
      if (result.kind !== "unhandled") return result;
    }

    return UNHANDLED;
  }

  private inheritInteractiveState(replaces: Viewport<TChild>): void {
    this.xadjustment.viewportReplaces(replaces.xadjustment);
    this.yadjustment.viewportReplaces(replaces.yadjustment);

    this.xadjustment.range = replaces.xadjustment.range;
    this.xadjustment.value = replaces.xadjustment.value;
    this.yadjustment.range = replaces.yadjustment.range;
    this.yadjustment.value = replaces.yadjustment.value;

    this.xoffset = replaces.xoffset;
    this.yoffset = replaces.yoffset;

    this.dragPosition = replaces.dragPosition;
    this.dragPositionTime = replaces.dragPositionTime;
    this.dragSpeed = { ...replaces.dragSpeed };

    replaces.xadjustment.unregister(replaces);
    replaces.yadjustment.unregister(replaces);

    // An in-progress drag keeps its grab on the rebuilt viewport.
    if (this.host.focus.getGrab() === replaces) this.host.focus.setGrab(this);

    this.logger.debug({ dragging: this.dragPosition !== null }, "viewport state carried over from replaced viewport");
  }
}

function syncRange(adjustment: Adjustment, range: number, page: number): void {
  if (adjustment.range === range && adjustment.page === page) return;
  adjustment.range = range;
  adjustment.page = page;
  adjustment.update();
}

function resolveOffsetTarget(target: OffsetTarget, scrollable: number): number {
  return target.kind === "absolute" ? target.value : scrollable * target.value;
}

function changeResult(result: unknown): EventResult {
  return result === undefined ? CONSUMED : redirect(result);
}
