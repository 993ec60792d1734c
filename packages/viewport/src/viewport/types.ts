import type { Logger } from "pino";

import type { ViewportConfig } from "../config/viewportConfig";
import type { FocusContext } from "../focus/FocusRegistry";
import type { ActionMatcher, InputEvent } from "../input/events";
import type { RedrawScheduler } from "../redraw/RedrawQueue";
import type { Canvas, Surface } from "../rendering/Canvas";

export interface Point {
  x: number;
  y: number;
}

/** One-shot scroll target: pixels, or a fraction of the scrollable range. */
export type OffsetTarget = { kind: "absolute"; value: number } | { kind: "fraction"; value: number };

export function absoluteOffset(value: number): OffsetTarget {
  return { kind: "absolute", value };
}

export function fractionOffset(value: number): OffsetTarget {
  return { kind: "fraction", value };
}

export type EventResult = { kind: "unhandled" } | { kind: "consumed" } | { kind: "redirect"; value: unknown };

export const UNHANDLED: EventResult = { kind: "unhandled" };
export const CONSUMED: EventResult = { kind: "consumed" };

export function redirect(value: unknown): EventResult {
  return { kind: "redirect", value };
}

/**
 * `true` scrolls vertically and `"horizontal"` horizontally, both consuming the wheel even at the
 * ends of the range. The `-change` variants leave the wheel unhandled at the ends so an outer
 * widget can use it.
 */
export type MousewheelMode = boolean | "change" | "horizontal" | "horizontal-change";

/** Response curve for edge scrolling, mapping `[-1, 1]` to `[-1, 1]`. */
export type EdgeFunction = (n: number) => number;

export const edgescrollProportional: EdgeFunction = (n) => n;

export interface EdgeScrollOptions {
  /** Width (px) of the zone along each edge that triggers scrolling. */
  size: number;
  /** Scroll speed (px/s) with the pointer on the edge itself. */
  speed: number;
  fn?: EdgeFunction;
}

export interface ViewportStyle {
  xminimum: number;
  yminimum: number;
  xfill: boolean;
  yfill: boolean;
  spacing: number;
  xspacing: number | null;
  yspacing: number | null;
  leftMargin: number;
  rightMargin: number;
  topMargin: number;
  bottomMargin: number;
}

export const DEFAULT_VIEWPORT_STYLE: Readonly<ViewportStyle> = {
  xminimum: 0,
  yminimum: 0,
  xfill: false,
  yfill: false,
  spacing: 0,
  xspacing: null,
  yspacing: null,
  leftMargin: 0,
  rightMargin: 0,
  topMargin: 0,
  bottomMargin: 0,
};

export interface OffsetResult {
  xOffset: number;
  yOffset: number;
  width: number;
  height: number;
}

/** Everything a viewport consumes from the engine around it. */
export interface ViewportHost<TChild> {
  /** Renders `child` into a surface. The surface may be larger or smaller than requested. */
  renderChild(child: TChild, width: number, height: number, st: number, at: number): Surface;
  /** Places a rendered child inside a cell, returning where it ended up. Defaults to a blit at the cell origin. */
  place?(child: TChild, canvas: Canvas, x: number, y: number, width: number, height: number, surface: Surface): Point;
  /** Offers an event to a child, in the child's coordinates. */
  dispatch?(child: TChild, event: InputEvent, x: number, y: number, st: number): EventResult;
  /** True while the engine renders only to measure sizes; adjustments are left alone then. */
  measuring?(): boolean;
  focus: FocusContext;
  redraw: RedrawScheduler;
  actions: ActionMatcher;
  config?: ViewportConfig;
  logger?: Logger;
}

/** The slice of a viewport a layout strategy sees during one render. */
export interface LayoutPass<TChild> {
  readonly children: readonly TChild[];
  /** Size offered to the viewport. */
  readonly width: number;
  readonly height: number;
  /** Size offered to children: the fixed child size where one was configured, else the viewport size. */
  readonly childWidth: number;
  readonly childHeight: number;
  readonly style: Readonly<ViewportStyle>;
  readonly st: number;
  readonly at: number;
  renderChild(child: TChild, width: number, height: number): Surface;
  placeChild(child: TChild, canvas: Canvas, x: number, y: number, width: number, height: number, surface: Surface): Point;
  updateOffsets(contentWidth: number, contentHeight: number): OffsetResult;
}

export interface LayoutResult {
  canvas: Canvas;
  /** One entry per child, in child order. */
  placements: Point[];
  /** Visible size to clip to, or `null` when nothing was laid out. */
  visible: { width: number; height: number } | null;
}

/**
 * Sizing and placement for a scrolling controller. Strategies never touch scroll state directly;
 * they hand their content size to `updateOffsets` and use the offsets it returns.
 */
export interface ViewportLayout<TChild> {
  render(pass: LayoutPass<TChild>): LayoutResult;
  /** Called before a child is appended; throws to reject it. */
  beforeAdd?(childCount: number, config: ViewportConfig): void;
  /** Called once per interaction cycle with the current child count. */
  perInteract?(childCount: number, config: ViewportConfig, logger: Logger): void;
}
