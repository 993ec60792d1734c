export { Adjustment, inertiaWarper } from "./adjustment/Adjustment";
export type {
  AdjustmentChangedHook,
  AdjustmentObserver,
  AdjustmentOptions,
  AnimationWarper,
  ForceStep,
} from "./adjustment/Adjustment";

export { ViewportConfigSchema, loadViewportConfigFromEnv, resolveViewportConfig } from "./config/viewportConfig";
export type { ViewportConfig, ViewportConfigInput } from "./config/viewportConfig";

export { ViewportConfigError, ViewportStateError } from "./errors";
export type { ViewportConfigErrorCode } from "./errors";

export { FocusRegistry } from "./focus/FocusRegistry";
export type { FocusChangeHook, FocusContext, FocusTarget } from "./focus/FocusRegistry";

export { VIEWPORT_ACTIONS, isPointerEvent } from "./input/events";
export type { ActionMatcher, InputEvent, InputEventType, ViewportAction } from "./input/events";
export { DEFAULT_VIEWPORT_KEYMAP, Keymap } from "./input/Keymap";
export type { KeymapBindings } from "./input/Keymap";

export { createLogger } from "./logger";
export type { Logger } from "./logger";

export { RedrawQueue } from "./redraw/RedrawQueue";
export type { RedrawScheduler } from "./redraw/RedrawQueue";

export { Canvas, intersect } from "./rendering/Canvas";
export type { CanvasBlit, FocusRegion, Rect, Surface } from "./rendering/Canvas";

export { Viewport } from "./viewport/Viewport";
export type { ViewportOptions } from "./viewport/Viewport";
export { SingleChildLayout } from "./viewport/SingleChildLayout";
export { edgeFactor, edgeRamp } from "./viewport/edgeScroll";
export {
  CONSUMED,
  DEFAULT_VIEWPORT_STYLE,
  UNHANDLED,
  absoluteOffset,
  edgescrollProportional,
  fractionOffset,
  redirect,
} from "./viewport/types";
export type {
  EdgeFunction,
  EdgeScrollOptions,
  EventResult,
  LayoutPass,
  LayoutResult,
  MousewheelMode,
  OffsetResult,
  OffsetTarget,
  Point,
  ViewportHost,
  ViewportLayout,
  ViewportStyle,
} from "./viewport/types";

export { GridLayout, gridCellForIndex, resolveGridDimensions } from "./grid/GridLayout";
export type { GridCell, GridLayoutOptions } from "./grid/GridLayout";
export { GridViewport } from "./grid/GridViewport";
export type { GridViewportOptions } from "./grid/GridViewport";

export {
  VIEWPORT_SNAPSHOT_VERSION,
  ViewportSnapshotSchema,
  parseViewportSnapshot,
  restoreViewport,
  snapshotViewport,
} from "./state/snapshot";
export type { AxisSnapshot, ViewportSnapshot } from "./state/snapshot";
