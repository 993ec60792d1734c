export type InputEvent =
  | { type: "pointermove" }
  | { type: "pointerdown"; button: number }
  | { type: "pointerup"; button: number }
  /** `deltaY < 0` scrolls up. */
  | { type: "wheel"; deltaY: number }
  | { type: "keydown"; key: string };

export type InputEventType = InputEvent["type"];

export function isPointerEvent(event: InputEvent): boolean {
  return event.type === "pointermove" || event.type === "pointerdown" || event.type === "pointerup";
}

export const VIEWPORT_ACTIONS = [
  "viewport_drag_start",
  "viewport_drag_end",
  "viewport_wheelup",
  "viewport_wheeldown",
  "viewport_leftarrow",
  "viewport_rightarrow",
  "viewport_uparrow",
  "viewport_downarrow",
  "viewport_pageup",
  "viewport_pagedown",
] as const;

export type ViewportAction = (typeof VIEWPORT_ACTIONS)[number];

/** Tests whether an input event triggers a logical action under the host's bindings. */
export interface ActionMatcher {
  matches(event: InputEvent, action: ViewportAction): boolean;
}
