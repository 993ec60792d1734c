import { z } from "zod";

import { ViewportConfigError } from "../errors";
import { VIEWPORT_ACTIONS, type ActionMatcher, type InputEvent, type ViewportAction } from "./events";

type Binding =
  | { kind: "pointerdown" | "pointerup"; button: number }
  | { kind: "wheel"; direction: "up" | "down" }
  | { kind: "key"; key: string };

const BindingSchema = z
  .string()
  .regex(/^(?:(?:pointerdown|pointerup):\d+|wheel:(?:up|down)|key:.+)$/, "expected pointerdown:<n>, pointerup:<n>, wheel:up|down or key:<name>");

const KeymapSchema = z.record(z.enum(VIEWPORT_ACTIONS), z.array(BindingSchema));

export type KeymapBindings = Partial<Record<ViewportAction, string[]>>;

export const DEFAULT_VIEWPORT_KEYMAP: Readonly<Record<ViewportAction, readonly string[]>> = {
  viewport_drag_start: ["pointerdown:0"],
  viewport_drag_end: ["pointerup:0"],
  viewport_wheelup: ["wheel:up"],
  viewport_wheeldown: ["wheel:down"],
  viewport_leftarrow: ["key:ArrowLeft"],
  viewport_rightarrow: ["key:ArrowRight"],
  viewport_uparrow: ["key:ArrowUp"],
  viewport_downarrow: ["key:ArrowDown"],
  viewport_pageup: ["key:PageUp"],
  viewport_pagedown: ["key:PageDown"],
};

function parseBinding(text: string): Binding {
  const separator = text.indexOf(":");
  const kind = text.slice(0, separator);
  const rest = text.slice(separator + 1);

  switch (kind) {
    case "pointerdown":
    case "pointerup":
      return { kind, button: Number.parseInt(rest, 10) };
    case "wheel":
      return { kind: "wheel", direction: rest === "up" ? "up" : "down" };
    default:
      return { kind: "key", key: rest };
  }
}

function bindingMatches(binding: Binding, event: InputEvent): boolean {
  switch (binding.kind) {
    case "pointerdown":
    case "pointerup":
      return event.type === binding.kind && event.button === binding.button;
    case "wheel":
      if (event.type !== "wheel" || event.deltaY === 0) return false;
      return binding.direction === "up" ? event.deltaY < 0 : event.deltaY > 0;
    case "key":
      return event.type === "keydown" && event.key === binding.key;
  }
}

/**
 * Input-to-action mapping. Bindings passed to the constructor replace the defaults for the
 * actions they name.
 */
export class Keymap implements ActionMatcher {
  private readonly bindings = new Map<ViewportAction, Binding[]>();

  constructor(overrides: KeymapBindings = {}) {
    const parsed = KeymapSchema.safeParse(overrides);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ViewportConfigError("invalid-config", `Invalid keymap (${details.join("; ")})`);
    }

    for (const action of VIEWPORT_ACTIONS) {
      const bindings = parsed.data[action] ?? DEFAULT_VIEWPORT_KEYMAP[action];
      this.bindings.set(action, bindings.map(parseBinding));
    }
  }

  bindingsFor(action: ViewportAction): string[] {
    return (this.bindings.get(action) ?? []).map(formatBinding);
  }

  matches(event: InputEvent, action: ViewportAction): boolean {
    const bindings = this.bindings.get(action);
    if (!bindings) return false;
    return bindings.some((binding) => bindingMatches(binding, event));
  }
}

function formatBinding(binding: Binding): string {
  switch (binding.kind) {
    case "pointerdown":
    case "pointerup":
      return `${binding.kind}:${binding.button}`;
    case "wheel":
      return `wheel:${binding.direction}`;
    case "key":
      return `key:${binding.key}`;
  }
}
