import { Viewport, type ViewportOptions } from "../viewport/Viewport";
import { GridLayout, type GridLayoutOptions } from "./GridLayout";

export interface GridViewportOptions<TChild> extends Omit<ViewportOptions<TChild>, "child" | "layout">, GridLayoutOptions {
  children?: readonly TChild[];
}

/**
 * A viewport over a grid of children. Scrolling, input and drag physics are the shared
 * {@link Viewport} controller's; only sizing and placement come from {@link GridLayout}.
 */
export class GridViewport<TChild> extends Viewport<TChild> {
  readonly grid: GridLayout<TChild>;

  constructor(options: GridViewportOptions<TChild>) {
    const { cols, rows, transpose, allowUnderfull, children, ...rest } = options;
    const grid = new GridLayout<TChild>({ cols, rows, transpose, allowUnderfull });

    super({ ...rest, layout: grid });
    this.grid = grid;

    for (const child of children ?? []) this.add(child);
  }
}
