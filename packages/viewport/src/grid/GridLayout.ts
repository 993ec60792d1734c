import type { Logger } from "pino";
import { z } from "zod";

import type { ViewportConfig } from "../config/viewportConfig";
import { ViewportConfigError } from "../errors";
import { Canvas } from "../rendering/Canvas";
import type { LayoutPass, LayoutResult, Point, ViewportLayout } from "../viewport/types";

export interface GridLayoutOptions {
  cols?: number | null;
  rows?: number | null;
  /** Column-major placement. Defaults to true when only `rows` is given. */
  transpose?: boolean | null;
  /** `null` defers to the config's underfull/unfull grid settings. */
  allowUnderfull?: boolean | null;
}

export interface GridCell {
  row: number;
  col: number;
}

const GridDimensionSchema = z.number().int().positive().nullable();

function checkDimension(name: "cols" | "rows", value: number | null): number | null {
  const parsed = GridDimensionSchema.safeParse(value);
  if (!parsed.success) {
    throw new ViewportConfigError("grid-dimensions", `Grid viewport ${name} must be a positive integer, got ${value}.`);
  }
  return parsed.data;
}

/** Cell of the `index`th child: row-major, or column-major when transposed. */
export function gridCellForIndex(index: number, cols: number, rows: number, transpose: boolean): GridCell {
  if (transpose) return { row: index % rows, col: Math.floor(index / rows) };
  return { row: Math.floor(index / cols), col: index % cols };
}

/**
 * Resolves the grid's dimensions for `childCount` children, computing a missing one by ceiling
 * division.
 */
export function resolveGridDimensions(
  cols: number | null,
  rows: number | null,
  childCount: number,
): { cols: number; rows: number } {
  checkDimension("cols", cols);
  checkDimension("rows", rows);
  if (cols === null && rows === null) {
    throw new ViewportConfigError("grid-dimensions", "A grid viewport must be given the rows or cols property.");
  }
  if (cols === null) {
    const r = rows ?? 1;
    return { cols: Math.ceil(childCount / r), rows: r };
  }
  if (rows === null) {
    return { cols, rows: Math.ceil(childCount / cols) };
  }
  return { cols, rows };
}

/**
 * Lays children out in equally sized cells, sized from the first child, and only renders the
 * cells that intersect the visible window.
 */
export class GridLayout<TChild> implements ViewportLayout<TChild> {
  readonly cols: number | null;
  readonly rows: number | null;
  readonly transpose: boolean;
  readonly allowUnderfull: boolean | null;

  constructor(options: GridLayoutOptions) {
    const cols = checkDimension("cols", options.cols ?? null);
    const rows = checkDimension("rows", options.rows ?? null);

    if (cols === null && rows === null) {
      throw new ViewportConfigError("grid-dimensions", "A grid viewport must be given the rows or cols property.");
    }

    this.cols = cols;
    this.rows = rows;
    this.transpose = options.transpose ?? (rows !== null && cols === null);
    this.allowUnderfull = options.allowUnderfull ?? null;
  }

  beforeAdd(childCount: number, config: ViewportConfig): void {
    if (this.cols === null || this.rows === null) return;
    if (childCount + 1 > this.cols * this.rows && !config.allowUnfullGrids) {
      throw new ViewportConfigError(
        "grid-overfull",
        `Grid viewport overfull: ${this.cols}x${this.rows} cells cannot hold ${childCount + 1} children.`,
      );
    }
  }

  /** Number of empty cells needed to complete the last row/column (or the whole grid). */
  missingCells(childCount: number): number {
    if (this.cols !== null && this.rows !== null) return this.cols * this.rows - childCount;

    const given = this.cols ?? this.rows ?? 0;
    if (!given) return 0;
    return given - (childCount % given || given);
  }

  perInteract(childCount: number, config: ViewportConfig, logger: Logger): void {
    const missing = this.missingCells(childCount);
    if (missing <= 0) return;

    const allowUnderfull = this.allowUnderfull ?? (config.allowUnderfullGrids || config.allowUnfullGrids);
    if (config.developer && !allowUnderfull) {
      let message = "Grid viewport not completely full";
      if (this.cols === null || this.rows === null) {
        message += `, needs a multiple of ${this.cols ?? this.rows} children`;
      }
      throw new ViewportConfigError("grid-underfull", `${message}.`);
    }

    logger.debug({ childCount, missing }, "grid viewport underfull; trailing cells left empty");
  }

  render(pass: LayoutPass<TChild>): LayoutResult {
    const { children, style } = pass;
    if (children.length === 0) {
      return { canvas: new Canvas(0, 0), placements: [], visible: null };
    }

    const { cols, rows } = resolveGridDimensions(this.cols, this.rows, children.length);

    const xspacing = style.xspacing ?? style.spacing;
    const yspacing = style.yspacing ?? style.spacing;

    const first = pass.renderChild(children[0], pass.childWidth, pass.childHeight);
    let cellWidth = first.width;
    let cellHeight = first.height;

    let totalWidth = (cellWidth + xspacing) * cols - xspacing + style.leftMargin + style.rightMargin;
    let totalHeight = (cellHeight + yspacing) * rows - yspacing + style.topMargin + style.bottomMargin;

    if (style.xfill) {
      totalWidth = pass.childWidth;
      cellWidth = Math.floor((totalWidth - (cols - 1) * xspacing - style.leftMargin - style.rightMargin) / cols);
    }

    if (style.yfill) {
      totalHeight = pass.childHeight;
      cellHeight = Math.floor((totalHeight - (rows - 1) * yspacing - style.topMargin - style.bottomMargin) / rows);
    }

    const offsets = pass.updateOffsets(totalWidth, totalHeight);
    const originX = offsets.xOffset + style.leftMargin;
    const originY = offsets.yOffset + style.topMargin;
    const { width, height } = offsets;

    const canvas = new Canvas(width, height);
    const placements: Point[] = [];

    children.forEach((child, index) => {
      const cell = gridCellForIndex(index, cols, rows, this.transpose);
      const x = cell.col * (cellWidth + xspacing) + originX;
      const y = cell.row * (cellHeight + yspacing) + originY;

      const outside = x + cellWidth < 0 || y + cellHeight < 0 || x >= width || y >= height;
      if (outside) {
        placements.push({ x, y });
        return;
      }

      const surface = pass.renderChild(child, cellWidth, cellHeight);
      placements.push(pass.placeChild(child, canvas, x, y, cellWidth, cellHeight, surface));
    });

    return { canvas, placements, visible: { width, height } };
  }
}
