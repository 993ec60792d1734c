import type { FocusTarget } from "../focus/FocusRegistry";

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Anything with a rendered size. */
export interface Surface {
  readonly width: number;
  readonly height: number;
}

export interface CanvasBlit {
  surface: Surface;
  x: number;
  y: number;
}

export interface FocusRegion {
  target: FocusTarget;
  rect: Rect;
  /** `false` registers the region for keyboard/drag focus without claiming direct pointer hits. */
  mouse: boolean;
}

/**
 * A retained display list: surfaces blitted at integer offsets plus the focus regions that
 * drive hit testing.
 */
export class Canvas implements Surface {
  readonly width: number;
  readonly height: number;

  readonly blits: CanvasBlit[] = [];
  readonly focusRegions: FocusRegion[] = [];
  clip: Rect | null = null;
  keepsChildFocus = true;

  constructor(width: number, height: number) {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
  }

  blit(surface: Surface, x: number, y: number): void {
    this.blits.push({ surface, x, y });
  }

  addFocus(target: FocusTarget, rect: Rect, options: { mouse: boolean }): void {
    this.focusRegions.push({ target, rect: { ...rect }, mouse: options.mouse });
  }

  /**
   * Returns a canvas of `rect`'s size showing that part of this one, clipped to its bounds.
   * Without `focus`, focus regions inside the clipped area are dropped.
   */
  subsurface(rect: Rect, options: { focus?: boolean } = {}): Canvas {
    const out = new Canvas(rect.width, rect.height);
    out.clip = { x: 0, y: 0, width: rect.width, height: rect.height };
    out.keepsChildFocus = options.focus ?? false;

    for (const blit of this.blits) {
      out.blit(blit.surface, blit.x - rect.x, blit.y - rect.y);
    }

    if (out.keepsChildFocus) {
      for (const region of this.focusRegions) {
        out.focusRegions.push({
          ...region,
          rect: { ...region.rect, x: region.rect.x - rect.x, y: region.rect.y - rect.y },
        });
      }
    }

    return out;
  }

  /**
   * Focus regions of this canvas and of the canvases blitted into it, translated by the offset
   * and clipped.
   */
  collectFocusRegions(offsetX = 0, offsetY = 0): FocusRegion[] {
    const found: FocusRegion[] = [];
    if (this.keepsChildFocus) {
      for (const blit of this.blits) {
        if (blit.surface instanceof Canvas) {
          found.push(...blit.surface.collectFocusRegions(offsetX + blit.x, offsetY + blit.y));
        }
      }
    }
    for (const region of this.focusRegions) {
      found.push({ ...region, rect: { ...region.rect, x: region.rect.x + offsetX, y: region.rect.y + offsetY } });
    }

    const clip = this.clip;
    if (!clip) return found;

    const bounds = { ...clip, x: clip.x + offsetX, y: clip.y + offsetY };
    const out: FocusRegion[] = [];
    for (const region of found) {
      const rect = intersect(region.rect, bounds);
      if (rect) out.push({ ...region, rect });
    }
    return out;
  }
}

export function intersect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.width, b.x + b.width);
  const y1 = Math.min(a.y + a.height, b.y + b.height);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}
