import { ViewportConfigError } from "../errors";
import { Canvas } from "../rendering/Canvas";
import type { LayoutPass, LayoutResult, ViewportLayout } from "./types";

/** Shows one child, scrolled by the viewport's offsets. */
export class SingleChildLayout<TChild> implements ViewportLayout<TChild> {
  beforeAdd(childCount: number): void {
    if (childCount >= 1) {
      throw new ViewportConfigError("child-count", "A viewport holds a single child; use a grid viewport for more.");
    }
  }

  render(pass: LayoutPass<TChild>): LayoutResult {
    const surface =
      pass.children.length > 0 ? pass.renderChild(pass.children[0], pass.childWidth, pass.childHeight) : new Canvas(0, 0);

    const { xOffset, yOffset, width, height } = pass.updateOffsets(surface.width, surface.height);

    const canvas = new Canvas(width, height);
    canvas.blit(surface, xOffset, yOffset);

    return {
      canvas,
      placements: [{ x: xOffset, y: yOffset }],
      visible: { width, height },
    };
  }
}
