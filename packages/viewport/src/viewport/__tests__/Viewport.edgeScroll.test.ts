import { describe, expect, it } from "vitest";
import type { InputEvent } from "../../input/events";
import { edgeFactor, edgeRamp } from "../edgeScroll";
import type { EdgeFunction } from "../types";
import { Viewport } from "../Viewport";
import { block, createTestHost } from "./testHost";

const move: InputEvent = { type: "pointermove" };

function setup(fn?: EdgeFunction) {
  const harness = createTestHost();
  const viewport = new Viewport({
    host: harness.host,
    child: block("content", 300, 200),
    edgescroll: { size: 20, speed: 100, fn },
  });
  viewport.render(100, 50, 0, 0);
  harness.redraw.drain(0);
  return { ...harness, viewport };
}

describe("edgeFactor", () => {
  it("ramps from the inner edge of each zone out to the border", () => {
    expect(edgeFactor(0, 100, 20)).toBe(-1);
    expect(edgeFactor(10, 100, 20)).toBe(-0.5);
    expect(edgeFactor(20, 100, 20)).toBe(0);
    expect(edgeFactor(50, 100, 20)).toBe(0);
    expect(edgeFactor(90, 100, 20)).toBe(0.5);
    expect(edgeFactor(100, 100, 20)).toBe(1);
  });

  it("is zero outside the ramp span", () => {
    expect(edgeRamp(-5, 0, 10)).toBe(0);
    expect(edgeRamp(15, 0, 10)).toBe(0);
    expect(edgeRamp(5, 0, 10)).toBe(0.5);
  });
});

describe("Viewport edge scrolling", () => {
  it("sets signed speeds from the pointer position", () => {
    const { viewport } = setup();

    viewport.event(move, 10, 25, 0);
    expect(viewport.edgeXSpeed).toBe(-50);
    expect(viewport.edgeYSpeed).toBe(0);

    viewport.event(move, 90, 45, 0);
    expect(viewport.edgeXSpeed).toBe(50);
    expect(viewport.edgeYSpeed).toBe(75);
  });

  it("shapes speeds through the response curve", () => {
    const { viewport } = setup((n) => n * n * n);

    viewport.event(move, 10, 25, 0);
    expect(viewport.edgeXSpeed).toBe(-12.5);
  });

  it("scrolls by speed times elapsed time on the next render", () => {
    const { viewport, redraw } = setup();
    viewport.xadjustment.change(100);

    viewport.event(move, 0, 25, 1);
    expect(viewport.edgeXSpeed).toBe(-100);
    expect(viewport.edgeLastSt).toBe(1);
    expect(redraw.pending(viewport)).toBe(0);

    viewport.render(100, 50, 1.5, 1.5);
    expect(viewport.xadjustment.value).toBe(50);
    expect(viewport.edgeLastSt).toBe(1.5);
  });

  it("keeps integrating from the first event while the pointer holds still", () => {
    const { viewport } = setup();
    viewport.xadjustment.change(100);

    viewport.event(move, 0, 25, 1);
    viewport.event(move, 0, 25, 1.25);
    expect(viewport.edgeLastSt).toBe(1);

    viewport.render(100, 50, 1.5, 1.5);
    expect(viewport.xadjustment.value).toBe(50);
  });

  it("stops at the end of the range", () => {
    const { viewport, redraw } = setup();

    viewport.event(move, 0, 25, 1);
    expect(viewport.edgeXSpeed).toBe(-100);
    expect(viewport.edgeLastSt).toBeNull();
    expect(redraw.pending(viewport)).toBeNull();

    viewport.render(100, 50, 2, 2);
    expect(viewport.xadjustment.value).toBe(0);
  });

  it("clears the speeds when the pointer leaves", () => {
    const { viewport } = setup();
    viewport.xadjustment.change(100);
    viewport.event(move, 0, 25, 1);

    viewport.event(move, 150, 25, 1.1);
    expect(viewport.edgeXSpeed).toBe(0);
    expect(viewport.edgeYSpeed).toBe(0);
    expect(viewport.edgeLastSt).toBeNull();
  });

  it("drops the anchor when the pointer returns to the middle", () => {
    const { viewport } = setup();
    viewport.xadjustment.change(100);
    viewport.event(move, 0, 25, 1);

    viewport.event(move, 50, 25, 1.1);
    expect(viewport.edgeXSpeed).toBe(0);
    expect(viewport.edgeLastSt).toBeNull();

    viewport.render(100, 50, 2, 2);
    expect(viewport.xadjustment.value).toBe(100);
  });

  it("ignores key events", () => {
    const { viewport } = setup();

    viewport.event({ type: "keydown", key: "a" }, 0, 25, 1);
    expect(viewport.edgeXSpeed).toBe(0);
  });
});
