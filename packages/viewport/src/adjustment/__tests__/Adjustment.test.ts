import { describe, expect, it, vi } from "vitest";
import { Adjustment } from "../Adjustment";

describe("Adjustment", () => {
  it("clamps the value whenever the range shrinks below it", () => {
    const adjustment = new Adjustment({ range: 100, value: 80 });

    adjustment.range = 50;
    expect(adjustment.value).toBe(50);

    adjustment.range = 200;
    expect(adjustment.value).toBe(50);
  });

  it("clamps direct value writes into [0, range]", () => {
    const adjustment = new Adjustment({ range: 100 });

    adjustment.value = -5;
    expect(adjustment.value).toBe(0);

    adjustment.value = 500;
    expect(adjustment.value).toBe(100);
  });

  it("derives page and step when they are not set", () => {
    const adjustment = new Adjustment({ range: 200 });
    expect(adjustment.page).toBe(20);
    expect(adjustment.step).toBe(1);

    adjustment.page = 50;
    expect(adjustment.step).toBe(5);

    adjustment.step = 7;
    expect(adjustment.step).toBe(7);
  });

  it("notifies observers and the change hook only when the value moves", () => {
    const changed = vi.fn(() => undefined);
    const adjustment = new Adjustment({ range: 100, changed });
    const observer = { adjustmentChanged: vi.fn() };
    adjustment.register(observer);

    expect(adjustment.change(10)).toBeUndefined();
    expect(adjustment.change(10)).toBeUndefined();

    expect(observer.adjustmentChanged).toHaveBeenCalledTimes(1);
    expect(changed).toHaveBeenCalledTimes(1);
    expect(changed).toHaveBeenCalledWith(10);
  });

  it("returns the change hook's override result", () => {
    const adjustment = new Adjustment({ range: 100, changed: () => "redirected" });
    expect(adjustment.change(30)).toBe("redirected");
    expect(adjustment.value).toBe(30);
  });

  it("stops notifying observers after unregister", () => {
    const adjustment = new Adjustment({ range: 100 });
    const observer = { adjustmentChanged: vi.fn() };
    adjustment.register(observer);
    adjustment.unregister(observer);

    adjustment.update();
    expect(observer.adjustmentChanged).not.toHaveBeenCalled();
  });

  it("forgets every observer when a new interaction cycle begins", () => {
    const adjustment = new Adjustment({ range: 100 });
    const stale = { adjustmentChanged: vi.fn() };
    const live = { adjustmentChanged: vi.fn() };
    adjustment.register(stale);

    adjustment.beginInteraction();
    adjustment.register(live);
    adjustment.change(20);

    expect(stale.adjustmentChanged).not.toHaveBeenCalled();
    expect(live.adjustmentChanged).toHaveBeenCalledTimes(1);
  });

  describe("roundValue", () => {
    it("pins values at or past either end", () => {
      const adjustment = new Adjustment({ range: 100, step: 10, forceStep: true });
      expect(adjustment.roundValue(-3, true)).toBe(0);
      expect(adjustment.roundValue(120, false)).toBe(100);
    });

    it("leaves values alone without forced stepping", () => {
      const adjustment = new Adjustment({ range: 100, step: 10 });
      expect(adjustment.roundValue(33, true)).toBe(33);
    });

    it("snaps every change under continuous stepping", () => {
      const adjustment = new Adjustment({ range: 100, step: 10, forceStep: true });
      expect(adjustment.roundValue(33, false)).toBe(30);
      expect(adjustment.roundValue(36, false)).toBe(40);
    });

    it("snaps only on release under release stepping", () => {
      const adjustment = new Adjustment({ range: 100, step: 10, forceStep: "release" });
      expect(adjustment.roundValue(33, false)).toBe(33);
      expect(adjustment.roundValue(36, true)).toBe(40);
    });
  });

  describe("animation", () => {
    it("decays inertia toward the target with shrinking increments", () => {
      const adjustment = new Adjustment({ range: 1000, value: 100 });
      adjustment.inertia(50, 0.5, 0);

      expect(adjustment.periodic(0)).toBe(0);
      expect(adjustment.value).toBe(100);

      expect(adjustment.periodic(0.5)).toBe(0);
      const first = adjustment.value;
      expect(adjustment.periodic(1)).toBe(0);
      const second = adjustment.value;
      expect(adjustment.periodic(1.5)).toBe(0);
      const third = adjustment.value;

      expect(first).toBeCloseTo(150 - 50 * Math.exp(-1), 9);
      expect(second - first).toBeLessThan(first - 100);
      expect(third - second).toBeLessThan(second - first);

      expect(adjustment.periodic(3)).toBeNull();
      expect(adjustment.value).toBeCloseTo(150 - 50 * Math.exp(-6), 9);
      expect(adjustment.isAnimating()).toBe(false);
      expect(adjustment.periodic(4)).toBeNull();
    });

    it("anchors the start time on the first tick when none was given", () => {
      const adjustment = new Adjustment({ range: 1000, value: 100 });
      adjustment.inertia(50, 0.5);

      expect(adjustment.periodic(10)).toBe(0);
      expect(adjustment.value).toBe(100);
      expect(adjustment.periodic(13)).toBeNull();
    });

    it("jumps to the target when ended without `instantly`", () => {
      const adjustment = new Adjustment({ range: 1000, value: 100 });
      adjustment.inertia(50, 0.5, 0);

      adjustment.endAnimation();
      expect(adjustment.value).toBe(150);
      expect(adjustment.isAnimating()).toBe(false);
    });

    it("keeps the current value when ended instantly", () => {
      const adjustment = new Adjustment({ range: 1000, value: 100 });
      adjustment.inertia(50, 0.5, 0);

      adjustment.endAnimation({ instantly: true });
      expect(adjustment.value).toBe(100);
      expect(adjustment.isAnimating()).toBe(false);
    });

    it("does not start an animation with no amplitude or no range", () => {
      const flat = new Adjustment({ range: 1000 });
      flat.inertia(0, 0.5, 0);
      expect(flat.isAnimating()).toBe(false);

      const empty = new Adjustment({ range: 0 });
      empty.inertia(25, 0.5, 0);
      expect(empty.isAnimating()).toBe(false);
    });

    it("cancels a running animation on an ordinary change", () => {
      const adjustment = new Adjustment({ range: 1000, value: 100 });
      adjustment.inertia(50, 0.5, 0);

      adjustment.change(300);
      expect(adjustment.isAnimating()).toBe(false);
      expect(adjustment.value).toBe(300);
    });

    it("carries a running animation over to a replacing adjustment", () => {
      const previous = new Adjustment({ range: 1000, value: 100 });
      previous.inertia(50, 0.5, 0);

      const next = new Adjustment({ range: 1000, value: 100 });
      next.viewportReplaces(previous);

      expect(next.isAnimating()).toBe(true);
      next.endAnimation();
      expect(next.value).toBe(150);
      expect(previous.isAnimating()).toBe(true);
    });
  });
});
