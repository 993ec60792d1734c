/**
 * `0` at `zero`, `1` at `one`, linear in between, and `0` outside that span on either side.
 */
export function edgeRamp(position: number, zero: number, one: number): number {
  const n = (position - zero) / (one - zero);
  if (n < 0 || n > 1) return 0;
  return n;
}

/**
 * Signed edge-scroll factor in `[-1, 1]` for a pointer at `position` along an axis of `extent`
 * pixels: negative near the start, positive near the end, zero in the middle.
 */
export function edgeFactor(position: number, extent: number, edgeSize: number): number {
  return edgeRamp(position, extent - edgeSize, extent) - edgeRamp(position, edgeSize, 0);
}
