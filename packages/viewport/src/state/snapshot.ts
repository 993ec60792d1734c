import { z } from "zod";

import type { Adjustment } from "../adjustment/Adjustment";
import { ViewportStateError } from "../errors";
import type { Viewport } from "../viewport/Viewport";

export const VIEWPORT_SNAPSHOT_VERSION = 1;

const FiniteNumber = z.number().finite();

const AxisSnapshotSchema = z.object({
  value: FiniteNumber.nonnegative(),
  range: FiniteNumber.nonnegative(),
  page: FiniteNumber.nonnegative(),
});

const PointSchema = z.object({ x: FiniteNumber, y: FiniteNumber });

const DragSnapshotSchema = z.object({
  position: PointSchema,
  time: FiniteNumber.nullable(),
  speed: PointSchema,
});

const ViewportSnapshotV1Schema = z.object({
  version: z.literal(1),
  x: AxisSnapshotSchema,
  y: AxisSnapshotSchema,
  drag: DragSnapshotSchema.nullable(),
});

// New versions join this union; older ones stay readable.
export const ViewportSnapshotSchema = z.discriminatedUnion("version", [ViewportSnapshotV1Schema]);

export type ViewportSnapshot = z.infer<typeof ViewportSnapshotSchema>;
export type AxisSnapshot = z.infer<typeof AxisSnapshotSchema>;

function snapshotAxis(adjustment: Adjustment): AxisSnapshot {
  return { value: adjustment.value, range: adjustment.range, page: adjustment.page };
}

function restoreAxis(adjustment: Adjustment, snapshot: AxisSnapshot): void {
  adjustment.range = snapshot.range;
  adjustment.page = snapshot.page;
  adjustment.value = snapshot.value;
}

/**
 * Captures the persisted subset of a viewport: scroll position/extent per axis and any drag in
 * progress. Everything else is rebuilt from configuration.
 */
export function snapshotViewport<TChild>(viewport: Viewport<TChild>): ViewportSnapshot {
  const position = viewport.dragPosition;

  return {
    version: VIEWPORT_SNAPSHOT_VERSION,
    x: snapshotAxis(viewport.xadjustment),
    y: snapshotAxis(viewport.yadjustment),
    drag: position
      ? {
          position: { ...position },
          time: viewport.dragPositionTime,
          speed: { ...viewport.dragSpeed },
        }
      : null,
  };
}

export function parseViewportSnapshot(raw: unknown): ViewportSnapshot {
  if (raw !== null && typeof raw === "object" && "version" in raw && raw.version !== VIEWPORT_SNAPSHOT_VERSION) {
    throw new ViewportStateError(`Unsupported viewport snapshot version: ${String(raw.version)}`);
  }

  const parsed = ViewportSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ViewportStateError("Invalid viewport snapshot", issues);
  }
  return parsed.data;
}

export function restoreViewport<TChild>(viewport: Viewport<TChild>, raw: unknown): void {
  const snapshot = parseViewportSnapshot(raw);

  restoreAxis(viewport.xadjustment, snapshot.x);
  restoreAxis(viewport.yadjustment, snapshot.y);

  if (snapshot.drag) {
    viewport.dragPosition = { ...snapshot.drag.position };
    viewport.dragPositionTime = snapshot.drag.time;
    viewport.dragSpeed = { ...snapshot.drag.speed };
  } else {
    viewport.dragPosition = null;
    viewport.dragPositionTime = null;
    viewport.dragSpeed = { x: 0, y: 0 };
  }
}
