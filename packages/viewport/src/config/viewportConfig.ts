import { z } from "zod";

import { ViewportConfigError } from "../errors";

export const ViewportConfigSchema = z.object({
  /** Distance (px) the pointer must travel before a pending drag takes the grab. */
  dragRadius: z.number().finite().nonnegative().default(6),
  /**
   * Scales the release speed (px per 1/60s frame) into inertial travel. `0` disables inertia.
   */
  inertiaAmplitude: z.number().finite().nonnegative().default(20),
  /** Seconds. Inertia settles after six time constants. */
  inertiaTimeConstant: z.number().finite().positive().default(0.325),
  screenWidth: z.number().int().positive().default(1920),
  screenHeight: z.number().int().positive().default(1080),
  allowUnfullGrids: z.boolean().default(false),
  allowUnderfullGrids: z.boolean().default(false),
  developer: z.boolean().default(false),
  variants: z.array(z.string().min(1)).default([]),
});

export type ViewportConfig = z.infer<typeof ViewportConfigSchema>;
export type ViewportConfigInput = z.input<typeof ViewportConfigSchema>;

export function resolveViewportConfig(overrides: ViewportConfigInput = {}): ViewportConfig {
  const parsed = ViewportConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ViewportConfigError("invalid-config", `Invalid viewport config (${details.join("; ")})`);
  }
  return parsed.data;
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

function envNumber(value: string | undefined, parse: (raw: string) => number): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = parse(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function loadViewportConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ViewportConfig {
  const int = (raw: string) => Number.parseInt(raw, 10);

  return resolveViewportConfig({
    dragRadius: envNumber(env.VIEWPORT_DRAG_RADIUS, Number.parseFloat),
    inertiaAmplitude: envNumber(env.VIEWPORT_INERTIA_AMPLITUDE, Number.parseFloat),
    inertiaTimeConstant: envNumber(env.VIEWPORT_INERTIA_TIME_CONSTANT, Number.parseFloat),
    screenWidth: envNumber(env.VIEWPORT_SCREEN_WIDTH, int),
    screenHeight: envNumber(env.VIEWPORT_SCREEN_HEIGHT, int),
    allowUnfullGrids: envBool(env.VIEWPORT_ALLOW_UNFULL_GRIDS),
    allowUnderfullGrids: envBool(env.VIEWPORT_ALLOW_UNDERFULL_GRIDS),
    developer: envBool(env.VIEWPORT_DEVELOPER),
    variants: envList(env.VIEWPORT_VARIANTS),
  });
}
