import { z } from "zod";
import { RunSettings } from "./types";
import { ConfigurationError } from "./core/errors";

/** Engine defaults; callers override individual knobs per run */
export const DEFAULT_SETTINGS: Readonly<RunSettings> = Object.freeze({
  maxRuntimeSeconds: 300,
  maxItems: 0,
  concurrency: 8,
  delayMs: 500,
  requestTimeoutMs: 30_000,
});

const settingsSchema = z.object({
  maxRuntimeSeconds: z.number().finite().nonnegative(),
  maxItems: z.number().int().nonnegative(),
  concurrency: z.number().int().min(1),
  delayMs: z.number().int().nonnegative(),
  requestTimeoutMs: z.number().int().positive(),
});

/**
 * Compose the defaults with caller overrides once, at run start.
 * Undefined overrides keep the default. The result is frozen.
 */
export function resolveSettings(
  overrides: Partial<RunSettings> = {}
): Readonly<RunSettings> {
  const merged: RunSettings = {
    maxRuntimeSeconds:
      overrides.maxRuntimeSeconds ?? DEFAULT_SETTINGS.maxRuntimeSeconds,
    maxItems: overrides.maxItems ?? DEFAULT_SETTINGS.maxItems,
    concurrency: overrides.concurrency ?? DEFAULT_SETTINGS.concurrency,
    delayMs: overrides.delayMs ?? DEFAULT_SETTINGS.delayMs,
    requestTimeoutMs:
      overrides.requestTimeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs,
  };

  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid run settings",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return Object.freeze(parsed.data);
}
