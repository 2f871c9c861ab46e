import type {
  AdaptiveTuning,
  PacingProfile,
  PacingSettings,
  Surface,
  SurfaceBounds,
} from "./types.js";

/**
 * Fixed delays for the static profiles. The index surface is the more
 * fragile one: the archive escalates penalties there.
 */
const FIXED_DELAY_MS: Record<
  "conservative" | "default",
  Record<Surface, number>
> = {
  conservative: { index: 1500, content: 2000 },
  default: { index: 1000, content: 1500 },
};

const ADAPTIVE_BOUNDS: Record<Surface, SurfaceBounds> = {
  index: { initialDelayMs: 1500, floorMs: 1200, ceilingMs: 30_000 },
  content: { initialDelayMs: 1500, floorMs: 800, ceilingMs: 20_000 },
};

export const DEFAULT_TUNING: AdaptiveTuning = {
  backoffFactor: 2,
  recoveryFactor: 0.9,
  sustainMs: 30_000,
  errorBurst: 2,
  cooldownOnThrottledMs: 10 * 60_000,
  cooldownOnErrorMs: 10_000,
  cooldownGrowth: 2,
  maxPenaltyLevel: 6,
  maxCooldownMs: 60 * 60_000,
};

const DEFAULT_WINDOW_SIZE = 128;

export interface PacingOverrides {
  bounds?: Partial<Record<Surface, Partial<SurfaceBounds>>>;
  tuning?: Partial<AdaptiveTuning>;
  windowSize?: number;
}

function fixedBounds(delayMs: number): SurfaceBounds {
  return { initialDelayMs: delayMs, floorMs: delayMs, ceilingMs: delayMs };
}

function baseBounds(profile: PacingProfile): Record<Surface, SurfaceBounds> {
  if (profile === "adaptive") {
    return {
      index: { ...ADAPTIVE_BOUNDS.index },
      content: { ...ADAPTIVE_BOUNDS.content },
    };
  }
  const delays = FIXED_DELAY_MS[profile];
  return {
    index: fixedBounds(delays.index),
    content: fixedBounds(delays.content),
  };
}

function mergeBounds(
  base: SurfaceBounds,
  override: Partial<SurfaceBounds> | undefined,
  fixed: boolean,
): SurfaceBounds {
  if (!override) return base;
  if (fixed) {
    // Fixed profiles have a single delay; any override value replaces it.
    const delay =
      override.initialDelayMs ?? override.floorMs ?? override.ceilingMs;
    return delay === undefined ? base : fixedBounds(delay);
  }
  const floorMs = override.floorMs ?? base.floorMs;
  const ceilingMs = Math.max(override.ceilingMs ?? base.ceilingMs, floorMs);
  const initial = override.initialDelayMs ?? base.initialDelayMs;
  return {
    floorMs,
    ceilingMs,
    initialDelayMs: Math.min(Math.max(initial, floorMs), ceilingMs),
  };
}

/** Resolves the immutable settings for one run. */
export function resolvePacingSettings(
  profile: PacingProfile,
  overrides: PacingOverrides = {},
): PacingSettings {
  const fixed = profile !== "adaptive";
  const bounds = baseBounds(profile);
  return Object.freeze({
    profile,
    bounds: {
      index: mergeBounds(bounds.index, overrides.bounds?.index, fixed),
      content: mergeBounds(bounds.content, overrides.bounds?.content, fixed),
    },
    tuning: { ...DEFAULT_TUNING, ...overrides.tuning },
    windowSize: overrides.windowSize ?? DEFAULT_WINDOW_SIZE,
  });
}
