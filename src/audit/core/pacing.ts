import { type PacingOverrides, resolvePacingSettings } from "./profiles.js";
import { type Clock, sleep, systemClock, throwIfAborted } from "./timing.js";
import type {
  AdaptiveTuning,
  OutcomeEvent,
  PacingProfile,
  PacingSettings,
  PacingSnapshot,
  Surface,
  SurfaceBounds,
  WindowCounts,
} from "./types.js";

// ─── Trailing Window ───

/** Fixed-capacity ring of recent outcomes; the oldest is evicted on insert. */
export class OutcomeWindow {
  private readonly events: (OutcomeEvent | undefined)[];
  private next = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Window capacity must be a positive integer`);
    }
    this.events = new Array<OutcomeEvent | undefined>(capacity);
  }

  push(event: OutcomeEvent): void {
    this.events[this.next] = event;
    this.next = (this.next + 1) % this.capacity;
    this.size = Math.min(this.size + 1, this.capacity);
  }

  get length(): number {
    return this.size;
  }

  counts(): WindowCounts {
    const counts = emptyCounts();
    for (const event of this.events) {
      if (event) counts[event.classification]++;
    }
    return counts;
  }

  /** Counts throttled and error events at or after `since`. */
  dangerSince(since: number): { throttled: number; error: number } {
    let throttled = 0;
    let error = 0;
    for (const event of this.events) {
      if (!event || event.at < since) continue;
      if (event.classification === "throttled") throttled++;
      else if (event.classification === "error") error++;
    }
    return { throttled, error };
  }
}

function emptyCounts(): WindowCounts {
  return { success: 0, throttled: 0, error: 0 };
}

// ─── Controller ───

export interface PacingControllerOptions {
  surface: Surface;
  profile: PacingProfile;
  bounds: SurfaceBounds;
  tuning: AdaptiveTuning;
  windowSize: number;
  clock?: Clock;
}

/**
 * Owns the inter-request delay of one surface. `acquire` hands out permits
 * spaced by the current delay; `report` feeds outcomes back. Only the
 * adaptive profile moves the delay: fast multiplicative backoff on
 * throttling or repeated errors, slow multiplicative recovery after a quiet
 * sustain period.
 */
export class PacingController {
  readonly surface: Surface;
  readonly profile: PacingProfile;

  private readonly bounds: SurfaceBounds;
  private readonly tuning: AdaptiveTuning;
  private readonly clock: Clock;
  private readonly window: OutcomeWindow;
  private readonly totals: WindowCounts = emptyCounts();

  private delayMs: number;
  private lastGrantAt = Number.NEGATIVE_INFINITY;
  private cooldownUntil = 0;
  private penaltyLevel = 0;

  constructor(opts: PacingControllerOptions) {
    this.surface = opts.surface;
    this.profile = opts.profile;
    this.bounds = opts.bounds;
    this.tuning = opts.tuning;
    this.clock = opts.clock ?? systemClock;
    this.window = new OutcomeWindow(opts.windowSize);
    this.delayMs = this.clamp(opts.bounds.initialDelayMs);
  }

  get adaptive(): boolean {
    return this.profile === "adaptive";
  }

  /**
   * Waits until a permit is due: the current delay after the last grant and
   * past any cooldown. Both are re-read after every wait, so an outcome
   * reported while callers sleep holds them back. The slot is taken only
   * when it is due.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      throwIfAborted(signal);
      const now = this.clock();
      const grantAt = Math.max(
        now,
        this.lastGrantAt + this.delayMs,
        this.cooldownUntil,
      );
      if (grantAt <= now) {
        this.lastGrantAt = now;
        return;
      }
      await sleep(grantAt - now, signal);
    }
  }

  report(event: OutcomeEvent): void {
    if (event.surface !== this.surface) {
      throw new Error(
        `Outcome for ${event.surface} reported to the ${this.surface} controller`,
      );
    }
    this.window.push(event);
    this.totals[event.classification]++;

    if (!this.adaptive) return;

    switch (event.classification) {
      case "success":
        this.onSuccess(event.at);
        break;
      case "throttled":
        this.onBackpressure(event.at, this.tuning.cooldownOnThrottledMs);
        break;
      case "error": {
        const since = event.at - this.tuning.sustainMs;
        const recent = this.window.dangerSince(since);
        if (recent.error >= this.tuning.errorBurst) {
          this.onBackpressure(event.at, this.tuning.cooldownOnErrorMs);
        }
        break;
      }
    }
  }

  snapshot(): PacingSnapshot {
    return {
      surface: this.surface,
      profile: this.profile,
      delayMs: this.delayMs,
      floorMs: this.bounds.floorMs,
      ceilingMs: this.bounds.ceilingMs,
      cooldownRemainingMs: Math.max(0, this.cooldownUntil - this.clock()),
      penaltyLevel: this.penaltyLevel,
      window: this.window.counts(),
      totals: { ...this.totals },
    };
  }

  private onSuccess(at: number): void {
    if (at < this.cooldownUntil) return;

    const recent = this.window.dangerSince(at - this.tuning.sustainMs);
    if (recent.throttled > 0 || recent.error > 0) return;

    if (this.penaltyLevel > 0) this.penaltyLevel--;
    this.delayMs = this.clamp(this.delayMs * this.tuning.recoveryFactor);
  }

  private onBackpressure(at: number, baseCooldownMs: number): void {
    this.delayMs = this.clamp(this.delayMs * this.tuning.backoffFactor);
    this.penaltyLevel = Math.min(
      this.penaltyLevel + 1,
      this.tuning.maxPenaltyLevel,
    );
    const cooldown = Math.min(
      baseCooldownMs * this.tuning.cooldownGrowth ** (this.penaltyLevel - 1),
      this.tuning.maxCooldownMs,
    );
    this.cooldownUntil = Math.max(this.cooldownUntil, at + cooldown);
  }

  private clamp(delayMs: number): number {
    const { floorMs, ceilingMs } = this.bounds;
    return Math.min(Math.max(delayMs, floorMs), ceilingMs);
  }
}

// ─── Pacer ───

export interface PacerOptions extends PacingOverrides {
  clock?: Clock;
}

/** One independent controller per surface. */
export class Pacer {
  readonly settings: PacingSettings;
  readonly clock: Clock;
  private readonly controllers: Record<Surface, PacingController>;

  constructor(settings: PacingSettings, clock: Clock = systemClock) {
    this.settings = settings;
    this.clock = clock;
    const build = (surface: Surface) =>
      new PacingController({
        surface,
        profile: settings.profile,
        bounds: settings.bounds[surface],
        tuning: settings.tuning,
        windowSize: settings.windowSize,
        clock,
      });
    this.controllers = { index: build("index"), content: build("content") };
  }

  acquire(surface: Surface, signal?: AbortSignal): Promise<void> {
    return this.controllers[surface].acquire(signal);
  }

  report(event: OutcomeEvent): void {
    this.controllers[event.surface].report(event);
  }

  controller(surface: Surface): PacingController {
    return this.controllers[surface];
  }
}

export function createPacer(
  profile: PacingProfile,
  opts: PacerOptions = {},
): Pacer {
  const { clock, ...overrides } = opts;
  return new Pacer(resolvePacingSettings(profile, overrides), clock);
}
