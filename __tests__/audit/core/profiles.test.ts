import { describe, expect, it } from "vitest";
import { DEFAULT_TUNING, resolvePacingSettings } from "../../../src/audit/core/profiles.js";

describe("resolvePacingSettings", () => {
  it("fixes the delay for static profiles", () => {
    const settings = resolvePacingSettings("conservative");
    expect(settings.bounds.index).toEqual({
      initialDelayMs: 1500,
      floorMs: 1500,
      ceilingMs: 1500,
    });
    expect(settings.bounds.content.initialDelayMs).toBe(2000);
  });

  it("gives the adaptive profile per-surface bounds", () => {
    const settings = resolvePacingSettings("adaptive");
    expect(settings.bounds.index).toEqual({
      initialDelayMs: 1500,
      floorMs: 1200,
      ceilingMs: 30_000,
    });
    expect(settings.bounds.content).toEqual({
      initialDelayMs: 1500,
      floorMs: 800,
      ceilingMs: 20_000,
    });
    expect(settings.tuning).toEqual(DEFAULT_TUNING);
  });

  it("clamps an overridden initial delay into the bounds", () => {
    const settings = resolvePacingSettings("adaptive", {
      bounds: { index: { initialDelayMs: 100, floorMs: 500 } },
    });
    expect(settings.bounds.index).toEqual({
      initialDelayMs: 500,
      floorMs: 500,
      ceilingMs: 30_000,
    });
  });

  it("applies a single override value to a fixed profile", () => {
    const settings = resolvePacingSettings("default", {
      bounds: { content: { initialDelayMs: 250 } },
    });
    expect(settings.bounds.content).toEqual({
      initialDelayMs: 250,
      floorMs: 250,
      ceilingMs: 250,
    });
    expect(settings.bounds.index.initialDelayMs).toBe(1000);
  });

  it("merges tuning overrides and freezes the result", () => {
    const settings = resolvePacingSettings("adaptive", {
      tuning: { maxPenaltyLevel: 3 },
      windowSize: 16,
    });
    expect(settings.tuning.maxPenaltyLevel).toBe(3);
    expect(settings.tuning.backoffFactor).toBe(2);
    expect(settings.windowSize).toBe(16);
    expect(Object.isFrozen(settings)).toBe(true);
  });
});
