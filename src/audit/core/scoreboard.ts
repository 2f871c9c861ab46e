import type { Pacer } from "./pacing.js";
import { type PacingSnapshot, SURFACES } from "./types.js";

export interface ScoreboardSnapshot {
  takenAt: string;
  surfaces: PacingSnapshot[];
}

/**
 * Read-only view over a Pacer. Taking a snapshot copies controller state and
 * never changes it.
 */
export class Scoreboard {
  private readonly pacer: Pacer;

  constructor(pacer: Pacer) {
    this.pacer = pacer;
  }

  snapshot(now: Date = new Date()): ScoreboardSnapshot {
    return {
      takenAt: now.toISOString(),
      surfaces: SURFACES.map((surface) =>
        this.pacer.controller(surface).snapshot(),
      ),
    };
  }

  format(snapshot: ScoreboardSnapshot = this.snapshot()): string {
    const lines = [`Pacing scoreboard at ${snapshot.takenAt}`];
    for (const s of snapshot.surfaces) {
      lines.push(
        `${s.surface.padEnd(7)} profile=${s.profile} delay=${fmtMs(s.delayMs)} ` +
          `(floor=${fmtMs(s.floorMs)} ceiling=${fmtMs(s.ceilingMs)}) ` +
          `cooldown=${fmtMs(s.cooldownRemainingMs)} penalty=${s.penaltyLevel}`,
      );
      lines.push(
        `        window: success=${s.window.success} throttled=${s.window.throttled} error=${s.window.error}` +
          ` | totals: success=${s.totals.success} throttled=${s.totals.throttled} error=${s.totals.error}`,
      );
    }
    return `${lines.join("\n")}\n`;
  }
}

function fmtMs(ms: number): string {
  return `${Math.round(ms)}ms`;
}

// ─── Operator Signal ───

export interface SignalTarget {
  on(event: string, listener: () => void): unknown;
  off(event: string, listener: () => void): unknown;
}

export interface DiagnosticsOptions {
  signal?: string;
  target?: SignalTarget;
  write?: (text: string) => void;
}

/**
 * Prints the scoreboard whenever the diagnostic signal arrives. Returns a
 * function that removes the listener.
 */
export function installDiagnosticsSignal(
  scoreboard: Scoreboard,
  opts: DiagnosticsOptions = {},
): () => void {
  const signal = opts.signal ?? "SIGUSR1";
  const target: SignalTarget = opts.target ?? process;
  const write = opts.write ?? ((text: string) => process.stderr.write(text));

  const listener = () => {
    write(scoreboard.format());
  };
  target.on(signal, listener);
  return () => {
    target.off(signal, listener);
  };
}
