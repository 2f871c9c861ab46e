import { ConfigError } from "./errors.js";
import type { PacingOverrides } from "./profiles.js";
import {
  type AdaptiveTuning,
  PACING_PROFILES,
  type PacingProfile,
} from "./types.js";

export interface AuditConfig {
  pacing: PacingProfile;
  pacingOverrides: PacingOverrides;
  indexConcurrency: number;
  contentConcurrency: number;
  checkExistence: boolean;
  storeDir: string;
  requestTimeoutMs: number;
  bearerToken?: string;
}

/** Values as the command line hands them over. */
export interface CliConfigInput {
  pacing?: string;
  indexConcurrency?: string | number;
  contentConcurrency?: string | number;
  check?: boolean;
  store?: string;
}

type Env = Record<string, string | undefined>;

// ─── Parsing ───

function parseNumber(name: string, raw: string | number): number {
  const value = typeof raw === "number" ? raw : Number(raw.trim());
  if (typeof raw === "string" && raw.trim() === "") {
    throw new ConfigError(`${name} must be a number, got an empty value`);
  }
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function positiveInt(name: string, raw: string | number): number {
  const value = parseNumber(name, raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function nonNegative(name: string, raw: string | number): number {
  const value = parseNumber(name, raw);
  if (value < 0) {
    throw new ConfigError(`${name} must not be negative, got "${raw}"`);
  }
  return value;
}

export function parsePacingProfile(raw: string): PacingProfile {
  const profile = PACING_PROFILES.find((p) => p === raw);
  if (!profile) {
    throw new ConfigError(
      `Unknown pacing profile "${raw}" (expected ${PACING_PROFILES.join(", ")})`,
    );
  }
  return profile;
}

// ─── Environment overrides ───

const SECONDS_OVERRIDES: [string, keyof AdaptiveTuning][] = [
  ["ARCHIVE_AUDIT_COOLDOWN_THROTTLED_SECS", "cooldownOnThrottledMs"],
  ["ARCHIVE_AUDIT_COOLDOWN_ERROR_SECS", "cooldownOnErrorMs"],
  ["ARCHIVE_AUDIT_MAX_COOLDOWN_SECS", "maxCooldownMs"],
  ["ARCHIVE_AUDIT_SUSTAIN_SECS", "sustainMs"],
];

function tuningFromEnv(env: Env): Partial<AdaptiveTuning> {
  const tuning: Partial<AdaptiveTuning> = {};
  for (const [name, key] of SECONDS_OVERRIDES) {
    const raw = env[name];
    if (raw !== undefined) tuning[key] = nonNegative(name, raw) * 1000;
  }

  const growth = env.ARCHIVE_AUDIT_COOLDOWN_GROWTH;
  if (growth !== undefined) {
    const value = parseNumber("ARCHIVE_AUDIT_COOLDOWN_GROWTH", growth);
    if (value < 1) {
      throw new ConfigError(
        `ARCHIVE_AUDIT_COOLDOWN_GROWTH must be at least 1, got "${growth}"`,
      );
    }
    tuning.cooldownGrowth = value;
  }

  const penalty = env.ARCHIVE_AUDIT_MAX_PENALTY_LEVEL;
  if (penalty !== undefined) {
    tuning.maxPenaltyLevel = positiveInt(
      "ARCHIVE_AUDIT_MAX_PENALTY_LEVEL",
      penalty,
    );
  }
  return tuning;
}

/**
 * Resolves the run's configuration from the environment and command-line
 * options. The result is frozen; invalid values raise ConfigError.
 */
export function loadConfig(
  env: Env = process.env,
  cli: CliConfigInput = {},
): AuditConfig {
  const checkExistence = cli.check ?? true;
  const bearerToken = env.TWITTER_BEARER_TOKEN?.trim() || undefined;
  if (checkExistence && !bearerToken) {
    throw new ConfigError(
      "The existence check needs TWITTER_BEARER_TOKEN (or pass --no-check)",
    );
  }

  return Object.freeze({
    pacing: parsePacingProfile(cli.pacing ?? "default"),
    pacingOverrides: { tuning: tuningFromEnv(env) },
    indexConcurrency: positiveInt(
      "--index-concurrency",
      cli.indexConcurrency ?? 1,
    ),
    contentConcurrency: positiveInt(
      "--content-concurrency",
      cli.contentConcurrency ?? 2,
    ),
    checkExistence,
    storeDir: cli.store ?? env.ARCHIVE_AUDIT_STORE_DIR ?? "./data",
    requestTimeoutMs:
      positiveInt(
        "ARCHIVE_AUDIT_REQUEST_TIMEOUT_SECS",
        env.ARCHIVE_AUDIT_REQUEST_TIMEOUT_SECS ?? 60,
      ) * 1000,
    bearerToken,
  });
}
