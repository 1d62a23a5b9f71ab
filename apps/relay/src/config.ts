/**
 * Relay configuration, read from the environment.
 */

import { z } from "zod";
import { CADENCE, FRAME_FILE, SYNC_DEFAULTS, formatZodError } from "@lumasync/shared";
import type { EstimatorConfig } from "@lumasync/sync";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  /** Comma-separated list */
  CORS_ORIGINS: z.string().default("http://localhost:3000"),
  FPP_BASE_URL: z.string().url().default("http://127.0.0.1"),
  AUDIO_FSEQ_DIR: z.string().min(1).default(FRAME_FILE.DEFAULT_DIR),
  STATUS_POLL_MS: z.coerce.number().int().positive().default(CADENCE.STATUS_POLL_MS),
  STATUS_TIMEOUT_MS: z.coerce.number().int().positive().default(CADENCE.STATUS_TIMEOUT_MS),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  LIST_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  FRAME_RATE: z.coerce.number().int().min(1).max(100).default(CADENCE.FRAME_RATE),
  DEFAULT_CHANNELS: z.coerce.number().int().positive().default(FRAME_FILE.DEFAULT_CHANNELS),
  HARD_SEEK_THRESHOLD_MS: z.coerce
    .number()
    .positive()
    .default(SYNC_DEFAULTS.HARD_SEEK_THRESHOLD_MS),
  HARD_SEEK_COOLDOWN_MS: z.coerce
    .number()
    .nonnegative()
    .default(SYNC_DEFAULTS.HARD_SEEK_COOLDOWN_MS),
  DEADBAND_MS: z.coerce.number().nonnegative().default(SYNC_DEFAULTS.DEADBAND_MS),
  MAX_RATE_ADJUST: z.coerce.number().min(0).max(0.5).default(SYNC_DEFAULTS.MAX_RATE_ADJUST),
});

export interface RelayConfig {
  port: number;
  corsOrigins: string[];
  fppBaseUrl: string;
  audioDir: string;
  statusPollMs: number;
  statusTimeoutMs: number;
  commandTimeoutMs: number;
  listTimeoutMs: number;
  frameRate: number;
  defaultChannels: number;
  estimator: Partial<EstimatorConfig>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Expand each origin to both its www and non-www form.
 * "http://localhost:3000,https://show.example" becomes four origins.
 */
export function expandCorsOrigins(list: string): string[] {
  const origins: string[] = [];
  const base = list
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  for (const origin of base) {
    origins.push(origin);
    if (origin.includes("://www.")) {
      origins.push(origin.replace("://www.", "://"));
    } else if (!origin.includes("localhost") && !origin.includes("127.0.0.1")) {
      origins.push(origin.replace("://", "://www."));
    }
  }

  return [...new Set(origins)];
}

/** Validate the environment and build the relay configuration */
export function loadConfig(env: Record<string, string | undefined>): RelayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid relay configuration: ${formatZodError(parsed.error)}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    corsOrigins: expandCorsOrigins(e.CORS_ORIGINS),
    fppBaseUrl: e.FPP_BASE_URL.replace(/\/+$/, ""),
    audioDir: e.AUDIO_FSEQ_DIR,
    statusPollMs: e.STATUS_POLL_MS,
    statusTimeoutMs: e.STATUS_TIMEOUT_MS,
    commandTimeoutMs: e.COMMAND_TIMEOUT_MS,
    listTimeoutMs: e.LIST_TIMEOUT_MS,
    frameRate: e.FRAME_RATE,
    defaultChannels: e.DEFAULT_CHANNELS,
    estimator: {
      hardSeekThresholdMs: e.HARD_SEEK_THRESHOLD_MS,
      hardSeekCooldownMs: e.HARD_SEEK_COOLDOWN_MS,
      deadbandMs: e.DEADBAND_MS,
      maxRateAdjust: e.MAX_RATE_ADJUST,
    },
  };
}
