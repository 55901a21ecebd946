import { join } from "path";
import { z } from "zod";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  DATA_DIR: z.string().min(1).default("./data"),
  POLYRATINGS_API: z.string().url().default("https://api-prod.polyratings.org"),
  RATE_MS: intFromEnv(100),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_RETRIES: intFromEnv(3),
  REVIEW_FAILURE_TOLERANCE: z.coerce.number().min(0).max(1).default(0),
  MAX_PROFESSORS: z.coerce.number().int().positive().optional(),
});

export type HarvestConfig = {
  mainDir: string;
  trackingDir: string;
  apiBase: string;
  http: { rateMs: number; timeoutMs: number; retries: number };
  reviewFailureTolerance: number;
  maxProfessors: number | null;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const v = env[key]?.trim();
    out[key] = v ? v : undefined;
  }
  return out;
}

/**
 * Build the run configuration from environment variables.
 * Unset or blank variables take their defaults.
 */
export function loadHarvestConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(i => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    mainDir: join(e.DATA_DIR, "main"),
    trackingDir: join(e.DATA_DIR, "tracking"),
    apiBase: e.POLYRATINGS_API.replace(/\/+$/, ""),
    http: { rateMs: e.RATE_MS, timeoutMs: e.HTTP_TIMEOUT_MS, retries: e.HTTP_RETRIES },
    reviewFailureTolerance: e.REVIEW_FAILURE_TOLERANCE,
    maxProfessors: e.MAX_PROFESSORS ?? null,
  };
}
