import "dotenv/config";
import { z } from "zod";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const booleanFlag = z
  .string()
  .default("false")
  .transform((v) => ["1", "true", "yes"].includes(v.trim().toLowerCase()));

const EnvSchema = z
  .object({
    USER_AGENT: z.string().trim().default(""),
    ACCEPT_LANGUAGE: z.string().trim().default("ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7"),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(600),
    PAUSE_MIN_MS: z.coerce.number().int().min(0).default(200),
    PAUSE_MAX_MS: z.coerce.number().int().min(0).default(500),
    RESOLVE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
    DEBUG_MODE: booleanFlag,
    OUTPUT_DIR: z.string().trim().min(1).default("data/out"),
  })
  .refine((env) => env.PAUSE_MAX_MS >= env.PAUSE_MIN_MS, {
    message: "PAUSE_MAX_MS must be >= PAUSE_MIN_MS",
    path: ["PAUSE_MAX_MS"],
  });

export type ResolverConfig = {
  userAgent: string;
  acceptLanguage: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  pauseMinMs: number;
  pauseMaxMs: number;
  concurrency: number;
  debug: boolean;
  outputDir: string;
};

/**
 * Builds the resolver configuration from an environment record.
 * Unset or empty variables fall back to their defaults; anything else must parse.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ResolverConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );
  const parsed = EnvSchema.parse(present);

  return {
    userAgent: parsed.USER_AGENT || DEFAULT_USER_AGENT,
    acceptLanguage: parsed.ACCEPT_LANGUAGE,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    maxRetries: parsed.MAX_RETRIES,
    retryBaseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    pauseMinMs: parsed.PAUSE_MIN_MS,
    pauseMaxMs: parsed.PAUSE_MAX_MS,
    concurrency: parsed.RESOLVE_CONCURRENCY,
    debug: parsed.DEBUG_MODE,
    outputDir: parsed.OUTPUT_DIR,
  };
}
