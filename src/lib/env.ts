import { z } from "zod";
import { ConfigError } from "./errors";

const seconds = (fallback: number) => z.coerce.number().nonnegative().default(fallback);
const count = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  STRAVA_CLIENT_ID: optionalString,
  STRAVA_CLIENT_SECRET: optionalString,
  ROSTER_PATH: optionalString,
  OUTPUT_DIR: z.string().default("strava_output"),
  CHECKPOINT_FILE: z.string().default("strava_checkpoint.json"),
  BATCH_SIZE: count(50),
  STRAVA_PER_PAGE: z.coerce.number().int().min(1).max(200).default(100),
  LOOKBACK_DAYS: count(30),
  RATE_LIMIT_15M: count(100),
  RATE_LIMIT_HOURLY: count(300),
  RATE_LIMIT_DAILY: count(1000),
  RATE_LIMIT_BUFFER_SEC: seconds(2),
  RATE_LIMIT_FALLBACK_SEC: seconds(60),
  MAX_RETRIES: count(5),
  INITIAL_RETRY_SLEEP: seconds(5),
  REQUEST_TIMEOUT_SEC: z.coerce.number().positive().default(30),
  SUBJECT_PAUSE_SEC: seconds(1),
  DATABASE_URL: optionalString,
  WEBHOOK_VERIFY_TOKEN: optionalString,
  STRAVA_API_BASE: z.string().url().default("https://www.strava.com/api/v3"),
  STRAVA_OAUTH_URL: z.string().url().default("https://www.strava.com/oauth/token"),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * Validate the process environment once. Every missing or invalid variable is
 * reported together so a misconfigured deployment fails in a single run.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): AppEnv {
  // Blank values count as unset so defaults apply.
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new ConfigError(`Invalid configuration: ${variables.join(", ")}`, variables);
  }
  return parsed.data;
}

export function requireRosterPath(env: AppEnv): string {
  if (!env.ROSTER_PATH) {
    throw new ConfigError("ROSTER_PATH is not set", ["ROSTER_PATH"]);
  }
  return env.ROSTER_PATH;
}

/** Commands that talk to Strava need the OAuth client pair; the offline ones do not. */
export function requireStravaCredentials(env: AppEnv): { clientId: string; clientSecret: string } {
  const { STRAVA_CLIENT_ID: clientId, STRAVA_CLIENT_SECRET: clientSecret } = env;
  if (!clientId || !clientSecret) {
    const missing = [
      ...(clientId ? [] : ["STRAVA_CLIENT_ID"]),
      ...(clientSecret ? [] : ["STRAVA_CLIENT_SECRET"]),
    ];
    throw new ConfigError(`Missing required configuration: ${missing.join(", ")}`, missing);
  }
  return { clientId, clientSecret };
}
