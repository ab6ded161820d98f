import { z } from "zod";
import { ConfigError } from "./utils/errors.js";
import { LOG_LEVELS, type LogLevel } from "./utils/logger.js";
import { getDefaultDatabasePath } from "./utils/paths.js";
import { fromDateKey } from "./utils/weeks.js";

export interface StravaSettings {
  clientId: string;
  clientSecret: string;
  apiUrl: string;
  tokenUrl: string;
  timeoutMs: number;
  pageSize: number;
  maxPages: number;
}

export interface EnrichmentSettings {
  zoneBatchSize: number;
  segmentBatchSize: number;
}

export interface TrophySettings {
  /** `YYYY-MM-DD`; no trophy is computed for weeks before the week containing this day. */
  epoch: string;
  activityTypes: string[];
}

export interface ScheduleSettings {
  syncIntervalMinutes: number;
  trophyIntervalHours: number;
}

export interface AppConfig {
  strava: StravaSettings;
  enrichment: EnrichmentSettings;
  trophies: TrophySettings;
  schedule: ScheduleSettings;
  databasePath: string;
  logLevel: LogLevel;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  STRAVA_CLIENT_ID: z.string().default(""),
  STRAVA_CLIENT_SECRET: z.string().default(""),
  STRAVA_API_URL: z.string().url().default("https://www.strava.com/api/v3"),
  STRAVA_TOKEN_URL: z.string().url().default("https://www.strava.com/oauth/token"),
  HTTP_TIMEOUT_MS: positiveInt(10_000),
  ACTIVITY_PAGE_SIZE: z.coerce.number().int().min(1).max(200).default(50),
  ACTIVITY_MAX_PAGES: z.coerce.number().int().min(1).max(10).default(10),
  ZONE_BATCH_SIZE: positiveInt(20),
  SEGMENT_BATCH_SIZE: positiveInt(10),
  TROPHY_EPOCH: z
    .string()
    .default("2025-01-06")
    .refine((value) => {
      try {
        fromDateKey(value);
        return true;
      } catch {
        return false;
      }
    }, "must be a YYYY-MM-DD date"),
  TROPHY_ACTIVITY_TYPES: z
    .string()
    .default("Walk,Hike,Run,Ride")
    .transform((value) => value.split(",").map((t) => t.trim()).filter((t) => t.length > 0))
    .refine((types) => types.length > 0, "must name at least one activity type"),
  SYNC_INTERVAL_MINUTES: positiveInt(30),
  TROPHY_INTERVAL_HOURS: positiveInt(24),
  DATABASE_PATH: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

// Empty strings in .env mean "unset"
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") result[key] = value;
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  const e = parsed.data;

  return {
    strava: {
      clientId: e.STRAVA_CLIENT_ID,
      clientSecret: e.STRAVA_CLIENT_SECRET,
      apiUrl: e.STRAVA_API_URL.replace(/\/+$/, ""),
      tokenUrl: e.STRAVA_TOKEN_URL,
      timeoutMs: e.HTTP_TIMEOUT_MS,
      pageSize: e.ACTIVITY_PAGE_SIZE,
      maxPages: e.ACTIVITY_MAX_PAGES,
    },
    enrichment: {
      zoneBatchSize: e.ZONE_BATCH_SIZE,
      segmentBatchSize: e.SEGMENT_BATCH_SIZE,
    },
    trophies: {
      epoch: e.TROPHY_EPOCH,
      activityTypes: e.TROPHY_ACTIVITY_TYPES,
    },
    schedule: {
      syncIntervalMinutes: e.SYNC_INTERVAL_MINUTES,
      trophyIntervalHours: e.TROPHY_INTERVAL_HOURS,
    },
    databasePath: e.DATABASE_PATH ?? getDefaultDatabasePath(env),
    logLevel: e.LOG_LEVEL,
  };
}
