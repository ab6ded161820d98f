import { vi } from "vitest";
import type { EnrichmentSettings, StravaSettings, TrophySettings } from "../src/config.js";
import type { Clock, ServiceContext } from "../src/context.js";
import { openDatabase, type Db } from "../src/db/connection.js";
import { upsertUserFromAuth } from "../src/db/users.js";
import { StravaClient, type FetchLike } from "../src/strava/client.js";
import type { StravaActivitySummary } from "../src/strava/schemas.js";
import type { PrivacyLevel, UserRecord } from "../src/types/index.js";
import { createLogger, type Logger } from "../src/utils/logger.js";
import { toEpochSeconds } from "../src/utils/weeks.js";

export const TEST_STRAVA: StravaSettings = {
  clientId: "test-client",
  clientSecret: "test-secret",
  apiUrl: "https://strava.test/api/v3",
  tokenUrl: "https://strava.test/oauth/token",
  timeoutMs: 1000,
  pageSize: 2,
  maxPages: 3,
};

export const TEST_ENRICHMENT: EnrichmentSettings = { zoneBatchSize: 20, segmentBatchSize: 10 };

export const TEST_TROPHIES: TrophySettings = {
  epoch: "2025-01-06",
  activityTypes: ["Walk", "Hike", "Run", "Ride"],
};

export const silentLogger = createLogger({ level: "silent" });

export function createRecordingLogger() {
  const logger = {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    child: (_scope: string): Logger => logger,
  };
  return logger;
}

export function fixedClock(iso: string): Clock {
  return { now: () => new Date(iso) };
}

export function createTestDb(): Db {
  return openDatabase(":memory:");
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export type RouteHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

/** A fetch stub that hands every request to `handler` and records the calls. */
export function createFetchStub(handler: RouteHandler) {
  return vi.fn<FetchLike>(async (input, init) => handler(new URL(input), init));
}

export function bearer(init?: RequestInit): string | null {
  return new Headers(init?.headers).get("Authorization");
}

export interface TestContextOptions {
  db?: Db;
  fetch?: FetchLike;
  now?: string;
  logger?: Logger;
  strava?: Partial<StravaSettings>;
  enrichment?: Partial<EnrichmentSettings>;
  trophies?: Partial<TrophySettings>;
}

export const DEFAULT_NOW = "2025-03-12T12:00:00Z";

export function createTestContext(options: TestContextOptions = {}): ServiceContext {
  const logger = options.logger ?? silentLogger;
  const fetch = options.fetch ?? createFetchStub(() => json({ message: "unexpected request" }, 500));
  return {
    db: options.db ?? createTestDb(),
    strava: new StravaClient({ ...TEST_STRAVA, ...options.strava }, logger, fetch),
    clock: fixedClock(options.now ?? DEFAULT_NOW),
    logger,
    config: {
      enrichment: { ...TEST_ENRICHMENT, ...options.enrichment },
      trophies: { ...TEST_TROPHIES, ...options.trophies },
    },
  };
}

export interface TestUserOptions {
  athleteId: number;
  firstname?: string;
  lastname?: string;
  accessToken?: string;
  expiresAt?: number;
  privacyLevel?: PrivacyLevel;
}

export function insertUser(db: Db, options: TestUserOptions): UserRecord {
  return upsertUserFromAuth(
    db,
    { id: options.athleteId, firstname: options.firstname ?? "Test", lastname: options.lastname ?? "Athlete" },
    {
      access_token: options.accessToken ?? "test-access",
      refresh_token: "test-refresh",
      expires_at: options.expiresAt ?? toEpochSeconds(new Date(DEFAULT_NOW)) + 3600,
    },
    new Date(DEFAULT_NOW),
    options.privacyLevel
  );
}

export function makeActivity(
  overrides: Partial<StravaActivitySummary> & Pick<StravaActivitySummary, "id">
): StravaActivitySummary {
  return {
    name: `Activity ${overrides.id}`,
    type: "Run",
    start_date: "2025-03-04T07:30:00Z",
    distance: 5000,
    moving_time: 1500,
    elapsed_time: 1620,
    total_elevation_gain: 25,
    average_speed: 3.3,
    max_speed: 4.6,
    kudos_count: 0,
    ...overrides,
  };
}

export function epochOf(iso: string): number {
  return Math.floor(Date.parse(iso) / 1000);
}
