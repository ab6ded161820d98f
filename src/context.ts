import type { AppConfig } from "./config.js";
import type { Db } from "./db/connection.js";
import type { StravaClient } from "./strava/client.js";
import type { Logger } from "./utils/logger.js";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Everything a job needs, constructed once at process start and handed to
 * every entry point.
 */
export interface ServiceContext {
  db: Db;
  strava: StravaClient;
  clock: Clock;
  logger: Logger;
  config: Pick<AppConfig, "enrichment" | "trophies">;
}
