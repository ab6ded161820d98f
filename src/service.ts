import type { AppConfig } from "./config.js";
import { systemClock, type Clock, type ServiceContext } from "./context.js";
import { getActivityCount, getLatestActivityDate } from "./db/activities.js";
import { getSchemaVersion, openDatabase, type Db } from "./db/connection.js";
import { countPendingSegmentActivities } from "./db/enrichment.js";
import { countTrophyWeeks } from "./db/trophies.js";
import { countUsers } from "./db/users.js";
import { StravaClient, type FetchLike } from "./strava/client.js";
import { syncAll, syncUser } from "./sync/orchestrator.js";
import { calculateWeeklyTrophies } from "./trophies/calculator.js";
import {
  getAllTimeKudosLeaderboard,
  getRecentTrophyWinners,
  getTopKudosActivity,
  getTrophyLeaderboard,
  getWeeklyKudosLeaderboard,
} from "./trophies/leaderboards.js";
import type {
  KudosLeaderboardEntry,
  StatusReport,
  SyncAllStats,
  SyncUserResult,
  TopKudosActivity,
  TrophyLeaderboardEntry,
  TrophyStats,
  TrophyWinner,
} from "./types/index.js";
import { createLogger, type Logger } from "./utils/logger.js";

/**
 * Entry point for everything the scheduler, CLI and web layer call. Owns the
 * database handle it was given.
 */
export class ClubService {
  constructor(private readonly ctx: ServiceContext) {}

  syncUser(userId: number): Promise<SyncUserResult> {
    return syncUser(this.ctx, userId);
  }

  syncAll(): Promise<SyncAllStats> {
    return syncAll(this.ctx);
  }

  calculateWeeklyTrophies(): TrophyStats {
    return calculateWeeklyTrophies(this.ctx);
  }

  getTrophyLeaderboard(): TrophyLeaderboardEntry[] {
    return getTrophyLeaderboard(this.ctx.db, this.ctx.config.trophies.epoch);
  }

  getRecentTrophyWinners(weeks?: number): TrophyWinner[] {
    return getRecentTrophyWinners(this.ctx.db, weeks);
  }

  getWeeklyKudosLeaderboard(): KudosLeaderboardEntry[] {
    return getWeeklyKudosLeaderboard(this.ctx.db, this.ctx.clock.now());
  }

  getAllTimeKudosLeaderboard(): KudosLeaderboardEntry[] {
    return getAllTimeKudosLeaderboard(this.ctx.db, this.ctx.config.trophies.epoch);
  }

  getTopKudosActivity(): TopKudosActivity | null {
    return getTopKudosActivity(this.ctx.db, this.ctx.config.trophies.epoch);
  }

  status(): StatusReport {
    const users = countUsers(this.ctx.db);
    return {
      schemaVersion: getSchemaVersion(this.ctx.db),
      activeUsers: users.active,
      totalUsers: users.total,
      activities: getActivityCount(this.ctx.db),
      latestActivity: getLatestActivityDate(this.ctx.db),
      pendingSegmentActivities: countPendingSegmentActivities(this.ctx.db),
      trophyWeeks: countTrophyWeeks(this.ctx.db),
    };
  }

  close(): void {
    if (this.ctx.db.open) {
      this.ctx.db.close();
    }
  }
}

export interface ServiceOverrides {
  db?: Db;
  fetch?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

export function createService(config: AppConfig, overrides: ServiceOverrides = {}): ClubService {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const db = overrides.db ?? openDatabase(config.databasePath);
  const strava = new StravaClient(config.strava, logger.child("strava"), overrides.fetch);

  return new ClubService({
    db,
    strava,
    clock: overrides.clock ?? systemClock,
    logger,
    config: { enrichment: config.enrichment, trophies: config.trophies },
  });
}
