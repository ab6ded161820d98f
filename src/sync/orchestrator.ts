import type { ServiceContext } from "../context.js";
import { getLatestActivityTimestamp, saveActivities } from "../db/activities.js";
import { getActiveUser, listActiveUsers } from "../db/users.js";
import type { StravaActivitySummary } from "../strava/schemas.js";
import { refreshUserToken } from "../strava/tokens.js";
import type { EnrichmentStats, SyncAllStats, SyncUserResult } from "../types/index.js";
import { SyncError, UserNotFoundError, describeError } from "../utils/errors.js";
import { fromEpochSeconds } from "../utils/weeks.js";
import { enrichUserActivities } from "./enrichment.js";

const EMPTY_ENRICHMENT: EnrichmentStats = {
  zones: { attempted: 0, enriched: 0, failed: 0 },
  segments: { attempted: 0, enriched: 0, failed: 0, efforts: 0 },
};

function failure(error: unknown): SyncUserResult {
  return {
    success: false,
    error: describeError(error),
    code: error instanceof SyncError ? error.code : "UNEXPECTED",
  };
}

/**
 * Refreshes the user's token, fetches activities newer than the newest stored
 * one, saves them and runs one bounded round of enrichment. Activities saved
 * before a later failure stay saved.
 */
export async function syncUser(ctx: ServiceContext, userId: number): Promise<SyncUserResult> {
  const logger = ctx.logger.child("sync");
  logger.info(`Starting sync for user ${userId}`);

  const stored = getActiveUser(ctx.db, userId);
  if (!stored) {
    return failure(new UserNotFoundError(userId));
  }

  let user = stored;
  try {
    user = await refreshUserToken(ctx, stored);
  } catch (error) {
    return failure(error);
  }

  const watermark = getLatestActivityTimestamp(ctx.db, userId);
  if (watermark !== null) {
    logger.info(`User ${userId}: last activity at ${fromEpochSeconds(watermark).toISOString()}, fetching newer activities`);
  } else {
    logger.info(`User ${userId}: no activities yet, fetching recent activities`);
  }

  let fetched: StravaActivitySummary[];
  try {
    fetched = await ctx.strava.fetchActivitiesSince(user.access_token, watermark);
  } catch (error) {
    return failure(error);
  }

  let newActivities: number;
  try {
    newActivities = saveActivities(ctx.db, userId, fetched, logger);
  } catch (error) {
    return failure(error);
  }
  logger.info(`User ${userId}: saved ${newActivities} new activities (fetched ${fetched.length})`);

  let enrichment = EMPTY_ENRICHMENT;
  try {
    enrichment = await enrichUserActivities(ctx, user);
  } catch (error) {
    logger.error(`User ${userId}: enrichment aborted: ${describeError(error)}`);
  }

  return { success: true, newActivities, fetched: fetched.length, enrichment };
}

/** Syncs every active user one after another; one user's failure never stops the rest. */
export async function syncAll(ctx: ServiceContext): Promise<SyncAllStats> {
  const logger = ctx.logger.child("sync");
  logger.info("Starting sync for all users");

  const users = listActiveUsers(ctx.db);
  const stats: SyncAllStats = {
    totalUsers: users.length,
    successful: 0,
    failed: 0,
    newActivities: 0,
    errors: [],
  };

  for (const user of users) {
    const label = `User ${[user.firstname, user.lastname].filter(Boolean).join(" ") || "unknown"} (${user.id})`;
    try {
      const result = await syncUser(ctx, user.id);
      if (result.success) {
        stats.successful++;
        stats.newActivities += result.newActivities;
      } else {
        stats.failed++;
        stats.errors.push(`${label}: ${result.error}`);
        logger.error(`Sync failed for ${label}: ${result.error}`);
      }
    } catch (error) {
      stats.failed++;
      stats.errors.push(`${label}: ${describeError(error)}`);
      logger.error(`Unexpected error syncing ${label}: ${describeError(error)}`);
    }
  }

  logger.info(
    `Sync complete: ${stats.successful}/${stats.totalUsers} users successful, ${stats.newActivities} new activities`
  );
  return stats;
}
