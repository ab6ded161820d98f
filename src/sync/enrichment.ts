import type { ServiceContext } from "../context.js";
import {
  getActivitiesWithoutSegments,
  getActivitiesWithoutZones,
  insertHrZones,
  saveSegmentEfforts,
} from "../db/enrichment.js";
import type { EnrichmentStats, SegmentSyncStats, UserRecord, ZoneSeconds, ZoneSyncStats } from "../types/index.js";
import { describeError, isStopCondition } from "../utils/errors.js";

const NO_ZONE_DATA: ZoneSeconds = [0, 0, 0, 0, 0];

/**
 * Fetches heart-rate zone distributions for the user's most recent activities
 * that recorded heart rate and have no zone record yet. A failed fetch leaves
 * the activity for the next cycle; an activity Strava has no distribution for
 * gets an all-zero record so it is not asked about again.
 */
export async function syncHeartRateZones(ctx: ServiceContext, user: UserRecord): Promise<ZoneSyncStats> {
  const logger = ctx.logger.child("zones");
  const pending = getActivitiesWithoutZones(ctx.db, user.id, ctx.config.enrichment.zoneBatchSize);
  const stats: ZoneSyncStats = { attempted: 0, enriched: 0, failed: 0 };

  for (const activity of pending) {
    stats.attempted++;
    let zones: ZoneSeconds | null;
    try {
      zones = await ctx.strava.fetchActivityZones(user.access_token, activity.activity_id);
    } catch (error) {
      stats.failed++;
      logger.warn(`Zones unavailable for activity ${activity.activity_id}: ${describeError(error)}`);
      if (isStopCondition(error)) break;
      continue;
    }

    try {
      insertHrZones(ctx.db, user.id, activity.activity_id, zones ?? NO_ZONE_DATA, ctx.clock.now().toISOString());
      stats.enriched++;
    } catch (error) {
      stats.failed++;
      logger.error(`Error saving zones for activity ${activity.activity_id}: ${describeError(error)}`);
    }
  }

  if (stats.attempted > 0) {
    logger.info(`User ${user.id}: zones ${stats.enriched}/${stats.attempted} activities`);
  }
  return stats;
}

/**
 * Fetches activity detail for the user's most recent activities whose segment
 * efforts have not been processed. The processed flag is only set once the
 * detail was fetched and stored, including when it carries no efforts.
 */
export async function syncSegmentEfforts(ctx: ServiceContext, user: UserRecord): Promise<SegmentSyncStats> {
  const logger = ctx.logger.child("segments");
  const pending = getActivitiesWithoutSegments(ctx.db, user.id, ctx.config.enrichment.segmentBatchSize);
  const stats: SegmentSyncStats = { attempted: 0, enriched: 0, failed: 0, efforts: 0 };

  for (const activity of pending) {
    stats.attempted++;
    try {
      const detail = await ctx.strava.fetchActivityDetail(user.access_token, activity.activity_id);
      stats.efforts += saveSegmentEfforts(
        ctx.db,
        user.id,
        activity.activity_id,
        detail.segmentEfforts,
        ctx.clock.now().toISOString()
      );
      stats.enriched++;
    } catch (error) {
      stats.failed++;
      logger.warn(`Segments unavailable for activity ${activity.activity_id}: ${describeError(error)}`);
      if (isStopCondition(error)) break;
    }
  }

  if (stats.attempted > 0) {
    logger.info(`User ${user.id}: segments ${stats.enriched}/${stats.attempted} activities, ${stats.efforts} new efforts`);
  }
  return stats;
}

export async function enrichUserActivities(ctx: ServiceContext, user: UserRecord): Promise<EnrichmentStats> {
  const zones = await syncHeartRateZones(ctx, user);
  const segments = await syncSegmentEfforts(ctx, user);
  return { zones, segments };
}
