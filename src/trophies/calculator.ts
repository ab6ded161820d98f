import type { ServiceContext } from "../context.js";
import {
  getEarliestActivityTimestamp,
  getWeeklyDistanceTotals,
  hasTrophiesForWeek,
  insertTrophy,
  type WeeklyDistanceTotal,
} from "../db/trophies.js";
import type { TrophyStats } from "../types/index.js";
import { describeError } from "../utils/errors.js";
import {
  addDays,
  fromDateKey,
  fromEpochSeconds,
  startOfIsoWeek,
  toDateKey,
  toEpochSeconds,
} from "../utils/weeks.js";

export interface WeeklyWinner {
  userId: number;
  totalDistance: number;
  activityCount: number;
}

/**
 * Everyone whose total, rounded to whole meters, reaches the week's maximum.
 * Rounding first keeps equal distances summed in a different order tied.
 */
export function pickWeeklyWinners(totals: WeeklyDistanceTotal[]): WeeklyWinner[] {
  const rounded = totals.map((t) => ({
    userId: t.user_id,
    totalDistance: Math.round(t.total_distance),
    activityCount: t.activity_count,
  }));
  if (rounded.length === 0) return [];

  const winningDistance = Math.max(...rounded.map((t) => t.totalDistance));
  return rounded
    .filter((t) => t.totalDistance >= winningDistance)
    .sort((a, b) => a.userId - b.userId);
}

/** First week eligible for a trophy: the week of the earliest activity, but never before the epoch's week. */
export function firstTrophyWeek(earliestActivity: Date, epoch: string): Date {
  const activityWeek = startOfIsoWeek(earliestActivity);
  const epochWeek = startOfIsoWeek(fromDateKey(epoch));
  return activityWeek.getTime() > epochWeek.getTime() ? activityWeek : epochWeek;
}

/**
 * Walks every week from the first eligible one up to now and awards the
 * distance trophy for each completed week that has none yet. Re-running is a
 * no-op for weeks already awarded.
 */
export function calculateWeeklyTrophies(ctx: ServiceContext): TrophyStats {
  const logger = ctx.logger.child("trophies");
  const { epoch, activityTypes } = ctx.config.trophies;
  const stats: TrophyStats = { weeksProcessed: 0, trophiesAwarded: 0, weeksSkipped: 0, errors: [] };

  logger.info("Starting weekly trophy calculation");

  const earliest = getEarliestActivityTimestamp(ctx.db);
  if (earliest === null) {
    logger.info("No activities found for trophy calculation");
    return stats;
  }

  const now = ctx.clock.now();

  const processWeeks = ctx.db.transaction(() => {
    const firstWeek = firstTrophyWeek(fromEpochSeconds(earliest), epoch);
    for (let weekStart = firstWeek; weekStart.getTime() <= now.getTime(); weekStart = addDays(weekStart, 7)) {
      const weekEnd = addDays(weekStart, 7);
      const weekKey = toDateKey(weekStart);

      // Current week is still open
      if (weekEnd.getTime() > now.getTime()) {
        stats.weeksSkipped++;
        continue;
      }

      try {
        if (hasTrophiesForWeek(ctx.db, weekKey)) {
          stats.weeksSkipped++;
          continue;
        }

        const totals = getWeeklyDistanceTotals(ctx.db, toEpochSeconds(weekStart), toEpochSeconds(weekEnd), activityTypes);
        const winners = pickWeeklyWinners(totals);
        if (winners.length === 0) {
          stats.weeksSkipped++;
          continue;
        }

        for (const winner of winners) {
          try {
            const awarded = insertTrophy(ctx.db, {
              userId: winner.userId,
              weekStart: weekKey,
              weekEnd: toDateKey(weekEnd),
              totalDistance: winner.totalDistance,
              activityCount: winner.activityCount,
            });
            if (awarded) {
              stats.trophiesAwarded++;
              logger.info(
                `Trophy awarded for week ${weekKey}: user ${winner.userId} - ${(winner.totalDistance / 1000).toFixed(2)}km`
              );
            }
          } catch (error) {
            logger.error(`Error awarding trophy for week ${weekKey} to user ${winner.userId}: ${describeError(error)}`);
            stats.errors.push(`Week ${weekKey}, user ${winner.userId}: ${describeError(error)}`);
          }
        }

        stats.weeksProcessed++;
      } catch (error) {
        logger.error(`Error processing week ${weekKey}: ${describeError(error)}`);
        stats.errors.push(`Week ${weekKey}: ${describeError(error)}`);
      }
    }
  });

  try {
    processWeeks();
  } catch (error) {
    logger.error(`Error in trophy calculation: ${describeError(error)}`);
    stats.errors.push(describeError(error));
  }

  logger.info(
    `Trophy calculation complete: ${stats.weeksProcessed} weeks processed, ${stats.trophiesAwarded} trophies awarded`
  );
  return stats;
}
