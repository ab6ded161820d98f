import type { WeeklyTrophyRecord } from "../types/index.js";
import type { Db } from "./connection.js";

export interface WeeklyDistanceTotal {
  user_id: number;
  total_distance: number;
  activity_count: number;
}

export interface TrophyAward {
  userId: number;
  weekStart: string;
  weekEnd: string;
  totalDistance: number;
  activityCount: number;
}

export function getEarliestActivityTimestamp(db: Db): number | null {
  const row = db.prepare<[], { first: number | null }>("SELECT MIN(start_ts) AS first FROM activities").get();
  return row?.first ?? null;
}

export function hasTrophiesForWeek(db: Db, weekStart: string): boolean {
  const row = db
    .prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM weekly_trophies WHERE week_start = ?")
    .get(weekStart);
  return (row?.count ?? 0) > 0;
}

/**
 * Distance per user over [startTs, endTs) for the qualifying activity types,
 * leaving out activities only their owner can see.
 */
export function getWeeklyDistanceTotals(
  db: Db,
  startTs: number,
  endTs: number,
  activityTypes: string[]
): WeeklyDistanceTotal[] {
  const placeholders = activityTypes.map(() => "?").join(", ");
  return db
    .prepare<(string | number)[], WeeklyDistanceTotal>(`
      SELECT user_id, SUM(distance) AS total_distance, COUNT(*) AS activity_count
      FROM activities
      WHERE start_ts >= ? AND start_ts < ?
        AND type IN (${placeholders})
        AND visibility != 'only_me'
      GROUP BY user_id
      HAVING total_distance > 0
      ORDER BY total_distance DESC, user_id ASC
    `)
    .all(startTs, endTs, ...activityTypes);
}

/** Returns false when the user already holds the trophy for that week. */
export function insertTrophy(db: Db, award: TrophyAward): boolean {
  const result = db.prepare(`
    INSERT OR IGNORE INTO weekly_trophies (user_id, week_start, week_end, total_distance, activity_count)
    VALUES (?, ?, ?, ?, ?)
  `).run(award.userId, award.weekStart, award.weekEnd, award.totalDistance, award.activityCount);
  return result.changes > 0;
}

export function getTrophiesForWeek(db: Db, weekStart: string): WeeklyTrophyRecord[] {
  return db
    .prepare<[string], WeeklyTrophyRecord>("SELECT * FROM weekly_trophies WHERE week_start = ? ORDER BY user_id")
    .all(weekStart);
}

export function countTrophyWeeks(db: Db): number {
  const row = db
    .prepare<[], { count: number }>("SELECT COUNT(DISTINCT week_start) AS count FROM weekly_trophies")
    .get();
  return row?.count ?? 0;
}
