import type { Db } from "../db/connection.js";
import type {
  KudosLeaderboardEntry,
  TopKudosActivity,
  TrophyLeaderboardEntry,
  TrophyWinner,
} from "../types/index.js";
import { fromDateKey, isoWeekWindow, startOfIsoWeek, toDateKey, toEpochSeconds } from "../utils/weeks.js";

// Shared by every view: only active members who have not opted out of rankings
const VISIBLE_USER = "u.is_active = 1 AND u.privacy_level != 'private'";
const VISIBLE_ACTIVITY = "a.visibility != 'only_me'";

const NO_UPPER_BOUND = Number.MAX_SAFE_INTEGER;

function epochWeekKey(epoch: string): string {
  return toDateKey(startOfIsoWeek(fromDateKey(epoch)));
}

export function getTrophyLeaderboard(db: Db, epoch: string): TrophyLeaderboardEntry[] {
  return db
    .prepare<[string], TrophyLeaderboardEntry>(`
      SELECT
        u.id AS user_id,
        u.firstname,
        u.lastname,
        u.profile_picture,
        COUNT(wt.id) AS trophy_count,
        SUM(wt.total_distance) AS total_winning_distance,
        MIN(wt.week_start) AS first_trophy,
        MAX(wt.week_start) AS latest_trophy
      FROM users u
      INNER JOIN weekly_trophies wt ON u.id = wt.user_id
      WHERE ${VISIBLE_USER} AND wt.week_start >= ?
      GROUP BY u.id
      ORDER BY trophy_count DESC, total_winning_distance DESC, u.id ASC
    `)
    .all(epochWeekKey(epoch));
}

/** Winners of the `weeks` most recent trophy weeks, newest week first. */
export function getRecentTrophyWinners(db: Db, weeks: number = 10): TrophyWinner[] {
  return db
    .prepare<[number], TrophyWinner>(`
      SELECT
        wt.user_id,
        u.firstname,
        u.lastname,
        u.profile_picture,
        wt.week_start,
        wt.week_end,
        wt.total_distance,
        wt.activity_count
      FROM weekly_trophies wt
      INNER JOIN users u ON wt.user_id = u.id
      WHERE ${VISIBLE_USER}
        AND wt.week_start IN (
          SELECT DISTINCT wt2.week_start
          FROM weekly_trophies wt2
          INNER JOIN users u ON wt2.user_id = u.id
          WHERE ${VISIBLE_USER}
          ORDER BY wt2.week_start DESC
          LIMIT ?
        )
      ORDER BY wt.week_start DESC, wt.user_id ASC
    `)
    .all(weeks);
}

function kudosLeaderboard(db: Db, startTs: number, endTs: number, limit: number): KudosLeaderboardEntry[] {
  return db
    .prepare<[number, number, number], KudosLeaderboardEntry>(`
      SELECT
        u.id AS user_id,
        u.firstname,
        u.lastname,
        u.profile_picture,
        SUM(a.kudos_count) AS total_kudos,
        COUNT(a.id) AS activity_count
      FROM activities a
      INNER JOIN users u ON u.id = a.user_id
      WHERE ${VISIBLE_USER} AND ${VISIBLE_ACTIVITY}
        AND a.start_ts >= ? AND a.start_ts < ?
      GROUP BY u.id
      HAVING total_kudos > 0
      ORDER BY total_kudos DESC, u.id ASC
      LIMIT ?
    `)
    .all(startTs, endTs, limit);
}

/** Kudos received on activities in the current Monday–Sunday (UTC) week. */
export function getWeeklyKudosLeaderboard(db: Db, now: Date, limit: number = 50): KudosLeaderboardEntry[] {
  const { start, end } = isoWeekWindow(now);
  return kudosLeaderboard(db, toEpochSeconds(start), toEpochSeconds(end), limit);
}

export function getAllTimeKudosLeaderboard(db: Db, epoch: string, limit: number = 50): KudosLeaderboardEntry[] {
  return kudosLeaderboard(db, toEpochSeconds(fromDateKey(epoch)), NO_UPPER_BOUND, limit);
}

/** The single most-kudoed visible activity since the epoch; earliest wins a tie. */
export function getTopKudosActivity(db: Db, epoch: string): TopKudosActivity | null {
  const row = db
    .prepare<[number], TopKudosActivity>(`
      SELECT
        a.user_id,
        u.firstname,
        u.lastname,
        a.activity_id,
        a.name,
        a.type,
        a.start_date,
        a.distance,
        a.kudos_count
      FROM activities a
      INNER JOIN users u ON u.id = a.user_id
      WHERE ${VISIBLE_USER} AND ${VISIBLE_ACTIVITY}
        AND a.start_ts >= ? AND a.kudos_count > 0
      ORDER BY a.kudos_count DESC, a.start_ts ASC, a.id ASC
      LIMIT 1
    `)
    .get(toEpochSeconds(fromDateKey(epoch)));
  return row ?? null;
}
