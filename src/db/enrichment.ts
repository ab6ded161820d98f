import type { StravaSegmentEffort } from "../strava/schemas.js";
import type { HrZoneRecord, ZoneSeconds } from "../types/index.js";
import type { Db } from "./connection.js";

export interface PendingActivity {
  activity_id: number;
  name: string;
  type: string;
}

export function getActivitiesWithoutZones(db: Db, userId: number, limit: number): PendingActivity[] {
  return db
    .prepare<[number, number], PendingActivity>(`
      SELECT a.activity_id, a.name, a.type
      FROM activities a
      LEFT JOIN activity_hr_zones z ON a.user_id = z.user_id AND a.activity_id = z.activity_id
      WHERE a.user_id = ?
        AND a.average_heartrate IS NOT NULL
        AND z.id IS NULL
      ORDER BY a.start_ts DESC, a.activity_id DESC
      LIMIT ?
    `)
    .all(userId, limit);
}

/** Insert-or-ignore: a zone record is written once per activity and never updated. */
export function insertHrZones(
  db: Db,
  userId: number,
  activityId: number,
  zones: ZoneSeconds,
  fetchedAt: string
): boolean {
  const result = db.prepare(`
    INSERT OR IGNORE INTO activity_hr_zones (
      user_id, activity_id, zone_1_seconds, zone_2_seconds,
      zone_3_seconds, zone_4_seconds, zone_5_seconds, fetched_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(userId, activityId, ...zones, fetchedAt);
  return result.changes > 0;
}

export function getHrZones(db: Db, userId: number, activityId: number): HrZoneRecord | undefined {
  return db
    .prepare<[number, number], HrZoneRecord>(`
      SELECT user_id, activity_id, zone_1_seconds, zone_2_seconds, zone_3_seconds,
             zone_4_seconds, zone_5_seconds, fetched_at
      FROM activity_hr_zones WHERE user_id = ? AND activity_id = ?
    `)
    .get(userId, activityId);
}

export function getActivitiesWithoutSegments(db: Db, userId: number, limit: number): PendingActivity[] {
  return db
    .prepare<[number, number], PendingActivity>(`
      SELECT activity_id, name, type
      FROM activities
      WHERE user_id = ? AND segments_fetched = 0
      ORDER BY start_ts DESC, activity_id DESC
      LIMIT ?
    `)
    .all(userId, limit);
}

/**
 * Upserts the referenced segments, inserts new efforts and marks the activity
 * as processed, all in one transaction. Returns the number of efforts inserted.
 */
export function saveSegmentEfforts(
  db: Db,
  userId: number,
  activityId: number,
  efforts: StravaSegmentEffort[],
  fetchedAt: string
): number {
  const upsertSegment = db.prepare(`
    INSERT INTO segments (
      strava_segment_id, name, distance, average_grade, maximum_grade,
      city, state, climb_category
    ) VALUES (
      $strava_segment_id, $name, $distance, $average_grade, $maximum_grade,
      $city, $state, $climb_category
    )
    ON CONFLICT(strava_segment_id) DO UPDATE SET
      name = excluded.name,
      distance = excluded.distance,
      average_grade = excluded.average_grade,
      maximum_grade = excluded.maximum_grade,
      city = excluded.city,
      state = excluded.state,
      climb_category = excluded.climb_category
  `);

  const insertEffort = db.prepare(`
    INSERT OR IGNORE INTO segment_efforts (
      user_id, activity_id, strava_segment_id, strava_effort_id,
      elapsed_time, moving_time, start_date, pr_rank, kom_rank,
      average_heartrate, max_heartrate, fetched_at
    ) VALUES (
      $user_id, $activity_id, $strava_segment_id, $strava_effort_id,
      $elapsed_time, $moving_time, $start_date, $pr_rank, $kom_rank,
      $average_heartrate, $max_heartrate, $fetched_at
    )
  `);

  const markFetched = db.prepare(
    "UPDATE activities SET segments_fetched = 1 WHERE user_id = ? AND activity_id = ?"
  );

  const run = db.transaction(() => {
    let inserted = 0;
    for (const effort of efforts) {
      const segment = effort.segment;
      upsertSegment.run({
        strava_segment_id: segment.id,
        name: segment.name,
        distance: segment.distance ?? null,
        average_grade: segment.average_grade ?? null,
        maximum_grade: segment.maximum_grade ?? null,
        city: segment.city ?? null,
        state: segment.state ?? null,
        climb_category: segment.climb_category ?? 0,
      });

      const result = insertEffort.run({
        user_id: userId,
        activity_id: activityId,
        strava_segment_id: segment.id,
        strava_effort_id: effort.id,
        elapsed_time: effort.elapsed_time ?? null,
        moving_time: effort.moving_time ?? null,
        start_date: effort.start_date ?? null,
        pr_rank: effort.pr_rank ?? null,
        kom_rank: effort.kom_rank ?? null,
        average_heartrate: effort.average_heartrate ?? null,
        max_heartrate: effort.max_heartrate ?? null,
        fetched_at: fetchedAt,
      });
      inserted += result.changes;
    }
    markFetched.run(userId, activityId);
    return inserted;
  });

  return run();
}

export function countPendingSegmentActivities(db: Db): number {
  const row = db
    .prepare<[], { count: number }>(
      "SELECT COUNT(*) AS count FROM activities a JOIN users u ON u.id = a.user_id WHERE u.is_active = 1 AND a.segments_fetched = 0"
    )
    .get();
  return row?.count ?? 0;
}
