import type { ActivityVisibility, StravaActivitySummary } from "../strava/schemas.js";
import type { Logger } from "../utils/logger.js";
import { describeError } from "../utils/errors.js";
import { isoToEpochSeconds } from "../utils/weeks.js";
import type { Db } from "./connection.js";

interface ActivityRow {
  user_id: number;
  activity_id: number;
  name: string;
  type: string;
  sport_type: string | null;
  start_date: string;
  start_ts: number;
  distance: number;
  moving_time: number;
  elapsed_time: number;
  total_elevation_gain: number;
  average_speed: number;
  max_speed: number;
  average_heartrate: number | null;
  max_heartrate: number | null;
  calories: number | null;
  kudos_count: number;
  visibility: ActivityVisibility;
  start_lat: number | null;
  start_lng: number | null;
}

export function resolveVisibility(activity: StravaActivitySummary): ActivityVisibility {
  if (activity.visibility) return activity.visibility;
  return activity.private ? "only_me" : "everyone";
}

function startPoint(activity: StravaActivitySummary): { lat: number | null; lng: number | null } {
  const latlng = activity.start_latlng;
  if (latlng && latlng.length === 2) {
    return { lat: latlng[0], lng: latlng[1] };
  }
  return { lat: null, lng: null };
}

function toActivityRow(userId: number, activity: StravaActivitySummary): ActivityRow {
  const { lat, lng } = startPoint(activity);
  return {
    user_id: userId,
    activity_id: activity.id,
    name: activity.name,
    type: activity.type,
    sport_type: activity.sport_type ?? null,
    start_date: activity.start_date,
    start_ts: isoToEpochSeconds(activity.start_date),
    distance: activity.distance,
    moving_time: Math.round(activity.moving_time),
    elapsed_time: Math.round(activity.elapsed_time),
    total_elevation_gain: activity.total_elevation_gain,
    average_speed: activity.average_speed,
    max_speed: activity.max_speed,
    average_heartrate: activity.average_heartrate ?? null,
    max_heartrate: activity.max_heartrate ?? null,
    calories: activity.calories ?? null,
    kudos_count: activity.kudos_count,
    visibility: resolveVisibility(activity),
    start_lat: lat,
    start_lng: lng,
  };
}

/** Watermark for incremental sync: start of the newest stored activity, in epoch seconds. */
export function getLatestActivityTimestamp(db: Db, userId: number): number | null {
  const row = db
    .prepare<[number], { latest: number | null }>(
      "SELECT MAX(start_ts) AS latest FROM activities WHERE user_id = ?"
    )
    .get(userId);
  return row?.latest ?? null;
}

/** `start_date` of the newest stored activity across all users. */
export function getLatestActivityDate(db: Db): string | null {
  const row = db
    .prepare<[], { start_date: string }>("SELECT start_date FROM activities ORDER BY start_ts DESC, id DESC LIMIT 1")
    .get();
  return row?.start_date ?? null;
}

export function getActivityCount(db: Db, userId?: number): number {
  const row =
    userId === undefined
      ? db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM activities").get()
      : db
          .prepare<[number], { count: number }>("SELECT COUNT(*) AS count FROM activities WHERE user_id = ?")
          .get(userId);
  return row?.count ?? 0;
}

/**
 * Inserts activities seen for the first time and refreshes the fields that
 * change after creation (kudos, visibility, start point) on known ones.
 * Returns the number of newly inserted rows. Safe to call with overlapping or
 * duplicate input.
 */
export function saveActivities(
  db: Db,
  userId: number,
  activities: StravaActivitySummary[],
  logger: Logger
): number {
  if (activities.length === 0) return 0;

  const findExisting = db.prepare<[number, number], { id: number }>(
    "SELECT id FROM activities WHERE user_id = ? AND activity_id = ?"
  );

  const update = db.prepare<Pick<ActivityRow, "kudos_count" | "visibility" | "start_lat" | "start_lng"> & { id: number }>(`
    UPDATE activities
    SET kudos_count = $kudos_count,
        visibility = $visibility,
        start_lat = COALESCE($start_lat, start_lat),
        start_lng = COALESCE($start_lng, start_lng)
    WHERE id = $id
  `);

  const insert = db.prepare<ActivityRow>(`
    INSERT INTO activities (
      user_id, activity_id, name, type, sport_type, start_date, start_ts,
      distance, moving_time, elapsed_time, total_elevation_gain,
      average_speed, max_speed, average_heartrate, max_heartrate, calories,
      kudos_count, visibility, start_lat, start_lng
    ) VALUES (
      $user_id, $activity_id, $name, $type, $sport_type, $start_date, $start_ts,
      $distance, $moving_time, $elapsed_time, $total_elevation_gain,
      $average_speed, $max_speed, $average_heartrate, $max_heartrate, $calories,
      $kudos_count, $visibility, $start_lat, $start_lng
    )
  `);

  const saveAll = db.transaction((records: StravaActivitySummary[]) => {
    let newCount = 0;
    for (const activity of records) {
      try {
        const row = toActivityRow(userId, activity);
        const existing = findExisting.get(userId, activity.id);
        if (existing) {
          update.run({
            id: existing.id,
            kudos_count: row.kudos_count,
            visibility: row.visibility,
            start_lat: row.start_lat,
            start_lng: row.start_lng,
          });
        } else {
          insert.run(row);
          newCount++;
        }
      } catch (error) {
        logger.error(`Error saving activity ${activity.id}: ${describeError(error)}`);
      }
    }
    return newCount;
  });

  return saveAll(activities);
}
