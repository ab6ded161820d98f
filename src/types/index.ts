import type { ActivityVisibility } from "../strava/schemas.js";

export type { ActivityVisibility };

export type PrivacyLevel = "public" | "club_only" | "private";

export interface UserRecord {
  id: number;
  strava_athlete_id: number;
  firstname: string | null;
  lastname: string | null;
  profile_picture: string | null;
  access_token: string;
  refresh_token: string;
  token_expires_at: number;
  privacy_level: PrivacyLevel;
  is_active: number;
  created_at: string;
  last_login: string | null;
}

export interface ActivityRecord {
  id: number;
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
  segments_fetched: number;
}

export type ZoneSeconds = [number, number, number, number, number];

export interface HrZoneRecord {
  user_id: number;
  activity_id: number;
  zone_1_seconds: number;
  zone_2_seconds: number;
  zone_3_seconds: number;
  zone_4_seconds: number;
  zone_5_seconds: number;
  fetched_at: string;
}

export interface WeeklyTrophyRecord {
  id: number;
  user_id: number;
  week_start: string;
  week_end: string;
  total_distance: number;
  activity_count: number;
  created_at: string;
}

export interface ZoneSyncStats {
  attempted: number;
  enriched: number;
  failed: number;
}

export interface SegmentSyncStats {
  attempted: number;
  enriched: number;
  failed: number;
  efforts: number;
}

export interface EnrichmentStats {
  zones: ZoneSyncStats;
  segments: SegmentSyncStats;
}

export type SyncUserResult =
  | { success: true; newActivities: number; fetched: number; enrichment: EnrichmentStats }
  | { success: false; error: string; code: string };

export interface SyncAllStats {
  totalUsers: number;
  successful: number;
  failed: number;
  newActivities: number;
  errors: string[];
}

export interface TrophyStats {
  weeksProcessed: number;
  trophiesAwarded: number;
  weeksSkipped: number;
  errors: string[];
}

export interface TrophyLeaderboardEntry {
  user_id: number;
  firstname: string | null;
  lastname: string | null;
  profile_picture: string | null;
  trophy_count: number;
  total_winning_distance: number;
  first_trophy: string;
  latest_trophy: string;
}

export interface TrophyWinner {
  user_id: number;
  firstname: string | null;
  lastname: string | null;
  profile_picture: string | null;
  week_start: string;
  week_end: string;
  total_distance: number;
  activity_count: number;
}

export interface KudosLeaderboardEntry {
  user_id: number;
  firstname: string | null;
  lastname: string | null;
  profile_picture: string | null;
  total_kudos: number;
  activity_count: number;
}

export interface TopKudosActivity {
  user_id: number;
  firstname: string | null;
  lastname: string | null;
  activity_id: number;
  name: string;
  type: string;
  start_date: string;
  distance: number;
  kudos_count: number;
}

export interface StatusReport {
  schemaVersion: number;
  activeUsers: number;
  totalUsers: number;
  activities: number;
  latestActivity: string | null;
  pendingSegmentActivities: number;
  trophyWeeks: number;
}
