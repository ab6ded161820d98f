import type { PrivacyLevel, UserRecord } from "../types/index.js";
import type { StravaTokenResponse } from "../strava/schemas.js";
import type { Db } from "./connection.js";

export interface AthleteProfile {
  id: number;
  firstname?: string | null;
  lastname?: string | null;
  profile?: string | null;
}

export function getActiveUser(db: Db, userId: number): UserRecord | undefined {
  return db
    .prepare<[number], UserRecord>("SELECT * FROM users WHERE id = ? AND is_active = 1")
    .get(userId);
}

export function getUserByAthleteId(db: Db, stravaAthleteId: number): UserRecord | undefined {
  return db
    .prepare<[number], UserRecord>("SELECT * FROM users WHERE strava_athlete_id = ?")
    .get(stravaAthleteId);
}

export function listActiveUsers(db: Db): Pick<UserRecord, "id" | "firstname" | "lastname">[] {
  return db
    .prepare<[], Pick<UserRecord, "id" | "firstname" | "lastname">>(
      "SELECT id, firstname, lastname FROM users WHERE is_active = 1 ORDER BY id"
    )
    .all();
}

/**
 * Called by the web layer after an OAuth code exchange. Creates the user on
 * first authentication, otherwise refreshes profile and credentials and
 * reactivates a deactivated account.
 */
export function upsertUserFromAuth(
  db: Db,
  athlete: AthleteProfile,
  tokens: StravaTokenResponse,
  now: Date,
  privacyLevel: PrivacyLevel = "club_only"
): UserRecord {
  db.prepare(`
    INSERT INTO users (
      strava_athlete_id, firstname, lastname, profile_picture,
      access_token, refresh_token, token_expires_at,
      last_login, privacy_level, is_active
    ) VALUES (
      $strava_athlete_id, $firstname, $lastname, $profile_picture,
      $access_token, $refresh_token, $token_expires_at,
      $last_login, $privacy_level, 1
    )
    ON CONFLICT(strava_athlete_id) DO UPDATE SET
      firstname = excluded.firstname,
      lastname = excluded.lastname,
      profile_picture = excluded.profile_picture,
      access_token = excluded.access_token,
      refresh_token = excluded.refresh_token,
      token_expires_at = excluded.token_expires_at,
      last_login = excluded.last_login,
      is_active = 1
  `).run({
    strava_athlete_id: athlete.id,
    firstname: athlete.firstname ?? null,
    lastname: athlete.lastname ?? null,
    profile_picture: athlete.profile ?? null,
    access_token: tokens.access_token,
    refresh_token: tokens.refresh_token,
    token_expires_at: tokens.expires_at,
    last_login: now.toISOString(),
    privacy_level: privacyLevel,
  });

  const user = getUserByAthleteId(db, athlete.id);
  if (!user) {
    throw new Error(`User for athlete ${athlete.id} was not persisted`);
  }
  return user;
}

export function updateUserTokens(db: Db, userId: number, tokens: StravaTokenResponse): void {
  db.prepare(
    "UPDATE users SET access_token = ?, refresh_token = ?, token_expires_at = ? WHERE id = ?"
  ).run(tokens.access_token, tokens.refresh_token, tokens.expires_at, userId);
}

export function setPrivacyLevel(db: Db, userId: number, privacyLevel: PrivacyLevel): void {
  db.prepare("UPDATE users SET privacy_level = ? WHERE id = ?").run(privacyLevel, userId);
}

/** Users are never deleted; deactivated users drop out of sync and leaderboards. */
export function deactivateUser(db: Db, userId: number): boolean {
  return db.prepare("UPDATE users SET is_active = 0 WHERE id = ?").run(userId).changes > 0;
}

export function countUsers(db: Db): { total: number; active: number } {
  const row = db
    .prepare<[], { total: number; active: number | null }>(
      "SELECT COUNT(*) AS total, SUM(is_active) AS active FROM users"
    )
    .get();
  return { total: row?.total ?? 0, active: row?.active ?? 0 };
}
