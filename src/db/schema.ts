export const SCHEMA_VERSION = 1;

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    strava_athlete_id INTEGER UNIQUE NOT NULL,
    firstname TEXT,
    lastname TEXT,
    profile_picture TEXT,
    access_token TEXT NOT NULL,
    refresh_token TEXT NOT NULL,
    token_expires_at INTEGER NOT NULL,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    last_login TEXT,
    privacy_level TEXT NOT NULL DEFAULT 'club_only'
      CHECK (privacy_level IN ('public', 'club_only', 'private')),
    is_active INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS activities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    activity_id INTEGER NOT NULL,
    name TEXT NOT NULL DEFAULT '',
    type TEXT NOT NULL,
    sport_type TEXT,
    start_date TEXT NOT NULL,
    start_ts INTEGER NOT NULL,
    distance REAL NOT NULL DEFAULT 0,
    moving_time INTEGER NOT NULL DEFAULT 0,
    elapsed_time INTEGER NOT NULL DEFAULT 0,
    total_elevation_gain REAL NOT NULL DEFAULT 0,
    average_speed REAL NOT NULL DEFAULT 0,
    max_speed REAL NOT NULL DEFAULT 0,
    average_heartrate REAL,
    max_heartrate REAL,
    calories REAL,
    kudos_count INTEGER NOT NULL DEFAULT 0,
    visibility TEXT NOT NULL DEFAULT 'everyone'
      CHECK (visibility IN ('everyone', 'followers_only', 'only_me')),
    start_lat REAL,
    start_lng REAL,
    segments_fetched INTEGER NOT NULL DEFAULT 0,
    UNIQUE(user_id, activity_id)
  );

  CREATE INDEX IF NOT EXISTS idx_activities_user_id ON activities(user_id);
  CREATE INDEX IF NOT EXISTS idx_activities_start_ts ON activities(start_ts);
  CREATE INDEX IF NOT EXISTS idx_activities_type ON activities(type);

  CREATE TABLE IF NOT EXISTS activity_hr_zones (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    activity_id INTEGER NOT NULL,
    zone_1_seconds INTEGER NOT NULL DEFAULT 0,
    zone_2_seconds INTEGER NOT NULL DEFAULT 0,
    zone_3_seconds INTEGER NOT NULL DEFAULT 0,
    zone_4_seconds INTEGER NOT NULL DEFAULT 0,
    zone_5_seconds INTEGER NOT NULL DEFAULT 0,
    fetched_at TEXT NOT NULL,
    UNIQUE(user_id, activity_id)
  );

  CREATE TABLE IF NOT EXISTS segments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    strava_segment_id INTEGER NOT NULL UNIQUE,
    name TEXT NOT NULL,
    distance REAL,
    average_grade REAL,
    maximum_grade REAL,
    city TEXT,
    state TEXT,
    climb_category INTEGER DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS segment_efforts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    activity_id INTEGER NOT NULL,
    strava_segment_id INTEGER NOT NULL REFERENCES segments(strava_segment_id),
    strava_effort_id INTEGER NOT NULL,
    elapsed_time INTEGER,
    moving_time INTEGER,
    start_date TEXT,
    pr_rank INTEGER,
    kom_rank INTEGER,
    average_heartrate REAL,
    max_heartrate REAL,
    fetched_at TEXT NOT NULL,
    UNIQUE(user_id, strava_effort_id)
  );

  CREATE INDEX IF NOT EXISTS idx_segment_efforts_user_segment ON segment_efforts(user_id, strava_segment_id);
  CREATE INDEX IF NOT EXISTS idx_segment_efforts_activity ON segment_efforts(user_id, activity_id);

  CREATE TABLE IF NOT EXISTS weekly_trophies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    week_start TEXT NOT NULL,
    week_end TEXT NOT NULL,
    total_distance REAL NOT NULL,
    activity_count INTEGER NOT NULL,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(user_id, week_start)
  );

  CREATE INDEX IF NOT EXISTS idx_weekly_trophies_week ON weekly_trophies(week_start, week_end);
  CREATE INDEX IF NOT EXISTS idx_weekly_trophies_user ON weekly_trophies(user_id);
`;
