import * as path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/utils/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ CLUB_DATA_DIR: "/var/lib/club" });

    expect(config.strava).toEqual({
      clientId: "",
      clientSecret: "",
      apiUrl: "https://www.strava.com/api/v3",
      tokenUrl: "https://www.strava.com/oauth/token",
      timeoutMs: 10_000,
      pageSize: 50,
      maxPages: 10,
    });
    expect(config.enrichment).toEqual({ zoneBatchSize: 20, segmentBatchSize: 10 });
    expect(config.trophies).toEqual({ epoch: "2025-01-06", activityTypes: ["Walk", "Hike", "Run", "Ride"] });
    expect(config.schedule).toEqual({ syncIntervalMinutes: 30, trophyIntervalHours: 24 });
    expect(config.databasePath).toBe(path.join("/var/lib/club", "club.db"));
    expect(config.logLevel).toBe("info");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ ACTIVITY_PAGE_SIZE: "", LOG_LEVEL: "  " });
    expect(config.strava.pageSize).toBe(50);
    expect(config.logLevel).toBe("info");
  });

  it("reads overrides", () => {
    const config = loadConfig({
      STRAVA_CLIENT_ID: "12345",
      STRAVA_CLIENT_SECRET: "test-secret",
      STRAVA_API_URL: "https://strava.test/api/v3/",
      ACTIVITY_PAGE_SIZE: "100",
      TROPHY_EPOCH: "2025-03-03",
      TROPHY_ACTIVITY_TYPES: " Run , Ride ,,",
      DATABASE_PATH: "/tmp/club-test.db",
      LOG_LEVEL: "debug",
    });

    expect(config.strava.clientId).toBe("12345");
    expect(config.strava.apiUrl).toBe("https://strava.test/api/v3");
    expect(config.strava.pageSize).toBe(100);
    expect(config.trophies).toEqual({ epoch: "2025-03-03", activityTypes: ["Run", "Ride"] });
    expect(config.databasePath).toBe("/tmp/club-test.db");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ ACTIVITY_PAGE_SIZE: "500" })).toThrow(ConfigError);
    expect(() => loadConfig({ TROPHY_EPOCH: "2025-13-01" })).toThrow(/TROPHY_EPOCH/);
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
    expect(() => loadConfig({ SYNC_INTERVAL_MINUTES: "0" })).toThrow(/SYNC_INTERVAL_MINUTES/);
  });

  it("caps the activity page count at ten", () => {
    expect(loadConfig({ ACTIVITY_MAX_PAGES: "10" }).strava.maxPages).toBe(10);
    expect(() => loadConfig({ ACTIVITY_MAX_PAGES: "11" })).toThrow(/ACTIVITY_MAX_PAGES/);
    expect(() => loadConfig({ ACTIVITY_MAX_PAGES: "0" })).toThrow(ConfigError);
  });
});
