import { describe, expect, it } from "vitest";
import { saveActivities } from "../src/db/activities.js";
import type { Db } from "../src/db/connection.js";
import { getHrZones, saveSegmentEfforts } from "../src/db/enrichment.js";
import { segmentEffortSchema } from "../src/strava/schemas.js";
import { enrichUserActivities, syncHeartRateZones, syncSegmentEfforts } from "../src/sync/enrichment.js";
import type { UserRecord } from "../src/types/index.js";
import { createFetchStub, createTestContext, createTestDb, insertUser, json, makeActivity, silentLogger } from "./helpers.js";

const HR_ZONES = [
  {
    type: "heartrate",
    distribution_buckets: [
      { min: 0, max: 120, time: 600 },
      { min: 120, max: 140, time: 1200 },
      { min: 140, max: 160, time: 900 },
      { min: 160, max: 175, time: 240 },
      { min: 175, max: -1, time: 60 },
    ],
  },
];

function seed(db: Db): UserRecord {
  const user = insertUser(db, { athleteId: 1 });
  saveActivities(
    db,
    user.id,
    [
      makeActivity({ id: 101, start_date: "2025-03-06T07:00:00Z", average_heartrate: 150 }),
      makeActivity({ id: 102, start_date: "2025-03-05T07:00:00Z", average_heartrate: 142 }),
      makeActivity({ id: 103, start_date: "2025-03-04T07:00:00Z" }),
    ],
    silentLogger
  );
  return user;
}

function segmentsFetched(db: Db, activityId: number): number | undefined {
  return db
    .prepare<[number], { segments_fetched: number }>("SELECT segments_fetched FROM activities WHERE activity_id = ?")
    .get(activityId)?.segments_fetched;
}

function countRows(db: Db, table: "segments" | "segment_efforts" | "activity_hr_zones"): number {
  return db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;
}

describe("syncHeartRateZones", () => {
  it("stores zones for activities with heart rate, zeros when Strava has none", async () => {
    const db = createTestDb();
    const user = seed(db);
    const fetch = createFetchStub((url) => (url.pathname.endsWith("/activities/101/zones") ? json(HR_ZONES) : json([])));
    const ctx = createTestContext({ db, fetch });

    const stats = await syncHeartRateZones(ctx, user);

    expect(stats).toEqual({ attempted: 2, enriched: 2, failed: 0 });
    expect(getHrZones(db, user.id, 101)).toMatchObject({
      zone_1_seconds: 600,
      zone_2_seconds: 1200,
      zone_3_seconds: 900,
      zone_4_seconds: 240,
      zone_5_seconds: 60,
      fetched_at: "2025-03-12T12:00:00.000Z",
    });
    expect(getHrZones(db, user.id, 102)).toMatchObject({
      zone_1_seconds: 0,
      zone_2_seconds: 0,
      zone_3_seconds: 0,
      zone_4_seconds: 0,
      zone_5_seconds: 0,
    });
    expect(fetch.mock.calls.map(([url]) => new URL(url).pathname)).toEqual([
      "/api/v3/activities/101/zones",
      "/api/v3/activities/102/zones",
    ]);

    // Nothing left to ask about
    expect(await syncHeartRateZones(ctx, user)).toEqual({ attempted: 0, enriched: 0, failed: 0 });
  });

  it("leaves a failed activity for the next cycle", async () => {
    const db = createTestDb();
    const user = seed(db);
    let healthy = false;
    const fetch = createFetchStub((url) => {
      if (!healthy && url.pathname.endsWith("/activities/101/zones")) return json({ message: "oops" }, 500);
      return json(HR_ZONES);
    });
    const ctx = createTestContext({ db, fetch });

    expect(await syncHeartRateZones(ctx, user)).toEqual({ attempted: 2, enriched: 1, failed: 1 });
    expect(getHrZones(db, user.id, 101)).toBeUndefined();

    healthy = true;
    expect(await syncHeartRateZones(ctx, user)).toEqual({ attempted: 1, enriched: 1, failed: 0 });
    expect(getHrZones(db, user.id, 101)?.zone_2_seconds).toBe(1200);
  });

  it("stops the round on a rate limit", async () => {
    const db = createTestDb();
    const user = seed(db);
    const fetch = createFetchStub(() => json({ message: "Rate Limit Exceeded" }, 429));
    const ctx = createTestContext({ db, fetch });

    expect(await syncHeartRateZones(ctx, user)).toEqual({ attempted: 1, enriched: 0, failed: 1 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("handles at most the batch size, newest first", async () => {
    const db = createTestDb();
    const user = seed(db);
    const fetch = createFetchStub(() => json(HR_ZONES));
    const ctx = createTestContext({ db, fetch, enrichment: { zoneBatchSize: 1 } });

    expect(await syncHeartRateZones(ctx, user)).toEqual({ attempted: 1, enriched: 1, failed: 0 });
    expect(getHrZones(db, user.id, 101)).toBeDefined();
    expect(getHrZones(db, user.id, 102)).toBeUndefined();
  });
});

describe("syncSegmentEfforts", () => {
  const detail = (id: number) => ({
    id,
    segment_efforts:
      id === 101
        ? [
            { id: 5001, elapsed_time: 300, pr_rank: 1, segment: { id: 9, name: "Harbour sprint", distance: 400 } },
            { id: 5002, elapsed_time: 610, segment: { id: 10, name: "Park loop", distance: 2100 } },
          ]
        : [],
  });

  it("stores efforts and flags every processed activity", async () => {
    const db = createTestDb();
    const user = seed(db);
    const fetch = createFetchStub((url) => json(detail(Number(url.pathname.split("/").pop()))));
    const ctx = createTestContext({ db, fetch });

    const stats = await syncSegmentEfforts(ctx, user);

    expect(stats).toEqual({ attempted: 3, enriched: 3, failed: 0, efforts: 2 });
    expect(countRows(db, "segments")).toBe(2);
    expect(countRows(db, "segment_efforts")).toBe(2);
    expect([101, 102, 103].map((id) => segmentsFetched(db, id))).toEqual([1, 1, 1]);
  });

  it("does not flag an activity whose detail failed", async () => {
    const db = createTestDb();
    const user = seed(db);
    const fetch = createFetchStub((url) =>
      url.pathname.endsWith("/activities/102") ? json({ message: "oops" }, 500) : json(detail(Number(url.pathname.split("/").pop())))
    );
    const ctx = createTestContext({ db, fetch });

    expect(await syncSegmentEfforts(ctx, user)).toEqual({ attempted: 3, enriched: 2, failed: 1, efforts: 2 });
    expect(segmentsFetched(db, 102)).toBe(0);
    expect(segmentsFetched(db, 103)).toBe(1);
  });

  it("stops the round when the token is rejected", async () => {
    const db = createTestDb();
    const user = seed(db);
    const fetch = createFetchStub(() => json({ message: "Authorization Error" }, 401));
    const ctx = createTestContext({ db, fetch });

    expect(await syncSegmentEfforts(ctx, user)).toEqual({ attempted: 1, enriched: 0, failed: 1, efforts: 0 });
  });

  it("ignores efforts it already has", () => {
    const db = createTestDb();
    const user = seed(db);
    const efforts = [
      segmentEffortSchema.parse({ id: 5001, elapsed_time: 300, segment: { id: 9, name: "Harbour sprint" } }),
    ];

    expect(saveSegmentEfforts(db, user.id, 101, efforts, "2025-03-12T12:00:00.000Z")).toBe(1);
    expect(saveSegmentEfforts(db, user.id, 101, efforts, "2025-03-12T13:00:00.000Z")).toBe(0);
    expect(countRows(db, "segment_efforts")).toBe(1);
  });
});

describe("enrichUserActivities", () => {
  it("runs zones and segments for one user", async () => {
    const db = createTestDb();
    const user = seed(db);
    const fetch = createFetchStub((url) =>
      url.pathname.endsWith("/zones") ? json(HR_ZONES) : json({ id: 1, segment_efforts: [] })
    );
    const ctx = createTestContext({ db, fetch, enrichment: { zoneBatchSize: 5, segmentBatchSize: 2 } });

    const stats = await enrichUserActivities(ctx, user);

    expect(stats.zones).toEqual({ attempted: 2, enriched: 2, failed: 0 });
    expect(stats.segments).toEqual({ attempted: 2, enriched: 2, failed: 0, efforts: 0 });
    expect(countRows(db, "activity_hr_zones")).toBe(2);
  });
});
