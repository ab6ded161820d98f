import { beforeEach, describe, expect, it } from "vitest";
import { saveActivities } from "../src/db/activities.js";
import type { Db } from "../src/db/connection.js";
import { insertTrophy } from "../src/db/trophies.js";
import { deactivateUser } from "../src/db/users.js";
import {
  getAllTimeKudosLeaderboard,
  getRecentTrophyWinners,
  getTopKudosActivity,
  getTrophyLeaderboard,
  getWeeklyKudosLeaderboard,
} from "../src/trophies/leaderboards.js";
import type { UserRecord } from "../src/types/index.js";
import { addDays, fromDateKey, toDateKey } from "../src/utils/weeks.js";
import { createTestDb, insertUser, makeActivity, silentLogger } from "./helpers.js";

const EPOCH = "2025-01-06";

function award(db: Db, user: UserRecord, weekStart: string, totalDistance: number): void {
  insertTrophy(db, {
    userId: user.id,
    weekStart,
    weekEnd: toDateKey(addDays(fromDateKey(weekStart), 7)),
    totalDistance,
    activityCount: 1,
  });
}

describe("leaderboards", () => {
  let db: Db;
  let ada: UserRecord;
  let bo: UserRecord;
  let cy: UserRecord;
  let dee: UserRecord;

  beforeEach(() => {
    db = createTestDb();
    ada = insertUser(db, { athleteId: 1, firstname: "Ada", lastname: "One" });
    bo = insertUser(db, { athleteId: 2, firstname: "Bo", lastname: "Two", privacyLevel: "public" });
    cy = insertUser(db, { athleteId: 3, firstname: "Cy", lastname: "Three", privacyLevel: "private" });
    dee = insertUser(db, { athleteId: 4, firstname: "Dee", lastname: "Four" });

    award(db, ada, "2024-12-30", 9000);
    award(db, ada, "2025-01-06", 8000);
    award(db, ada, "2025-01-13", 5000);
    award(db, bo, "2025-01-06", 8000);
    award(db, bo, "2025-01-20", 6000);
    award(db, cy, "2025-01-27", 30000);
    award(db, cy, "2025-02-03", 30000);
    award(db, cy, "2025-02-10", 30000);
    award(db, dee, "2025-02-17", 12000);
    deactivateUser(db, dee.id);

    saveActivities(
      db,
      ada.id,
      [
        makeActivity({ id: 1, start_date: "2025-01-21T07:00:00Z", kudos_count: 5 }),
        makeActivity({ id: 2, start_date: "2025-01-22T07:00:00Z", kudos_count: 3 }),
        makeActivity({ id: 3, start_date: "2025-01-21T18:00:00Z", kudos_count: 100, visibility: "only_me" }),
        makeActivity({ id: 4, start_date: "2025-01-01T07:00:00Z", kudos_count: 40 }),
      ],
      silentLogger
    );
    saveActivities(
      db,
      bo.id,
      [
        makeActivity({ id: 5, start_date: "2025-01-20T00:00:00Z", kudos_count: 6 }),
        makeActivity({ id: 6, start_date: "2025-01-19T23:59:59Z", kudos_count: 50 }),
      ],
      silentLogger
    );
    saveActivities(db, cy.id, [makeActivity({ id: 7, start_date: "2025-01-21T07:00:00Z", kudos_count: 99 })], silentLogger);
    saveActivities(db, dee.id, [makeActivity({ id: 8, start_date: "2025-01-21T07:00:00Z", kudos_count: 200 })], silentLogger);
  });

  it("ranks trophies by count, then winning distance", () => {
    expect(getTrophyLeaderboard(db, EPOCH)).toEqual([
      {
        user_id: bo.id,
        firstname: "Bo",
        lastname: "Two",
        profile_picture: null,
        trophy_count: 2,
        total_winning_distance: 14000,
        first_trophy: "2025-01-06",
        latest_trophy: "2025-01-20",
      },
      {
        user_id: ada.id,
        firstname: "Ada",
        lastname: "One",
        profile_picture: null,
        trophy_count: 2,
        total_winning_distance: 13000,
        first_trophy: "2025-01-06",
        latest_trophy: "2025-01-13",
      },
    ]);
  });

  it("counts trophies from the epoch's week when the epoch is mid-week", () => {
    expect(getTrophyLeaderboard(db, "2025-01-01").find((e) => e.user_id === ada.id)?.trophy_count).toBe(3);
  });

  it("lists winners of the most recent visible weeks", () => {
    expect(getRecentTrophyWinners(db, 2).map((w) => [w.week_start, w.user_id])).toEqual([
      ["2025-01-20", bo.id],
      ["2025-01-13", ada.id],
    ]);
    expect(getRecentTrophyWinners(db).map((w) => [w.week_start, w.user_id])).toEqual([
      ["2025-01-20", bo.id],
      ["2025-01-13", ada.id],
      ["2025-01-06", ada.id],
      ["2025-01-06", bo.id],
      ["2024-12-30", ada.id],
    ]);
  });

  it("sums kudos for the current week only", () => {
    const entries = getWeeklyKudosLeaderboard(db, new Date("2025-01-22T12:00:00Z"));
    expect(entries.map((e) => [e.user_id, e.total_kudos, e.activity_count])).toEqual([
      [ada.id, 8, 2],
      [bo.id, 6, 1],
    ]);
  });

  it("sums kudos since the epoch", () => {
    const entries = getAllTimeKudosLeaderboard(db, EPOCH);
    expect(entries.map((e) => [e.user_id, e.total_kudos, e.activity_count])).toEqual([
      [bo.id, 56, 2],
      [ada.id, 8, 2],
    ]);
  });

  it("finds the most kudoed visible activity", () => {
    expect(getTopKudosActivity(db, EPOCH)).toMatchObject({
      user_id: bo.id,
      activity_id: 6,
      kudos_count: 50,
      firstname: "Bo",
    });
  });

  it("returns null when nothing has kudos", () => {
    expect(getTopKudosActivity(createTestDb(), EPOCH)).toBeNull();
  });
});
