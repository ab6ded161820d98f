import { z } from "zod";

export const visibilitySchema = z.enum(["everyone", "followers_only", "only_me"]);

const nullableNumber = z.number().nullable().optional();

/** One element of `GET /athlete/activities`. */
export const activitySummarySchema = z.object({
  id: z.number().int(),
  name: z.string().default(""),
  type: z.string(),
  sport_type: z.string().optional(),
  start_date: z.string(),
  distance: z.number().default(0),
  moving_time: z.number().default(0),
  elapsed_time: z.number().default(0),
  total_elevation_gain: z.number().default(0),
  average_speed: z.number().default(0),
  max_speed: z.number().default(0),
  average_heartrate: nullableNumber,
  max_heartrate: nullableNumber,
  calories: nullableNumber,
  kudos_count: z.number().int().default(0),
  visibility: visibilitySchema.optional(),
  private: z.boolean().optional(),
  // Strava sends [] when the activity has no GPS start point
  start_latlng: z.array(z.number()).nullable().optional(),
});

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.number().int(),
});

const distributionBucketSchema = z.object({
  min: z.number().optional(),
  max: z.number().optional(),
  time: z.number().default(0),
});

/** `GET /activities/{id}/zones` returns one entry per zone type (heartrate, power, ...). */
export const activityZonesSchema = z.array(
  z.object({
    type: z.string(),
    distribution_buckets: z.array(distributionBucketSchema).default([]),
  })
);

export const segmentSchema = z.object({
  id: z.number().int(),
  name: z.string().default(""),
  distance: nullableNumber,
  average_grade: nullableNumber,
  maximum_grade: nullableNumber,
  city: z.string().nullable().optional(),
  state: z.string().nullable().optional(),
  climb_category: z.number().int().nullable().optional(),
});

export const segmentEffortSchema = z.object({
  id: z.number().int(),
  elapsed_time: nullableNumber,
  moving_time: nullableNumber,
  start_date: z.string().nullable().optional(),
  pr_rank: z.number().int().nullable().optional(),
  kom_rank: z.number().int().nullable().optional(),
  average_heartrate: nullableNumber,
  max_heartrate: nullableNumber,
  segment: segmentSchema,
});

/** `GET /activities/{id}`: efforts are validated one by one so a bad effort does not sink the activity. */
export const activityDetailSchema = z.object({
  id: z.number().int(),
  segment_efforts: z.array(z.unknown()).nullable().optional(),
});

export type ActivityVisibility = z.infer<typeof visibilitySchema>;
export type StravaActivitySummary = z.infer<typeof activitySummarySchema>;
export type StravaTokenResponse = z.infer<typeof tokenResponseSchema>;
export type StravaSegmentEffort = z.infer<typeof segmentEffortSchema>;

export interface StravaActivityDetail {
  id: number;
  segmentEfforts: StravaSegmentEffort[];
  /** Efforts dropped because they failed validation. */
  malformedEfforts: number;
}
