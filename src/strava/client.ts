import type { StravaSettings } from "../config.js";
import type { ZoneSeconds } from "../types/index.js";
import type { Logger } from "../utils/logger.js";
import {
  ApiError,
  AuthError,
  MalformedRecordError,
  TransientApiError,
  apiError,
  authInvalid,
  describeError,
  isTimeoutError,
  rateLimited,
} from "../utils/errors.js";
import {
  activityDetailSchema,
  activitySummarySchema,
  activityZonesSchema,
  segmentEffortSchema,
  tokenResponseSchema,
  type StravaActivityDetail,
  type StravaActivitySummary,
  type StravaSegmentEffort,
  type StravaTokenResponse,
} from "./schemas.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const HR_ZONE_COUNT = 5;

function describeRaw(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    return String(raw.id);
  }
  return "<no id>";
}

export class StravaClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly settings: StravaSettings,
    private readonly logger: Logger,
    fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {
    this.fetchImpl = fetchImpl;
  }

  hasClientCredentials(): boolean {
    return !!(this.settings.clientId && this.settings.clientSecret);
  }

  private async request(url: string, init: RequestInit = {}): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.settings.timeoutMs) });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new TransientApiError("TIMEOUT", `Request timed out after ${this.settings.timeoutMs}ms`);
      }
      throw new TransientApiError("NETWORK", `Network error: ${describeError(error)}`);
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new TransientApiError("TIMEOUT", `Response timed out after ${this.settings.timeoutMs}ms`);
      }
      throw new ApiError("API_ERROR", `Invalid JSON from Strava (${response.status})`, response.status);
    }
  }

  private async getJson(path: string, accessToken: string): Promise<unknown> {
    const response = await this.request(`${this.settings.apiUrl}${path}`, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });

    if (response.status === 429) throw rateLimited();
    if (response.status === 401) throw authInvalid();
    if (!response.ok) throw apiError(response.status);

    return this.readJson(response);
  }

  async refreshToken(refreshToken: string): Promise<StravaTokenResponse> {
    if (!this.hasClientCredentials()) {
      throw new AuthError("MISSING_CREDENTIALS", "Missing STRAVA_CLIENT_ID or STRAVA_CLIENT_SECRET");
    }

    const response = await this.request(this.settings.tokenUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        client_id: this.settings.clientId,
        client_secret: this.settings.clientSecret,
        refresh_token: refreshToken,
        grant_type: "refresh_token",
      }),
    });

    if (!response.ok) {
      throw new AuthError("TOKEN_REFRESH_FAILED", `Token refresh failed: ${response.status}`, response.status);
    }

    const parsed = tokenResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new AuthError("TOKEN_REFRESH_FAILED", "Token refresh returned an unexpected payload", response.status);
    }
    return parsed.data;
  }

  /**
   * Pages newest-first through the athlete's activities. With `after` set, only
   * activities that started strictly after that epoch second are requested.
   * A timeout ends paging early and keeps what was already collected.
   */
  async fetchActivitiesSince(accessToken: string, after: number | null): Promise<StravaActivitySummary[]> {
    const { pageSize, maxPages } = this.settings;
    const activities: StravaActivitySummary[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const params = new URLSearchParams({ per_page: String(pageSize), page: String(page) });
      if (after !== null) {
        params.set("after", String(Math.floor(after)));
      }

      let batch: unknown;
      try {
        batch = await this.getJson(`/athlete/activities?${params.toString()}`, accessToken);
      } catch (error) {
        if (error instanceof TransientApiError && error.code === "TIMEOUT") {
          this.logger.warn(`Activity list timed out on page ${page}; keeping ${activities.length} activities`);
          break;
        }
        throw error;
      }

      if (!Array.isArray(batch)) {
        throw new ApiError("API_ERROR", "Unexpected activity list payload");
      }
      if (batch.length === 0) break;

      for (const raw of batch) {
        const parsed = activitySummarySchema.safeParse(raw);
        if (parsed.success) {
          activities.push(parsed.data);
        } else {
          this.logger.warn(`Skipping malformed activity ${describeRaw(raw)}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        }
      }

      if (batch.length < pageSize) break;
    }

    return activities;
  }

  /**
   * Seconds spent in heart-rate zones 1..5, or null when Strava has no
   * heart-rate distribution for the activity.
   */
  async fetchActivityZones(accessToken: string, activityId: number): Promise<ZoneSeconds | null> {
    const raw = await this.getJson(`/activities/${activityId}/zones`, accessToken);
    const parsed = activityZonesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedRecordError(`Unexpected zones payload for activity ${activityId}`);
    }

    const heartrate = parsed.data.find((zone) => zone.type === "heartrate");
    if (!heartrate || heartrate.distribution_buckets.length === 0) {
      return null;
    }

    const seconds: ZoneSeconds = [0, 0, 0, 0, 0];
    heartrate.distribution_buckets.slice(0, HR_ZONE_COUNT).forEach((bucket, i) => {
      seconds[i] = Math.round(bucket.time);
    });
    return seconds;
  }

  async fetchActivityDetail(accessToken: string, activityId: number): Promise<StravaActivityDetail> {
    const raw = await this.getJson(`/activities/${activityId}`, accessToken);
    const parsed = activityDetailSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedRecordError(`Unexpected detail payload for activity ${activityId}`);
    }

    const segmentEfforts: StravaSegmentEffort[] = [];
    let malformedEfforts = 0;
    for (const rawEffort of parsed.data.segment_efforts ?? []) {
      const effort = segmentEffortSchema.safeParse(rawEffort);
      if (effort.success) {
        segmentEfforts.push(effort.data);
      } else {
        malformedEfforts++;
        this.logger.warn(`Skipping malformed segment effort ${describeRaw(rawEffort)} on activity ${activityId}`);
      }
    }

    return { id: parsed.data.id, segmentEfforts, malformedEfforts };
  }
}
