import { z } from "zod";
import type { Clock } from "./clock";
import { AuthError, MalformedResponseError, RequestRejectedError } from "./errors";
import type { RateGovernor } from "./rateLimiter";
import { safeRequest, type RetryPolicy } from "./request";

// ── Response shapes ──

const AthleteSummarySchema = z
  .object({
    id: z.number().int(),
    firstname: z.string().nullish(),
    lastname: z.string().nullish(),
    username: z.string().nullish(),
  })
  .passthrough();

export type AthleteSummary = z.infer<typeof AthleteSummarySchema>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).nullish(),
  expires_at: z.number().nullish(),
  athlete: AthleteSummarySchema.nullish(),
});

const optionalMetric = z.number().nullish();

/**
 * Activity summary as returned by /athlete/activities and /activities/:id.
 * Only the fields the pipeline reads are checked; the rest pass through.
 */
export const StravaActivitySchema = z
  .object({
    id: z.number().int(),
    name: z.string().nullish(),
    type: z.string().nullish(),
    sport_type: z.string().nullish(),
    start_date: z.string().min(1),
    // Local wall-clock time with a fake "Z" suffix.
    start_date_local: z.string().min(1),
    timezone: z.string().nullish(),
    distance: z.number().nonnegative(),
    moving_time: z.number().int().nonnegative(),
    elapsed_time: z.number().int().nonnegative().nullish(),
    total_elevation_gain: optionalMetric,
    average_speed: optionalMetric,
    max_speed: optionalMetric,
    average_cadence: optionalMetric,
    average_watts: optionalMetric,
    max_watts: optionalMetric,
    average_heartrate: optionalMetric,
    max_heartrate: optionalMetric,
    calories: optionalMetric,
    kilojoules: optionalMetric,
    athlete: z.object({ id: z.number().int() }).passthrough().nullish(),
    map: z
      .object({
        summary_polyline: z.string().nullish(),
        polyline: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type StravaActivity = z.infer<typeof StravaActivitySchema>;

const ActivityPageSchema = z.array(StravaActivitySchema);

// ── Client ──

export interface StravaClientOptions {
  clientId: string;
  clientSecret: string;
  apiBase: string;
  oauthUrl: string;
  governor: RateGovernor;
  policy: RetryPolicy;
  clock?: Clock;
  fetchImpl?: typeof fetch;
}

export interface TokenGrant {
  accessToken: string;
  /** The refresh token to use next time: the rotated one, or the one just spent. */
  refreshToken: string;
  rotated: boolean;
  expiresAt: number | null;
  athlete: AthleteSummary | null;
}

export interface ActivityPageQuery {
  after: number | null;
  before: number | null;
  page: number;
  perPage: number;
}

export class StravaClient {
  constructor(private readonly options: StravaClientOptions) {}

  /**
   * Exchange a refresh token for an access token. Side-effect free: a rotated
   * refresh token is reported, never stored; persisting it is the caller's job.
   */
  async exchangeRefreshToken(refreshToken: string): Promise<TokenGrant> {
    const { clientId, clientSecret, oauthUrl, policy, clock, fetchImpl } = this.options;
    const body = new URLSearchParams({
      client_id: clientId,
      client_secret: clientSecret,
      grant_type: "refresh_token",
      refresh_token: refreshToken,
    });

    const res = await safeRequest(oauthUrl, { method: "POST", body }, { policy, clock, fetchImpl, label: "oauth:token" });
    if (!res.ok) {
      throw new AuthError(res.status, await res.text());
    }

    const data = await readJson(res, "oauth:token", TokenResponseSchema);
    const next = data.refresh_token ?? refreshToken;
    return {
      accessToken: data.access_token,
      refreshToken: next,
      rotated: next !== refreshToken,
      expiresAt: data.expires_at ?? null,
      athlete: data.athlete ?? null,
    };
  }

  async getAthlete(accessToken: string): Promise<AthleteSummary> {
    return this.getJson("/athlete", accessToken, "athlete", AthleteSummarySchema);
  }

  async getActivity(accessToken: string, activityId: number): Promise<StravaActivity> {
    return this.getJson(`/activities/${activityId}`, accessToken, "activities:get", StravaActivitySchema);
  }

  async listActivitiesPage(accessToken: string, query: ActivityPageQuery): Promise<StravaActivity[]> {
    const params = new URLSearchParams({
      page: String(query.page),
      per_page: String(query.perPage),
    });
    if (query.after !== null) params.set("after", String(query.after));
    if (query.before !== null) params.set("before", String(query.before));

    return this.getJson(`/athlete/activities?${params.toString()}`, accessToken, "activities:list", ActivityPageSchema);
  }

  private async getJson<T extends z.ZodTypeAny>(
    path: string,
    accessToken: string,
    label: string,
    schema: T,
  ): Promise<z.infer<T>> {
    const { apiBase, governor, policy, clock, fetchImpl } = this.options;
    const res = await safeRequest(
      `${apiBase}${path}`,
      { headers: { Authorization: `Bearer ${accessToken}` } },
      { policy, clock, governor, fetchImpl, label },
    );

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(res.status, await res.text());
    }
    if (!res.ok) {
      throw new RequestRejectedError(res.status, await res.text());
    }
    return readJson(res, label, schema);
  }
}

async function readJson<T extends z.ZodTypeAny>(res: Response, endpoint: string, schema: T): Promise<z.infer<T>> {
  const text = await res.text();
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw new MalformedResponseError(endpoint, "body is not JSON");
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new MalformedResponseError(endpoint, `${where}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}
