import { http, HttpResponse } from 'msw'
import { RateGovernor, stravaWindows } from '../../src/lib/rateLimiter'
import type { RetryPolicy } from '../../src/lib/request'
import { StravaClient, type StravaActivity, type StravaClientOptions } from '../../src/lib/strava'
import type { Clock } from '../../src/lib/clock'

export const STRAVA_API = 'https://www.strava.com/api/v3'
export const STRAVA_OAUTH_URL = 'https://www.strava.com/oauth/token'

export const TEST_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 100,
  backoffMultiplier: 2,
  timeoutMs: 5_000,
  isRetryableStatus: (status) => status >= 500 && status < 600,
}

export function createTestClient(clock: Clock, overrides: Partial<StravaClientOptions> = {}) {
  const governor = new RateGovernor(
    stravaWindows({ per15Min: 100, perHour: 300, perDay: 1000, safetyBufferMs: 2_000 }),
    { clock },
  )
  const client = new StravaClient({
    clientId: 'test-client-id',
    clientSecret: 'test-secret',
    apiBase: STRAVA_API,
    oauthUrl: STRAVA_OAUTH_URL,
    governor,
    policy: TEST_POLICY,
    clock,
    ...overrides,
  })
  return { client, governor }
}

/** Activity summary as /athlete/activities returns it. */
export function makeActivity(overrides: Partial<StravaActivity> & { id: number; start_date: string }): StravaActivity {
  return {
    name: `Activity ${overrides.id}`,
    type: 'Ride',
    start_date_local: overrides.start_date,
    timezone: '(GMT+00:00) Europe/London',
    distance: 10_000,
    moving_time: 1_800,
    elapsed_time: 2_000,
    total_elevation_gain: 100,
    average_speed: 5.5,
    max_speed: 12,
    ...overrides,
  }
}

export interface FakeAthlete {
  id: number
  firstname: string
  refreshToken: string
  accessToken: string
  /** When set, the next exchange of refreshToken hands this out and invalidates the old one. */
  rotateTo?: string
  activities: StravaActivity[]
}

/**
 * In-process Strava: token exchange with optional rotation, and a paginated,
 * `after`/`before`-filtered activity list per access token.
 */
export function fakeStrava(athletes: FakeAthlete[]) {
  const exchanged: string[] = []
  const listRequests: URL[] = []

  const handlers = [
    http.post(STRAVA_OAUTH_URL, async ({ request }) => {
      const form = new URLSearchParams(await request.text())
      const token = form.get('refresh_token') ?? ''
      exchanged.push(token)

      const athlete = athletes.find((a) => a.refreshToken === token)
      if (!athlete) {
        return HttpResponse.json({ message: 'Bad Request', errors: [{ field: 'refresh_token', code: 'invalid' }] }, { status: 400 })
      }
      if (athlete.rotateTo) {
        athlete.refreshToken = athlete.rotateTo
        athlete.rotateTo = undefined
      }
      return HttpResponse.json({
        token_type: 'Bearer',
        access_token: athlete.accessToken,
        refresh_token: athlete.refreshToken,
        expires_at: 1_900_000_000,
        athlete: { id: athlete.id, firstname: athlete.firstname },
      })
    }),

    http.get(`${STRAVA_API}/athlete/activities`, ({ request }) => {
      const url = new URL(request.url)
      listRequests.push(url)
      const athlete = athletes.find((a) => request.headers.get('authorization') === `Bearer ${a.accessToken}`)
      if (!athlete) {
        return HttpResponse.json({ message: 'Authorization Error' }, { status: 401 })
      }

      const after = Number(url.searchParams.get('after') ?? '0')
      const before = Number(url.searchParams.get('before') ?? 'Infinity')
      const page = Number(url.searchParams.get('page') ?? '1')
      const perPage = Number(url.searchParams.get('per_page') ?? '30')

      const matching = athlete.activities
        .filter((a) => {
          const start = Date.parse(a.start_date) / 1000
          return start > after && start < before
        })
        .sort((a, b) => Date.parse(a.start_date) - Date.parse(b.start_date))

      return HttpResponse.json(matching.slice((page - 1) * perPage, page * perPage))
    }),
  ]

  return { handlers, exchanged, listRequests }
}
