import type { StravaActivity, StravaClient } from "./strava";

export interface PaginateOptions {
  /** Epoch seconds, exclusive. Null fetches from the beginning of history. */
  after: number | null;
  /** Epoch seconds, exclusive. Null means up to now. */
  before: number | null;
  perPage: number;
}

/**
 * Lazily walk /athlete/activities page by page.
 *
 * An empty page ends the walk; so does a short page, since Strava only returns
 * fewer than `perPage` items on the last one. Not resumable mid-walk: a new
 * call starts again at page 1. Errors from the page fetch propagate.
 */
export async function* paginateActivities(
  client: StravaClient,
  accessToken: string,
  options: PaginateOptions,
): AsyncGenerator<StravaActivity, void, undefined> {
  for (let page = 1; ; page++) {
    const items = await client.listActivitiesPage(accessToken, { ...options, page });
    console.log(`[Strava] activities:list page ${page}: ${items.length} item(s)`);
    if (items.length === 0) return;

    yield* items;

    if (items.length < options.perPage) return;
  }
}

export async function collectActivities(
  client: StravaClient,
  accessToken: string,
  options: PaginateOptions,
): Promise<StravaActivity[]> {
  const all: StravaActivity[] = [];
  for await (const activity of paginateActivities(client, accessToken, options)) {
    all.push(activity);
  }
  return all;
}
