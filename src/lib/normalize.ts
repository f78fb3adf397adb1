import type { ActivityRecord } from "./records";
import type { StravaActivity } from "./strava";

export interface SubjectRef {
  subjectId: string | null;
  displayName: string;
}

/** Meters to kilometres, rounded to 2 decimals. Computed once, at ingestion. */
export function metersToKm(meters: number): number {
  return Math.round(meters / 10) / 100;
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/**
 * Raw Strava activity to ActivityRecord.
 *
 * start_date_local is kept as the string Strava sent: it is local wall-clock
 * time despite its "Z" suffix and must not go through new Date().
 */
export function normalizeActivity(raw: StravaActivity, subject: SubjectRef, fetchedAt: string): ActivityRecord {
  const ownerId = raw.athlete?.id;
  return {
    recordId: raw.id,
    subjectId: subject.subjectId ?? (ownerId !== undefined ? String(ownerId) : null),
    subjectName: subject.displayName,
    name: raw.name ?? null,
    category: raw.type ?? raw.sport_type ?? "Unknown",
    startedAtLocal: raw.start_date_local,
    startedAtUtc: raw.start_date,
    timezone: raw.timezone ?? null,
    distanceMeters: raw.distance,
    distanceKm: metersToKm(raw.distance),
    durationSeconds: raw.moving_time,
    elapsedSeconds: raw.elapsed_time ?? null,
    elevationGainMeters: finiteOrNull(raw.total_elevation_gain),
    averageSpeed: finiteOrNull(raw.average_speed),
    maxSpeed: finiteOrNull(raw.max_speed),
    averageCadence: finiteOrNull(raw.average_cadence),
    averageWatts: finiteOrNull(raw.average_watts),
    maxWatts: finiteOrNull(raw.max_watts),
    averageHeartrate: finiteOrNull(raw.average_heartrate),
    calories: finiteOrNull(raw.calories),
    mapPolyline: raw.map?.summary_polyline ?? raw.map?.polyline ?? null,
    fetchedAt,
  };
}

/** Latest UTC start among the records, as an ISO string; null for none. */
export function latestStart(records: ActivityRecord[]): string | null {
  let best: number | null = null;
  for (const r of records) {
    const ts = Date.parse(r.startedAtUtc);
    if (!Number.isNaN(ts) && (best === null || ts > best)) best = ts;
  }
  return best === null ? null : new Date(best).toISOString();
}
