import { z } from "zod";

// Normalized activity record. `recordId` (the Strava activity id) is the only dedup key.

const nullableNumber = z.number().nullable();

export const ActivityRecordSchema = z.object({
  recordId: z.number().int(),
  subjectId: z.string().nullable(),
  subjectName: z.string(),
  name: z.string().nullable(),
  category: z.string(),
  startedAtLocal: z.string(),
  startedAtUtc: z.string(),
  timezone: z.string().nullable(),
  distanceMeters: z.number().nonnegative(),
  distanceKm: z.number().nonnegative(),
  durationSeconds: z.number().int().nonnegative(),
  elapsedSeconds: z.number().int().nonnegative().nullable(),
  elevationGainMeters: nullableNumber,
  averageSpeed: nullableNumber,
  maxSpeed: nullableNumber,
  averageCadence: nullableNumber,
  averageWatts: nullableNumber,
  maxWatts: nullableNumber,
  averageHeartrate: nullableNumber,
  calories: nullableNumber,
  mapPolyline: z.string().nullable(),
  fetchedAt: z.string(),
});

export type ActivityRecord = z.infer<typeof ActivityRecordSchema>;

export type ColumnType = "INTEGER" | "REAL" | "TEXT";

export interface RecordColumn {
  key: keyof ActivityRecord;
  column: string;
  type: ColumnType;
}

/** Flattened column layout shared by the CSV and SQL exports. */
export const RECORD_COLUMNS: readonly RecordColumn[] = [
  { key: "recordId", column: "activity_id", type: "INTEGER" },
  { key: "subjectId", column: "athlete_id", type: "TEXT" },
  { key: "subjectName", column: "athlete_name", type: "TEXT" },
  { key: "name", column: "name", type: "TEXT" },
  { key: "category", column: "type", type: "TEXT" },
  { key: "startedAtLocal", column: "start_date_local", type: "TEXT" },
  { key: "startedAtUtc", column: "start_date_utc", type: "TEXT" },
  { key: "timezone", column: "timezone", type: "TEXT" },
  { key: "distanceMeters", column: "distance_m", type: "REAL" },
  { key: "distanceKm", column: "distance_km", type: "REAL" },
  { key: "durationSeconds", column: "moving_time_s", type: "INTEGER" },
  { key: "elapsedSeconds", column: "elapsed_time_s", type: "INTEGER" },
  { key: "elevationGainMeters", column: "total_elevation_gain_m", type: "REAL" },
  { key: "averageSpeed", column: "average_speed_mps", type: "REAL" },
  { key: "maxSpeed", column: "max_speed_mps", type: "REAL" },
  { key: "averageCadence", column: "average_cadence", type: "REAL" },
  { key: "averageWatts", column: "average_watts", type: "REAL" },
  { key: "maxWatts", column: "max_watts", type: "REAL" },
  { key: "averageHeartrate", column: "average_heartrate", type: "REAL" },
  { key: "calories", column: "calories", type: "REAL" },
  { key: "mapPolyline", column: "map_polyline", type: "TEXT" },
  { key: "fetchedAt", column: "fetched_at_utc", type: "TEXT" },
];
