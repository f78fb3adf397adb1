import { Client } from "pg";
import { PersistenceError } from "./errors";
import type { ActivityRecord } from "./records";

/** Anything that wants each subject's freshly normalized records. */
export interface RecordSink {
  readonly name: string;
  write(records: ActivityRecord[]): Promise<void>;
}

export type Queryable = Pick<Client, "query">;

export async function withDb<T>(connectionString: string, fn: (c: Client) => Promise<T>): Promise<T> {
  const client = new Client({ connectionString, ssl: sslFor(connectionString) });
  await client.connect();
  try {
    return await fn(client);
  } finally {
    await client.end();
  }
}

function sslFor(connectionString: string): { rejectUnauthorized: boolean } | undefined {
  return /localhost|127\.0\.0\.1/.test(connectionString) ? undefined : { rejectUnauthorized: false };
}

export async function ensureActivityTable(c: Queryable): Promise<void> {
  await c.query(`
    create table if not exists activity (
      id bigint primary key,
      athlete_id text,
      athlete_name text,
      name text,
      type text,
      start_date timestamptz,
      start_date_local text,
      timezone text,
      distance_m double precision,
      distance_km double precision,
      moving_time_s integer,
      elapsed_time_s integer,
      total_elevation_gain_m double precision,
      average_speed_mps double precision,
      max_speed_mps double precision,
      average_watts double precision,
      average_heartrate double precision,
      calories double precision,
      fetched_at timestamptz,
      created_at timestamptz default now(),
      updated_at timestamptz default now()
    )
  `);
}

export async function upsertActivitySummary(c: Queryable, r: ActivityRecord): Promise<void> {
  await c.query(`
    insert into activity (id, athlete_id, athlete_name, name, type, start_date, start_date_local, timezone,
                          distance_m, distance_km, moving_time_s, elapsed_time_s, total_elevation_gain_m,
                          average_speed_mps, max_speed_mps, average_watts, average_heartrate, calories,
                          fetched_at, created_at, updated_at)
    values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19, now(), now())
    on conflict (id) do update set
      athlete_id=excluded.athlete_id,
      athlete_name=excluded.athlete_name,
      name=excluded.name,
      type=excluded.type,
      start_date=excluded.start_date,
      start_date_local=excluded.start_date_local,
      timezone=excluded.timezone,
      distance_m=excluded.distance_m,
      distance_km=excluded.distance_km,
      moving_time_s=excluded.moving_time_s,
      elapsed_time_s=excluded.elapsed_time_s,
      total_elevation_gain_m=excluded.total_elevation_gain_m,
      average_speed_mps=excluded.average_speed_mps,
      max_speed_mps=excluded.max_speed_mps,
      average_watts=excluded.average_watts,
      average_heartrate=excluded.average_heartrate,
      calories=excluded.calories,
      fetched_at=excluded.fetched_at,
      updated_at=now()
  `, [
    r.recordId, r.subjectId, r.subjectName, r.name, r.category, r.startedAtUtc, r.startedAtLocal, r.timezone,
    r.distanceMeters, r.distanceKm, r.durationSeconds, r.elapsedSeconds, r.elevationGainMeters,
    r.averageSpeed, r.maxSpeed, r.averageWatts, r.averageHeartrate, r.calories, r.fetchedAt,
  ]);
}

/** Mirrors every upserted record into Postgres (DATABASE_URL). */
export class PostgresSink implements RecordSink {
  readonly name = "postgres";
  private tableReady = false;

  constructor(private readonly connectionString: string) {}

  async write(records: ActivityRecord[]): Promise<void> {
    if (records.length === 0) return;
    try {
      await withDb(this.connectionString, async (c) => {
        if (!this.tableReady) {
          await ensureActivityTable(c);
          this.tableReady = true;
        }
        await c.query("begin");
        try {
          for (const r of records) await upsertActivitySummary(c, r);
          await c.query("commit");
        } catch (error) {
          await c.query("rollback");
          throw error;
        }
      });
    } catch (error) {
      // The connection string carries credentials; report the table instead.
      throw new PersistenceError("postgres:activity", { cause: error });
    }
    console.log(`[DB] Upserted ${records.length} activit${records.length === 1 ? "y" : "ies"}`);
  }
}
