import { z } from "zod";
import { describeError } from "./errors";
import { readFileIfExists, writeFileAtomic } from "./files";

/**
 * Durable sync state, one JSON file:
 *
 *   { "last_batch_index": 3,
 *     "athletes": { "<row>_<name>": { "refresh_token": "...", "last_activity_ts": "..." } } }
 *
 * Saved after every subject, so a crash loses at most the subject in flight.
 */

const SubjectCheckpointSchema = z
  .object({
    refresh_token: z.string().optional(),
    last_activity_ts: z.string().nullish(),
    last_seen: z.string().optional(),
    athlete_id: z.string().optional(),
    name: z.string().optional(),
    last_error: z.string().optional(),
    seeded_at: z.string().optional(),
    refreshed_at: z.string().optional(),
  })
  .passthrough();

const CheckpointSchema = z.object({
  last_batch_index: z.number().int().nonnegative().default(0),
  athletes: z.record(SubjectCheckpointSchema).default({}),
});

export type SubjectCheckpoint = z.infer<typeof SubjectCheckpointSchema>;
export type Checkpoint = z.infer<typeof CheckpointSchema>;

export function emptyCheckpoint(): Checkpoint {
  return { last_batch_index: 0, athletes: {} };
}

/** Mutable entry for `key`, created on first use. */
export function subjectEntry(checkpoint: Checkpoint, key: string): SubjectCheckpoint {
  const existing = checkpoint.athletes[key];
  if (existing) return existing;
  const created: SubjectCheckpoint = {};
  checkpoint.athletes[key] = created;
  return created;
}

/** Every entry that belongs to the athlete: keyed by the id, or carrying it as athlete_id. */
export function entriesForAthlete(
  checkpoint: Checkpoint,
  athleteId: string,
): { key: string; entry: SubjectCheckpoint }[] {
  return Object.entries(checkpoint.athletes)
    .filter(([key, entry]) => entry.athlete_id === athleteId || key === athleteId)
    .map(([key, entry]) => ({ key, entry }));
}

/**
 * The athlete's entry. A roster-keyed entry (the one the batch sync writes)
 * wins over one the seeder stored under the bare athlete id.
 */
export function findByAthleteId(
  checkpoint: Checkpoint,
  athleteId: string,
): { key: string; entry: SubjectCheckpoint } | null {
  const matches = entriesForAthlete(checkpoint, athleteId);
  return matches.find((m) => m.key !== athleteId) ?? matches[0] ?? null;
}

/**
 * Fold an entry seeded under the bare athlete id into the roster-keyed one, so
 * the athlete has a single entry and a rotated token can never leave a stale
 * copy behind. The seeded token fills a missing token only.
 */
export function adoptSeededEntry(checkpoint: Checkpoint, key: string, athleteId: string): boolean {
  if (key === athleteId) return false;
  const seeded = checkpoint.athletes[athleteId];
  if (!seeded) return false;

  const entry = subjectEntry(checkpoint, key);
  if (!entry.refresh_token && seeded.refresh_token) entry.refresh_token = seeded.refresh_token;
  if (!entry.seeded_at && seeded.seeded_at) entry.seeded_at = seeded.seeded_at;
  if (!entry.last_activity_ts && seeded.last_activity_ts) entry.last_activity_ts = seeded.last_activity_ts;
  entry.athlete_id = athleteId;
  delete checkpoint.athletes[athleteId];
  return true;
}

export class CheckpointStore {
  constructor(readonly path: string) {}

  /** Never throws: a missing or malformed file yields an empty checkpoint. */
  async load(): Promise<Checkpoint> {
    let text: string | null;
    try {
      text = await readFileIfExists(this.path);
    } catch (error) {
      console.warn(`[Checkpoint] Could not read ${this.path}; starting fresh:`, describeError(error));
      return emptyCheckpoint();
    }
    if (text === null) return emptyCheckpoint();

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      console.warn(`[Checkpoint] ${this.path} is not valid JSON; starting fresh`);
      return emptyCheckpoint();
    }

    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[Checkpoint] ${this.path} has an unexpected shape; starting fresh`);
      return emptyCheckpoint();
    }
    return parsed.data;
  }

  /** Atomic; throws PersistenceError and leaves the previous file intact on failure. */
  async save(checkpoint: Checkpoint): Promise<void> {
    // Refresh tokens: owner-only.
    await writeFileAtomic(this.path, `${JSON.stringify(checkpoint, null, 2)}\n`, { mode: 0o600 });
  }

  /** save(), but a failure is logged instead of thrown. Resolves false when nothing was written. */
  async persist(checkpoint: Checkpoint): Promise<boolean> {
    try {
      await this.save(checkpoint);
      return true;
    } catch (error) {
      console.error(`[Checkpoint] FAILED to save ${this.path}; previous state kept:`, describeError(error));
      return false;
    }
  }
}
