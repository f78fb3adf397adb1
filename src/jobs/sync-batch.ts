import { adoptSeededEntry, subjectEntry, type Checkpoint, type CheckpointStore, type SubjectCheckpoint } from "../lib/checkpoint";
import { systemClock, toEpochSeconds, type Clock } from "../lib/clock";
import type { RecordSink } from "../lib/db";
import { describeError, isSyncError, type SyncErrorKind } from "../lib/errors";
import { latestStart, normalizeActivity } from "../lib/normalize";
import { collectActivities } from "../lib/paginate";
import type { ActivityRecord } from "../lib/records";
import type { RosterEntry, RosterSource, RosterUpdate } from "../lib/roster";
import type { ActivityStore } from "../lib/store";
import type { StravaClient, TokenGrant } from "../lib/strava";

const DAY_MS = 24 * 60 * 60 * 1000;

export type SyncPhase =
  | "idle"
  | "resolving-credential"
  | "paginating"
  | "normalizing"
  | "upserting"
  | "checkpoint-advance"
  | "batch-complete";

export interface SyncBatchOptions {
  batchSize: number;
  perPage: number;
  /** How far back to look for a subject that has no cursor yet. */
  lookbackDays: number;
  subjectPauseMs: number;
  /** Lower bound for activity start times, epoch seconds. Replaces the lookback and caps an older cursor. */
  after?: number | null;
  /** Upper bound for activity start times, epoch seconds. Null means now. */
  before?: number | null;
}

export interface SyncBatchDeps {
  client: StravaClient;
  checkpoints: CheckpointStore;
  store: ActivityStore;
  roster: RosterSource;
  sinks?: RecordSink[];
  clock?: Clock;
  options: SyncBatchOptions;
}

export type SubjectOutcome =
  | {
      status: "synced";
      key: string;
      displayName: string;
      subjectId: string;
      rotated: boolean;
      fetched: number;
      inserted: number;
      updated: number;
    }
  | {
      status: "skipped";
      key: string;
      displayName: string;
      /** Phase the subject was in when it failed. */
      phase: SyncPhase;
      errorKind: SyncErrorKind | "unknown";
      error: string;
    };

export interface RunTotals {
  processed: number;
  skipped: number;
  fetched: number;
  inserted: number;
  updated: number;
  outcomes: SubjectOutcome[];
}

export interface BatchSummary extends RunTotals {
  batchIndex: number;
  nextBatchIndex: number;
  rosterSize: number;
}

export interface TargetedSummary extends RunTotals {
  /** Requested athlete ids that synced. */
  synced: string[];
  /** Requested athlete ids with no roster row. */
  notFound: string[];
}

/**
 * Slice of the roster for this run. A stored index that points past the end
 * (the roster shrank) starts over at 0.
 */
export function selectBatch<T>(roster: T[], batchIndex: number, batchSize: number): { index: number; slice: T[] } {
  const index = batchIndex * batchSize >= roster.length ? 0 : batchIndex;
  const start = index * batchSize;
  return { index, slice: roster.slice(start, start + batchSize) };
}

export function nextBatchIndex(batchIndex: number, batchSize: number, rosterSize: number): number {
  const next = batchIndex + 1;
  return next * batchSize >= rosterSize ? 0 : next;
}

/**
 * Epoch seconds to fetch after: the subject's cursor, else now minus the
 * lookback. An explicit `after` replaces the lookback and wins over an older cursor.
 */
export function sinceCursor(
  entry: SubjectCheckpoint,
  nowMs: number,
  lookbackDays: number,
  after: number | null = null,
): number {
  const cursor = entry.last_activity_ts ? Date.parse(entry.last_activity_ts) : Number.NaN;
  if (!Number.isNaN(cursor)) {
    const since = toEpochSeconds(cursor);
    return after !== null && after > since ? after : since;
  }
  return after ?? toEpochSeconds(nowMs - lookbackDays * DAY_MS);
}

class SubjectFailure extends Error {
  constructor(readonly phase: SyncPhase, readonly error: unknown) {
    super(describeError(error));
  }
}

/**
 * Run one batch slice of the roster.
 *
 * Each subject goes resolving-credential, paginating, normalizing, upserting,
 * checkpoint-advance. A failure anywhere skips straight to checkpoint-advance
 * for that subject only (recording last_seen and last_error) and the batch
 * continues. The checkpoint is saved after every subject, and immediately
 * whenever a refresh token rotates.
 */
export async function runSyncBatch(deps: SyncBatchDeps): Promise<BatchSummary> {
  const { checkpoints, roster, store, options } = deps;
  const clock = deps.clock ?? systemClock;

  const entries = await roster.load();
  const checkpoint = await checkpoints.load();
  const { index, slice } = selectBatch(entries, checkpoint.last_batch_index, options.batchSize);
  const nextIndex = nextBatchIndex(index, options.batchSize, entries.length);
  const first = index * options.batchSize + 1;

  console.log(
    `[Sync] Batch ${index}: ${slice.length} of ${entries.length} athlete(s)` +
      (slice.length > 0 ? ` (rows ${first}-${first + slice.length - 1})` : ""),
  );

  const outcomes = await syncSubjects(deps, clock, checkpoint, slice);

  checkpoint.last_batch_index = nextIndex;
  await checkpoints.persist(checkpoint);

  try {
    await store.writeExports();
  } catch (error) {
    console.error("[Sync] Failed to write CSV/SQL exports:", describeError(error));
  }

  const summary: BatchSummary = {
    batchIndex: index,
    nextBatchIndex: nextIndex,
    rosterSize: entries.length,
    ...tally(outcomes),
  };
  console.log(
    `[Sync] Batch complete: processed=${summary.processed}, skipped=${summary.skipped}, ` +
      `fetched=${summary.fetched}, inserted=${summary.inserted}, updated=${summary.updated}, next batch=${nextIndex}`,
  );
  return summary;
}

/**
 * Sync the roster rows of the given athlete ids, outside the batch rotation.
 * An id matches a row by its Athlete ID column or by the athlete id already
 * recorded in that row's checkpoint entry. last_batch_index is left alone.
 */
export async function runTargetedSync(deps: SyncBatchDeps, athleteIds: string[]): Promise<TargetedSummary> {
  const { checkpoints, roster, store } = deps;
  const clock = deps.clock ?? systemClock;

  const entries = await roster.load();
  const checkpoint = await checkpoints.load();
  const idOf = (subject: RosterEntry) => subject.subjectId ?? checkpoint.athletes[subject.key]?.athlete_id ?? null;

  const requested = [...new Set(athleteIds)];
  const targets: { athleteId: string; subject: RosterEntry }[] = [];
  const notFound: string[] = [];
  for (const athleteId of requested) {
    const subject = entries.find((e) => idOf(e) === athleteId);
    if (subject) targets.push({ athleteId, subject });
    else notFound.push(athleteId);
  }
  if (notFound.length > 0) {
    console.warn(`[Sync] No roster row for athlete id(s): ${notFound.join(", ")}`);
  }

  console.log(`[Sync] Targeted sync: ${targets.length} of ${requested.length} requested athlete(s)`);
  const outcomes = await syncSubjects(deps, clock, checkpoint, targets.map((t) => t.subject));

  try {
    await store.writeExports();
  } catch (error) {
    console.error("[Sync] Failed to write CSV/SQL exports:", describeError(error));
  }

  const synced = targets.filter((_, i) => outcomes[i]?.status === "synced").map((t) => t.athleteId);
  const summary: TargetedSummary = { synced, notFound, ...tally(outcomes) };
  console.log(
    `[Sync] Targeted sync complete: processed=${summary.processed}, skipped=${summary.skipped}, ` +
      `not found=${notFound.length}, fetched=${summary.fetched}, inserted=${summary.inserted}, updated=${summary.updated}`,
  );
  return summary;
}

async function syncSubjects(
  deps: SyncBatchDeps,
  clock: Clock,
  checkpoint: Checkpoint,
  subjects: RosterEntry[],
): Promise<SubjectOutcome[]> {
  const outcomes: SubjectOutcome[] = [];
  for (const [i, subject] of subjects.entries()) {
    const outcome = await syncSubject(deps, clock, checkpoint, subject);
    outcomes.push(outcome);

    if (outcome.status === "synced") {
      console.log(
        `[Sync] (${i + 1}/${subjects.length}) ${subject.displayName}: fetched ${outcome.fetched}, ` +
          `inserted ${outcome.inserted}, updated ${outcome.updated}`,
      );
    }

    if (i < subjects.length - 1 && deps.options.subjectPauseMs > 0) {
      await clock.sleep(deps.options.subjectPauseMs);
    }
  }
  return outcomes;
}

async function syncSubject(
  deps: SyncBatchDeps,
  clock: Clock,
  checkpoint: Checkpoint,
  subject: RosterEntry,
): Promise<SubjectOutcome> {
  const { checkpoints } = deps;
  if (subject.subjectId) adoptSeeded(checkpoint, subject, subject.subjectId);
  const entry = subjectEntry(checkpoint, subject.key);
  entry.name = subject.displayName;

  try {
    const result = await fetchSubject(deps, clock, checkpoint, subject, entry);

    entry.last_activity_ts = result.cursor;
    entry.last_seen = new Date(clock.now()).toISOString();
    delete entry.last_error;
    await checkpoints.persist(checkpoint);

    return {
      status: "synced",
      key: subject.key,
      displayName: subject.displayName,
      subjectId: result.subjectId,
      rotated: result.rotated,
      fetched: result.fetched,
      inserted: result.inserted,
      updated: result.updated,
    };
  } catch (caught) {
    const failure = caught instanceof SubjectFailure ? caught : new SubjectFailure("idle", caught);
    const errorKind = isSyncError(failure.error) ? failure.error.kind : "unknown";
    console.error(`[Sync] Skipping ${subject.displayName} (${failure.phase}):`, failure.message);

    entry.last_seen = new Date(clock.now()).toISOString();
    entry.last_error = `${errorKind}: ${failure.message}`;
    await checkpoints.persist(checkpoint);

    return {
      status: "skipped",
      key: subject.key,
      displayName: subject.displayName,
      phase: failure.phase,
      errorKind,
      error: failure.message,
    };
  }
}

interface FetchResult {
  subjectId: string;
  rotated: boolean;
  cursor: string | null;
  fetched: number;
  inserted: number;
  updated: number;
}

async function fetchSubject(
  deps: SyncBatchDeps,
  clock: Clock,
  checkpoint: Checkpoint,
  subject: RosterEntry,
  entry: SubjectCheckpoint,
): Promise<FetchResult> {
  const { client, checkpoints, store, options } = deps;
  let phase: SyncPhase = "resolving-credential";

  try {
    const refreshToken = entry.refresh_token ?? subject.refreshToken;
    if (!refreshToken) {
      throw new Error("no refresh token in checkpoint or roster");
    }

    const grant = await client.exchangeRefreshToken(refreshToken);
    entry.refresh_token = grant.refreshToken;
    entry.refreshed_at = new Date(clock.now()).toISOString();
    const rosterUpdate: RosterUpdate = {};
    if (grant.rotated) {
      console.log(`[Sync] Refresh token rotated for ${subject.displayName}`);
      // Persist before anything else can fail; the old token is already dead.
      await checkpoints.persist(checkpoint);
      rosterUpdate.refreshToken = grant.refreshToken;
    }

    const subjectId = await resolveSubjectId(client, subject, entry, grant);
    if (!subject.subjectId && entry.athlete_id !== subjectId) rosterUpdate.subjectId = subjectId;
    entry.athlete_id = subjectId;
    adoptSeeded(checkpoint, subject, subjectId);
    await mirrorToRoster(deps.roster, subject, rosterUpdate);

    phase = "paginating";
    const raw = await collectActivities(client, grant.accessToken, {
      after: sinceCursor(entry, clock.now(), options.lookbackDays, options.after ?? null),
      before: options.before ?? null,
      perPage: options.perPage,
    });

    phase = "normalizing";
    const fetchedAt = new Date(clock.now()).toISOString();
    const records = raw.map((a) => normalizeActivity(a, { subjectId, displayName: subject.displayName }, fetchedAt));

    phase = "upserting";
    const result = await store.upsert(records);
    await writeSinks(deps.sinks ?? [], subject, records);

    return {
      subjectId,
      rotated: grant.rotated,
      cursor: laterOf(latestStart(records), entry.last_activity_ts ?? null),
      fetched: records.length,
      inserted: result.inserted,
      updated: result.updated,
    };
  } catch (error) {
    throw new SubjectFailure(phase, error);
  }
}

/** The cursor never moves backwards; a run that fetched nothing keeps the previous one. */
function laterOf(fetched: string | null, previous: string | null): string | null {
  if (fetched === null) return previous;
  if (previous === null) return fetched;
  return Date.parse(fetched) >= Date.parse(previous) ? fetched : previous;
}

function adoptSeeded(checkpoint: Checkpoint, subject: RosterEntry, athleteId: string): void {
  if (adoptSeededEntry(checkpoint, subject.key, athleteId)) {
    console.log(`[Checkpoint] Moved seeded entry ${athleteId} under ${subject.key}`);
  }
}

async function resolveSubjectId(
  client: StravaClient,
  subject: RosterEntry,
  entry: SubjectCheckpoint,
  grant: TokenGrant,
): Promise<string> {
  if (subject.subjectId) return subject.subjectId;
  if (entry.athlete_id) return entry.athlete_id;
  if (grant.athlete) return String(grant.athlete.id);

  const athlete = await client.getAthlete(grant.accessToken);
  console.log(`[Sync] Discovered athlete id for ${subject.displayName}`);
  return String(athlete.id);
}

async function mirrorToRoster(roster: RosterSource, subject: RosterEntry, update: RosterUpdate): Promise<void> {
  if (!roster.writeBack || Object.keys(update).length === 0) return;
  try {
    await roster.writeBack(subject, update);
  } catch (error) {
    console.warn(`[Roster] Write-back for ${subject.displayName} failed:`, describeError(error));
  }
}

async function writeSinks(sinks: RecordSink[], subject: RosterEntry, records: ActivityRecord[]): Promise<void> {
  for (const sink of sinks) {
    try {
      await sink.write(records);
    } catch (error) {
      console.error(`[Sync] ${sink.name} sink failed for ${subject.displayName}:`, describeError(error));
    }
  }
}

function tally(outcomes: SubjectOutcome[]): RunTotals {
  const totals: RunTotals = { processed: 0, skipped: 0, fetched: 0, inserted: 0, updated: 0, outcomes };
  for (const o of outcomes) {
    if (o.status === "skipped") {
      totals.skipped++;
      continue;
    }
    totals.processed++;
    totals.fetched += o.fetched;
    totals.inserted += o.inserted;
    totals.updated += o.updated;
  }
  return totals;
}
