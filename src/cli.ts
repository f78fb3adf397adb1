/**
 * strava-roster-sync command line.
 *
 * Commands:
 *   sync [--after] [--before] - sync the next batch slice of the roster
 *   sync-athletes [ids...]    - sync named athletes (or a --file of ids) out of rotation
 *   export [--format]         - write (or print) the JSON/CSV/SQL exports
 *   leaderboard               - kilometres per athlete, as JSON
 *   seed-checkpoint <csv>     - add refresh tokens to the checkpoint
 *   apply-event <file>        - apply saved webhook event(s)
 *
 * Exit codes: 0 on completion, 2 on configuration errors, 1 otherwise.
 */

import "dotenv/config";
import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import { runSyncBatch, runTargetedSync, type SyncBatchDeps } from "./jobs/sync-batch";
import { seedCheckpoint } from "./jobs/seed-checkpoint";
import { extractEvents, handleWebhookEvent, type WebhookOutcome } from "./jobs/webhook-event";
import { parseAthleteIdList, removeFromAthleteIdList } from "./lib/athleteList";
import { CheckpointStore } from "./lib/checkpoint";
import { toEpochSeconds } from "./lib/clock";
import { PostgresSink, type RecordSink } from "./lib/db";
import { loadEnv, requireRosterPath, requireStravaCredentials, type AppEnv } from "./lib/env";
import { ConfigError, describeError } from "./lib/errors";
import { readFileIfExists, writeFileAtomic } from "./lib/files";
import { buildLeaderboard } from "./lib/leaderboard";
import { RateGovernor, stravaWindows } from "./lib/rateLimiter";
import { DEFAULT_RETRY_POLICY } from "./lib/request";
import { CsvRosterSource } from "./lib/roster";
import { ActivityStore, type ExportFormat } from "./lib/store";
import { StravaClient } from "./lib/strava";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

const EXPORT_FORMATS: ExportFormat[] = ["json", "csv", "sql"];

const LocalDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

function parseLocalDate(value: string): string {
  const parsed = LocalDate.safeParse(value);
  if (!parsed.success || Number.isNaN(Date.parse(parsed.data))) {
    throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  }
  return parsed.data;
}

function parsePositiveInt(value: string): number {
  const parsed = z.coerce.number().int().positive().safeParse(value);
  if (!parsed.success) throw new InvalidArgumentError("Expected a positive whole number.");
  return parsed.data;
}

interface DateWindow {
  after?: string;
  before?: string;
}

/** Both bounds are midnight UTC and exclusive, as the activities endpoint takes them. */
export function windowBounds(window: DateWindow): { after: number | null; before: number | null } {
  const toSeconds = (date: string | undefined) => (date ? toEpochSeconds(Date.parse(`${date}T00:00:00Z`)) : null);
  const after = toSeconds(window.after);
  const before = toSeconds(window.before);
  if (after !== null && before !== null && after >= before) {
    throw new ConfigError(`--after ${window.after} must be earlier than --before ${window.before}`);
  }
  return { after, before };
}

function addWindowOptions(command: Command): Command {
  return command
    .option("--after <date>", "only activities after this date (YYYY-MM-DD, UTC)", parseLocalDate)
    .option("--before <date>", "only activities before this date (YYYY-MM-DD, UTC)", parseLocalDate);
}

/** Client wired to one governor and the retry policy from the environment. */
export function createStravaClient(env: AppEnv): StravaClient {
  const { clientId, clientSecret } = requireStravaCredentials(env);
  const bufferMs = env.RATE_LIMIT_BUFFER_SEC * 1000;
  const governor = new RateGovernor(
    stravaWindows({
      per15Min: env.RATE_LIMIT_15M,
      perHour: env.RATE_LIMIT_HOURLY,
      perDay: env.RATE_LIMIT_DAILY,
      safetyBufferMs: bufferMs,
    }),
    { rateLimitFallbackMs: env.RATE_LIMIT_FALLBACK_SEC * 1000, rateLimitBufferMs: bufferMs },
  );

  return new StravaClient({
    clientId,
    clientSecret,
    apiBase: env.STRAVA_API_BASE,
    oauthUrl: env.STRAVA_OAUTH_URL,
    governor,
    policy: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: env.MAX_RETRIES,
      initialDelayMs: env.INITIAL_RETRY_SLEEP * 1000,
      timeoutMs: env.REQUEST_TIMEOUT_SEC * 1000,
    },
  });
}

function createSinks(env: AppEnv): RecordSink[] {
  return env.DATABASE_URL ? [new PostgresSink(env.DATABASE_URL)] : [];
}

export function createProgram(source: Record<string, string | undefined> = process.env): Command {
  const program = new Command();
  const env = () => loadEnv(source);

  program
    .name("strava-roster-sync")
    .description("Rate-limited, checkpointed Strava activity sync for a roster of athletes")
    .version("0.1.0")
    .exitOverride();

  const syncDeps = (config: AppEnv, window: DateWindow): SyncBatchDeps => {
    const rosterPath = requireRosterPath(config);
    const bounds = windowBounds(window);
    return {
      client: createStravaClient(config),
      checkpoints: new CheckpointStore(config.CHECKPOINT_FILE),
      store: new ActivityStore(config.OUTPUT_DIR),
      roster: new CsvRosterSource(rosterPath),
      sinks: createSinks(config),
      options: {
        batchSize: config.BATCH_SIZE,
        perPage: config.STRAVA_PER_PAGE,
        lookbackDays: config.LOOKBACK_DAYS,
        subjectPauseMs: config.SUBJECT_PAUSE_SEC * 1000,
        ...bounds,
      },
    };
  };

  addWindowOptions(program.command("sync"))
    .description("Sync the next batch slice of the roster")
    .action(async (options: DateWindow) => {
      await runSyncBatch(syncDeps(env(), options));
    });

  addWindowOptions(program.command("sync-athletes"))
    .description("Sync the given athletes now, without moving the batch rotation")
    .argument("[ids...]", "Strava athlete ids")
    .option("--file <path>", "list of athlete ids, one per line; synced ids are removed from it")
    .option("--max <n>", "most athletes to sync in one run", parsePositiveInt, 50)
    .action(async (ids: string[], options: DateWindow & { file?: string; max: number }) => {
      const config = env();
      if (ids.length === 0 && !options.file) {
        throw new ConfigError("Give athlete ids or --file <path>");
      }
      const deps = syncDeps(config, options);

      const listText = options.file ? await readFileIfExists(options.file) : null;
      if (options.file && listText === null) {
        console.log(`[Sync] No athlete list at ${options.file}`);
      }
      const candidates = [...new Set([...ids, ...parseAthleteIdList(listText ?? "")])];
      if (candidates.length === 0) {
        console.log("[Sync] No athlete ids to sync");
        return;
      }
      if (candidates.length > options.max) {
        console.log(`[Sync] ${candidates.length} athlete id(s) listed; syncing the first ${options.max}`);
      }

      const summary = await runTargetedSync(deps, candidates.slice(0, options.max));

      if (options.file && listText !== null && summary.synced.length > 0) {
        await writeFileAtomic(options.file, removeFromAthleteIdList(listText, new Set(summary.synced)));
        console.log(`[Sync] Removed ${summary.synced.length} synced id(s) from ${options.file}`);
      }
    });

  program
    .command("export")
    .description("Write the JSON, CSV and SQL exports from the stored records")
    .addOption(new Option("--format <format>", "only this format").choices(EXPORT_FORMATS))
    .option("--stdout", "print instead of writing the file")
    .action(async (options: { format?: ExportFormat; stdout?: boolean }) => {
      const config = env();
      const store = new ActivityStore(config.OUTPUT_DIR);
      const formats = options.format ? [options.format] : EXPORT_FORMATS;

      if (options.stdout) {
        for (const format of formats) process.stdout.write(await store.export(format));
        return;
      }
      await store.writeExports(formats);
      for (const format of formats) console.log(`[Store] Wrote ${store.paths[format]}`);
    });

  program
    .command("leaderboard")
    .description("Total kilometres per athlete, with daily totals, as JSON")
    .option("--category <category>", "only this activity type, e.g. Ride")
    .option("--from <date>", "first local date, YYYY-MM-DD", parseLocalDate)
    .option("--to <date>", "last local date, YYYY-MM-DD", parseLocalDate)
    .action(async (options: { category?: string; from?: string; to?: string }) => {
      const config = env();
      const records = await new ActivityStore(config.OUTPUT_DIR).load();
      const board = buildLeaderboard(records, options);
      process.stdout.write(`${JSON.stringify(board, null, 2)}\n`);
    });

  program
    .command("seed-checkpoint")
    .description("Add refresh tokens from athlete_id,refresh_token[,name] lines")
    .argument("<csv>", "CSV file")
    .action(async (csvPath: string) => {
      const config = env();
      let text: string;
      try {
        text = await readFile(csvPath, "utf-8");
      } catch (error) {
        throw new ConfigError(`Cannot read ${csvPath}: ${describeError(error)}`);
      }

      const checkpoints = new CheckpointStore(config.CHECKPOINT_FILE);
      const checkpoint = await checkpoints.load();
      const before = Object.keys(checkpoint.athletes).length;
      const result = seedCheckpoint(text, checkpoint, new Date());
      await checkpoints.save(checkpoint);
      console.log(
        `[Seed] Athletes before: ${before}, after: ${Object.keys(checkpoint.athletes).length}. ` +
          `Added ${result.added}, updated ${result.updated}, skipped ${result.skipped}. Saved ${checkpoints.path}`,
      );
    });

  program
    .command("apply-event")
    .description("Apply saved Strava webhook event(s) through the merge store")
    .argument("<file>", "JSON file: one event, an array, or { events: [...] }")
    .action(async (file: string) => {
      const config = env();
      const client = createStravaClient(config);
      const payload: unknown = JSON.parse(await readFile(file, "utf-8"));

      const deps = {
        client,
        checkpoints: new CheckpointStore(config.CHECKPOINT_FILE),
        store: new ActivityStore(config.OUTPUT_DIR),
        sinks: createSinks(config),
      };
      const outcomes: WebhookOutcome[] = [];
      for (const event of extractEvents(payload)) {
        outcomes.push(await handleWebhookEvent(event, deps));
      }
      await deps.store.writeExports();

      const count = (status: WebhookOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
      console.log(`[Webhook] Applied ${outcomes.length} event(s): stored=${count("stored")}, ignored=${count("ignored")}, failed=${count("failed")}`);
    });

  return program;
}

/** Parse and run; resolves with the process exit code instead of exiting. */
export async function run(argv: string[], source: Record<string, string | undefined> = process.env): Promise<number> {
  try {
    await createProgram(source).parseAsync(argv);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version arrive here too, with exit code 0.
      return error.exitCode;
    }
    if (error instanceof ConfigError) {
      console.error(`[Config] ${error.message}`);
      return EXIT_CONFIG;
    }
    console.error("[CLI] Unexpected failure:", error);
    return EXIT_FAILURE;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = await run(process.argv);
}
