import { join } from "node:path";
import { formatCSV } from "./csv";
import { describeError } from "./errors";
import { readFileIfExists, writeFileAtomic } from "./files";
import { ActivityRecordSchema, RECORD_COLUMNS, type ActivityRecord } from "./records";

export type ExportFormat = "json" | "csv" | "sql";

export interface MergeResult {
  records: ActivityRecord[];
  inserted: number;
  updated: number;
}

export interface UpsertResult {
  inserted: number;
  updated: number;
  total: number;
}

/**
 * Last write wins per recordId. Order is first appearance, so an overwritten
 * record keeps its position. This is the only place records are deduplicated.
 */
export function mergeRecords(prior: ActivityRecord[], incoming: ActivityRecord[]): MergeResult {
  const byId = new Map<number, ActivityRecord>();
  for (const r of prior) byId.set(r.recordId, r);

  let inserted = 0;
  let updated = 0;
  for (const r of incoming) {
    if (byId.has(r.recordId)) updated++;
    else inserted++;
    byId.set(r.recordId, r);
  }
  return { records: [...byId.values()], inserted, updated };
}

// ── Renderers ──

export function renderJSON(records: ActivityRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}

export function renderCSV(records: ActivityRecord[]): string {
  const header = RECORD_COLUMNS.map((c) => c.column);
  return formatCSV([header, ...records.map((r) => RECORD_COLUMNS.map((c) => r[c.key]))]);
}

function sqlValue(value: string | number | null): string {
  if (value === null) return "NULL";
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "NULL";
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderSQL(records: ActivityRecord[]): string {
  const columns = RECORD_COLUMNS.map((c) =>
    c.key === "recordId" ? `  ${c.column} ${c.type} PRIMARY KEY` : `  ${c.column} ${c.type}`,
  );
  const names = RECORD_COLUMNS.map((c) => c.column).join(", ");
  const lines = [
    "-- activities dump",
    `CREATE TABLE IF NOT EXISTS activities (\n${columns.join(",\n")}\n);`,
    ...records.map(
      (r) => `INSERT OR REPLACE INTO activities (${names}) VALUES (${RECORD_COLUMNS.map((c) => sqlValue(r[c.key])).join(", ")});`,
    ),
  ];
  return `${lines.join("\n")}\n`;
}

export function renderRecords(records: ActivityRecord[], format: ExportFormat): string {
  switch (format) {
    case "json":
      return renderJSON(records);
    case "csv":
      return renderCSV(records);
    case "sql":
      return renderSQL(records);
  }
}

// ── Store ──

export class ActivityStore {
  private cache: ActivityRecord[] | null = null;
  readonly paths: Record<ExportFormat, string>;

  constructor(outputDir: string, basename = "activities") {
    this.paths = {
      json: join(outputDir, `${basename}.json`),
      csv: join(outputDir, `${basename}.csv`),
      sql: join(outputDir, `${basename}.sql`),
    };
  }

  /**
   * Previously persisted records. A missing file is an empty store; an
   * unreadable or corrupt one is logged and treated as empty so the run goes on
   * with the new batch only.
   */
  async load(): Promise<ActivityRecord[]> {
    if (this.cache) return this.cache;
    this.cache = await this.readPersisted();
    return this.cache;
  }

  private async readPersisted(): Promise<ActivityRecord[]> {
    const path = this.paths.json;
    let text: string | null;
    let raw: unknown;
    try {
      text = await readFileIfExists(path);
      if (text === null) return [];
      raw = JSON.parse(text);
    } catch (error) {
      console.error(`[Store] Could not read ${path}; continuing with the new batch only:`, describeError(error));
      return [];
    }

    if (!Array.isArray(raw)) {
      console.error(`[Store] ${path} is not a JSON array; continuing with the new batch only`);
      return [];
    }

    const records: ActivityRecord[] = [];
    let dropped = 0;
    for (const item of raw) {
      const parsed = ActivityRecordSchema.safeParse(item);
      if (parsed.success) records.push(parsed.data);
      else dropped++;
    }
    if (dropped > 0) {
      console.error(`[Store] Dropped ${dropped} unreadable record(s) from ${path}`);
    }
    return records;
  }

  /** Merge and persist the record file. Throws PersistenceError if the write fails. */
  async upsert(incoming: ActivityRecord[]): Promise<UpsertResult> {
    const prior = await this.load();
    const merged = mergeRecords(prior, incoming);
    await writeFileAtomic(this.paths.json, renderJSON(merged.records));
    this.cache = merged.records;
    return { inserted: merged.inserted, updated: merged.updated, total: merged.records.length };
  }

  async export(format: ExportFormat): Promise<string> {
    return renderRecords(await this.load(), format);
  }

  /** Write the derived CSV and SQL files beside the record file. */
  async writeExports(formats: ExportFormat[] = ["csv", "sql"]): Promise<void> {
    const records = await this.load();
    for (const format of formats) {
      await writeFileAtomic(this.paths[format], renderRecords(records, format));
    }
  }
}
