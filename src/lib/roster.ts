import { readFile } from "node:fs/promises";
import { formatCSV, parseCSV } from "./csv";
import { ConfigError, describeError } from "./errors";
import { writeFileAtomic } from "./files";

export interface RosterEntry {
  /** Stable checkpoint key: "<sheet row>_<display name>". */
  key: string;
  /** 1-based row number as in the spreadsheet; the header is row 1. */
  rowNumber: number;
  subjectId: string | null;
  displayName: string;
  refreshToken: string | null;
}

export interface RosterUpdate {
  subjectId?: string;
  refreshToken?: string;
}

export interface RosterSource {
  load(): Promise<RosterEntry[]>;
  /** Best-effort mirror of rotated credentials and discovered ids. */
  writeBack?(entry: RosterEntry, update: RosterUpdate): Promise<void>;
}

export type RosterField = "subjectId" | "displayName" | "firstName" | "lastName" | "username" | "refreshToken";

/** Accepted header spellings per field, compared case- and whitespace-insensitively. */
export const ROSTER_FIELD_ALIASES: Record<RosterField, string[]> = {
  subjectId: ["athlete id", "athleteid", "athlete_id", "strava id"],
  displayName: ["name", "athlete name", "display name"],
  firstName: ["firstname", "first name", "first"],
  lastName: ["lastname", "last name", "last"],
  username: ["username", "user"],
  refreshToken: ["refresh token", "refreshtoken", "refresh_token"],
};

const ROSTER_FIELDS: RosterField[] = ["subjectId", "displayName", "firstName", "lastName", "username", "refreshToken"];
const REQUIRED_FIELDS: RosterField[] = ["refreshToken"];

export type RosterColumns = Partial<Record<RosterField, number>>;

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, " ");
}

/** Resolve header positions once. Throws ConfigError when a required field has no column. */
export function resolveRosterColumns(headers: string[]): RosterColumns {
  const normalized = headers.map(normalizeHeader);
  const columns: RosterColumns = {};
  for (const field of ROSTER_FIELDS) {
    const index = normalized.findIndex((h) => ROSTER_FIELD_ALIASES[field].includes(h));
    if (index !== -1) columns[field] = index;
  }

  const missing = REQUIRED_FIELDS.filter((f) => columns[f] === undefined);
  if (missing.length > 0) {
    const accepted = missing.map((f) => `${f} (${ROSTER_FIELD_ALIASES[f].join(" | ")})`).join(", ");
    throw new ConfigError(`Roster is missing required column(s): ${accepted}`, ["ROSTER_PATH"]);
  }
  return columns;
}

function cell(row: string[], index: number | undefined): string {
  if (index === undefined) return "";
  return (row[index] ?? "").trim();
}

export function parseRoster(text: string): { columns: RosterColumns; entries: RosterEntry[] } {
  const [headers, ...rows] = parseCSV(text);
  if (!headers) throw new ConfigError("Roster is empty", ["ROSTER_PATH"]);
  const columns = resolveRosterColumns(headers);

  const entries: RosterEntry[] = [];
  rows.forEach((row, i) => {
    if (row.every((c) => c.trim() === "")) return;
    const rowNumber = i + 2;
    const subjectId = cell(row, columns.subjectId) || null;
    const username = cell(row, columns.username);
    const fullName = `${cell(row, columns.firstName)} ${cell(row, columns.lastName)}`.trim();
    const displayName = cell(row, columns.displayName) || fullName || username || subjectId || `row-${rowNumber}`;

    entries.push({
      key: `${rowNumber}_${displayName}`,
      rowNumber,
      subjectId,
      displayName,
      refreshToken: cell(row, columns.refreshToken) || null,
    });
  });
  return { columns, entries };
}

/** Roster kept as a CSV export of the roster spreadsheet. */
export class CsvRosterSource implements RosterSource {
  constructor(readonly path: string) {}

  async load(): Promise<RosterEntry[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (error) {
      throw new ConfigError(`Cannot read roster ${this.path}: ${describeError(error)}`, ["ROSTER_PATH"]);
    }
    const { entries } = parseRoster(text);
    console.log(`[Roster] Loaded ${entries.length} athlete(s) from ${this.path}`);
    return entries;
  }

  async writeBack(entry: RosterEntry, update: RosterUpdate): Promise<void> {
    const rows = parseCSV(await readFile(this.path, "utf-8"));
    const headers = rows[0];
    const row = rows[entry.rowNumber - 1];
    if (!headers || !row) {
      throw new Error(`Roster row ${entry.rowNumber} no longer exists`);
    }

    const columns = resolveRosterColumns(headers);
    const set = (field: RosterField, value: string | undefined) => {
      const index = columns[field];
      if (value === undefined || index === undefined) return;
      while (row.length <= index) row.push("");
      row[index] = value;
    };
    set("refreshToken", update.refreshToken);
    set("subjectId", update.subjectId);

    await writeFileAtomic(this.path, formatCSV(rows));
    console.log(`[Roster] Updated row ${entry.rowNumber} (${Object.keys(update).join(", ")})`);
  }
}
