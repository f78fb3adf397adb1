import type { ActivityRecord } from "./records";

export interface LeaderboardOptions {
  /** Only this category (e.g. "Ride"), compared case-insensitively. */
  category?: string;
  /** Inclusive local dates, YYYY-MM-DD. */
  from?: string;
  to?: string;
}

export interface LeaderboardRow {
  subjectId: string | null;
  subjectName: string;
  totalKm: number;
  activities: number;
  /** Kilometres per local date (YYYY-MM-DD). */
  daily: Record<string, number>;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Local calendar day of an activity: the date part of start_date_local, no time zone conversion. */
export function localDay(record: ActivityRecord): string {
  return record.startedAtLocal.slice(0, 10);
}

export function buildLeaderboard(records: ActivityRecord[], options: LeaderboardOptions = {}): LeaderboardRow[] {
  const category = options.category?.toLowerCase();
  const rows = new Map<string, LeaderboardRow>();

  for (const r of records) {
    if (category && r.category.toLowerCase() !== category) continue;
    const day = localDay(r);
    if (options.from && day < options.from) continue;
    if (options.to && day > options.to) continue;

    const key = r.subjectId ?? `name:${r.subjectName}`;
    let row = rows.get(key);
    if (!row) {
      row = { subjectId: r.subjectId, subjectName: r.subjectName, totalKm: 0, activities: 0, daily: {} };
      rows.set(key, row);
    }
    row.totalKm += r.distanceKm;
    row.activities++;
    row.daily[day] = (row.daily[day] ?? 0) + r.distanceKm;
  }

  const board = [...rows.values()].map((row) => ({
    ...row,
    totalKm: round2(row.totalKm),
    daily: Object.fromEntries(
      Object.entries(row.daily)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([day, km]) => [day, round2(km)]),
    ),
  }));

  return board.sort((a, b) => {
    if (b.totalKm !== a.totalKm) return b.totalKm - a.totalKm;
    return a.subjectName < b.subjectName ? -1 : a.subjectName > b.subjectName ? 1 : 0;
  });
}
