import { entriesForAthlete, subjectEntry, type Checkpoint } from "../lib/checkpoint";
import { parseCSV } from "../lib/csv";

export interface SeedResult {
  added: number;
  updated: number;
  skipped: number;
}

function isHeader(firstCell: string): boolean {
  const cell = firstCell.trim().toLowerCase();
  return cell.startsWith("athlete") || cell.startsWith("id");
}

/**
 * Add or refresh checkpoint entries from `athlete_id,refresh_token[,name]` lines.
 * An athlete already in the checkpoint is updated in place, in every entry
 * that carries its id; a new one is keyed by its athlete id. seeded_at is
 * only ever set once.
 */
export function seedCheckpoint(csvText: string, checkpoint: Checkpoint, now: Date): SeedResult {
  const result: SeedResult = { added: 0, updated: 0, skipped: 0 };

  parseCSV(csvText).forEach((row, i) => {
    const line = i + 1;
    if (row.every((c) => c.trim() === "")) return;
    if (line === 1 && isHeader(row[0] ?? "")) return;

    if (row.length < 2) {
      console.warn(`[Seed] Skipping line ${line}: expected athlete_id,refresh_token[,name]`);
      result.skipped++;
      return;
    }
    const athleteId = (row[0] ?? "").trim();
    const refreshToken = (row[1] ?? "").trim();
    const name = (row[2] ?? "").trim();
    if (!athleteId || !refreshToken) {
      console.warn(`[Seed] Skipping line ${line}: empty athlete_id or refresh_token`);
      result.skipped++;
      return;
    }

    const existing = entriesForAthlete(checkpoint, athleteId).map((m) => m.entry);
    if (existing.length > 0) result.updated++;
    else result.added++;

    for (const entry of existing.length > 0 ? existing : [subjectEntry(checkpoint, athleteId)]) {
      entry.refresh_token = refreshToken;
      entry.athlete_id = athleteId;
      if (name) entry.name = name;
      if (!entry.seeded_at) entry.seeded_at = now.toISOString();
    }
  });

  return result;
}
