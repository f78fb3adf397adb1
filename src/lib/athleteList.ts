/**
 * Plain-text list of athlete ids to sync out of rotation, one per line.
 * Blank lines and lines starting with '#' are ignored; anything after the
 * first comma or space on a line is a note.
 */

function idOnLine(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  return trimmed.split(/[\s,]+/)[0] || null;
}

export function parseAthleteIdList(text: string): string[] {
  const ids: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const id = idOnLine(line);
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

/** The list without the lines for `done`; comments and the remaining ids keep their order. */
export function removeFromAthleteIdList(text: string, done: ReadonlySet<string>): string {
  const kept = text.split(/\r?\n/).filter((line) => {
    if (line.trim().startsWith("#")) return true;
    const id = idOnLine(line);
    return id !== null && !done.has(id);
  });
  return kept.length > 0 ? `${kept.join("\n")}\n` : "";
}
