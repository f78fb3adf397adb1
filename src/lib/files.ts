import { chmod, mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { describeError, PersistenceError } from "./errors";

export interface AtomicWriteOptions {
  /** Permission bits for the file. Defaults to those of the file being replaced. */
  mode?: number;
}

/**
 * Write to a sibling temp file, then rename over the target. A reader sees the
 * old file or the new one, never a partial write. On failure the temp file is
 * removed and the previous contents stay in place.
 */
export async function writeFileAtomic(path: string, contents: string, options: AtomicWriteOptions = {}): Promise<void> {
  const tmp = `${path}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    const mode = options.mode ?? (await existingMode(path));
    await writeFile(tmp, contents, { encoding: "utf-8", mode });
    // The creation mode is masked by the umask and ignored for a leftover temp file.
    if (mode !== undefined) await chmod(tmp, mode);
    await rename(tmp, path);
  } catch (error) {
    await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
      console.warn(`[Files] Could not remove ${tmp}:`, describeError(cleanupError));
    });
    throw new PersistenceError(path, { cause: error });
  }
}

async function existingMode(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mode & 0o777;
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
}

/** File contents, or null when the file does not exist. Other read errors propagate. */
export async function readFileIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
