import fs from "fs/promises";
import path from "path";

/**
 * Picks the lexicographically greatest name carrying the prefix and extension.
 * Stage outputs embed zero-padded timestamps, so this is also the newest one.
 */
export function selectLatestFile(
  fileNames: readonly string[],
  prefix: string,
  extension: string
): string | null {
  const matching = fileNames
    .filter(name => name.startsWith(prefix) && name.endsWith(extension))
    .sort();

  return matching.length ? matching[matching.length - 1] : null;
}

export async function findLatestFile(
  dir: string,
  prefix: string,
  extension: string
): Promise<string | null> {
  let entries: string[];

  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (isMissingPath(err)) return null;
    throw err;
  }

  const latest = selectLatestFile(entries, prefix, extension);
  return latest ? path.join(dir, latest) : null;
}

// fs errors may come from another realm (e.g. under Jest), so match on the code only
function isMissingPath(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
