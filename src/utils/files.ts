import { readdir } from "node:fs/promises";
import path from "node:path";

/** Convert a shell-style wildcard (`*`, `?`) file name pattern to an anchored RegExp. */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("")
    .map((ch) => {
      if (ch === "*") return "[^/]*";
      if (ch === "?") return "[^/]";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`);
}

/**
 * Find the first file (alphabetically) matching `pattern` relative to `baseDir`.
 * Wildcards are only honoured in the last path segment. Returns an absolute
 * path, or null when nothing matches or the directory is unreadable.
 */
export async function findMatchingFile(baseDir: string, pattern: string): Promise<string | null> {
  const resolved = path.resolve(baseDir, pattern);
  const dir = path.dirname(resolved);
  const matcher = wildcardToRegExp(path.basename(resolved));

  let entries: string[];
  try {
    const dirents = await readdir(dir, { withFileTypes: true });
    entries = dirents.filter((d) => d.isFile() || d.isSymbolicLink()).map((d) => d.name);
  } catch {
    // Missing or unreadable directory counts as no match
    return null;
  }

  const match = entries.filter((name) => matcher.test(name)).sort()[0];
  return match ? path.join(dir, match) : null;
}
