import * as path from "node:path";

/**
 * Lexically clean a path: resolve `.` and `..` segments, collapse repeated
 * separators and drop a trailing separator (except on a filesystem root).
 */
export function cleanPath(p: string): string {
  const normalized = path.normalize(p);
  const root = path.parse(normalized).root;
  if (normalized.length > root.length && normalized.endsWith(path.sep)) {
    return normalized.slice(0, -1);
  }
  return normalized;
}
