/**
 * Expansion of user patterns into the set of directories to watch.
 *
 * @module watch/resolver
 */

import * as path from "node:path";

import { FsGlob, type Glob } from "../fs/glob.js";
import { cleanPath } from "../fs/path.js";
import { isDir } from "../fs/stat.js";
import { OrderedSet } from "../utils/ordered-set.js";

/** A path segment containing any of these is a glob, not a literal name. */
const GLOB_SEGMENT = /[*?[{\\]/;

/**
 * Longest leading run of literal segments of `dir`, if it is an existing
 * directory. A relative pattern whose first segment is already a glob falls
 * back to the current directory.
 *
 * @example
 * ```typescript
 * findRealDirectory("src/**");      // "src" when src/ exists
 * findRealDirectory("src/{a,b}/x"); // "src"
 * findRealDirectory("**");          // "."
 * ```
 */
export function findRealDirectory(dir: string): string | undefined {
  const segments = cleanPath(dir).split(path.sep);
  const literal: string[] = [];
  for (const segment of segments) {
    if (GLOB_SEGMENT.test(segment)) {
      break;
    }
    literal.push(segment);
  }

  let candidate: string;
  if (literal.length === 0) {
    candidate = ".";
  } else if (literal.length === 1 && literal[0] === "") {
    candidate = path.sep;
  } else {
    candidate = literal.join(path.sep);
  }

  return isDir(candidate) ? candidate : undefined;
}

/**
 * Resolve `patterns` into an ordered, duplicate-free list of directories.
 *
 * For each pattern, in order: the literal prefix of its parent directory,
 * the directories it matches (and those holding files it matches), then the
 * directories its parent pattern matches. Resolution stops as soon as the set
 * grows past `maxDirs`, so a result longer than `maxDirs` means "too many".
 */
export function resolveWatchDirectories(
  patterns: readonly string[],
  maxDirs: number,
  glob: Glob = new FsGlob()
): string[] {
  const targets = new OrderedSet();
  const exceeded = (): boolean => targets.size > maxDirs;

  for (const pattern of patterns) {
    const parent = path.dirname(pattern);

    const real = findRealDirectory(parent);
    if (real !== undefined) {
      targets.add(real);
    }
    if (exceeded()) {
      return targets.toArray();
    }

    const matches = glob.find(pattern);
    for (const dir of matches.dirs) {
      targets.add(cleanPath(dir));
    }
    for (const file of matches.files) {
      targets.add(cleanPath(path.dirname(file)));
    }
    if (exceeded()) {
      return targets.toArray();
    }

    for (const dir of glob.find(parent).dirs) {
      targets.add(cleanPath(dir));
    }
    if (exceeded()) {
      return targets.toArray();
    }
  }

  return targets.toArray();
}
