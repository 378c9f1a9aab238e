/**
 * Glob capability: pattern expansion against the filesystem and pure
 * pattern matching for event paths.
 *
 * @module fs/glob
 */

import { globSync } from "glob";
import picomatch from "picomatch";

import { isDir, isFile } from "./stat.js";

/**
 * Matches of a pattern, split by kind.
 */
export interface GlobMatches {
  /** Regular files, sorted */
  files: string[];
  /** Directories, sorted */
  dirs: string[];
}

/**
 * Pattern expansion and matching, injectable for tests.
 */
export interface Glob {
  /** Expand `pattern` against the filesystem. */
  find(pattern: string): GlobMatches;
  /** Whether `path` matches `pattern`, without touching the filesystem. */
  match(pattern: string, path: string): boolean;
}

/**
 * Convert platform separators to forward slashes for glob libraries.
 */
export function toPosixPath(path: string): string {
  return path.replace(/\\/g, "/");
}

/**
 * Test `path` against `pattern`. `**` crosses directories, `*` does not,
 * dotfiles are matched.
 */
export function globMatch(pattern: string, path: string): boolean {
  return picomatch(toPosixPath(pattern), { dot: true })(toPosixPath(path));
}

/**
 * Filesystem-backed Glob using the `glob` package.
 *
 * @example
 * ```typescript
 * const { files, dirs } = new FsGlob().find("src/**\/*.ts");
 * ```
 */
export class FsGlob implements Glob {
  find(pattern: string): GlobMatches {
    let matches: string[];
    try {
      matches = globSync(toPosixPath(pattern), { dot: true });
    } catch {
      // Malformed patterns expand to nothing
      return { files: [], dirs: [] };
    }

    const files: string[] = [];
    const dirs: string[] = [];
    for (const match of matches) {
      if (isFile(match)) {
        files.push(match);
      } else if (isDir(match)) {
        dirs.push(match);
      }
    }

    return { files: files.sort(), dirs: dirs.sort() };
  }

  match(pattern: string, path: string): boolean {
    return globMatch(pattern, path);
  }
}
