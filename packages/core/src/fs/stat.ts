/**
 * Filesystem stat helpers used by the resolver, the notifier and the dispatcher.
 *
 * All helpers are synchronous and never throw: a path that cannot be stat'ed is
 * neither a file nor a directory, and has modification time 0.
 *
 * @module fs/stat
 */

import { type Stats, statSync } from "node:fs";

function statOrUndefined(path: string): Stats | undefined {
  try {
    return statSync(path);
  } catch {
    // ENOENT, EACCES and friends all mean "nothing usable here"
    return undefined;
  }
}

export function isDir(path: string): boolean {
  return statOrUndefined(path)?.isDirectory() ?? false;
}

export function isFile(path: string): boolean {
  return statOrUndefined(path)?.isFile() ?? false;
}

/**
 * Modification time of `path` in epoch milliseconds (fractional), or 0.
 */
export function modifiedTime(path: string): number {
  return statOrUndefined(path)?.mtimeMs ?? 0;
}
