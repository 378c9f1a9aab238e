/**
 * One entry of the command table. A rule is usable only when `run` is
 * non-empty and at least one of `ext` / `re` is set; when both are set both
 * must match.
 */
export interface CommandRule {
  /** File extension including the dot, compared exactly (".ts") */
  ext?: string;
  /** Regular expression tested against the event path */
  re?: string;
  /** Command template, see {@link renderCommand} */
  run: string;
}

/**
 * The rule a path matched and the command rendered for it.
 */
export interface CommandMatch {
  rule: CommandRule;
  command: string;
}

/**
 * Maps a changed file to the shell command to run for it.
 */
export interface CommandTable {
  match(path: string): CommandMatch | undefined;
}
