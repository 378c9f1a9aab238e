// ============================================
// Rule Table
// ============================================

import * as path from "node:path";
import { ErrorCode } from "@tripwire/shared";

import { TripwireError } from "../errors/types.js";
import { renderCommand } from "./render.js";
import type { CommandMatch, CommandRule, CommandTable } from "./types.js";

interface CompiledRule {
  rule: CommandRule;
  re?: RegExp;
}

/**
 * Ordered rule list: the first usable rule matching a path wins.
 *
 * @example
 * ```typescript
 * const table = new RuleTable([{ ext: ".txt", run: "echo {file}" }]);
 * table.match("notes.txt")?.command; // "echo notes.txt"
 * ```
 */
export class RuleTable implements CommandTable {
  private readonly rules: CompiledRule[];

  /**
   * @throws TripwireError (CONFIG_INVALID) if a rule's `re` does not compile
   */
  constructor(rules: readonly CommandRule[]) {
    this.rules = rules.filter(isUsable).map(compile);
  }

  /** Number of usable rules. */
  get size(): number {
    return this.rules.length;
  }

  match(file: string): CommandMatch | undefined {
    if (file === "") {
      return undefined;
    }
    for (const { rule, re } of this.rules) {
      if (rule.ext && path.extname(file) !== rule.ext) {
        continue;
      }
      if (re && !re.test(file)) {
        continue;
      }
      return { rule, command: renderCommand(rule.run, file) };
    }
    return undefined;
  }
}

/**
 * Table whose single rule runs `run` for every changed file.
 */
export function oneOffTable(run: string): RuleTable {
  return new RuleTable([{ re: ".", run }]);
}

function isUsable(rule: CommandRule): boolean {
  return rule.run !== "" && Boolean(rule.ext || rule.re);
}

function compile(rule: CommandRule): CompiledRule {
  if (!rule.re) {
    return { rule };
  }
  try {
    return { rule, re: new RegExp(rule.re) };
  } catch (error) {
    throw new TripwireError(`invalid regular expression: ${rule.re}`, ErrorCode.CONFIG_INVALID, {
      cause: error,
      context: { re: rule.re },
    });
  }
}
