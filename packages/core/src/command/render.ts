import * as path from "node:path";

/** `{{name}}` or `{name}`, with optional spaces inside double braces */
const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}|\{(\w+)\}/g;

/**
 * Values a command template can refer to, for `file`.
 *
 * | Placeholder | `src/app/main.ts` |
 * |-------------|-------------------|
 * | file        | src/app/main.ts   |
 * | ext         | .ts               |
 * | base        | main.ts           |
 * | base0       | main              |
 * | dir         | src/app           |
 * | abs         | /work/src/app/main.ts |
 */
export function placeholderValues(file: string): Record<string, string> {
  const ext = path.extname(file);
  const base = path.basename(file);
  return {
    file,
    ext,
    base,
    base0: base.slice(0, base.length - ext.length),
    dir: path.dirname(file),
    abs: path.resolve(file),
  };
}

/**
 * Substitute placeholders in `template` for `file`. Unknown placeholders are
 * left untouched.
 *
 * @example
 * ```typescript
 * renderCommand('go run "{{file}}"', "cmd/main.go"); // 'go run "cmd/main.go"'
 * renderCommand("echo {base0}", "notes.txt");        // "echo notes"
 * ```
 */
export function renderCommand(template: string, file: string): string {
  const values = placeholderValues(file);
  return template.replace(PLACEHOLDER, (match, double: string | undefined, single: string | undefined) => {
    const key = double ?? single;
    if (key === undefined) {
      return match;
    }
    return Object.hasOwn(values, key) ? (values[key] ?? match) : match;
  });
}
