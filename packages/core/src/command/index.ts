export { placeholderValues, renderCommand } from "./render.js";
export { oneOffTable, RuleTable } from "./table.js";
export type { CommandMatch, CommandRule, CommandTable } from "./types.js";
