import { z } from "zod";

// ============================================
// Command Rule Schema
// ============================================

function compiles(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export const CommandRuleSchema = z.object({
  ext: z.string().optional(),
  re: z
    .string()
    .optional()
    .refine((re) => re === undefined || compiles(re), { message: "Invalid regular expression" }),
  run: z.string(),
});

// ============================================
// Root Configuration Schema
// ============================================

/**
 * Complete tripwire configuration file.
 */
export const ConfigSchema = z.object({
  commands: z.array(CommandRuleSchema).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
