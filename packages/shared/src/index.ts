// ============================================
// Tripwire Shared Types
// ============================================

// Error codes
export { ErrorCode } from "./errors/codes.js";
export { type ErrorSeverity, inferSeverity } from "./errors/severity.js";
// Result type (shared so config loading and the CLI agree on one shape)
export type { ErrResult, OkResult, Result } from "./types/result.js";
export { Err, Ok } from "./types/result.js";
