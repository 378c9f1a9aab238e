// ============================================
// Tripwire Errors - Barrel Export
// ============================================

export { ErrorCode, type ErrorSeverity, inferSeverity } from "@tripwire/shared";
export {
  isTooManyTargetsError,
  isTripwireError,
  ProcessError,
  type ProcessErrorDetails,
  toError,
  TooManyTargetsError,
  TripwireError,
  type TripwireErrorOptions,
} from "./types.js";
