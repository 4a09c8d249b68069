/**
 * @chronovault/runtime — Host-level errors.
 *
 * These are the failures the host itself raises (or hands to programs to
 * raise) that are not specific to any one program: missing signatures,
 * wrong storage ownership, privilege violations, malformed account data.
 */

/** Error codes for host-level failures. */
export type RuntimeErrorCode =
  | "MISSING_REQUIRED_SIGNATURE"
  | "INCORRECT_PROGRAM_ID"
  | "INVALID_ACCOUNT_OWNER"
  | "NOT_ENOUGH_ACCOUNT_KEYS"
  | "INVALID_ACCOUNT_DATA"
  | "INVALID_ARGUMENT"
  | "UNKNOWN_PROGRAM"
  | "READONLY_DATA_MODIFIED"
  | "EXTERNAL_ACCOUNT_DATA_MODIFIED"
  | "PRIVILEGE_ESCALATION"
  | "CALL_DEPTH_EXCEEDED";

/**
 * Structured error from the host runtime.
 * Always thrown, never returned as a value.
 */
export class RuntimeError extends Error {
  public readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string) {
    super(message);
    this.name = "RuntimeError";
    this.code = code;
  }
}

/**
 * Best-effort code extraction for logging.
 * Any thrown value with a string `code` reports it; everything else is
 * reported as INTERNAL_ERROR.
 */
export function errorCodeOf(error: unknown): string {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "INTERNAL_ERROR";
}
