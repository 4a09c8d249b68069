/**
 * @chronovault/vault — Vault error codes.
 *
 * A closed set. Each code has a stable numeric value so callers can
 * branch on it without parsing messages: retry later on
 * UNLOCK_TIME_NOT_REACHED, give up on ALREADY_WITHDRAWN.
 *
 * Host-level failures (missing signature, wrong storage owner) are
 * RuntimeErrors from @chronovault/runtime, not VaultErrors.
 */

export type VaultErrorCode =
  | "UNLOCK_TIME_NOT_REACHED"
  | "UNAUTHORIZED_WITHDRAWAL"
  | "DEPOSIT_NOT_FOUND"
  | "INVALID_AMOUNT"
  | "ALREADY_WITHDRAWN"
  | "INVALID_UNLOCK_TIME"
  | "REENTRANCY_DETECTED"
  | "INVALID_INSTRUCTION_DATA"
  | "ACCOUNT_ALREADY_IN_USE"
  | "INSUFFICIENT_FUNDS"
  | "MATH_OVERFLOW";

/** Stable numeric value of each code. Never renumber. */
export const VAULT_ERROR_NUMBERS = {
  UNLOCK_TIME_NOT_REACHED: 0,
  UNAUTHORIZED_WITHDRAWAL: 1,
  DEPOSIT_NOT_FOUND: 2,
  INVALID_AMOUNT: 3,
  ALREADY_WITHDRAWN: 4,
  INVALID_UNLOCK_TIME: 5,
  REENTRANCY_DETECTED: 6,
  INVALID_INSTRUCTION_DATA: 7,
  ACCOUNT_ALREADY_IN_USE: 8,
  INSUFFICIENT_FUNDS: 9,
  MATH_OVERFLOW: 10,
} as const satisfies Record<VaultErrorCode, number>;

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly numericCode: number;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
    this.numericCode = VAULT_ERROR_NUMBERS[code];
  }
}

/**
 * Map a numeric code back to its name, e.g. when reading a code
 * reported by another process.
 */
export function vaultErrorCodeOf(numericCode: number): VaultErrorCode | undefined {
  for (const [code, value] of Object.entries(VAULT_ERROR_NUMBERS)) {
    if (value === numericCode && isVaultErrorCode(code)) {
      return code;
    }
  }
  return undefined;
}

function isVaultErrorCode(value: string): value is VaultErrorCode {
  return Object.hasOwn(VAULT_ERROR_NUMBERS, value);
}
