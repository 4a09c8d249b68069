/**
 * Token Types
 *
 * Balance records held by the ledger service on behalf of an owner.
 */

import type { Address } from "./identity.js";

/**
 * A balance of a single asset type held for one owner.
 */
export interface TokenAccount {
  /** Asset type this balance is denominated in */
  readonly mint: Address;

  /** Identity allowed to authorize outgoing transfers */
  readonly owner: Address;

  /** Units held (u64) */
  readonly amount: bigint;
}
