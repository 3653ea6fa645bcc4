/**
 * Custody types
 */

import type { Seed, VaultKind } from "../addressing/derive.js";
import type { Amount } from "../core/amounts.js";
import type { Maybe } from "../core/maybe.js";
import type { Address } from "../core/types.js";

export type AccountKind = "wallet" | VaultKind;

/**
 * A token-holding account.
 *
 * Wallets are owned by the party whose identity is their address. Vaults
 * are owned by the escrow record's derived address and only move funds
 * under a derived signer.
 */
export interface TokenAccount {
	address: Address;
	owner: Address;
	kind: AccountKind;
	/** The escrow record a vault belongs to; none for wallets */
	escrow: Maybe<Address>;
	balance: Amount;
}

/**
 * Authority presented when moving value out of an account.
 *
 * - owner: a party acting on its own wallet
 * - derived: seeds that must re-derive to the vault's owner
 */
export type TransferSigner =
	| { kind: "owner"; address: Address }
	| { kind: "derived"; seeds: Seed[] };
