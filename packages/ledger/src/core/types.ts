/**
 * Core types for the escrow ledger
 */

import { isHexOfLength } from "../utils/encoding.js";
import { LedgerError } from "./errors.js";

/**
 * A 32-byte identity rendered as 64 lowercase hex characters.
 *
 * Parties are x-only secp256k1 public keys; custody accounts and escrow
 * records have derived addresses of the same width.
 */
export type Address = string;

/** A 32-byte content hash rendered as 64 lowercase hex characters. */
export type Hash32 = string;

/** Caller-chosen unsigned 64-bit identifier. */
export type U64Id = bigint;

export const U64_ID_MAX: U64Id = (1n << 64n) - 1n;

export type PartyRole = "buyer" | "seller";

export function otherRole(role: PartyRole): PartyRole {
	return role === "buyer" ? "seller" : "buyer";
}

export function validateAddress(value: string, field = "address"): Address {
	if (!isHexOfLength(value, 32)) {
		throw new LedgerError(
			"INVALID_ADDRESS",
			`Invalid ${field}: expected 32 bytes as hex`,
			{ field, value },
		);
	}
	return value.toLowerCase();
}

/**
 * Only the byte length is checked. Entropy or repetition rules are not
 * applied to evidence and explanation hashes.
 */
export function validateHash32(value: string, field = "hash"): Hash32 {
	if (!isHexOfLength(value, 32)) {
		throw new LedgerError(
			"INVALID_HASH",
			`Invalid ${field}: expected a 32-byte hash as hex`,
			{ field, value },
		);
	}
	return value.toLowerCase();
}

export function validateU64Id(value: bigint, field: string): U64Id {
	if (value < 0n || value > U64_ID_MAX) {
		throw new LedgerError(
			"INVALID_IDENTIFIER",
			`Invalid ${field}: must fit in an unsigned 64-bit integer`,
			{ field, value: value.toString() },
		);
	}
	return value;
}
