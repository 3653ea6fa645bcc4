/**
 * Deterministic addressing
 *
 * Every escrow record and custody vault lives at an address derived from a
 * fixed tag plus public identifiers. Anyone can recompute them; nobody holds
 * a private key for them.
 */

import { sha256 } from "@noble/hashes/sha2";
import { LedgerError } from "../core/errors.js";
import { type Address, type PartyRole, validateU64Id } from "../core/types.js";
import {
	bytesToHex,
	concatBytes,
	hexToBytes,
	stringToBytes,
} from "../utils/encoding.js";

export type Seed = Uint8Array;

export const MAX_SEED_LENGTH = 32;
export const MAX_SEEDS = 16;
export const DERIVATION_MARKER = "ProgramDerivedAddress";

export const SEED_TAGS = {
	escrow: "escrow",
	principalVault: "escrow_token",
	buyerBondVault: "buyer_bond",
	sellerBondVault: "seller_bond",
} as const;

export type VaultKind = "principal-vault" | "buyer-bond-vault" | "seller-bond-vault";

const VAULT_TAGS: Record<VaultKind, string> = {
	"principal-vault": SEED_TAGS.principalVault,
	"buyer-bond-vault": SEED_TAGS.buyerBondVault,
	"seller-bond-vault": SEED_TAGS.sellerBondVault,
};

/**
 * Derive an address from seeds under a program id.
 *
 * sha256(len(s0) ‖ s0 ‖ … ‖ len(sn) ‖ sn ‖ programId ‖ marker)
 *
 * Each seed is prefixed with its one-byte length so that distinct seed
 * tuples never share a preimage.
 */
export function deriveAddress(programId: Address, seeds: Seed[]): Address {
	if (seeds.length > MAX_SEEDS) {
		throw new LedgerError(
			"INVALID_SEEDS",
			`Too many seeds: ${seeds.length} > ${MAX_SEEDS}`,
		);
	}
	const parts: Uint8Array[] = [];
	for (const seed of seeds) {
		if (seed.length > MAX_SEED_LENGTH) {
			throw new LedgerError(
				"INVALID_SEEDS",
				`Seed too long: ${seed.length} > ${MAX_SEED_LENGTH}`,
			);
		}
		parts.push(Uint8Array.of(seed.length), seed);
	}
	parts.push(hexToBytes(programId), stringToBytes(DERIVATION_MARKER));
	return bytesToHex(sha256(concatBytes(...parts)));
}

/**
 * Encode an unsigned 64-bit identifier as 8 little-endian bytes.
 */
export function encodeU64LE(value: bigint): Uint8Array {
	const bytes = new Uint8Array(8);
	new DataView(bytes.buffer).setBigUint64(0, validateU64Id(value, "id"), true);
	return bytes;
}

export function escrowSeeds(escrowId: bigint, tradeId: bigint): Seed[] {
	return [
		stringToBytes(SEED_TAGS.escrow),
		encodeU64LE(escrowId),
		encodeU64LE(tradeId),
	];
}

export function vaultSeeds(kind: VaultKind, record: Address): Seed[] {
	return [stringToBytes(VAULT_TAGS[kind]), hexToBytes(record)];
}

export function bondVaultKind(role: PartyRole): VaultKind {
	return role === "buyer" ? "buyer-bond-vault" : "seller-bond-vault";
}

export function deriveEscrowAddress(
	programId: Address,
	escrowId: bigint,
	tradeId: bigint,
): Address {
	return deriveAddress(programId, escrowSeeds(escrowId, tradeId));
}

export function deriveVaultAddress(
	programId: Address,
	kind: VaultKind,
	record: Address,
): Address {
	return deriveAddress(programId, vaultSeeds(kind, record));
}

export interface EscrowAddresses {
	record: Address;
	principalVault: Address;
	buyerBondVault: Address;
	sellerBondVault: Address;
}

export function deriveEscrowAddresses(
	programId: Address,
	escrowId: bigint,
	tradeId: bigint,
): EscrowAddresses {
	const record = deriveEscrowAddress(programId, escrowId, tradeId);
	return {
		record,
		principalVault: deriveVaultAddress(programId, "principal-vault", record),
		buyerBondVault: deriveVaultAddress(programId, "buyer-bond-vault", record),
		sellerBondVault: deriveVaultAddress(programId, "seller-bond-vault", record),
	};
}
