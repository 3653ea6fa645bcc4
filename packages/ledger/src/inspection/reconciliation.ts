/**
 * Reconciliation
 *
 * Recomputes an escrow's vault addresses from its public identifiers and
 * compares each vault's actual balance with the ledger's own accounting.
 * Any mismatch is a defect in transfer or accounting logic.
 */

import {
	type VaultKind,
	deriveEscrowAddresses,
} from "../addressing/derive.js";
import { type Amount, checkedAdd } from "../core/amounts.js";
import { LedgerError } from "../core/errors.js";
import type { Address, U64Id } from "../core/types.js";
import type { EscrowRecord, EscrowState } from "../modules/escrow/types.js";
import type { LedgerStorage } from "../storage/types.js";

export interface VaultReport {
	kind: VaultKind;
	address: Address;
	status: "open" | "closed";
	balance: Amount;
	expected: Amount;
	mismatch: boolean;
}

export interface EscrowInspection {
	address: Address;
	escrowId: U64Id;
	tradeId: U64Id;
	state: EscrowState;
	counter: number;
	trackedBalance: Amount;
	/** The stored address re-derives from (escrowId, tradeId) */
	addressMatches: boolean;
	vaults: VaultReport[];
	/** Sum of all vault balances */
	lockedFunds: Amount;
	mismatch: boolean;
}

/**
 * What each vault should hold according to the record alone.
 */
export function expectedVaultBalances(
	record: EscrowRecord,
): Record<VaultKind, Amount> {
	const expected: Record<VaultKind, Amount> = {
		"principal-vault": record.trackedBalance,
		"buyer-bond-vault": 0n,
		"seller-bond-vault": 0n,
	};
	if (record.phase.state === "disputed") {
		const { buyer, seller } = record.phase.dispute.submissions;
		if (buyer.kind === "some") expected["buyer-bond-vault"] = buyer.value.bond;
		if (seller.kind === "some") expected["seller-bond-vault"] = seller.value.bond;
	}
	return expected;
}

export async function inspectEscrow(
	storage: LedgerStorage,
	programId: Address,
	address: Address,
): Promise<EscrowInspection> {
	const record = await storage.loadEscrow(address);
	if (!record) {
		throw new LedgerError("ESCROW_NOT_FOUND", `Escrow ${address} not found`, {
			address,
		});
	}

	const derived = deriveEscrowAddresses(
		programId,
		record.escrowId,
		record.tradeId,
	);
	const expected = expectedVaultBalances(record);
	const layout: Array<[VaultKind, Address]> = [
		["principal-vault", derived.principalVault],
		["buyer-bond-vault", derived.buyerBondVault],
		["seller-bond-vault", derived.sellerBondVault],
	];

	const vaults: VaultReport[] = [];
	let lockedFunds: Amount = 0n;
	for (const [kind, vaultAddress] of layout) {
		const account = await storage.loadAccount(vaultAddress);
		const balance = account?.balance ?? 0n;
		lockedFunds = checkedAdd(lockedFunds, balance);
		vaults.push({
			kind,
			address: vaultAddress,
			status: account ? "open" : "closed",
			balance,
			expected: expected[kind],
			mismatch: balance !== expected[kind],
		});
	}

	const addressMatches = derived.record === record.address;

	return {
		address: record.address,
		escrowId: record.escrowId,
		tradeId: record.tradeId,
		state: record.phase.state,
		counter: record.counter,
		trackedBalance: record.trackedBalance,
		addressMatches,
		vaults,
		lockedFunds,
		mismatch: !addressMatches || vaults.some((v) => v.mismatch),
	};
}
