/**
 * Settlement plans
 *
 * Pure functions computing which vault pays whom when an escrow reaches a
 * terminal state. Every plan drains the vaults it touches exactly.
 */

import type { EscrowAddresses } from "../../addressing/derive.js";
import { bondVaultKind } from "../../addressing/derive.js";
import { checkedAdd } from "../../core/amounts.js";
import { LedgerError } from "../../core/errors.js";
import type { Address, PartyRole } from "../../core/types.js";
import type { DisputeInfo, EscrowRecord, Payout } from "./types.js";

/**
 * The buyer, or the downstream escrow for a sequential trade.
 */
export function principalRecipient(record: EscrowRecord): Address {
	const route = record.sequential;
	if (route.kind === "direct") return record.buyer;
	if (route.next.kind === "none") {
		throw new LedgerError(
			"MISSING_SEQUENTIAL_ADDRESS",
			"Sequential escrow has no forwarding address",
			{ escrow: record.address },
		);
	}
	return route.next.value;
}

export function partyAddress(record: EscrowRecord, role: PartyRole): Address {
	return role === "buyer" ? record.buyer : record.seller;
}

export function bondVaultAddress(
	vaults: EscrowAddresses,
	role: PartyRole,
): Address {
	return bondVaultKind(role) === "buyer-bond-vault"
		? vaults.buyerBondVault
		: vaults.sellerBondVault;
}

/**
 * Fee to the arbitrator, principal to the buyer side.
 */
export function releasePlan(
	record: EscrowRecord,
	vaults: EscrowAddresses,
): Payout[] {
	return nonZero([
		{
			from: vaults.principalVault,
			to: record.arbitrator,
			amount: record.fee,
			reason: "fee",
		},
		{
			from: vaults.principalVault,
			to: principalRecipient(record),
			amount: record.amount,
			reason: "principal",
		},
	]);
}

/**
 * Everything in the principal vault back to the seller.
 */
export function refundPlan(
	record: EscrowRecord,
	vaults: EscrowAddresses,
): Payout[] {
	return nonZero([
		{
			from: vaults.principalVault,
			to: record.seller,
			amount: checkedAdd(record.amount, record.fee),
			reason: "refund",
		},
	]);
}

/**
 * Principal vault and every posted bond after a dispute.
 *
 * Buyer wins: fee to the arbitrator, principal to the buyer side.
 * Seller wins: principal and fee to the seller.
 * A posted bond returns to its poster if they won, else goes to the
 * arbitrator.
 */
export function disputePlan(
	record: EscrowRecord,
	dispute: DisputeInfo,
	winner: PartyRole,
	vaults: EscrowAddresses,
): Payout[] {
	const payouts: Payout[] =
		winner === "buyer"
			? releasePlan(record, vaults)
			: [
					{
						from: vaults.principalVault,
						to: record.seller,
						amount: record.amount,
						reason: "principal",
					},
					{
						from: vaults.principalVault,
						to: record.seller,
						amount: record.fee,
						reason: "fee",
					},
				];

	for (const role of ["buyer", "seller"] as const) {
		const submission = dispute.submissions[role];
		if (submission.kind === "none") continue;
		payouts.push({
			from: bondVaultAddress(vaults, role),
			to: role === winner ? partyAddress(record, role) : record.arbitrator,
			amount: submission.value.bond,
			reason: "bond",
		});
	}

	return nonZero(payouts);
}

/**
 * Total paid to `address` by a plan.
 */
export function totalTo(payouts: Payout[], address: Address): bigint {
	return payouts
		.filter((p) => p.to === address)
		.reduce((sum, p) => checkedAdd(sum, p.amount), 0n);
}

function nonZero(payouts: Payout[]): Payout[] {
	return payouts.filter((p) => p.amount > 0n);
}
