/**
 * Escrow Types
 *
 * Types specific to the escrow ledger record and its dispute sub-protocol.
 */

import type { Amount } from "../../core/amounts.js";
import type { Maybe } from "../../core/maybe.js";
import type { Address, Hash32, PartyRole, U64Id } from "../../core/types.js";

/**
 * Escrow lifecycle states.
 */
export type EscrowState =
	| "created"
	| "funded"
	| "released"
	| "cancelled"
	| "disputed"
	| "resolved";

/**
 * Escrow actions.
 */
export type EscrowAction =
	| "fund"
	| "mark-fiat-paid"
	| "update-sequential-address"
	| "release"
	| "cancel"
	| "auto-cancel"
	| "open-dispute"
	| "respond-dispute"
	| "resolve-dispute"
	| "default-judgment";

/**
 * Where released principal goes.
 *
 * A sequential escrow forwards principal to a downstream escrow address
 * instead of the buyer; that address may be filled in later by the buyer.
 */
export type SequentialRoute =
	| { kind: "direct" }
	| { kind: "sequential"; next: Maybe<Address> };

/**
 * Bond and evidence posted by one party.
 */
export interface DisputeSubmission {
	evidenceHash: Hash32;
	bond: Amount;
	submittedAt: number;
}

export interface DisputeInfo {
	initiator: PartyRole;
	initiatedAt: number;
	responseDeadline: number;
	/** Set when the respondent posts */
	arbitrationDeadline: Maybe<number>;
	submissions: Record<PartyRole, Maybe<DisputeSubmission>>;
}

export type Resolution =
	| {
			kind: "arbitrated";
			winner: PartyRole;
			explanationHash: Hash32;
			resolvedAt: number;
	  }
	| {
			kind: "default-judgment";
			winner: PartyRole;
			resolvedAt: number;
	  };

/**
 * Per-state data. Dispute fields only exist in the states that use them.
 */
export type EscrowPhase =
	| { state: "created" }
	| { state: "funded" }
	| { state: "released" }
	| { state: "cancelled"; automatic: boolean }
	| { state: "disputed"; dispute: DisputeInfo }
	| { state: "resolved"; dispute: DisputeInfo; resolution: Resolution };

export interface EscrowRecord {
	/** Derived from (escrowId, tradeId) */
	address: Address;
	escrowId: U64Id;
	tradeId: U64Id;

	seller: Address;
	buyer: Address;
	arbitrator: Address;

	/** Principal, 6 implied decimals */
	amount: Amount;
	/** 1% of amount, fixed at creation */
	fee: Amount;

	/** Unix seconds */
	depositDeadline: number;
	/** Unix seconds; 0 until funded */
	fiatDeadline: number;

	sequential: SequentialRoute;
	fiatPaid: boolean;

	/** Incremented on every value-moving transition */
	counter: number;
	/** What the principal vault should hold */
	trackedBalance: Amount;

	createdAt: number;
	updatedAt: number;

	phase: EscrowPhase;
}

/**
 * Input for creating an escrow.
 */
export interface CreateEscrowParams {
	escrowId: U64Id;
	tradeId: U64Id;
	buyer: Address;
	amount: Amount;
	sequential: boolean;
	sequentialAddress?: Address;
}

export type PayoutReason = "principal" | "fee" | "bond" | "refund";

/**
 * A single movement out of a vault.
 */
export interface Payout {
	from: Address;
	to: Address;
	amount: Amount;
	reason: PayoutReason;
}

export type ArbitrationDeadlinePolicy = "warn" | "enforce";
