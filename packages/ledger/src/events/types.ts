/**
 * Ledger events
 *
 * One event is published per state-changing operation, after the operation
 * has committed.
 */

import type { Amount } from "../core/amounts.js";
import type { Address, Hash32, PartyRole, U64Id } from "../core/types.js";
import type { Payout } from "../modules/escrow/types.js";

interface EscrowEventBase {
	escrowAddress: Address;
	escrowId: U64Id;
	tradeId: U64Id;
	/** The record's counter after the operation */
	counter: number;
	/** Unix seconds */
	timestamp: number;
}

export interface EscrowCreatedEvent extends EscrowEventBase {
	type: "EscrowCreated";
	seller: Address;
	buyer: Address;
	amount: Amount;
	fee: Amount;
	sequential: boolean;
	depositDeadline: number;
}

export interface FundsDepositedEvent extends EscrowEventBase {
	type: "FundsDeposited";
	seller: Address;
	vault: Address;
	amount: Amount;
	fee: Amount;
	fiatDeadline: number;
}

export interface FiatMarkedPaidEvent extends EscrowEventBase {
	type: "FiatMarkedPaid";
	buyer: Address;
}

export interface SequentialAddressUpdatedEvent extends EscrowEventBase {
	type: "SequentialAddressUpdated";
	sequentialAddress: Address;
}

export interface EscrowReleasedEvent extends EscrowEventBase {
	type: "EscrowReleased";
	releasedBy: Address;
	recipient: Address;
	payouts: Payout[];
}

export interface EscrowCancelledEvent extends EscrowEventBase {
	type: "EscrowCancelled";
	cancelledBy: Address;
	automatic: boolean;
	refunded: Amount;
}

export interface BondAccountInitializedEvent extends EscrowEventBase {
	type: "BondAccountInitialized";
	role: PartyRole;
	vault: Address;
}

export interface DisputeOpenedEvent extends EscrowEventBase {
	type: "DisputeOpened";
	initiator: PartyRole;
	party: Address;
	evidenceHash: Hash32;
	bond: Amount;
	responseDeadline: number;
}

export interface DisputeResponseSubmittedEvent extends EscrowEventBase {
	type: "DisputeResponseSubmitted";
	respondent: PartyRole;
	party: Address;
	evidenceHash: Hash32;
	bond: Amount;
	arbitrationDeadline: number;
}

export interface DisputeResolvedEvent extends EscrowEventBase {
	type: "DisputeResolved";
	winner: PartyRole;
	explanationHash: Hash32;
	payouts: Payout[];
}

export interface DisputeDefaultJudgmentEvent extends EscrowEventBase {
	type: "DisputeDefaultJudgment";
	winner: PartyRole;
	payouts: Payout[];
}

export type LedgerEvent =
	| EscrowCreatedEvent
	| FundsDepositedEvent
	| FiatMarkedPaidEvent
	| SequentialAddressUpdatedEvent
	| EscrowReleasedEvent
	| EscrowCancelledEvent
	| BondAccountInitializedEvent
	| DisputeOpenedEvent
	| DisputeResponseSubmittedEvent
	| DisputeResolvedEvent
	| DisputeDefaultJudgmentEvent;

export type LedgerEventType = LedgerEvent["type"];

export type LedgerEventListener = (event: LedgerEvent) => void;
