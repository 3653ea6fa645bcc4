import type { LedgerEvent, LedgerEventType } from "@stablecoin-escrow/ledger";

export const ESCROW_EVENT_PREFIX = "escrow";
export const ESCROW_EVENT_WILDCARD = `${ESCROW_EVENT_PREFIX}.*`;

export const ESCROW_EVENT_IDS = {
	EscrowCreated: "escrow.created",
	FundsDeposited: "escrow.funded",
	FiatMarkedPaid: "escrow.fiat-paid",
	SequentialAddressUpdated: "escrow.sequential-address-updated",
	EscrowReleased: "escrow.released",
	EscrowCancelled: "escrow.cancelled",
	BondAccountInitialized: "escrow.bond-account-initialized",
	DisputeOpened: "escrow.dispute-opened",
	DisputeResponseSubmitted: "escrow.dispute-responded",
	DisputeResolved: "escrow.dispute-resolved",
	DisputeDefaultJudgment: "escrow.default-judgment",
} as const satisfies Record<LedgerEventType, `${typeof ESCROW_EVENT_PREFIX}.${string}`>;

export type EscrowEventId = (typeof ESCROW_EVENT_IDS)[LedgerEventType];

export type EscrowEventEnvelope = {
	eventId: string;
	name: EscrowEventId;
	escrowAddress: string;
	emittedAt: string; // ISO timestamp
	event: LedgerEvent;
};
