export type {
	LedgerEvent,
	LedgerEventType,
	LedgerEventListener,
	EscrowCreatedEvent,
	FundsDepositedEvent,
	FiatMarkedPaidEvent,
	SequentialAddressUpdatedEvent,
	EscrowReleasedEvent,
	EscrowCancelledEvent,
	BondAccountInitializedEvent,
	DisputeOpenedEvent,
	DisputeResponseSubmittedEvent,
	DisputeResolvedEvent,
	DisputeDefaultJudgmentEvent,
} from "./types.js";
export { LedgerEventBus } from "./event-bus.js";
