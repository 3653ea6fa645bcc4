/**
 * Escrow module - custodial escrow ledger with a bonded dispute protocol
 */

export type {
	EscrowState,
	EscrowAction,
	SequentialRoute,
	DisputeSubmission,
	DisputeInfo,
	Resolution,
	EscrowPhase,
	EscrowRecord,
	CreateEscrowParams,
	PayoutReason,
	Payout,
	ArbitrationDeadlinePolicy,
} from "./types.js";

export {
	ESCROW_STATE_MACHINE,
	nextEscrowState,
	isFinalState,
	isActiveState,
	getAllowedActions,
} from "./escrow-state-machine.js";

export {
	DEPOSIT_WINDOW_SECONDS,
	FIAT_WINDOW_SECONDS,
	DISPUTE_RESPONSE_WINDOW_SECONDS,
	ARBITRATION_WINDOW_SECONDS,
	isAutoCancelEligible,
} from "./deadlines.js";

export {
	principalRecipient,
	releasePlan,
	refundPlan,
	disputePlan,
	totalTo,
} from "./settlement.js";

export { EscrowLedger, type EscrowLedgerOptions } from "./escrow-ledger.js";
